// src/models/GraphNode.ts
import mongoose, { Schema } from 'mongoose';
import { GraphView, NODE_LABELS, NodeLabel } from '../types/graph';

export interface IGraphNode {
  nodeId: string;
  label: NodeLabel;
  name?: string;
  category?: string;
  view: GraphView;
  properties: Record<string, unknown>;
}

const GraphNodeSchema = new Schema<IGraphNode>(
  {
    nodeId: { type: String, required: true, unique: true },
    label: { type: String, enum: [...NODE_LABELS], required: true },
    name: { type: String },
    category: { type: String },
    view: {
      type: String,
      enum: ['document', 'asset', 'people', 'temporal'],
      required: true
    },
    properties: { type: Schema.Types.Mixed, default: {} },
  },
  {
    timestamps: true,
    collection: 'graph_nodes'
  }
);

// Entity recognition lists named nodes by label
GraphNodeSchema.index({ label: 1, name: 1 });

export const GraphNode = mongoose.model<IGraphNode>('GraphNode', GraphNodeSchema);
