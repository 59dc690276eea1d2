// src/models/GraphEdge.ts
import mongoose, { Schema } from 'mongoose';
import { GraphView, RELATIONS, Relation } from '../types/graph';

export interface IGraphEdge {
  from: string;
  to: string;
  relation: Relation;
  view: GraphView;
}

const GraphEdgeSchema = new Schema<IGraphEdge>(
  {
    from: { type: String, required: true },
    to: { type: String, required: true },
    relation: { type: String, enum: [...RELATIONS], required: true },
    view: {
      type: String,
      enum: ['document', 'asset', 'people', 'temporal'],
      required: true
    },
  },
  {
    timestamps: true,
    collection: 'graph_edges'
  }
);

// One index per hop direction
GraphEdgeSchema.index({ from: 1, relation: 1 });
GraphEdgeSchema.index({ to: 1, relation: 1 });

export const GraphEdge = mongoose.model<IGraphEdge>('GraphEdge', GraphEdgeSchema);
