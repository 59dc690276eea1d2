import mongoose from 'mongoose';
import { logger } from '../core/logger';
import { GraphUnavailableError, PipelineAbortedError, errorMessage } from '../core/errors';
import { GraphEdge, GraphNode as GraphNodeModel } from '../models';
import { IGraphNode } from '../models/GraphNode';
import { CallOptions, GraphStore } from '../types/capabilities';
import { GraphEdgeRef, GraphNeighbor, GraphNode, GraphStats, HopRequest, Neighborhood, NodeLabel } from '../types/graph';

function toGraphNode(doc: IGraphNode): GraphNode {
  return {
    id: doc.nodeId,
    label: doc.label,
    name: doc.name || undefined,
    category: doc.category || undefined,
    view: doc.view,
  };
}

function assertNotAborted(options: CallOptions, label: string): void {
  if (options.signal?.aborted) {
    throw new PipelineAbortedError(`Aborted before ${label}`);
  }
}

/**
 * Entity graph stored as `graph_nodes` / `graph_edges` and walked one hop
 * per query. Results are ordered by insertion so traversals are repeatable.
 */
export class MongoGraphStore implements GraphStore {
  async findEntities(labels: readonly NodeLabel[], options: CallOptions = {}): Promise<GraphNode[]> {
    assertNotAborted(options, 'entity lookup');

    const docs = await GraphNodeModel.find({
      label: { $in: [...labels] },
      name: { $exists: true, $ne: '' },
    })
      .sort({ _id: 1 })
      .lean();

    return docs.map(toGraphNode);
  }

  async hop(request: HopRequest, options: CallOptions = {}): Promise<GraphNeighbor[]> {
    const { fromIds, relation, direction, targetLabel, limit } = request;

    if (fromIds.length === 0) {
      return [];
    }
    assertNotAborted(options, 'graph hop');

    logger.debug('Executing hop', {
      relation,
      direction,
      targetLabel,
      sourceIdsCount: fromIds.length,
    });

    const sourceField = direction === 'out' ? 'from' : 'to';
    const edges = await GraphEdge.find({ [sourceField]: { $in: fromIds }, relation })
      .sort({ _id: 1 })
      .lean();

    const targetIds = [...new Set(edges.map(edge => (direction === 'out' ? edge.to : edge.from)))];
    if (targetIds.length === 0) {
      return [];
    }
    assertNotAborted(options, 'graph hop');

    const targets = await GraphNodeModel.find({ nodeId: { $in: targetIds }, label: targetLabel }).lean();
    const byId = new Map(targets.map(doc => [doc.nodeId, toGraphNode(doc)]));

    const perSource = new Map<string, number>();
    const neighbors: GraphNeighbor[] = [];

    for (const edge of edges) {
      const sourceId = direction === 'out' ? edge.from : edge.to;
      const node = byId.get(direction === 'out' ? edge.to : edge.from);
      if (!node) continue;

      const count = perSource.get(sourceId) ?? 0;
      if (limit !== undefined && count >= limit) continue;

      perSource.set(sourceId, count + 1);
      neighbors.push({ sourceId, node });
    }

    logger.debug('Hop completed', { relation, resultCount: neighbors.length });
    return neighbors;
  }

  async stats(): Promise<GraphStats> {
    try {
      const [labelRows, relationRows] = await Promise.all([
        GraphNodeModel.aggregate<{ _id: string; count: number }>([
          { $group: { _id: '$label', count: { $sum: 1 } } },
          { $sort: { _id: 1 } },
        ]),
        GraphEdge.aggregate<{ _id: string; count: number }>([
          { $group: { _id: '$relation', count: { $sum: 1 } } },
          { $sort: { _id: 1 } },
        ]),
      ]);

      const nodesByLabel: Record<string, number> = {};
      const relationshipsByType: Record<string, number> = {};
      let totalNodes = 0;
      let totalRelationships = 0;
      for (const row of labelRows) {
        nodesByLabel[row._id] = row.count;
        totalNodes += row.count;
      }
      for (const row of relationRows) {
        relationshipsByType[row._id] = row.count;
        totalRelationships += row.count;
      }
      return { nodesByLabel, relationshipsByType, totalNodes, totalRelationships };
    } catch (error) {
      logger.error('Graph stats failed', { error: errorMessage(error) });
      throw new GraphUnavailableError(`Graph stats failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Breadth-first walk over edges in both directions, one query per hop.
   */
  async neighborhood(nodeId: string, hops: number, options: CallOptions = {}): Promise<Neighborhood | null> {
    assertNotAborted(options, 'neighborhood lookup');

    try {
      const center = await GraphNodeModel.findOne({ nodeId }).lean();
      if (!center) return null;

      const visited = new Set<string>([nodeId]);
      const seenEdges = new Set<string>();
      const edges: GraphEdgeRef[] = [];
      let frontier = [nodeId];

      for (let depth = 0; depth < hops && frontier.length > 0; depth++) {
        assertNotAborted(options, 'neighborhood hop');
        const docs = await GraphEdge.find({ $or: [{ from: { $in: frontier } }, { to: { $in: frontier } }] })
          .sort({ _id: 1 })
          .lean();

        const next: string[] = [];
        for (const doc of docs) {
          const key = `${doc.from}|${doc.relation}|${doc.to}`;
          if (seenEdges.has(key)) continue;
          seenEdges.add(key);
          edges.push({ from: doc.from, to: doc.to, relation: doc.relation });

          for (const id of [doc.from, doc.to]) {
            if (visited.has(id)) continue;
            visited.add(id);
            next.push(id);
          }
        }
        frontier = next;
      }

      const neighborIds = [...visited].filter(id => id !== nodeId);
      const neighbors = neighborIds.length > 0
        ? await GraphNodeModel.find({ nodeId: { $in: neighborIds } }).sort({ _id: 1 }).lean()
        : [];

      logger.debug('Neighborhood loaded', { hops, nodeCount: neighbors.length, edgeCount: edges.length });
      return { center: toGraphNode(center), hops, nodes: neighbors.map(toGraphNode), edges };
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      logger.error('Neighborhood lookup failed', { error: errorMessage(error) });
      throw new GraphUnavailableError(`Neighborhood lookup failed: ${errorMessage(error)}`);
    }
  }

  async ping(): Promise<void> {
    if (mongoose.connection.readyState !== 1) {
      throw new GraphUnavailableError('MongoDB connection is not open');
    }
    await GraphNodeModel.estimatedDocumentCount();
  }
}
