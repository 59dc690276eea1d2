export const NODE_LABELS = [
  'Person',
  'Role',
  'Team',
  'Asset',
  'Component',
  'Location',
  'Document',
  'Chunk',
  'MaintenanceEvent',
] as const;

export type NodeLabel = (typeof NODE_LABELS)[number];

export const RELATIONS = [
  'HAS_ROLE',
  'RESPONSIBLE_FOR',
  'MEMBER_OF',
  'HAS_COMPONENT',
  'LOCATED_AT',
  'APPLIES_TO',
  'MENTIONS',
  'SAFETY_OVERSIGHT',
  'PERFORMED',
] as const;

export type Relation = (typeof RELATIONS)[number];

/** Logical subsets of the single entity graph. */
export type GraphView = 'document' | 'asset' | 'people' | 'temporal';

export interface GraphNode {
  id: string;
  label: NodeLabel;
  name?: string;
  // e.g. "pump" for an Asset, used by session coreference
  category?: string;
  view?: GraphView;
}

export type HopDirection = 'out' | 'in';

export interface HopRequest {
  fromIds: string[];
  relation: Relation;
  direction: HopDirection;
  targetLabel: NodeLabel;
  // Per source node
  limit?: number;
}

export interface GraphNeighbor {
  sourceId: string;
  node: GraphNode;
}

export interface GraphPathRef {
  nodes: Array<Pick<GraphNode, 'id' | 'label' | 'name'>>;
  relations: Relation[];
}

export type TemplateId =
  | 'person-role-asset'
  | 'person-team'
  | 'asset-component'
  | 'asset-location'
  | 'document-asset'
  | 'chunk-component'
  | 'person-oversight-asset';

export interface TraversalTemplate {
  id: TemplateId;
  // nodes[i] -[relations[i]]-> nodes[i + 1]
  nodes: readonly NodeLabel[];
  relations: readonly Relation[];
  anchors: readonly NodeLabel[];
}

export interface GraphEdgeRef {
  from: string;
  to: string;
  relation: Relation;
}

export interface GraphStats {
  nodesByLabel: Record<string, number>;
  relationshipsByType: Record<string, number>;
  totalNodes: number;
  totalRelationships: number;
}

/** Nodes and edges within `hops` undirected steps of `center`. */
export interface Neighborhood {
  center: GraphNode;
  hops: number;
  nodes: GraphNode[];
  edges: GraphEdgeRef[];
}
