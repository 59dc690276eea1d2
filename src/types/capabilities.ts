import { GraphNeighbor, GraphNode, GraphStats, HopRequest, Neighborhood, NodeLabel } from './graph';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type CompletionPurpose = 'classify' | 'rerank' | 'generate';

export interface CompletionRequest {
  purpose: CompletionPurpose;
  messages: LLMMessage[];
  responseFormat?: 'text' | 'json';
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionProvider {
  complete(request: CompletionRequest, options?: CallOptions): Promise<string>;
}

export interface EmbeddingProvider {
  embed(text: string, options?: CallOptions): Promise<number[]>;
}

export interface VectorHit {
  chunkId: string;
  documentId: string;
  documentTitle?: string;
  text: string;
  score: number;
  entities?: string[];
}

export interface VectorIndex {
  query(vector: number[], k: number, options?: CallOptions): Promise<VectorHit[]>;
  ping(): Promise<void>;
}

export interface GraphStore {
  findEntities(labels: readonly NodeLabel[], options?: CallOptions): Promise<GraphNode[]>;
  hop(request: HopRequest, options?: CallOptions): Promise<GraphNeighbor[]>;
  stats(): Promise<GraphStats>;
  // null when no node has this id
  neighborhood(nodeId: string, hops: number, options?: CallOptions): Promise<Neighborhood | null>;
  ping(): Promise<void>;
}
