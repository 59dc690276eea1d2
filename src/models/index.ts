// src/models/index.ts
export { DocumentChunk } from './DocumentChunk';
export { GraphNode } from './GraphNode';
export { GraphEdge } from './GraphEdge';
