import { GraphPathRef, NodeLabel, TemplateId } from './graph';

export const INTENTS = ['procedure', 'troubleshooting', 'safety', 'asset_info', 'people'] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && (INTENTS as readonly string[]).includes(value);
}

export interface IntentResult {
  intent: Intent;
  confidence: number;
  reasoning: string;
  fallback?: boolean;
}

export interface Chunk {
  chunkId: string;
  documentId: string;
  documentTitle?: string;
  text: string;
  score: number;
  entities: string[];
  // Position in the vector result, 0-based
  rank: number;
}

export interface GraphFact {
  sentence: string;
  path: GraphPathRef;
  hops: number;
  template: TemplateId;
}

export type ScoredEvidence =
  | {
      provenance: 'graph';
      fact: GraphFact;
      score: number;
      requiresCitation: false;
    }
  | {
      provenance: 'document';
      chunk: Chunk;
      score: number;
      requiresCitation: true;
      citation: number;
    };

export interface FusedContext {
  evidence: ScoredEvidence[];
  // Skip connections, carried unchanged from the first stage
  intent: IntentResult;
  topVectorScore: number;
  topRerankScore: number;
  confidence: number;
  lowConfidence: boolean;
  noEvidence: boolean;
}

export interface RecognizedEntity {
  id: string;
  name: string;
  label: NodeLabel;
  category?: string;
}

export interface SessionEntity {
  name: string;
  kind: NodeLabel;
  category?: string;
}

export interface Turn {
  query: string;
  resolvedQuery: string;
  intent: Intent;
  entities: SessionEntity[];
  at: Date;
}

export interface Session {
  id: string;
  turns: Turn[];
  createdAt: Date;
  lastAccessedAt: Date;
}

export const PIPELINE_STAGES = [
  'received',
  'classified',
  'searched',
  'expanded',
  'reranked',
  'fused',
  'generated',
  'completed',
  'failed',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface RetrievalStep {
  stage: string;
  state: PipelineStage;
  durationMs: number;
  description: string;
  data: Record<string, unknown>;
}

export interface GeneratedAnswer {
  text: string;
  citations: number[];
}

export interface PipelineFailure {
  code: string;
  message: string;
  statusCode: number;
}

export interface SourceRef {
  text: string;
  score: number;
  metadata: {
    chunk_id: string;
    document_id: string;
    document_title?: string;
    citation: number;
    vector_score: number;
    cited: boolean;
  };
}

export interface PipelineResult {
  status: 'completed' | 'failed';
  traceId: string;
  sessionId: string;
  query: string;
  resolvedQuery: string;
  intent: IntentResult | null;
  answer: string | null;
  citations: number[];
  confidence: number;
  lowConfidence: boolean;
  graphFacts: string[];
  sources: SourceRef[];
  steps: RetrievalStep[];
  stage: PipelineStage;
  error: PipelineFailure | null;
}
