import { AnswerGenerator } from '../retrieval/answer-generator';
import { ContextFusion } from '../retrieval/context-fusion';
import { GraphExpander } from '../retrieval/graph-expander';
import { IntentClassifier } from '../retrieval/intent-classifier';
import { Reranker } from '../retrieval/reranker';
import { VectorSearcher } from '../retrieval/vector-searcher';
import { SessionMemory } from '../services/session-memory.service';
import { RetrievalStep } from '../types';

export interface PipelineComponents {
  classifier: Pick<IntentClassifier, 'classify'>;
  searcher: Pick<VectorSearcher, 'search'>;
  expander: Pick<GraphExpander, 'expand'>;
  reranker: Pick<Reranker, 'rerank'>;
  fusion: Pick<ContextFusion, 'fuse'>;
  generator: Pick<AnswerGenerator, 'generate'>;
  sessions: Pick<SessionMemory, 'append'>;
}

/** Per-run values shared by every node of one graph execution. */
export interface RunContext {
  signal: AbortSignal;
  topK: number;
  onStep?: (step: RetrievalStep) => void;
}
