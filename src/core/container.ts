import { PipelineOrchestrator, OrchestratorOptions } from '../graph/orchestrator';
import { AnswerGenerator } from '../retrieval/answer-generator';
import { ContextFusion } from '../retrieval/context-fusion';
import { EntityMatcher } from '../retrieval/entity-matcher';
import { GraphExpander } from '../retrieval/graph-expander';
import { IntentClassifier } from '../retrieval/intent-classifier';
import { Reranker } from '../retrieval/reranker';
import { VectorSearcher } from '../retrieval/vector-searcher';
import { EmbeddingService } from '../services/embedding.service';
import { MongoGraphStore } from '../services/graph-store.service';
import { LLMService } from '../services/llm.service';
import { SessionMemory } from '../services/session-memory.service';
import { TraceStore } from '../services/trace-store';
import { MongoVectorIndex } from '../services/vector-index.service';
import { CompletionProvider, EmbeddingProvider, GraphStore, VectorIndex } from '../types/capabilities';

export interface Providers {
  completion: CompletionProvider;
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  graphStore: GraphStore;
}

export interface ServiceOptions {
  sessions?: SessionMemory;
  traces?: TraceStore;
  matcher?: EntityMatcher;
  orchestrator?: Partial<OrchestratorOptions>;
}

export interface AppServices {
  orchestrator: Pick<PipelineOrchestrator, 'run'>;
  sessions: SessionMemory;
  traces: TraceStore;
  vectorIndex: Pick<VectorIndex, 'ping'>;
  graphStore: Pick<GraphStore, 'stats' | 'neighborhood' | 'ping'>;
}

/** Wires the pipeline components around the given capability providers. */
export function createServices(providers: Providers, options: ServiceOptions = {}): AppServices {
  const sessions = options.sessions ?? new SessionMemory();
  const traces = options.traces ?? new TraceStore();

  const orchestrator = new PipelineOrchestrator(
    {
      classifier: new IntentClassifier(providers.completion),
      searcher: new VectorSearcher(providers.embedder, providers.vectorIndex),
      expander: new GraphExpander(providers.graphStore, { matcher: options.matcher }),
      reranker: new Reranker(providers.completion),
      fusion: new ContextFusion(),
      generator: new AnswerGenerator(providers.completion),
      sessions,
      traces,
    },
    options.orchestrator
  );

  return {
    orchestrator,
    sessions,
    traces,
    vectorIndex: providers.vectorIndex,
    graphStore: providers.graphStore,
  };
}

export function createProductionServices(): AppServices {
  return createServices({
    completion: new LLMService(),
    embedder: new EmbeddingService(),
    vectorIndex: new MongoVectorIndex(),
    graphStore: new MongoGraphStore(),
  });
}
