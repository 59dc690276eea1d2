import { v4 as uuidv4 } from 'uuid';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { PipelineAbortedError, TimeoutError, ValidationError } from '../core/errors';
import { SessionMemory } from '../services/session-memory.service';
import { TraceStore } from '../services/trace-store';
import {
  PipelineFailure,
  PipelineResult,
  RetrievalStep,
  ScoredEvidence,
  SourceRef,
} from '../types';
import { isValidSessionId, maskIdentifier } from '../utils/security';
import { linkedSignal } from '../utils/timeout';
import { PipelineComponents, RunContext } from './context';
import { createRetrievalGraph } from './graph';
import { recordStep, toFailure } from './nodes/stage';
import { PipelineState, orderSteps } from './state';

export interface OrchestratorDeps extends PipelineComponents {
  sessions: Pick<SessionMemory, 'get' | 'append' | 'resolveReferences' | 'runExclusive'>;
  traces: Pick<TraceStore, 'save'>;
}

export interface OrchestratorOptions {
  totalTimeoutMs: number;
  topK: number;
  parallel: boolean;
}

export interface RunOptions {
  sessionId?: string;
  signal?: AbortSignal;
  onStep?: (step: RetrievalStep) => void;
}

type DocumentEvidence = Extract<ScoredEvidence, { provenance: 'document' }>;

export class PipelineOrchestrator {
  private options: OrchestratorOptions;

  constructor(
    private deps: OrchestratorDeps,
    options: Partial<OrchestratorOptions> = {}
  ) {
    this.options = {
      totalTimeoutMs: options.totalTimeoutMs ?? config.execution.totalTimeout,
      topK: options.topK ?? config.retrieval.vectorTopK,
      parallel: options.parallel ?? config.execution.enableParallelExecution,
    };
  }

  /**
   * Runs one query through the pipeline. Runs for the same session are
   * serialized so each one sees the turns of the previous.
   */
  async run(query: string, options: RunOptions = {}): Promise<PipelineResult> {
    const text = query.trim();
    if (!text) {
      throw new ValidationError('Query must not be empty');
    }

    const sessionId = options.sessionId ?? uuidv4();
    if (!isValidSessionId(sessionId)) {
      throw new ValidationError('Invalid session id', { sessionId });
    }

    return this.deps.sessions.runExclusive(sessionId, () => this.execute(text, sessionId, options));
  }

  private async execute(query: string, sessionId: string, options: RunOptions): Promise<PipelineResult> {
    const traceId = uuidv4();
    const startedAt = Date.now();

    const session = this.deps.sessions.get(sessionId);
    const resolvedQuery = this.deps.sessions.resolveReferences(query, session);
    const previousIntents = session?.turns.map(turn => turn.intent) ?? [];

    logger.info('Starting retrieval pipeline', {
      traceId,
      sessionId: maskIdentifier(sessionId),
      sessionTurns: session?.turns.length ?? 0,
      resolved: resolvedQuery !== query,
    });

    const recorded: RetrievalStep[] = [];
    const { signal, dispose } = linkedSignal(this.options.totalTimeoutMs, options.signal);
    const ctx: RunContext = {
      signal,
      topK: this.options.topK,
      onStep: (step) => {
        recorded.push(step);
        options.onStep?.(step);
      },
    };

    const received = recordStep(
      ctx,
      'query_received',
      'received',
      startedAt,
      resolvedQuery !== query ? 'Query received; references resolved from session' : 'Query received',
      { query, resolved_query: resolvedQuery, session_turns: session?.turns.length ?? 0 }
    );

    const graph = createRetrievalGraph(this.deps, ctx, { parallel: this.options.parallel });

    let finalState: PipelineState | null = null;
    let thrown: unknown = null;
    try {
      finalState = await graph.invoke(
        {
          traceId,
          sessionId,
          query,
          resolvedQuery,
          previousIntents,
          intent: null,
          chunks: [],
          topVectorScore: 0,
          facts: [],
          entities: [],
          evidence: [],
          fused: null,
          answer: null,
          steps: [received],
        },
        { signal }
      );
    } catch (error) {
      thrown = error;
    } finally {
      dispose();
    }

    const completed = finalState?.stage === 'completed';
    let failure: PipelineFailure | null = null;
    if (!completed) {
      if (signal.aborted) {
        failure = options.signal?.aborted
          ? toFailure(new PipelineAbortedError())
          : toFailure(new TimeoutError('retrieval pipeline', this.options.totalTimeoutMs));
      } else {
        failure = finalState?.error ?? toFailure(thrown);
      }
    }

    let steps = finalState ? finalState.steps : orderSteps(recorded);
    if (failure && !steps.some(step => step.state === 'failed')) {
      steps = [
        ...steps,
        recordStep(ctx, 'pipeline', 'failed', startedAt, `Run failed: ${failure.message}`, { code: failure.code }),
      ];
    }

    const result = this.toResult({ traceId, sessionId, query, resolvedQuery, state: finalState, steps, failure });
    this.deps.traces.save(result);

    logger.info('Retrieval pipeline finished', {
      traceId,
      status: result.status,
      stage: result.stage,
      durationMs: Date.now() - startedAt,
      confidence: result.confidence,
      facts: result.graphFacts.length,
      sources: result.sources.length,
    });

    return result;
  }

  private toResult(run: {
    traceId: string;
    sessionId: string;
    query: string;
    resolvedQuery: string;
    state: PipelineState | null;
    steps: RetrievalStep[];
    failure: PipelineFailure | null;
  }): PipelineResult {
    const { state, failure } = run;
    const fused = state?.fused ?? null;
    const answer = failure ? null : state?.answer ?? null;
    const citations = answer?.citations ?? [];

    const graphFacts = fused
      ? fused.evidence.flatMap(item => (item.provenance === 'graph' ? [item.fact.sentence] : []))
      : (state?.facts ?? []).map(fact => fact.sentence);

    const sources: SourceRef[] = (fused?.evidence ?? [])
      .filter((item): item is DocumentEvidence => item.provenance === 'document')
      .map(item => ({
        text: item.chunk.text,
        score: item.score,
        metadata: {
          chunk_id: item.chunk.chunkId,
          document_id: item.chunk.documentId,
          document_title: item.chunk.documentTitle,
          citation: item.citation,
          vector_score: item.chunk.score,
          cited: citations.includes(item.citation),
        },
      }));

    return {
      status: failure ? 'failed' : 'completed',
      traceId: run.traceId,
      sessionId: run.sessionId,
      query: run.query,
      resolvedQuery: run.resolvedQuery,
      intent: state?.intent ?? null,
      answer: answer?.text ?? null,
      citations,
      confidence: fused?.confidence ?? 0,
      lowConfidence: fused?.lowConfidence ?? true,
      graphFacts,
      sources,
      steps: run.steps,
      stage: failure ? 'failed' : 'completed',
      error: failure,
    };
  }
}
