import { Annotation } from '@langchain/langgraph';
import {
  Chunk,
  FusedContext,
  GeneratedAnswer,
  GraphFact,
  Intent,
  IntentResult,
  PIPELINE_STAGES,
  PipelineFailure,
  PipelineStage,
  RecognizedEntity,
  RetrievalStep,
  ScoredEvidence,
} from '../types';

export function stageRank(stage: PipelineStage): number {
  return PIPELINE_STAGES.indexOf(stage);
}

// Parallel branches finish in any order; the trace reads in pipeline order
export function orderSteps(steps: RetrievalStep[]): RetrievalStep[] {
  return steps
    .map((step, order) => ({ step, order }))
    .sort((a, b) => stageRank(a.step.state) - stageRank(b.step.state) || a.order - b.order)
    .map(({ step }) => step);
}

function mergeSteps(current: RetrievalStep[], update: RetrievalStep[]): RetrievalStep[] {
  return orderSteps([...current, ...update]);
}

export const PipelineStateAnnotation = Annotation.Root({
  traceId: Annotation<string>,
  sessionId: Annotation<string>,
  query: Annotation<string>,
  // Query after coreference resolution; every stage works on this one
  resolvedQuery: Annotation<string>,
  previousIntents: Annotation<Intent[]>,

  intent: Annotation<IntentResult | null>,
  chunks: Annotation<Chunk[]>,
  topVectorScore: Annotation<number>,
  facts: Annotation<GraphFact[]>,
  entities: Annotation<RecognizedEntity[]>,
  evidence: Annotation<ScoredEvidence[]>,
  fused: Annotation<FusedContext | null>,
  answer: Annotation<GeneratedAnswer | null>,

  // Sources that were unavailable for this run
  degraded: Annotation<string[]>({
    reducer: (current, update) => [...current, ...update],
    default: () => [],
  }),
  steps: Annotation<RetrievalStep[]>({
    reducer: mergeSteps,
    default: () => [],
  }),
  stage: Annotation<PipelineStage>({
    reducer: (current, update) => (stageRank(update) >= stageRank(current) ? update : current),
    default: () => 'received',
  }),
  error: Annotation<PipelineFailure | null>({
    reducer: (current, update) => current ?? update,
    default: () => null,
  }),
});

export type PipelineState = typeof PipelineStateAnnotation.State;
export type PipelineUpdate = typeof PipelineStateAnnotation.Update;
