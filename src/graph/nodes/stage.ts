import { logger } from '../../core/logger';
import { PipelineAbortedError, PipelineError, errorMessage } from '../../core/errors';
import { PipelineFailure, PipelineStage, RetrievalStep } from '../../types';
import { RunContext } from '../context';
import { PipelineState, PipelineUpdate } from '../state';

export type PipelineNode = (state: PipelineState) => Promise<PipelineUpdate>;

export function recordStep(
  ctx: RunContext,
  stage: string,
  state: PipelineStage,
  startedAt: number,
  description: string,
  data: Record<string, unknown> = {}
): RetrievalStep {
  const step: RetrievalStep = {
    stage,
    state,
    durationMs: Date.now() - startedAt,
    description,
    data,
  };
  ctx.onStep?.(step);
  return step;
}

export function toFailure(error: unknown): PipelineFailure {
  if (error instanceof PipelineError) {
    return { code: error.code, message: error.message, statusCode: error.statusCode };
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(error), statusCode: 500 };
}

/**
 * Wraps a node so a failed run skips the remaining stages and an unexpected
 * error ends the run in the `failed` state instead of escaping the graph.
 */
export function guardNode(stage: string, ctx: RunContext, node: PipelineNode): PipelineNode {
  return async (state) => {
    if (state.error) return {};

    const startedAt = Date.now();
    try {
      if (ctx.signal.aborted) {
        throw new PipelineAbortedError(`Aborted before ${stage}`);
      }
      return await node(state);
    } catch (error) {
      const cause = ctx.signal.aborted && !(error instanceof PipelineAbortedError)
        ? new PipelineAbortedError(`Aborted during ${stage}`)
        : error;
      const failure = toFailure(cause);

      logger.error('Pipeline stage failed', { traceId: state.traceId, stage, code: failure.code, error: failure.message });

      return {
        error: failure,
        stage: 'failed',
        steps: [recordStep(ctx, stage, 'failed', startedAt, `${stage} failed: ${failure.message}`, { code: failure.code })],
      };
    }
  };
}
