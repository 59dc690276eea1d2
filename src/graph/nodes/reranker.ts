import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

export function createRerankerNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('reranking', ctx, async (state) => {
    const startedAt = Date.now();
    const outcome = await components.reranker.rerank(state.resolvedQuery, state.chunks, state.facts, {
      signal: ctx.signal,
    });

    const description = outcome.partialFailure
      ? `Reranked ${outcome.evidence.length} items (${outcome.partialFailure.message})`
      : `Reranked ${outcome.evidence.length} items`;

    return {
      evidence: outcome.evidence,
      stage: 'reranked',
      steps: [
        recordStep(ctx, 'reranking', 'reranked', startedAt, description, {
          count: outcome.evidence.length,
          scored: outcome.scored,
          unscored: outcome.partialFailure?.unscored ?? 0,
          top_score: outcome.evidence.length > 0 ? outcome.evidence[0].score : 0,
        }),
      ],
    };
  });
}
