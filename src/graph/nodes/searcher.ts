import { logger } from '../../core/logger';
import { IndexUnavailableError } from '../../core/errors';
import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

export function createSearcherNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('vector_search', ctx, async (state) => {
    const startedAt = Date.now();

    try {
      const chunks = await components.searcher.search(state.resolvedQuery, ctx.topK, { signal: ctx.signal });
      const topVectorScore = chunks.length > 0 ? chunks[0].score : 0;

      return {
        chunks,
        topVectorScore,
        stage: 'searched',
        steps: [
          recordStep(ctx, 'vector_search', 'searched', startedAt, `Retrieved ${chunks.length} chunks`, {
            count: chunks.length,
            top_score: topVectorScore,
            chunk_ids: chunks.map(chunk => chunk.chunkId),
          }),
        ],
      };
    } catch (error) {
      if (!(error instanceof IndexUnavailableError)) throw error;

      logger.warn('Vector index unavailable, continuing with graph only', {
        traceId: state.traceId,
        error: error.message,
      });

      return {
        chunks: [],
        topVectorScore: 0,
        stage: 'searched',
        degraded: ['vector'],
        steps: [
          recordStep(ctx, 'vector_search', 'searched', startedAt, 'Vector index unavailable; continuing with graph only', {
            count: 0,
            unavailable: true,
            error: error.message,
          }),
        ],
      };
    }
  });
}
