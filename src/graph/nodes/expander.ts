import { logger } from '../../core/logger';
import { GraphUnavailableError } from '../../core/errors';
import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

export function createExpanderNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('graph_expansion', ctx, async (state) => {
    const startedAt = Date.now();
    const intent = state.intent?.intent ?? 'asset_info';

    try {
      const expansion = await components.expander.expand(intent, state.resolvedQuery, state.chunks, {
        signal: ctx.signal,
      });

      return {
        facts: expansion.facts,
        entities: expansion.entities,
        stage: 'expanded',
        steps: [
          recordStep(ctx, 'graph_expansion', 'expanded', startedAt, `Expanded ${expansion.facts.length} graph facts`, {
            count: expansion.facts.length,
            templates: expansion.templates,
            anchors: expansion.anchors,
            entities: expansion.entities.map(entity => entity.name),
          }),
        ],
      };
    } catch (error) {
      if (!(error instanceof GraphUnavailableError)) throw error;

      logger.warn('Graph unavailable, continuing with vector results only', {
        traceId: state.traceId,
        error: error.message,
      });

      return {
        facts: [],
        entities: [],
        stage: 'expanded',
        degraded: ['graph'],
        steps: [
          recordStep(ctx, 'graph_expansion', 'expanded', startedAt, 'Graph unavailable; continuing with vector results only', {
            count: 0,
            unavailable: true,
            error: error.message,
          }),
        ],
      };
    }
  });
}
