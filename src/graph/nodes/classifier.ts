import { logger } from '../../core/logger';
import { ClassificationError } from '../../core/errors';
import { IntentResult } from '../../types';
import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

const FALLBACK_INTENT: IntentResult = {
  intent: 'asset_info',
  confidence: 0,
  reasoning: 'Classification unavailable; using default intent',
  fallback: true,
};

export function createClassifierNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('intent_classification', ctx, async (state) => {
    const startedAt = Date.now();

    try {
      const intent = await components.classifier.classify(state.resolvedQuery, {
        signal: ctx.signal,
        previousIntents: state.previousIntents,
      });

      return {
        intent,
        stage: 'classified',
        steps: [
          recordStep(ctx, 'intent_classification', 'classified', startedAt, `Classified query as ${intent.intent}`, {
            intent: intent.intent,
            confidence: intent.confidence,
            reasoning: intent.reasoning,
          }),
        ],
      };
    } catch (error) {
      if (!(error instanceof ClassificationError)) throw error;

      logger.warn('Intent classification failed, using default intent', {
        traceId: state.traceId,
        error: error.message,
      });

      return {
        intent: FALLBACK_INTENT,
        stage: 'classified',
        degraded: ['classification'],
        steps: [
          recordStep(ctx, 'intent_classification', 'classified', startedAt, `Classification failed; defaulted to ${FALLBACK_INTENT.intent}`, {
            intent: FALLBACK_INTENT.intent,
            confidence: 0,
            fallback: true,
            error: error.message,
          }),
        ],
      };
    }
  });
}
