import { PipelineError } from '../../core/errors';
import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

export function createGeneratorNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('generation', ctx, async (state) => {
    const startedAt = Date.now();
    if (!state.fused) {
      throw new PipelineError('Generation reached without fused context', 'INVALID_STATE');
    }

    const answer = await components.generator.generate(state.resolvedQuery, state.fused, { signal: ctx.signal });

    return {
      answer,
      stage: 'generated',
      steps: [
        recordStep(ctx, 'generation', 'generated', startedAt, `Generated answer citing ${answer.citations.length} documents`, {
          length: answer.text.length,
          citations: answer.citations,
        }),
      ],
    };
  });
}
