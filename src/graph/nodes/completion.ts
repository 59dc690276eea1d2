import { PipelineAbortedError } from '../../core/errors';
import { SessionEntity } from '../../types';
import { extractPersonNames } from '../../utils/person-names';
import { PipelineComponents, RunContext } from '../context';
import { PipelineState } from '../state';
import { PipelineNode, guardNode, recordStep } from './stage';

function sessionEntities(state: PipelineState): SessionEntity[] {
  const entities: SessionEntity[] = state.entities.map(entity => ({
    name: entity.name,
    kind: entity.label,
    category: entity.category,
  }));

  const known = new Set(entities.map(entity => entity.name.toLowerCase()));
  for (const name of extractPersonNames(state.answer?.text ?? '')) {
    if (known.has(name.toLowerCase())) continue;
    known.add(name.toLowerCase());
    entities.push({ name, kind: 'Person' });
  }
  return entities;
}

export function createCompletionNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('completion', ctx, async (state) => {
    const startedAt = Date.now();

    // An aborted run leaves the session untouched
    if (ctx.signal.aborted) {
      throw new PipelineAbortedError('Aborted before the session was updated');
    }

    const entities = sessionEntities(state);
    const session = components.sessions.append(state.sessionId, {
      query: state.query,
      resolvedQuery: state.resolvedQuery,
      intent: state.intent?.intent ?? 'asset_info',
      entities,
      at: new Date(),
    });

    return {
      stage: 'completed',
      steps: [
        recordStep(ctx, 'completion', 'completed', startedAt, 'Recorded turn in session memory', {
          turns: session.turns.length,
          entities: entities.map(entity => entity.name),
          degraded: state.degraded,
        }),
      ],
    };
  });
}
