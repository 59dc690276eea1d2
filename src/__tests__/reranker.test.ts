import { Reranker } from '../retrieval/reranker';
import { PipelineAbortedError, RerankPartialFailure } from '../core/errors';
import { CompletionRequest } from '../types/capabilities';
import { ScoredEvidence } from '../types';
import { ScriptedCompletion, userMessage } from './helpers/fakes';
import { HIT_GUIDE, HIT_MANUAL, RESPONSIBLE_FACT, toChunk } from './helpers/fixtures';

const QUERY = 'Who maintains pump P-101?';

function describeEvidence(item: ScoredEvidence): string {
  return item.provenance === 'graph' ? `graph:${item.fact.sentence}` : `doc:${item.chunk.chunkId}#${item.citation}`;
}

describe('Reranker', () => {
  const chunks = [toChunk(HIT_MANUAL, 0), toChunk(HIT_GUIDE, 1)];
  const options = { blendWeight: 0.6, graphBaselineScore: 0.9, maxCandidates: 20, timeoutMs: 1000 };

  function scoreBy(scores: { fact: string; manual: string; guide: string }) {
    return (request: CompletionRequest): string => {
      const message = userMessage(request);
      if (message.includes('John Smith')) return scores.fact;
      if (message.includes('Inspect the pump')) return scores.manual;
      return scores.guide;
    };
  }

  test('should blend the model score with the prior and sort descending', async () => {
    const completion = new ScriptedCompletion({
      rerank: scoreBy({ fact: '{"score": 1}', manual: '{"score": 0.2}', guide: '{"score": 0.9}' }),
    });
    const reranker = new Reranker(completion, options);

    const { evidence, partialFailure, scored } = await reranker.rerank(QUERY, chunks, [RESPONSIBLE_FACT]);

    expect(evidence.map(describeEvidence)).toEqual([
      `graph:${RESPONSIBLE_FACT.sentence}`,
      'doc:chunk-2#1',
      'doc:chunk-1#2',
    ]);
    expect(evidence[0].score).toBeCloseTo(0.96, 10);
    expect(evidence[1].score).toBeCloseTo(0.784, 10);
    expect(evidence[2].score).toBeCloseTo(0.448, 10);
    expect(partialFailure).toBeNull();
    expect(scored).toBe(3);
  });

  test('should mark only documents as requiring a citation', async () => {
    const reranker = new Reranker(new ScriptedCompletion(), options);

    const { evidence } = await reranker.rerank(QUERY, chunks, [RESPONSIBLE_FACT]);

    expect(evidence.map(item => item.requiresCitation)).toEqual([false, true, true]);
  });

  test('should keep the prior score for items whose scoring fails', async () => {
    const completion = new ScriptedCompletion({
      rerank: (request) => {
        if (userMessage(request).includes('Inspect the pump')) {
          throw new Error('rate limited');
        }
        return '{"score": 0.5}';
      },
    });
    const reranker = new Reranker(completion, options);

    const { evidence, partialFailure, scored } = await reranker.rerank(QUERY, chunks, [RESPONSIBLE_FACT]);

    expect(evidence.map(describeEvidence)).toEqual([
      'doc:chunk-1#1',
      `graph:${RESPONSIBLE_FACT.sentence}`,
      'doc:chunk-2#2',
    ]);
    expect(evidence[0].score).toBe(0.82);
    expect(evidence[1].score).toBeCloseTo(0.66, 10);
    expect(evidence[2].score).toBeCloseTo(0.544, 10);
    expect(partialFailure).toBeInstanceOf(RerankPartialFailure);
    expect(partialFailure?.unscored).toBe(1);
    expect(partialFailure?.total).toBe(3);
    expect(partialFailure?.reasons).toEqual(['rate limited']);
    expect(scored).toBe(2);
  });

  test('should treat an unparsable score as a failed item', async () => {
    const completion = new ScriptedCompletion({ rerank: () => 'very relevant' });
    const reranker = new Reranker(completion, options);

    const { evidence, partialFailure } = await reranker.rerank(QUERY, [toChunk(HIT_GUIDE, 0)], []);

    expect(evidence[0].score).toBe(0.61);
    expect(partialFailure?.unscored).toBe(1);
  });

  test('should clamp model scores into [0, 1]', async () => {
    const completion = new ScriptedCompletion({ rerank: () => '{"score": 3}' });
    const reranker = new Reranker(completion, options);

    const { evidence } = await reranker.rerank(QUERY, [], [RESPONSIBLE_FACT]);

    expect(evidence[0].score).toBeCloseTo(0.96, 10);
  });

  test('should put graph facts first on equal scores, then keep input order', async () => {
    const reranker = new Reranker(new ScriptedCompletion(), { ...options, graphBaselineScore: 0.5 });
    const evenChunks = chunks.map(chunk => ({ ...chunk, score: 0.5 }));

    const { evidence } = await reranker.rerank(QUERY, evenChunks, [RESPONSIBLE_FACT]);

    expect(evidence.map(describeEvidence)).toEqual([
      `graph:${RESPONSIBLE_FACT.sentence}`,
      'doc:chunk-1#1',
      'doc:chunk-2#2',
    ]);
  });

  test('should score at most maxCandidates items per provenance', async () => {
    const completion = new ScriptedCompletion();
    const reranker = new Reranker(completion, { ...options, maxCandidates: 1 });

    const { evidence, scored } = await reranker.rerank(QUERY, chunks, [RESPONSIBLE_FACT]);

    expect(completion.callsFor('rerank')).toHaveLength(2);
    expect(scored).toBe(2);
    const guide = evidence.find(item => item.provenance === 'document' && item.chunk.chunkId === 'chunk-2');
    expect(guide?.score).toBe(0.61);
  });

  test('should return empty evidence for empty input', async () => {
    const completion = new ScriptedCompletion();
    const reranker = new Reranker(completion, options);

    expect(await reranker.rerank(QUERY, [], [])).toEqual({ evidence: [], partialFailure: null, scored: 0 });
    expect(completion.calls).toHaveLength(0);
  });

  test('should report an abort when the caller cancels', async () => {
    const controller = new AbortController();
    controller.abort();
    const completion = new ScriptedCompletion();
    const reranker = new Reranker(completion, options);

    await expect(
      reranker.rerank(QUERY, chunks, [RESPONSIBLE_FACT], { signal: controller.signal })
    ).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(completion.calls).toHaveLength(0);
  });
});
