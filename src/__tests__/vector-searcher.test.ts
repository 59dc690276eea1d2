import { VectorSearcher } from '../retrieval/vector-searcher';
import { IndexUnavailableError, PipelineAbortedError } from '../core/errors';
import { FakeEmbedder, InMemoryVectorIndex } from './helpers/fakes';
import { HIT_GUIDE, HIT_MANUAL } from './helpers/fixtures';

describe('VectorSearcher', () => {
  let embedder: FakeEmbedder;
  let index: InMemoryVectorIndex;
  let searcher: VectorSearcher;

  beforeEach(() => {
    embedder = new FakeEmbedder();
    index = new InMemoryVectorIndex([HIT_GUIDE, HIT_MANUAL]);
    searcher = new VectorSearcher(embedder, index, { topK: 10 });
  });

  test('should return chunks by descending score with their rank', async () => {
    const chunks = await searcher.search('pump bearing inspection');

    expect(chunks.map(chunk => [chunk.chunkId, chunk.rank])).toEqual([
      ['chunk-1', 0],
      ['chunk-2', 1],
    ]);
    expect(chunks[0]).toEqual({
      chunkId: 'chunk-1',
      documentId: 'doc-1',
      documentTitle: 'P-101 Maintenance Manual',
      text: 'Inspect the pump bearings every 500 operating hours.',
      score: 0.82,
      entities: ['P-101'],
      rank: 0,
    });
  });

  test('should embed the query text', async () => {
    await searcher.search('pump bearing inspection');

    expect(embedder.texts).toEqual(['pump bearing inspection']);
  });

  test('should keep index order for equal scores', async () => {
    index.hits = [
      { chunkId: 'a', documentId: 'd', text: 'first', score: 0.5 },
      { chunkId: 'b', documentId: 'd', text: 'second', score: 0.5 },
      { chunkId: 'c', documentId: 'd', text: 'third', score: 0.7 },
    ];

    const chunks = await searcher.search('q');

    expect(chunks.map(chunk => chunk.chunkId)).toEqual(['c', 'a', 'b']);
  });

  test('should clamp scores into [0, 1]', async () => {
    index.hits = [
      { chunkId: 'high', documentId: 'd', text: 't', score: 1.2 },
      { chunkId: 'low', documentId: 'd', text: 't', score: -0.1 },
    ];

    const chunks = await searcher.search('q');

    expect(chunks.map(chunk => chunk.score)).toEqual([1, 0]);
    expect(chunks[1].entities).toEqual([]);
  });

  test('should return at most k chunks', async () => {
    expect(await searcher.search('q', 1)).toHaveLength(1);
  });

  test('should return an empty list for an empty index', async () => {
    index.hits = [];

    expect(await searcher.search('q')).toEqual([]);
  });

  test('should report the index as unavailable when embedding fails', async () => {
    embedder.fail = new Error('embedding quota exceeded');

    await expect(searcher.search('q')).rejects.toBeInstanceOf(IndexUnavailableError);
  });

  test('should report the index as unavailable when the query fails', async () => {
    index.fail = new Error('connection reset');

    await expect(searcher.search('q')).rejects.toThrow('Vector search failed: connection reset');
  });

  test('should report an abort when the caller cancels', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(searcher.search('q', 10, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineAbortedError
    );
    expect(index.queries).toBe(0);
  });
});
