import { config } from '../core/config';
import { logger } from '../core/logger';
import { IndexUnavailableError, PipelineAbortedError, errorMessage } from '../core/errors';
import { Chunk } from '../types';
import { CallOptions, EmbeddingProvider, VectorIndex } from '../types/capabilities';
import { withTimeout } from '../utils/timeout';

export interface VectorSearcherOptions {
  topK: number;
  embedTimeoutMs: number;
  queryTimeoutMs: number;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export class VectorSearcher {
  private options: VectorSearcherOptions;

  constructor(
    private embedder: EmbeddingProvider,
    private index: VectorIndex,
    options: Partial<VectorSearcherOptions> = {}
  ) {
    this.options = {
      topK: options.topK ?? config.retrieval.vectorTopK,
      embedTimeoutMs: options.embedTimeoutMs ?? config.execution.embedTimeout,
      queryTimeoutMs: options.queryTimeoutMs ?? config.execution.dbTimeout,
    };
  }

  /**
   * Top-k chunks by descending similarity. Equal scores keep the order the
   * index returned them in.
   */
  async search(query: string, k: number = this.options.topK, options: CallOptions = {}): Promise<Chunk[]> {
    try {
      const vector = await withTimeout(
        (signal) => this.embedder.embed(query, { signal }),
        this.options.embedTimeoutMs,
        'query embedding',
        options.signal
      );

      const hits = await withTimeout(
        (signal) => this.index.query(vector, k, { signal }),
        this.options.queryTimeoutMs,
        'vector query',
        options.signal
      );

      const chunks = hits
        .map((hit, position) => ({ hit, position, score: clampScore(hit.score) }))
        .sort((a, b) => b.score - a.score || a.position - b.position)
        .slice(0, k)
        .map(({ hit, score }, rank): Chunk => ({
          chunkId: hit.chunkId,
          documentId: hit.documentId,
          documentTitle: hit.documentTitle,
          text: hit.text,
          score,
          entities: hit.entities ?? [],
          rank,
        }));

      logger.debug('Vector search completed', { k, resultCount: chunks.length });
      return chunks;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError('Aborted during vector search');
      }
      throw new IndexUnavailableError(`Vector search failed: ${errorMessage(error)}`);
    }
  }
}
