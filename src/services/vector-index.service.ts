import mongoose from 'mongoose';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { IndexUnavailableError, PipelineAbortedError, errorMessage } from '../core/errors';
import { DocumentChunk } from '../models';
import { CallOptions, VectorHit, VectorIndex } from '../types/capabilities';

interface VectorRow {
  chunkId: string;
  documentId: string;
  documentTitle?: string;
  text: string;
  entities?: string[];
  position: number;
  score: number;
}

export interface MongoVectorIndexOptions {
  vectorSearchEnabled: boolean;
  indexName: string;
  fallbackScanLimit: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Chunk index backed by the `chunks` collection. Uses Atlas `$vectorSearch`
 * when enabled and falls back to scanning embeddings in process otherwise.
 */
export class MongoVectorIndex implements VectorIndex {
  private options: MongoVectorIndexOptions;

  constructor(options: Partial<MongoVectorIndexOptions> = {}) {
    this.options = {
      vectorSearchEnabled: options.vectorSearchEnabled ?? config.mongodb.vectorSearchEnabled,
      indexName: options.indexName ?? config.mongodb.vectorIndexName,
      fallbackScanLimit: options.fallbackScanLimit ?? config.mongodb.fallbackScanLimit,
    };
  }

  async query(vector: number[], k: number, options: CallOptions = {}): Promise<VectorHit[]> {
    if (options.signal?.aborted) {
      throw new PipelineAbortedError('Aborted before vector query');
    }

    if (this.options.vectorSearchEnabled) {
      try {
        const rows = await DocumentChunk.aggregate<VectorRow>([
          {
            $vectorSearch: {
              index: this.options.indexName,
              path: 'embedding',
              queryVector: vector,
              numCandidates: k * 10,
              limit: k,
            },
          },
          {
            $project: {
              _id: 0,
              chunkId: 1,
              documentId: 1,
              documentTitle: 1,
              text: 1,
              entities: 1,
              position: 1,
              score: { $meta: 'vectorSearchScore' },
            },
          },
        ]);
        return this.toHits(rows, k);
      } catch (error) {
        logger.warn('Vector search failed, falling back to similarity scan', { error: errorMessage(error) });
      }
    }

    return this.scan(vector, k);
  }

  async ping(): Promise<void> {
    if (mongoose.connection.readyState !== 1) {
      throw new IndexUnavailableError('MongoDB connection is not open');
    }
    await DocumentChunk.estimatedDocumentCount();
  }

  private async scan(vector: number[], k: number): Promise<VectorHit[]> {
    const docs = await DocumentChunk.find({})
      .sort({ position: 1 })
      .limit(this.options.fallbackScanLimit)
      .lean();

    const rows: VectorRow[] = docs.map(doc => ({
      chunkId: doc.chunkId,
      documentId: doc.documentId,
      documentTitle: doc.documentTitle,
      text: doc.text,
      entities: doc.entities,
      position: doc.position,
      score: Array.isArray(doc.embedding) ? cosineSimilarity(vector, doc.embedding) : 0,
    }));

    return this.toHits(rows, k);
  }

  private toHits(rows: VectorRow[], k: number): VectorHit[] {
    return [...rows]
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map(row => ({
        chunkId: row.chunkId,
        documentId: row.documentId,
        documentTitle: row.documentTitle,
        text: row.text,
        score: row.score,
        entities: row.entities ?? [],
      }));
  }
}
