import OpenAI from 'openai';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { PipelineAbortedError, errorMessage } from '../core/errors';
import { CallOptions, EmbeddingProvider } from '../types/capabilities';

export interface EmbeddingServiceOptions {
  apiKey: string;
  model: string;
  // Prepended to queries for models trained with instruction prefixes (e5: "query: ")
  queryPrefix: string;
}

export class EmbeddingService implements EmbeddingProvider {
  private client: OpenAI;
  private options: EmbeddingServiceOptions;

  constructor(options: Partial<EmbeddingServiceOptions> = {}) {
    this.options = {
      apiKey: options.apiKey ?? config.openai.apiKey,
      model: options.model ?? config.openai.embeddingModel,
      queryPrefix: options.queryPrefix ?? config.openai.queryPrefix,
    };
    this.client = new OpenAI({ apiKey: this.options.apiKey, maxRetries: 0 });
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.options.model,
          input: `${this.options.queryPrefix}${text}`,
        },
        { signal: options.signal }
      );
      return response.data[0].embedding;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError('Aborted during embedding');
      }
      logger.error('Embedding generation failed', { model: this.options.model, error: errorMessage(error) });
      throw error;
    }
  }
}
