import axios, { AxiosInstance } from 'axios';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { CompletionError, PipelineAbortedError, errorMessage } from '../core/errors';
import {
  CallOptions,
  CompletionProvider,
  CompletionPurpose,
  CompletionRequest,
} from '../types/capabilities';

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface LLMServiceOptions {
  baseUrl: string;
  apiKey: string;
  models: Record<CompletionPurpose, string>;
  requestsPerMinute: number;
}

interface QueuedTask {
  run: () => Promise<void>;
}

/**
 * Spaces requests at least `60000 / requestsPerMinute` ms apart. A task
 * whose signal aborts while queued leaves the queue without using a slot.
 */
export class RateLimiter {
  private queue: QueuedTask[] = [];
  private processing = false;
  private minDelay: number;
  private lastRequestTime = 0;

  constructor(requestsPerMinute: number = 50) {
    this.minDelay = 60000 / requestsPerMinute;
  }

  execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new PipelineAbortedError('Aborted before rate limit slot'));
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(task);
        if (index !== -1) {
          this.queue.splice(index, 1);
          reject(new PipelineAbortedError('Aborted while waiting for a rate limit slot'));
        }
      };

      const task: QueuedTask = {
        run: async () => {
          signal?.removeEventListener('abort', onAbort);
          try {
            resolve(await fn());
          } catch (error) {
            reject(error);
          }
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(task);

      if (!this.processing) {
        void this.processQueue();
      }
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  private async processQueue(): Promise<void> {
    this.processing = true;

    while (this.queue.length > 0) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;

      if (timeSinceLastRequest < this.minDelay) {
        await new Promise(resolve =>
          setTimeout(resolve, this.minDelay - timeSinceLastRequest)
        );
      }

      // Aborted tasks may have emptied the queue during the wait
      const task = this.queue.shift();
      if (task) {
        this.lastRequestTime = Date.now();
        // Tasks settle their own promise; start the next one without waiting
        void task.run();
      }
    }

    this.processing = false;
  }
}

/**
 * OpenRouter-compatible chat completions client. The model is picked per
 * call purpose so classification and scoring can use a cheaper model than
 * answer generation.
 */
export class LLMService implements CompletionProvider {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;
  private options: LLMServiceOptions;

  constructor(options: Partial<LLMServiceOptions> = {}) {
    this.options = {
      baseUrl: options.baseUrl ?? config.openrouter.baseUrl,
      apiKey: options.apiKey ?? config.openrouter.apiKey,
      models: options.models ?? {
        classify: config.models.classifier,
        rerank: config.models.reranker,
        generate: config.models.generator,
      },
      requestsPerMinute: options.requestsPerMinute ?? config.execution.llmRequestsPerMinute,
    };

    this.client = axios.create({
      baseURL: this.options.baseUrl,
      headers: {
        'Authorization': `Bearer ${this.options.apiKey}`,
        'X-Title': 'Multi-view GraphRAG',
        'Content-Type': 'application/json',
      },
    });

    this.rateLimiter = new RateLimiter(this.options.requestsPerMinute);
  }

  async complete(request: CompletionRequest, options: CallOptions = {}): Promise<string> {
    const model = this.options.models[request.purpose];

    return this.rateLimiter.execute(async () => {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError(`Aborted before ${request.purpose} completion`);
      }

      try {
        logger.debug('LLM Request', { model, purpose: request.purpose, messageCount: request.messages.length });

        const payload = {
          model,
          messages: request.messages,
          temperature: request.temperature ?? 0.1,
          max_tokens: request.maxTokens ?? 1024,
          ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' } } : {}),
        };

        const response = await this.client.post<ChatCompletionResponse>('/chat/completions', payload, {
          signal: options.signal,
        });
        const content = response.data.choices?.[0]?.message?.content ?? '';
        const usage = response.data.usage;

        logger.debug('LLM Response', {
          model,
          purpose: request.purpose,
          contentLength: content.length,
          tokens: usage?.total_tokens,
        });

        if (!content) {
          throw new CompletionError('LLM returned an empty completion', { model });
        }
        return content;
      } catch (error) {
        if (error instanceof CompletionError) throw error;
        if (axios.isCancel(error) || options.signal?.aborted) {
          throw new PipelineAbortedError(`Aborted during ${request.purpose} completion`);
        }

        const responseData = axios.isAxiosError(error) ? error.response?.data : undefined;
        logger.error('LLM Error', {
          purpose: request.purpose,
          error: errorMessage(error),
          response: responseData,
        });

        throw new CompletionError(`LLM request failed: ${errorMessage(error)}`, {
          model,
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
        });
      }
    }, options.signal);
  }
}
