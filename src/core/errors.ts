export class PipelineError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'PipelineError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  export class ValidationError extends PipelineError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'VALIDATION_ERROR', 400, details);
      this.name = 'ValidationError';
    }
  }

  export class NotFoundError extends PipelineError {
    constructor(message: string = 'Not found', details?: Record<string, unknown>) {
      super(message, 'NOT_FOUND', 404, details);
      this.name = 'NotFoundError';
    }
  }

  export class ClassificationError extends PipelineError {
    constructor(message: string = 'Intent classification failed', details?: Record<string, unknown>) {
      super(message, 'CLASSIFICATION_ERROR', 502, details);
      this.name = 'ClassificationError';
    }
  }

  export class IndexUnavailableError extends PipelineError {
    constructor(message: string = 'Vector index unavailable', details?: Record<string, unknown>) {
      super(message, 'INDEX_UNAVAILABLE', 503, details);
      this.name = 'IndexUnavailableError';
    }
  }

  export class GraphUnavailableError extends PipelineError {
    constructor(message: string = 'Graph database unavailable', details?: Record<string, unknown>) {
      super(message, 'GRAPH_UNAVAILABLE', 503, details);
      this.name = 'GraphUnavailableError';
    }
  }

  /**
   * Reported (not thrown) by the reranker when some items could not be scored
   * and kept their prior score.
   */
  export class RerankPartialFailure extends PipelineError {
    constructor(
      public readonly unscored: number,
      public readonly total: number,
      public readonly reasons: string[]
    ) {
      super(`Reranking failed for ${unscored} of ${total} items`, 'RERANK_PARTIAL_FAILURE', 200, {
        unscored,
        total,
        reasons,
      });
      this.name = 'RerankPartialFailure';
    }
  }

  export class GenerationError extends PipelineError {
    constructor(message: string = 'Answer generation failed', details?: Record<string, unknown>) {
      super(message, 'GENERATION_ERROR', 502, details);
      this.name = 'GenerationError';
    }
  }

  export class CompletionError extends PipelineError {
    constructor(message: string = 'LLM request failed', details?: Record<string, unknown>) {
      super(message, 'LLM_ERROR', 502, details);
      this.name = 'CompletionError';
    }
  }

  export class StructuredOutputError extends PipelineError {
    constructor(message: string = 'LLM returned unparsable output', details?: Record<string, unknown>) {
      super(message, 'STRUCTURED_OUTPUT_ERROR', 502, details);
      this.name = 'StructuredOutputError';
    }
  }

  export class TimeoutError extends PipelineError {
    constructor(label: string, timeoutMs: number) {
      super(`Timeout: ${label} (${timeoutMs}ms)`, 'TIMEOUT', 504, { label, timeoutMs });
      this.name = 'TimeoutError';
    }
  }

  export class PipelineAbortedError extends PipelineError {
    constructor(message: string = 'Request aborted by caller') {
      super(message, 'ABORTED', 499);
      this.name = 'PipelineAbortedError';
    }
  }

  export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
