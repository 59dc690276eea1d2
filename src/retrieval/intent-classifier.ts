import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { ClassificationError, PipelineAbortedError, errorMessage } from '../core/errors';
import { SYSTEM_PROMPTS } from '../prompts/system-prompts';
import { PROMPT_TEMPLATES } from '../prompts/templates';
import { Intent, IntentResult, isIntent } from '../types';
import { CompletionProvider } from '../types/capabilities';
import { parseStructured } from '../utils/structured-output';
import { isAbortError, withTimeout } from '../utils/timeout';

const ClassificationSchema = z.object({
  intent: z.string(),
  confidence: z.unknown().optional(),
  reasoning: z.unknown().optional(),
});

export interface IntentClassifierOptions {
  defaultConfidence: number;
  timeoutMs: number;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
  // Earlier intents of the same session, oldest first
  previousIntents?: Intent[];
}

export class IntentClassifier {
  private options: IntentClassifierOptions;

  constructor(
    private completion: CompletionProvider,
    options: Partial<IntentClassifierOptions> = {}
  ) {
    this.options = {
      defaultConfidence: options.defaultConfidence ?? config.intent.defaultConfidence,
      timeoutMs: options.timeoutMs ?? config.execution.llmTimeout,
    };
  }

  async classify(query: string, options: ClassifyOptions = {}): Promise<IntentResult> {
    let content: string;
    try {
      content = await withTimeout(
        (signal) =>
          this.completion.complete(
            {
              purpose: 'classify',
              messages: [
                { role: 'system', content: SYSTEM_PROMPTS.CLASSIFIER },
                { role: 'user', content: PROMPT_TEMPLATES.CLASSIFY(query, options.previousIntents) },
              ],
              responseFormat: 'json',
              temperature: 0,
              maxTokens: 200,
            },
            { signal }
          ),
        this.options.timeoutMs,
        'intent classification',
        options.signal
      );
    } catch (error) {
      if (isAbortError(error) && options.signal?.aborted) {
        throw new PipelineAbortedError('Aborted during intent classification');
      }
      throw new ClassificationError(`Completion service failed: ${errorMessage(error)}`);
    }

    let parsed: z.infer<typeof ClassificationSchema>;
    try {
      parsed = parseStructured(content, ClassificationSchema);
    } catch (error) {
      throw new ClassificationError(`Unparsable classification: ${errorMessage(error)}`);
    }

    const label = parsed.intent.trim().toLowerCase();
    if (!isIntent(label)) {
      throw new ClassificationError(`Intent outside taxonomy: ${parsed.intent}`, { intent: parsed.intent });
    }

    const confidence = this.readConfidence(parsed.confidence);
    const result: IntentResult = {
      intent: label,
      confidence,
      reasoning: typeof parsed.reasoning === 'string' ? parsed.reasoning : '',
    };

    logger.debug('Intent classified', { intent: result.intent, confidence });
    return result;
  }

  private readConfidence(value: unknown): number {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1) {
      return value;
    }
    return this.options.defaultConfidence;
  }
}
