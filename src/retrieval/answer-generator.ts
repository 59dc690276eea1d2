import { config } from '../core/config';
import { logger } from '../core/logger';
import { GenerationError, PipelineAbortedError, errorMessage } from '../core/errors';
import { SYSTEM_PROMPTS } from '../prompts/system-prompts';
import { PROMPT_TEMPLATES } from '../prompts/templates';
import { FusedContext, GeneratedAnswer } from '../types';
import { CallOptions, CompletionProvider } from '../types/capabilities';
import { withTimeout } from '../utils/timeout';

export interface AnswerGeneratorOptions {
  timeoutMs: number;
  maxTokens: number;
}

/**
 * Citation numbers referenced in the answer, in order of first appearance.
 * Numbers that do not belong to a document in the context are ignored.
 */
export function extractCitations(text: string, context: FusedContext): number[] {
  const valid = new Set(
    context.evidence.flatMap(item => (item.provenance === 'document' ? [item.citation] : []))
  );

  const citations: number[] = [];
  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    const citation = parseInt(match[1], 10);
    if (valid.has(citation) && !citations.includes(citation)) {
      citations.push(citation);
    }
  }
  return citations;
}

export class AnswerGenerator {
  private options: AnswerGeneratorOptions;

  constructor(
    private completion: CompletionProvider,
    options: Partial<AnswerGeneratorOptions> = {}
  ) {
    this.options = {
      timeoutMs: options.timeoutMs ?? config.execution.llmTimeout,
      maxTokens: options.maxTokens ?? 1024,
    };
  }

  async generate(query: string, context: FusedContext, options: CallOptions = {}): Promise<GeneratedAnswer> {
    let text: string;
    try {
      text = await withTimeout(
        (signal) =>
          this.completion.complete(
            {
              purpose: 'generate',
              messages: [
                { role: 'system', content: SYSTEM_PROMPTS.GENERATOR },
                { role: 'user', content: PROMPT_TEMPLATES.ANSWER(query, context) },
              ],
              responseFormat: 'text',
              temperature: 0.1,
              maxTokens: this.options.maxTokens,
            },
            { signal }
          ),
        this.options.timeoutMs,
        'answer generation',
        options.signal
      );
    } catch (error) {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError('Aborted during answer generation');
      }
      logger.error('Answer generation failed', { error: errorMessage(error) });
      throw new GenerationError(`Answer generation failed: ${errorMessage(error)}`);
    }

    const answer = text.trim();
    if (!answer) {
      throw new GenerationError('Model returned an empty answer');
    }

    return { text: answer, citations: extractCitations(answer, context) };
  }
}
