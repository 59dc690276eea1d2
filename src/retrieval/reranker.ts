import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { PipelineAbortedError, RerankPartialFailure, errorMessage } from '../core/errors';
import { SYSTEM_PROMPTS } from '../prompts/system-prompts';
import { PROMPT_TEMPLATES } from '../prompts/templates';
import { Chunk, GraphFact, ScoredEvidence } from '../types';
import { CallOptions, CompletionProvider } from '../types/capabilities';
import { parseStructured } from '../utils/structured-output';
import { withTimeout } from '../utils/timeout';

const RelevanceSchema = z.object({
  score: z.number(),
  reasoning: z.string().optional(),
});

export interface RerankerOptions {
  // Weight of the model's relevance score against the prior score
  blendWeight: number;
  graphBaselineScore: number;
  maxCandidates: number;
  timeoutMs: number;
}

export interface RerankOutcome {
  evidence: ScoredEvidence[];
  partialFailure: RerankPartialFailure | null;
  scored: number;
}

type Item =
  | { provenance: 'graph'; fact: GraphFact; prior: number; content: string; order: number }
  | { provenance: 'document'; chunk: Chunk; prior: number; content: string; order: number };

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class Reranker {
  private options: RerankerOptions;

  constructor(
    private completion: CompletionProvider,
    options: Partial<RerankerOptions> = {}
  ) {
    this.options = {
      blendWeight: options.blendWeight ?? config.rerank.blendWeight,
      graphBaselineScore: options.graphBaselineScore ?? config.rerank.graphBaselineScore,
      maxCandidates: options.maxCandidates ?? config.rerank.maxCandidates,
      timeoutMs: options.timeoutMs ?? config.execution.llmTimeout,
    };
  }

  /**
   * Scores every fact and chunk against the query. Items whose scoring call
   * fails keep their prior score, so the output always has one entry per
   * input item.
   */
  async rerank(query: string, chunks: Chunk[], facts: GraphFact[], options: CallOptions = {}): Promise<RerankOutcome> {
    const items: Item[] = [
      ...facts.map((fact, order): Item => ({
        provenance: 'graph',
        fact,
        prior: this.options.graphBaselineScore,
        content: fact.sentence,
        order,
      })),
      ...chunks.map((chunk, order): Item => ({
        provenance: 'document',
        chunk,
        prior: chunk.score,
        content: chunk.text,
        order,
      })),
    ];

    // Beyond the cap per provenance, items keep their prior score without a call
    const toScore = items.filter(item => item.order < this.options.maxCandidates);
    const settled = await Promise.allSettled(toScore.map(item => this.scoreItem(query, item.content, options.signal)));

    if (options.signal?.aborted) {
      throw new PipelineAbortedError('Aborted during reranking');
    }

    const scores = new Map<Item, number>();
    const reasons: string[] = [];
    settled.forEach((result, i) => {
      const item = toScore[i];
      if (result.status === 'fulfilled') {
        const blend = this.options.blendWeight;
        scores.set(item, clamp01(blend * result.value + (1 - blend) * item.prior));
      } else {
        reasons.push(errorMessage(result.reason));
      }
    });

    const ranked = items
      .map(item => ({ item, score: scores.get(item) ?? clamp01(item.prior) }))
      .sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        if (a.item.provenance !== b.item.provenance) return a.item.provenance === 'graph' ? -1 : 1;
        return a.item.order - b.item.order;
      });

    let citation = 0;
    const evidence = ranked.map(({ item, score }): ScoredEvidence => {
      if (item.provenance === 'graph') {
        return { provenance: 'graph', fact: item.fact, score, requiresCitation: false };
      }
      citation++;
      return { provenance: 'document', chunk: item.chunk, score, requiresCitation: true, citation };
    });

    const partialFailure = reasons.length > 0
      ? new RerankPartialFailure(reasons.length, toScore.length, reasons)
      : null;

    if (partialFailure) {
      logger.warn('Reranking partially failed', { unscored: reasons.length, total: toScore.length });
    }

    return { evidence, partialFailure, scored: scores.size };
  }

  private async scoreItem(query: string, content: string, signal?: AbortSignal): Promise<number> {
    const response = await withTimeout(
      (child) =>
        this.completion.complete(
          {
            purpose: 'rerank',
            messages: [
              { role: 'system', content: SYSTEM_PROMPTS.RERANKER },
              { role: 'user', content: PROMPT_TEMPLATES.SCORE(query, content) },
            ],
            responseFormat: 'json',
            temperature: 0,
            maxTokens: 100,
          },
          { signal: child }
        ),
      this.options.timeoutMs,
      'relevance scoring',
      signal
    );

    return clamp01(parseStructured(response, RelevanceSchema).score);
  }
}
