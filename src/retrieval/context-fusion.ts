import { FusionWeights, config } from '../core/config';
import { FusedContext, IntentResult, ScoredEvidence } from '../types';

export interface ContextFusionOptions {
  weights: FusionWeights;
  tierSize: number;
  maxEvidence: number;
  // Documents kept on truncation even when graph facts outrank them
  minDocumentSlots: number;
  lowConfidenceThreshold: number;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Orders reranked evidence into the graph-first hierarchy and computes the
 * overall confidence from the classifier, vector and reranker signals.
 */
export class ContextFusion {
  private options: ContextFusionOptions;

  constructor(options: Partial<ContextFusionOptions> = {}) {
    this.options = {
      weights: options.weights ?? config.fusion.weights,
      tierSize: options.tierSize ?? config.fusion.tierSize,
      maxEvidence: options.maxEvidence ?? config.fusion.maxEvidence,
      minDocumentSlots: options.minDocumentSlots ?? config.fusion.minDocumentSlots,
      lowConfidenceThreshold: options.lowConfidenceThreshold ?? config.fusion.lowConfidenceThreshold,
    };
  }

  fuse(intent: IntentResult, topVectorScore: number, evidence: ScoredEvidence[]): FusedContext {
    const ranked = evidence
      .map((item, order) => ({ item, order, tier: this.tierOf(item.score) }))
      .sort((a, b) => {
        if (a.tier !== b.tier) return b.tier - a.tier;
        if (a.item.provenance !== b.item.provenance) return a.item.provenance === 'graph' ? -1 : 1;
        if (a.item.score !== b.item.score) return b.item.score - a.item.score;
        return a.order - b.order;
      })
      .map(({ item }) => item);
    const ordered = this.truncate(ranked);

    const topRerankScore = evidence.reduce((max, item) => Math.max(max, item.score), 0);

    if (ordered.length === 0) {
      return {
        evidence: [],
        intent,
        topVectorScore,
        topRerankScore,
        confidence: 0,
        lowConfidence: true,
        noEvidence: true,
      };
    }

    const confidence = this.confidence(intent.confidence, topVectorScore, topRerankScore);
    return {
      evidence: ordered,
      intent,
      topVectorScore,
      topRerankScore,
      confidence,
      lowConfidence: confidence < this.options.lowConfidenceThreshold,
      noEvidence: false,
    };
  }

  confidence(intentConfidence: number, topVectorScore: number, topRerankScore: number): number {
    const { intent, vector, rerank } = this.options.weights;
    const total = intent + vector + rerank;
    if (total <= 0) return 0;

    const weighted =
      intent * clamp01(intentConfidence) +
      vector * clamp01(topVectorScore) +
      rerank * clamp01(topRerankScore);
    return clamp01(weighted / total);
  }

  private truncate(ranked: ScoredEvidence[]): ScoredEvidence[] {
    const { maxEvidence, minDocumentSlots } = this.options;
    if (ranked.length <= maxEvidence) return ranked;

    const documents = ranked.filter(item => item.provenance === 'document');
    const reserved = new Set<ScoredEvidence>(documents.slice(0, Math.min(minDocumentSlots, maxEvidence)));
    let open = maxEvidence - reserved.size;

    return ranked.filter(item => {
      if (reserved.has(item)) return true;
      if (open > 0) {
        open--;
        return true;
      }
      return false;
    });
  }

  // A perfect score belongs to the top tier rather than a tier of its own
  private tierOf(score: number): number {
    const topTier = Math.ceil(1 / this.options.tierSize) - 1;
    return Math.min(Math.floor(clamp01(score) / this.options.tierSize), topTier);
  }
}
