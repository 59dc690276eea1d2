import { ContextFusion } from '../retrieval/context-fusion';
import { IntentResult, ScoredEvidence } from '../types';
import { HIT_GUIDE, HIT_MANUAL, RESPONSIBLE_FACT, toChunk } from './helpers/fixtures';

const INTENT: IntentResult = { intent: 'people', confidence: 0.9, reasoning: 'asks who' };

function graph(score: number, sentence: string = RESPONSIBLE_FACT.sentence): ScoredEvidence {
  return { provenance: 'graph', fact: { ...RESPONSIBLE_FACT, sentence }, score, requiresCitation: false };
}

function doc(score: number, citation: number): ScoredEvidence {
  const hit = citation === 1 ? HIT_MANUAL : HIT_GUIDE;
  return { provenance: 'document', chunk: toChunk(hit, citation - 1), score, requiresCitation: true, citation };
}

function label(item: ScoredEvidence): string {
  return item.provenance === 'graph' ? `graph@${item.score}` : `doc${item.citation}@${item.score}`;
}

describe('ContextFusion', () => {
  const fusion = new ContextFusion({
    weights: { intent: 0.2, vector: 0.3, rerank: 0.5 },
    tierSize: 0.25,
    maxEvidence: 15,
    minDocumentSlots: 3,
    lowConfidenceThreshold: 0.3,
  });

  describe('evidence hierarchy', () => {
    test('should order by score tier and put graph facts first within a tier', () => {
      const fused = fusion.fuse(INTENT, 0.82, [doc(0.9, 1), graph(0.8), doc(0.6, 2), graph(0.3, 'low fact')]);

      expect(fused.evidence.map(label)).toEqual(['graph@0.8', 'doc1@0.9', 'doc2@0.6', 'graph@0.3']);
    });

    test('should place a perfect score in the top tier', () => {
      const fused = fusion.fuse(INTENT, 0.82, [doc(1, 1), graph(0.76)]);

      expect(fused.evidence.map(label)).toEqual(['graph@0.76', 'doc1@1']);
    });

    test('should sort by score within a tier and provenance', () => {
      const fused = fusion.fuse(INTENT, 0.82, [graph(0.8, 'a'), graph(0.9, 'b'), graph(0.8, 'c')]);

      expect(fused.evidence.map(item => (item.provenance === 'graph' ? item.fact.sentence : ''))).toEqual([
        'b',
        'a',
        'c',
      ]);
    });

    test('should keep at most maxEvidence items', () => {
      const narrow = new ContextFusion({ maxEvidence: 2, minDocumentSlots: 0 });

      const fused = narrow.fuse(INTENT, 0.82, [doc(0.9, 1), graph(0.8), doc(0.6, 2)]);

      expect(fused.evidence.map(label)).toEqual(['graph@0.8', 'doc1@0.9']);
    });

    test('should keep document slots when top-tier graph facts fill maxEvidence', () => {
      const narrow = new ContextFusion({ maxEvidence: 3, minDocumentSlots: 1 });

      const fused = narrow.fuse(INTENT, 0.82, [
        graph(0.9, 'a'),
        graph(0.9, 'b'),
        graph(0.9, 'c'),
        graph(0.9, 'd'),
        doc(0.8, 1),
      ]);

      expect(fused.evidence.map(item => (item.provenance === 'graph' ? item.fact.sentence : `doc${item.citation}`))).toEqual([
        'a',
        'b',
        'doc1',
      ]);
    });

    test('should reserve no more slots than there are documents', () => {
      const narrow = new ContextFusion({ maxEvidence: 3, minDocumentSlots: 2 });

      const fused = narrow.fuse(INTENT, 0.82, [graph(0.9, 'a'), graph(0.9, 'b'), graph(0.9, 'c'), doc(0.3, 1)]);

      expect(fused.evidence.map(label)).toEqual(['graph@0.9', 'graph@0.9', 'doc1@0.3']);
    });
  });

  describe('skip connections', () => {
    test('should carry the intent and top vector score unchanged', () => {
      const fused = fusion.fuse(INTENT, 0.82, [graph(0.7)]);

      expect(fused.intent).toBe(INTENT);
      expect(fused.topVectorScore).toBe(0.82);
    });

    test('should carry them even with no evidence', () => {
      const fused = fusion.fuse(INTENT, 0.4, []);

      expect(fused).toEqual({
        evidence: [],
        intent: INTENT,
        topVectorScore: 0.4,
        topRerankScore: 0,
        confidence: 0,
        lowConfidence: true,
        noEvidence: true,
      });
    });
  });

  describe('confidence', () => {
    test('should combine intent, vector and rerank signals with the configured weights', () => {
      const fused = fusion.fuse(INTENT, 0.82, [graph(0.96), doc(0.784, 1)]);

      expect(fused.topRerankScore).toBe(0.96);
      expect(fused.confidence).toBeCloseTo(0.906, 10);
      expect(fused.lowConfidence).toBe(false);
      expect(fused.noEvidence).toBe(false);
    });

    test('should use the best score even when it was truncated away', () => {
      const narrow = new ContextFusion({ maxEvidence: 1 });

      const fused = narrow.fuse(INTENT, 0.5, [doc(0.95, 1), graph(0.7)]);

      expect(fused.evidence.map(label)).toEqual(['doc1@0.95']);
      expect(fused.topRerankScore).toBe(0.95);
    });

    test('should flag low confidence below the threshold', () => {
      const fallback: IntentResult = { intent: 'asset_info', confidence: 0, reasoning: '', fallback: true };

      const fused = fusion.fuse(fallback, 0, [doc(0.4, 1)]);

      expect(fused.confidence).toBeCloseTo(0.2, 10);
      expect(fused.lowConfidence).toBe(true);
    });

    test('should normalize by the sum of the weights', () => {
      const custom = new ContextFusion({ weights: { intent: 1, vector: 1, rerank: 2 } });

      expect(custom.confidence(0.5, 0.5, 1)).toBe(0.75);
    });

    test('should clamp out-of-range signals', () => {
      expect(fusion.confidence(1.5, -1, 2)).toBeCloseTo(0.7, 10);
    });
  });
});
