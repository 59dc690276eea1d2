import { IntentResult } from '../../types';
import { PipelineComponents, RunContext } from '../context';
import { PipelineNode, guardNode, recordStep } from './stage';

const UNCLASSIFIED: IntentResult = { intent: 'asset_info', confidence: 0, reasoning: '', fallback: true };

export function createFusionNode(components: PipelineComponents, ctx: RunContext): PipelineNode {
  return guardNode('context_fusion', ctx, async (state) => {
    const startedAt = Date.now();

    // Intent and vector score come straight from the first stage, not from the reranker
    const fused = components.fusion.fuse(state.intent ?? UNCLASSIFIED, state.topVectorScore, state.evidence);

    const fromGraph = fused.evidence.filter(item => item.provenance === 'graph').length;
    return {
      fused,
      stage: 'fused',
      steps: [
        recordStep(ctx, 'context_fusion', 'fused', startedAt, `Fused ${fused.evidence.length} evidence items`, {
          total_evidence: fused.evidence.length,
          from_graph: fromGraph,
          from_documents: fused.evidence.length - fromGraph,
          confidence: fused.confidence,
          low_confidence: fused.lowConfidence,
          no_evidence: fused.noEvidence,
        }),
      ],
    };
  });
}
