import { StateGraph, END, START } from '@langchain/langgraph';
import { logger } from '../core/logger';
import { PipelineComponents, RunContext } from './context';
import { PipelineState, PipelineStateAnnotation } from './state';
import { createClassifierNode } from './nodes/classifier';
import { createSearcherNode } from './nodes/searcher';
import { createExpanderNode } from './nodes/expander';
import { createRerankerNode } from './nodes/reranker';
import { createFusionNode } from './nodes/fusion';
import { createGeneratorNode } from './nodes/generator';
import { createCompletionNode } from './nodes/completion';

export interface RetrievalGraphOptions {
  parallel: boolean;
}

function shouldCompleteAfterGeneration(state: PipelineState): string {
  if (state.error) {
    logger.debug('Routing to end (run failed)', { traceId: state.traceId, code: state.error.code });
    return 'failed';
  }
  return 'complete';
}

/**
 * classify ─┐
 *           ├─> expand -> rerank -> fuse -> generate -> complete
 * search  ──┘
 */
export function createRetrievalGraph(
  components: PipelineComponents,
  ctx: RunContext,
  options: RetrievalGraphOptions
) {
  const workflow = new StateGraph(PipelineStateAnnotation)
    .addNode('classify', createClassifierNode(components, ctx))
    .addNode('search', createSearcherNode(components, ctx))
    .addNode('expand', createExpanderNode(components, ctx))
    .addNode('rerank', createRerankerNode(components, ctx))
    .addNode('fuse', createFusionNode(components, ctx))
    .addNode('generate', createGeneratorNode(components, ctx))
    .addNode('complete', createCompletionNode(components, ctx));

  if (options.parallel) {
    workflow.addEdge(START, 'classify');
    workflow.addEdge(START, 'search');
    workflow.addEdge(['classify', 'search'], 'expand');
  } else {
    workflow.addEdge(START, 'classify');
    workflow.addEdge('classify', 'search');
    workflow.addEdge('search', 'expand');
  }

  workflow.addEdge('expand', 'rerank');
  workflow.addEdge('rerank', 'fuse');
  workflow.addEdge('fuse', 'generate');

  workflow.addConditionalEdges('generate', shouldCompleteAfterGeneration, {
    complete: 'complete',
    failed: END,
  });

  workflow.addEdge('complete', END);

  return workflow.compile();
}
