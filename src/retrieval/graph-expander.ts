import { config } from '../core/config';
import { logger } from '../core/logger';
import { GraphUnavailableError, PipelineAbortedError, errorMessage } from '../core/errors';
import { Chunk, GraphFact, Intent, RecognizedEntity } from '../types';
import { CallOptions, GraphStore } from '../types/capabilities';
import { GraphNode, NODE_LABELS, NodeLabel, TemplateId, TraversalTemplate } from '../types/graph';
import { ExpiringMap } from '../utils/expiring-map';
import { withTimeout } from '../utils/timeout';
import { EntityMatcher, SubstringEntityMatcher } from './entity-matcher';
import { renderFact } from './fact-renderer';
import { templatesFor } from './traversal-templates';

export interface GraphExpanderOptions {
  maxFacts: number;
  maxNeighbors: number;
  entityCacheTtlMs: number;
  timeoutMs: number;
  matcher: EntityMatcher;
}

export interface GraphExpansion {
  facts: GraphFact[];
  // Named nodes recognized in the query or chunks, then named nodes reached by the walk
  entities: RecognizedEntity[];
  templates: TemplateId[];
  anchors: number;
}

interface Candidate {
  fact: GraphFact;
  templateIndex: number;
  discovery: number;
}

const ENTITY_CACHE_KEY = 'named-nodes';

/**
 * Walks the entity graph along the traversal templates of the query's
 * intent, starting from nodes recognized in the query and retrieved chunks.
 */
export class GraphExpander {
  private options: GraphExpanderOptions;
  private entityCache: ExpiringMap<GraphNode[]>;

  constructor(
    private store: GraphStore,
    options: Partial<GraphExpanderOptions> = {}
  ) {
    this.options = {
      maxFacts: options.maxFacts ?? config.graph.maxFacts,
      maxNeighbors: options.maxNeighbors ?? config.graph.maxNeighbors,
      entityCacheTtlMs: options.entityCacheTtlMs ?? config.graph.entityCacheTtlMs,
      timeoutMs: options.timeoutMs ?? config.execution.dbTimeout,
      matcher: options.matcher ?? new SubstringEntityMatcher(),
    };
    this.entityCache = new ExpiringMap<GraphNode[]>(this.options.entityCacheTtlMs);
  }

  async expand(intent: Intent, query: string, chunks: Chunk[], options: CallOptions = {}): Promise<GraphExpansion> {
    const templates = templatesFor(intent);

    try {
      const known = await this.namedNodes(options.signal);
      const recognized = this.options.matcher.match(
        [query, ...chunks.map(chunk => chunk.text), ...chunks.flatMap(chunk => chunk.entities)],
        known
      );

      const anchorLabels = new Set<NodeLabel>(templates.flatMap(template => template.anchors));
      const anchors = this.collectAnchors(recognized, chunks, known).filter(node => anchorLabels.has(node.label));

      const candidates: Candidate[] = [];
      for (const [templateIndex, template] of templates.entries()) {
        for (const anchor of anchors) {
          if (!template.anchors.includes(anchor.label)) continue;

          const paths = await this.walk(template, anchor, options.signal);
          for (const path of paths) {
            candidates.push({ fact: path, templateIndex, discovery: candidates.length });
          }
        }
      }

      const facts = this.rank(candidates);

      logger.debug('Graph expansion completed', {
        intent,
        anchors: anchors.length,
        candidates: candidates.length,
        facts: facts.length,
      });

      return {
        facts,
        entities: this.collectEntities(recognized, facts, known),
        templates: templates.map(template => template.id),
        anchors: anchors.length,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError('Aborted during graph expansion');
      }
      logger.warn('Graph expansion failed', { intent, error: errorMessage(error) });
      throw new GraphUnavailableError(`Graph expansion failed: ${errorMessage(error)}`);
    }
  }

  private async namedNodes(signal?: AbortSignal): Promise<GraphNode[]> {
    const cached = this.entityCache.get(ENTITY_CACHE_KEY);
    if (cached) return cached;

    const nodes = await withTimeout(
      (child) => this.store.findEntities(NODE_LABELS, { signal: child }),
      this.options.timeoutMs,
      'graph entity lookup',
      signal
    );
    this.entityCache.set(ENTITY_CACHE_KEY, nodes);
    return nodes;
  }

  // Recognized entities first, then the retrieved chunks and their documents
  private collectAnchors(recognized: GraphNode[], chunks: Chunk[], known: GraphNode[]): GraphNode[] {
    const byId = new Map(known.map(node => [node.id, node]));
    const anchors = new Map<string, GraphNode>();

    for (const node of recognized) {
      anchors.set(node.id, node);
    }

    for (const chunk of chunks) {
      if (!anchors.has(chunk.chunkId)) {
        anchors.set(chunk.chunkId, byId.get(chunk.chunkId) ?? { id: chunk.chunkId, label: 'Chunk' });
      }
      if (!anchors.has(chunk.documentId)) {
        anchors.set(
          chunk.documentId,
          byId.get(chunk.documentId) ?? { id: chunk.documentId, label: 'Document', name: chunk.documentTitle }
        );
      }
    }

    return [...anchors.values()];
  }

  /**
   * Every maximal path through `anchor` along the template: extended as far
   * back and as far forward as the graph allows. Paths without a hop are
   * dropped.
   */
  private async walk(template: TraversalTemplate, anchor: GraphNode, signal?: AbortSignal): Promise<GraphFact[]> {
    const position = template.nodes.indexOf(anchor.label);
    if (position === -1) return [];

    const backward = await this.extend(template, anchor, position, 'in', signal);
    const forward = await this.extend(template, anchor, position, 'out', signal);

    const facts: GraphFact[] = [];
    for (const before of backward) {
      for (const after of forward) {
        const nodes = [...before].reverse().concat(after.slice(1));
        const hops = nodes.length - 1;
        if (hops < 1) continue;

        const start = position - (before.length - 1);
        const relations = template.relations.slice(start, start + hops);
        const path = {
          nodes: nodes.map(node => ({ id: node.id, label: node.label, name: node.name })),
          relations: [...relations],
        };

        facts.push({ sentence: renderFact(path), path, hops, template: template.id });
      }
    }
    return facts;
  }

  // Chains start at the anchor and grow one template position per hop
  private async extend(
    template: TraversalTemplate,
    anchor: GraphNode,
    position: number,
    direction: 'in' | 'out',
    signal?: AbortSignal
  ): Promise<GraphNode[][]> {
    const finished: GraphNode[][] = [];
    let frontier: GraphNode[][] = [[anchor]];

    const steps = direction === 'in' ? position : template.nodes.length - 1 - position;
    for (let step = 1; step <= steps && frontier.length > 0; step++) {
      const relation = direction === 'in' ? template.relations[position - step] : template.relations[position + step - 1];
      const targetLabel = direction === 'in' ? template.nodes[position - step] : template.nodes[position + step];
      const fromIds = [...new Set(frontier.map(chain => chain[chain.length - 1].id))];

      const neighbors = await withTimeout(
        (child) =>
          this.store.hop(
            { fromIds, relation, direction, targetLabel, limit: this.options.maxNeighbors },
            { signal: child }
          ),
        this.options.timeoutMs,
        `graph hop ${relation}`,
        signal
      );

      const next: GraphNode[][] = [];
      for (const chain of frontier) {
        const head = chain[chain.length - 1];
        const reached = neighbors.filter(neighbor => neighbor.sourceId === head.id);
        if (reached.length === 0) {
          finished.push(chain);
          continue;
        }
        for (const neighbor of reached) {
          next.push([...chain, neighbor.node]);
        }
      }
      frontier = next;
    }

    return finished.concat(frontier);
  }

  private rank(candidates: Candidate[]): GraphFact[] {
    const ordered = [...candidates].sort(
      (a, b) =>
        b.fact.hops - a.fact.hops ||
        a.templateIndex - b.templateIndex ||
        a.discovery - b.discovery
    );

    const seen = new Set<string>();
    const facts: GraphFact[] = [];
    for (const { fact } of ordered) {
      if (seen.has(fact.sentence)) continue;
      seen.add(fact.sentence);
      facts.push(fact);
      if (facts.length >= this.options.maxFacts) break;
    }
    return facts;
  }

  private collectEntities(recognized: GraphNode[], facts: GraphFact[], known: GraphNode[]): RecognizedEntity[] {
    const byId = new Map(known.map(node => [node.id, node]));
    const entities = new Map<string, RecognizedEntity>();

    const add = (node: Pick<GraphNode, 'id' | 'label' | 'name'>) => {
      if (!node.name || entities.has(node.id)) return;
      entities.set(node.id, { id: node.id, name: node.name, label: node.label, category: byId.get(node.id)?.category });
    };

    recognized.forEach(add);
    for (const fact of facts) {
      fact.path.nodes.forEach(add);
    }
    return [...entities.values()];
  }
}
