import { GraphNode } from '../types/graph';

/** Finds which known graph nodes are mentioned in a set of texts. */
export interface EntityMatcher {
  /**
   * Returns the matched candidates, ordered by first appearance (texts in
   * the given order, then position inside each text), without duplicates.
   */
  match(texts: readonly string[], candidates: readonly GraphNode[]): GraphNode[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word match of node names. "P-101" matches in
 * "pump P-101 trips" but not in "P-1010".
 */
export class SubstringEntityMatcher implements EntityMatcher {
  private patterns: Map<string, RegExp> = new Map();

  constructor(private minNameLength: number = 2) {}

  match(texts: readonly string[], candidates: readonly GraphNode[]): GraphNode[] {
    const named = candidates.filter(
      (node): node is GraphNode & { name: string } =>
        typeof node.name === 'string' && node.name.trim().length >= this.minNameLength
    );

    const seen = new Set<string>();
    const matched: GraphNode[] = [];

    for (const text of texts) {
      if (!text) continue;

      const hits: Array<{ node: GraphNode; position: number; order: number }> = [];
      named.forEach((node, order) => {
        if (seen.has(node.id)) return;
        const position = text.search(this.patternFor(node.name));
        if (position !== -1) {
          hits.push({ node, position, order });
        }
      });

      hits.sort((a, b) => a.position - b.position || a.order - b.order);
      for (const hit of hits) {
        seen.add(hit.node.id);
        matched.push(hit.node);
      }
    }

    return matched;
  }

  private patternFor(name: string): RegExp {
    const key = name.trim().toLowerCase();
    let pattern = this.patterns.get(key);
    if (!pattern) {
      pattern = new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(key)}(?![A-Za-z0-9])`, 'i');
      this.patterns.set(key, pattern);
    }
    return pattern;
  }
}
