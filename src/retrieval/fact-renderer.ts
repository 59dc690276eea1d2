import { GraphPathRef, Relation } from '../types/graph';

const RELATION_PHRASES: Record<Relation, string> = {
  HAS_ROLE: 'has the role',
  RESPONSIBLE_FOR: 'is responsible for',
  MEMBER_OF: 'is a member of',
  HAS_COMPONENT: 'has component',
  LOCATED_AT: 'is located at',
  APPLIES_TO: 'applies to',
  MENTIONS: 'mentions',
  SAFETY_OVERSIGHT: 'has safety oversight of',
  PERFORMED: 'performed maintenance on',
};

type PathNode = GraphPathRef['nodes'][number];

export function displayName(node: PathNode): string {
  return node.name ?? `${node.label} ${node.id}`;
}

/**
 * Renders a path as one sentence keeping every intermediate node:
 *   Person -HAS_ROLE-> Role -RESPONSIBLE_FOR-> Asset
 *   => "John Smith (Mechanical Technician) is responsible for P-101"
 */
export function renderFact(path: GraphPathRef): string {
  const { nodes, relations } = path;
  if (relations.length === 0 || nodes.length !== relations.length + 1) {
    return nodes.map(displayName).join(', ');
  }

  let subject = displayName(nodes[0]);
  let next = 0;

  // A role reads as an apposition of the person holding it
  if (relations[0] === 'HAS_ROLE' && relations.length > 1) {
    subject = `${subject} (${displayName(nodes[1])})`;
    next = 1;
  }

  let sentence = `${subject} ${RELATION_PHRASES[relations[next]]} ${displayName(nodes[next + 1])}`;
  for (let i = next + 1; i < relations.length; i++) {
    sentence += `, which ${RELATION_PHRASES[relations[i]]} ${displayName(nodes[i + 1])}`;
  }
  return sentence;
}
