import { Chunk, GraphFact } from '../../types';
import { VectorHit } from '../../types/capabilities';
import { GraphNode } from '../../types/graph';
import { EdgeFixture, InMemoryGraphStore } from './fakes';

export const NODES: GraphNode[] = [
  { id: 'person-john', label: 'Person', name: 'John Smith', view: 'people' },
  { id: 'person-maria', label: 'Person', name: 'Maria Garcia', view: 'people' },
  { id: 'role-mech', label: 'Role', name: 'Mechanical Technician', view: 'people' },
  { id: 'team-rotating', label: 'Team', name: 'Rotating Equipment Team', view: 'people' },
  { id: 'asset-p101', label: 'Asset', name: 'P-101', category: 'pump', view: 'asset' },
  { id: 'asset-v201', label: 'Asset', name: 'V-201', category: 'valve', view: 'asset' },
  { id: 'comp-bearing', label: 'Component', name: 'Bearing B-7', view: 'asset' },
  { id: 'comp-seal', label: 'Component', name: 'Mechanical seal', view: 'asset' },
  { id: 'loc-a', label: 'Location', name: 'Pump House A', view: 'asset' },
  { id: 'doc-1', label: 'Document', name: 'P-101 Maintenance Manual', view: 'document' },
  { id: 'chunk-1', label: 'Chunk', view: 'document' },
];

export const EDGES: EdgeFixture[] = [
  { from: 'person-john', to: 'role-mech', relation: 'HAS_ROLE' },
  { from: 'role-mech', to: 'asset-p101', relation: 'RESPONSIBLE_FOR' },
  { from: 'person-john', to: 'team-rotating', relation: 'MEMBER_OF' },
  { from: 'person-maria', to: 'asset-p101', relation: 'SAFETY_OVERSIGHT' },
  { from: 'asset-p101', to: 'comp-bearing', relation: 'HAS_COMPONENT' },
  { from: 'asset-p101', to: 'comp-seal', relation: 'HAS_COMPONENT' },
  { from: 'asset-p101', to: 'loc-a', relation: 'LOCATED_AT' },
  { from: 'doc-1', to: 'asset-p101', relation: 'APPLIES_TO' },
  { from: 'chunk-1', to: 'comp-seal', relation: 'MENTIONS' },
];

export const HIT_MANUAL: VectorHit = {
  chunkId: 'chunk-1',
  documentId: 'doc-1',
  documentTitle: 'P-101 Maintenance Manual',
  text: 'Inspect the pump bearings every 500 operating hours.',
  score: 0.82,
  entities: ['P-101'],
};

export const HIT_GUIDE: VectorHit = {
  chunkId: 'chunk-2',
  documentId: 'doc-2',
  documentTitle: 'General Pump Guide',
  text: 'Centrifugal pumps require regular lubrication.',
  score: 0.61,
  entities: [],
};

export const RESPONSIBLE_FACT: GraphFact = {
  sentence: 'John Smith (Mechanical Technician) is responsible for P-101',
  path: {
    nodes: [
      { id: 'person-john', label: 'Person', name: 'John Smith' },
      { id: 'role-mech', label: 'Role', name: 'Mechanical Technician' },
      { id: 'asset-p101', label: 'Asset', name: 'P-101' },
    ],
    relations: ['HAS_ROLE', 'RESPONSIBLE_FOR'],
  },
  hops: 2,
  template: 'person-role-asset',
};

export function maintenanceGraph(): InMemoryGraphStore {
  return new InMemoryGraphStore(
    NODES.map(node => ({ ...node })),
    EDGES.map(edge => ({ ...edge }))
  );
}

export function toChunk(hit: VectorHit, rank: number): Chunk {
  return {
    chunkId: hit.chunkId,
    documentId: hit.documentId,
    documentTitle: hit.documentTitle,
    text: hit.text,
    score: hit.score,
    entities: hit.entities ?? [],
    rank,
  };
}
