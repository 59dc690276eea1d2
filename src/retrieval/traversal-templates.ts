import { Intent } from '../types';
import { TraversalTemplate } from '../types/graph';

const PERSON_ROLE_ASSET: TraversalTemplate = {
  id: 'person-role-asset',
  nodes: ['Person', 'Role', 'Asset'],
  relations: ['HAS_ROLE', 'RESPONSIBLE_FOR'],
  anchors: ['Person', 'Role', 'Asset'],
};

const PERSON_TEAM: TraversalTemplate = {
  id: 'person-team',
  nodes: ['Person', 'Team'],
  relations: ['MEMBER_OF'],
  anchors: ['Person'],
};

const ASSET_COMPONENT: TraversalTemplate = {
  id: 'asset-component',
  nodes: ['Asset', 'Component'],
  relations: ['HAS_COMPONENT'],
  anchors: ['Asset'],
};

const ASSET_LOCATION: TraversalTemplate = {
  id: 'asset-location',
  nodes: ['Asset', 'Location'],
  relations: ['LOCATED_AT'],
  anchors: ['Asset'],
};

const DOCUMENT_ASSET: TraversalTemplate = {
  id: 'document-asset',
  nodes: ['Document', 'Asset'],
  relations: ['APPLIES_TO'],
  anchors: ['Document', 'Asset'],
};

const CHUNK_COMPONENT: TraversalTemplate = {
  id: 'chunk-component',
  nodes: ['Chunk', 'Component'],
  relations: ['MENTIONS'],
  anchors: ['Chunk', 'Component'],
};

const PERSON_OVERSIGHT_ASSET: TraversalTemplate = {
  id: 'person-oversight-asset',
  nodes: ['Person', 'Asset'],
  relations: ['SAFETY_OVERSIGHT'],
  anchors: ['Person', 'Asset'],
};

/** Graph walks per intent, in priority order. */
export const TRAVERSAL_TEMPLATES: Readonly<Record<Intent, readonly TraversalTemplate[]>> = {
  people: [PERSON_ROLE_ASSET, PERSON_TEAM],
  asset_info: [ASSET_COMPONENT, ASSET_LOCATION],
  procedure: [DOCUMENT_ASSET, CHUNK_COMPONENT],
  troubleshooting: [DOCUMENT_ASSET, CHUNK_COMPONENT],
  safety: [PERSON_OVERSIGHT_ASSET, ASSET_LOCATION],
};

export function templatesFor(intent: Intent): readonly TraversalTemplate[] {
  return TRAVERSAL_TEMPLATES[intent];
}
