/**
 * docschema Diagram Rendering — UnifiedSchema → Mermaid erDiagram draft
 *
 * The draft still goes through the normalizer before it is written.
 */

import type { CollectionSchema, RelationshipEdge, UnifiedSchema } from './types.js';
import { flattenNestedFields } from './flatten.js';

export const DIAGRAM_HEADER = 'erDiagram';
export const RELATIONSHIP_TOKEN = '||--o{';
export const RELATIONSHIP_LABEL = 'references';
export const CLOSING_FENCE = '```';

const INDENT = '    ';

export function renderDiagram(schema: UnifiedSchema): string {
  let content = `${DIAGRAM_HEADER}\n`;

  for (const collection of schema.collections) {
    content += renderEntity(collection);
  }

  for (const edge of schema.relationships) {
    content += `${renderRelationship(edge)}\n`;
  }

  return content;
}

export function renderEntity(collection: CollectionSchema): string {
  let block = `${collection.name} {\n`;

  for (const [fieldName, entry] of Object.entries(collection.fields)) {
    if (typeof entry === 'string') {
      block += `${INDENT}${entry} ${fieldName}\n`;
      continue;
    }
    for (const [nestedName, nestedType] of Object.entries(flattenNestedFields(entry, fieldName))) {
      block += `${INDENT}${nestedType} ${nestedName}\n`;
    }
  }

  return `${block}}\n\n`;
}

export function renderRelationship(edge: RelationshipEdge): string {
  return `${INDENT}${edge.source} ${RELATIONSHIP_TOKEN} ${edge.target} : ${RELATIONSHIP_LABEL}`;
}
