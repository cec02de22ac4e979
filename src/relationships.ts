/**
 * docschema Relationship Detection
 *
 * Strategies turn collection schemas into directed reference edges. The
 * default one only knows a naming convention: a field named `<word>Id`
 * (letters only, so nested and underscored paths never match) references any collection whose name contains `<word>`, `<word>s` or
 * `<word>es`.
 */

import type { CollectionSchema, RelationshipEdge } from './types.js';
import type { DocSchemaLogger } from './logger.js';

export interface RelationshipStrategy {
  readonly name: string;
  detect(collections: CollectionSchema[]): RelationshipEdge[];
}

const ID_FIELD_PATTERN = /^([A-Za-z]+)Id$/;

/**
 * Every (field, collection) match yields its own edge. Nothing is
 * deduplicated and a collection may reference itself. Edge order follows
 * collection order, then field order.
 */
export class NamingConventionStrategy implements RelationshipStrategy {
  readonly name = 'naming-convention';

  detect(collections: CollectionSchema[]): RelationshipEdge[] {
    const edges: RelationshipEdge[] = [];

    for (const collection of collections) {
      for (const field of Object.keys(collection.fields)) {
        const candidate = referencedEntity(field);
        if (!candidate) continue;

        for (const target of collections) {
          if (matchesCollection(candidate, target.name)) {
            edges.push({ source: collection.name, target: target.name, field });
          }
        }
      }
    }

    return edges;
  }
}

/**
 * `customerId` → `customer`. `billing.accountId` and `meta_userId` → null.
 */
export function referencedEntity(fieldPath: string): string | null {
  const match = ID_FIELD_PATTERN.exec(fieldPath);
  const word = match?.[1];
  return word ? word.toLowerCase() : null;
}

export function matchesCollection(candidate: string, collectionName: string): boolean {
  const name = collectionName.toLowerCase();
  return name.includes(candidate)
    || name.includes(`${candidate}s`)
    || name.includes(`${candidate}es`);
}

export function detectRelationships(
  collections: CollectionSchema[],
  logger: DocSchemaLogger,
  strategy: RelationshipStrategy = new NamingConventionStrategy(),
): RelationshipEdge[] {
  logger.info('Identifying relationships between collections...');
  const edges = strategy.detect(collections);

  for (const collection of collections) {
    const own = edges.filter(e => e.source === collection.name);
    for (const edge of own) logger.relationshipFound(edge);
    logger.info(`Found ${own.length} relationships for '${collection.name}'`);
  }

  logger.info(`Total relationships identified: ${edges.length}`);
  return edges;
}
