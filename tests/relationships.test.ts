/**
 * Relationship Detection Tests — naming convention strategy
 */

import { describe, it, expect, vi } from 'vitest';
import {
  NamingConventionStrategy,
  detectRelationships,
  matchesCollection,
  referencedEntity,
} from '../src/relationships.js';
import type { RelationshipStrategy } from '../src/relationships.js';
import { DocSchemaLogger } from '../src/logger.js';
import type { CollectionSchema } from '../src/types.js';

const strategy = new NamingConventionStrategy();

describe('referencedEntity', () => {
  it('extracts the lower-cased word before Id', () => {
    expect(referencedEntity('customerId')).toBe('customer');
    expect(referencedEntity('ParentCategoryId')).toBe('parentcategory');
  });

  it('only accepts a whole field name made of letters', () => {
    expect(referencedEntity('billing.accountId')).toBeNull();
    expect(referencedEntity('meta_userId')).toBeNull();
    expect(referencedEntity('user2Id')).toBeNull();
  });

  it('ignores fields without the suffix', () => {
    expect(referencedEntity('name')).toBeNull();
    expect(referencedEntity('customerid')).toBeNull();
    expect(referencedEntity('Id')).toBeNull();
    expect(referencedEntity('customer_id')).toBeNull();
  });
});

describe('matchesCollection', () => {
  it('matches singular, s and es plural forms as substrings', () => {
    expect(matchesCollection('customer', 'customers')).toBe(true);
    expect(matchesCollection('box', 'Boxes')).toBe(true);
    expect(matchesCollection('user', 'app_users')).toBe(true);
    expect(matchesCollection('customer', 'orders')).toBe(false);
  });
});

describe('NamingConventionStrategy', () => {
  it('finds one edge for a foreign key field', () => {
    const collections: CollectionSchema[] = [
      { name: 'orders', fields: { customerId: 'string' } },
      { name: 'customers', fields: { name: 'string' } },
    ];
    expect(strategy.detect(collections)).toEqual([
      { source: 'orders', target: 'customers', field: 'customerId' },
    ]);
  });

  it('finds nothing without Id fields', () => {
    const collections: CollectionSchema[] = [
      { name: 'orders', fields: { total: 'float' } },
      { name: 'customers', fields: { name: 'string' } },
    ];
    expect(strategy.detect(collections)).toEqual([]);
  });

  it('emits one edge per matching collection without deduplication', () => {
    const collections: CollectionSchema[] = [
      { name: 'reviews', fields: { userId: 'string', authorUserId: 'string' } },
      { name: 'users', fields: {} },
      { name: 'admin_users', fields: {} },
    ];
    expect(strategy.detect(collections)).toEqual([
      { source: 'reviews', target: 'users', field: 'userId' },
      { source: 'reviews', target: 'admin_users', field: 'userId' },
    ]);
  });

  it('ignores nested and prefixed Id paths', () => {
    const collections: CollectionSchema[] = [
      { name: 'orders', fields: { 'billing.accountId': 'string', meta_userId: 'string' } },
      { name: 'accounts', fields: {} },
      { name: 'users', fields: {} },
    ];
    expect(strategy.detect(collections)).toEqual([]);
  });

  it('allows a collection to reference itself', () => {
    const collections: CollectionSchema[] = [
      { name: 'nodes', fields: { parentNodeId: 'string', nodeId: 'string' } },
    ];
    expect(strategy.detect(collections)).toEqual([
      { source: 'nodes', target: 'nodes', field: 'nodeId' },
    ]);
  });
});

describe('detectRelationships', () => {
  it('logs each edge and uses a substituted strategy', () => {
    const logger = new DocSchemaLogger({ enabled: true, verbose: false });
    const found = vi.fn();
    logger.emitter.on('relationship-found', found);

    const explicit: RelationshipStrategy = {
      name: 'explicit',
      detect: () => [{ source: 'a', target: 'b', field: 'ref' }],
    };
    const edges = detectRelationships(
      [{ name: 'a', fields: {} }, { name: 'b', fields: {} }],
      logger,
      explicit,
    );

    expect(edges).toEqual([{ source: 'a', target: 'b', field: 'ref' }]);
    expect(found).toHaveBeenCalledWith({ source: 'a', target: 'b', field: 'ref' });
  });
});
