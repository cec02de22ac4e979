/**
 * Nested Flattening Tests — underscore keys and _item expansion
 */

import { describe, it, expect } from 'vitest';
import { flattenNestedFields } from '../src/flatten.js';

describe('flattenNestedFields', () => {
  it('joins nested keys with underscores', () => {
    expect(flattenNestedFields({ city: 'Oslo', geo: { lat: 1.5 } }, 'address')).toEqual({
      address_city: 'string',
      address_geo_lat: 'float',
    });
  });

  it('expands the first item of an array of objects', () => {
    const flattened = flattenNestedFields({ lines: [{ sku: 'A1', qty: 2 }, { other: true }] }, 'order');
    expect(flattened).toEqual({
      order_lines: 'array',
      order_lines_item_sku: 'string',
      order_lines_item_qty: 'integer',
    });
  });

  it('parameterizes arrays of scalars', () => {
    expect(flattenNestedFields({ scores: [1, 2], tags: ['x'], empty: [] })).toEqual({
      scores: 'array<integer>',
      tags: 'array<string>',
      empty: 'array',
    });
  });

  it('uses unknown for values it cannot classify', () => {
    expect(flattenNestedFields({ seen: null }, 'meta')).toEqual({ meta_seen: 'unknown' });
  });
});
