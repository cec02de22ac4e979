/**
 * docschema Type Classification — runtime value → FieldType
 *
 * Two modes:
 * - classifyValue: used while sampling. Unknown values fall back to `string`,
 *   string arrays become `string[]`, every other array is `array`.
 * - simplifiedType: used while flattening nested structures for rendering.
 *   Arrays carry their first element's type (`array<integer>`) and unknown
 *   values become `unknown`.
 *
 * Only an array's first element is inspected; heterogeneous arrays are not
 * detected.
 */

import type { FieldType, NestedFields } from './types.js';

export function classifyValue(value: unknown): FieldType {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';

  if (Array.isArray(value)) {
    if (value.length > 0 && typeof value[0] === 'string') return 'string[]';
    return 'array';
  }

  if (isPlainObject(value)) return 'json';

  // null, Date, ObjectId, Binary, Decimal128 ...
  return 'string';
}

export function simplifiedType(value: unknown): FieldType {
  if (Array.isArray(value)) {
    if (value.length === 0) return 'array';
    return `array<${simplifiedType(value[0])}>`;
  }
  if (isPlainObject(value)) return 'json';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'string') return 'string';
  return 'unknown';
}

/**
 * True for subdocuments. BSON values such as ObjectId or Date are class
 * instances and do not count.
 */
export function isPlainObject(value: unknown): value is NestedFields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
