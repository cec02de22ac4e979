/**
 * docschema Field Extraction — document → flat dotted-path FieldMap
 */

import type { FieldMap } from './types.js';
import { classifyValue, isPlainObject } from './classify.js';

const IDENTITY_KEY = '_id';

/**
 * Walk one document. Nested objects get a `json` entry and, in addition,
 * every child under `parent.child`. The identity key is skipped at the top
 * level only; a nested `_id` is classified like any other field.
 */
export function extractDocumentFields(doc: Record<string, unknown>, prefix = ''): FieldMap {
  const fields: FieldMap = {};

  for (const [key, value] of Object.entries(doc)) {
    if (prefix === '' && key === IDENTITY_KEY) continue;

    const path = prefix ? `${prefix}.${key}` : key;
    const type = classifyValue(value);
    fields[path] = type;

    if (type === 'json' && isPlainObject(value)) {
      Object.assign(fields, extractDocumentFields(value, path));
    }
  }

  return fields;
}

/**
 * Merge `next` into `target`. Last write wins: a path keeps the type of the
 * most recent document that had it, not the most common one.
 */
export function mergeFieldMaps(target: FieldMap, next: FieldMap): FieldMap {
  return Object.assign(target, next);
}
