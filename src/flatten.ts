/**
 * docschema Nested Flattening — render-time helper
 *
 * Flattens a nested sample structure with underscore-joined keys. This is a
 * separate convention from the dot-joined paths produced while sampling
 * (`address.city` there, `address_city` here). The two are not unified.
 */

import type { FieldType, NestedFields } from './types.js';
import { isPlainObject, simplifiedType } from './classify.js';

export function flattenNestedFields(nested: NestedFields, parentKey = ''): Record<string, FieldType> {
  const flattened: Record<string, FieldType> = {};

  for (const [key, value] of Object.entries(nested)) {
    const newKey = parentKey ? `${parentKey}_${key}` : key;

    if (isPlainObject(value)) {
      Object.assign(flattened, flattenNestedFields(value, newKey));
      continue;
    }

    if (Array.isArray(value) && value.length > 0 && isPlainObject(value[0])) {
      // Array of subdocuments: describe the first item's shape
      flattened[newKey] = 'array';
      Object.assign(flattened, flattenNestedFields(value[0], `${newKey}_item`));
      continue;
    }

    flattened[newKey] = simplifiedType(value);
  }

  return flattened;
}
