/**
 * Receipt Tests — Structured run results
 */

import { describe, it, expect } from 'vitest';
import { createReceipt } from '../src/receipts.js';

describe('createReceipt', () => {
  it('creates a receipt with counts', () => {
    const receipt = createReceipt({
      outputPath: 'schemas/unified_database_schema.md',
      startTime: Date.now() - 12,
      collections: 3,
      skippedCollections: 1,
      fields: 17,
      relationships: 2,
      corrected: true,
    });

    expect(receipt.outputPath).toBe('schemas/unified_database_schema.md');
    expect(receipt.collections).toBe(3);
    expect(receipt.skippedCollections).toBe(1);
    expect(receipt.fields).toBe(17);
    expect(receipt.relationships).toBe(2);
    expect(receipt.corrected).toBe(true);
    expect(receipt.success).toBe(true);
    expect(receipt.duration).toBeGreaterThanOrEqual(0);
  });

  it('defaults counts to zero', () => {
    const receipt = createReceipt({ outputPath: 'out.md', startTime: Date.now() });
    expect(receipt.collections).toBe(0);
    expect(receipt.skippedCollections).toBe(0);
    expect(receipt.fields).toBe(0);
    expect(receipt.relationships).toBe(0);
    expect(receipt.corrected).toBe(false);
  });
});
