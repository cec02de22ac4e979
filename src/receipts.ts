/**
 * docschema Run Receipts — Structured pipeline results
 *
 * Every run returns a RunReceipt. Never void.
 */

import type { RunReceipt } from './types.js';

export function createReceipt(opts: {
  outputPath: string;
  startTime: number;
  collections?: number;
  skippedCollections?: number;
  fields?: number;
  relationships?: number;
  corrected?: boolean;
  success?: boolean;
}): RunReceipt {
  return {
    outputPath: opts.outputPath,
    collections: opts.collections ?? 0,
    skippedCollections: opts.skippedCollections ?? 0,
    fields: opts.fields ?? 0,
    relationships: opts.relationships ?? 0,
    corrected: opts.corrected ?? false,
    duration: Date.now() - opts.startTime,
    success: opts.success ?? true,
  };
}
