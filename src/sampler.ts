/**
 * docschema Collection Sampling
 *
 * Draws a random sample from one collection and merges every document's
 * FieldMap into a single schema. A path's type comes from the last sampled
 * document that had it (see mergeFieldMaps), so a field stored with mixed
 * types reports whichever one was sampled last.
 */

import type { CollectionSchema, FieldFilters, FieldMap } from './types.js';
import type { DocumentSource } from './adapters/source.js';
import type { DocSchemaLogger } from './logger.js';
import { DocSchemaError, errorMessage } from './errors.js';
import { extractDocumentFields, mergeFieldMaps } from './extract.js';

const PROGRESS_EVERY = 10;

export interface SampleResult {
  fields: FieldMap;
  documents: number;
}

/**
 * Sample `collection` and merge the documents' fields. Retrieval errors are
 * logged and produce an empty map so the run can move on to the next
 * collection.
 */
export async function sampleFields(
  source: DocumentSource,
  collection: string,
  sampleSize: number,
  logger: DocSchemaLogger,
): Promise<SampleResult> {
  logger.info(`Analyzing collection '${collection}' (sampling ${sampleSize} documents)...`);
  const startTime = Date.now();
  const fields: FieldMap = {};
  let documents = 0;

  try {
    for await (const doc of source.sample(collection, sampleSize)) {
      documents++;
      if (documents % PROGRESS_EVERY === 0) {
        logger.info(`Processed ${documents}/${sampleSize} documents in ${collection}`);
      }
      mergeFieldMaps(fields, extractDocumentFields(doc));
    }
  } catch (err) {
    const code = err instanceof DocSchemaError ? err.code : 'SAMPLING_FAILED';
    logger.samplingFailed(collection, code, errorMessage(err));
    return { fields: {}, documents: 0 };
  }

  logger.collectionSampled(collection, documents, Object.keys(fields).length, Date.now() - startTime);
  return { fields, documents };
}

/**
 * Allow-list first (only when non-empty), then deny-list.
 */
export function applyFieldFilters(fields: FieldMap, filters: FieldFilters): FieldMap {
  const include = filters.includeFields ?? [];
  const exclude = new Set(filters.excludeFields ?? []);

  let entries = Object.entries(fields);
  if (include.length > 0) {
    const allowed = new Set(include);
    entries = entries.filter(([name]) => allowed.has(name));
  }
  return Object.fromEntries(entries.filter(([name]) => !exclude.has(name)));
}

export interface SamplerOptions extends FieldFilters {
  sampleSize: number;
}

export class CollectionSampler {
  private source: DocumentSource;
  private options: SamplerOptions;
  private logger: DocSchemaLogger;

  constructor(source: DocumentSource, options: SamplerOptions, logger: DocSchemaLogger) {
    if (!Number.isInteger(options.sampleSize) || options.sampleSize < 1) {
      throw new DocSchemaError({
        code: 'CONFIGURATION_ERROR',
        message: `Invalid sample size ${options.sampleSize}.`,
        fix: `Set schema.sample_size to a positive integer.`,
      });
    }
    this.source = source;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Returns null when the sample produced no fields at all (empty collection
   * or a failed read). Filtering happens afterwards, so a collection whose
   * fields are all filtered out still yields an empty schema.
   */
  async sample(collection: string): Promise<CollectionSchema | null> {
    const { fields } = await sampleFields(this.source, collection, this.options.sampleSize, this.logger);

    if (Object.keys(fields).length === 0) {
      this.logger.warn(`No fields found in collection ${collection}`);
      return null;
    }

    return { name: collection, fields: applyFieldFilters(fields, this.options) };
  }
}
