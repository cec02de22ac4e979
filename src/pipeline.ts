/**
 * docschema Pipeline — one run, start to finish
 *
 *   list collections → sample each (sequentially) → filter fields
 *     → detect relationships → render draft → normalize → write artifact
 *     → receipt → logger.flush
 *
 * A collection that fails to sample is logged and left out. Failing to list
 * collections or to write the artifact aborts the run.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { CollectionSchema, RunReceipt } from './types.js';
import type { DocumentSource } from './adapters/source.js';
import type { TextCorrector } from './correctors.js';
import type { DocSchemaLogger } from './logger.js';
import type { RelationshipStrategy } from './relationships.js';
import { DocSchemaError, errorMessage, mapMongoError } from './errors.js';
import { CollectionSampler } from './sampler.js';
import type { SamplerOptions } from './sampler.js';
import { NamingConventionStrategy, detectRelationships } from './relationships.js';
import { renderDiagram } from './render.js';
import { DiagramNormalizer } from './normalize.js';
import { createReceipt } from './receipts.js';

export const OUTPUT_BASENAME = 'unified_database_schema';

export interface PipelineOptions {
  source: DocumentSource;
  corrector: TextCorrector;
  logger: DocSchemaLogger;
  output: { directory: string; format: string };
  schema: SamplerOptions;
  strategy?: RelationshipStrategy;
}

export interface CollectedSchemas {
  collections: CollectionSchema[];
  skipped: number;
}

export class SchemaPipeline {
  private options: PipelineOptions;
  private sampler: CollectionSampler;
  private normalizer: DiagramNormalizer;
  private strategy: RelationshipStrategy;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.sampler = new CollectionSampler(options.source, options.schema, options.logger);
    this.normalizer = new DiagramNormalizer(options.corrector, options.logger);
    this.strategy = options.strategy ?? new NamingConventionStrategy();
  }

  async run(): Promise<RunReceipt> {
    const { logger, output } = this.options;
    const startTime = Date.now();
    logger.info('Starting schema generation...');

    await prepareOutputDirectory(output.directory);

    const { collections, skipped } = await this.collectSchemas();
    const relationships = detectRelationships(collections, logger, this.strategy);

    logger.info('Generating ER diagram...');
    const draft = renderDiagram({ collections, relationships });
    const { content, corrected } = await this.normalizer.normalize(draft);

    const outputPath = outputFilePath(output.directory, output.format);
    logger.info(`Saving ER diagram to ${outputPath}`);
    await writeArtifact(outputPath, content);

    const receipt = createReceipt({
      outputPath,
      startTime,
      collections: collections.length,
      skippedCollections: skipped,
      fields: collections.reduce((sum, c) => sum + Object.keys(c.fields).length, 0),
      relationships: relationships.length,
      corrected,
    });

    logger.info(`Schema generation completed in ${(receipt.duration / 1000).toFixed(2)} seconds`);
    logger.info(`ER diagram saved to ${outputPath}`);
    logger.flush(receipt);
    return receipt;
  }

  async collectSchemas(): Promise<CollectedSchemas> {
    const { source, logger } = this.options;

    let names: string[];
    try {
      names = await source.listCollections();
    } catch (err) {
      throw mapMongoError(err);
    }
    logger.connected(source.dbName, names.length);

    const collections: CollectionSchema[] = [];
    let skipped = 0;

    for (const [index, name] of names.entries()) {
      logger.info(`Processing collection ${index + 1}/${names.length}: ${name}`);
      const schema = await this.sampler.sample(name);
      if (!schema) {
        skipped++;
        continue;
      }
      collections.push(schema);
      logger.info(`Completed processing '${name}' - Found ${Object.keys(schema.fields).length} fields`);
    }

    return { collections, skipped };
  }
}

// ─── Artifact ────────────────────────────────────────────────────────────────

export function outputFilePath(directory: string, format: string): string {
  return join(directory, `${OUTPUT_BASENAME}.${format}`);
}

async function prepareOutputDirectory(directory: string): Promise<void> {
  try {
    await mkdir(directory, { recursive: true });
  } catch (err) {
    throw writeFailed(`Cannot create output directory "${directory}"`, err);
  }
}

export async function writeArtifact(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf8');
  } catch (err) {
    throw writeFailed(`Cannot write "${path}"`, err);
  }
}

function writeFailed(message: string, err: unknown): DocSchemaError {
  return new DocSchemaError({
    code: 'WRITE_FAILED',
    message: `${message}: ${errorMessage(err)}`,
    fix: `Check that output.directory is writable.`,
    originalError: err,
  });
}
