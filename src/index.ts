/**
 * docschema — Public API Entry Point
 *
 * Sample a document database, infer per-collection schemas, and render them
 * as one Mermaid ER diagram.
 */

// Pipeline
export { SchemaPipeline, outputFilePath, writeArtifact, OUTPUT_BASENAME } from './pipeline.js';
export type { PipelineOptions, CollectedSchemas } from './pipeline.js';

// Inference
export { classifyValue, simplifiedType, isPlainObject } from './classify.js';
export { extractDocumentFields, mergeFieldMaps } from './extract.js';
export { flattenNestedFields } from './flatten.js';
export { CollectionSampler, sampleFields, applyFieldFilters } from './sampler.js';
export type { SampleResult, SamplerOptions } from './sampler.js';
export { NamingConventionStrategy, detectRelationships, referencedEntity, matchesCollection } from './relationships.js';
export type { RelationshipStrategy } from './relationships.js';

// Rendering
export { renderDiagram, renderEntity, renderRelationship, DIAGRAM_HEADER, CLOSING_FENCE } from './render.js';
export { DiagramNormalizer, cleanDiagram, frameDiagram } from './normalize.js';
export type { NormalizeResult } from './normalize.js';
export { NoopCorrector, AnthropicCorrector, anthropicCompletion, extractDiagram } from './correctors.js';
export type { TextCorrector, CompletionFn, CompletionRequest } from './correctors.js';

// Sources
export { MongoSource } from './adapters/mongo-source.js';
export type { DocumentSource, SampledDocument } from './adapters/source.js';

// Configuration, errors, logging
export { loadConfig, parseConfig, requireMongoUri, requireApiKey } from './config.js';
export { DocSchemaError, mapMongoError } from './errors.js';
export { DocSchemaEventEmitter } from './events.js';
export type { DocSchemaEventName, DocSchemaListener } from './events.js';
export { DocSchemaLogger } from './logger.js';
export type { LoggerConfig } from './logger.js';
export { attachConsoleReporter } from './reporter.js';
export { createReceipt } from './receipts.js';

// Types
export type {
  CollectionSchema,
  CorrectionConfig,
  DocSchemaConfig,
  DocSchemaErrorCode,
  DocSchemaEvents,
  FieldFilters,
  FieldMap,
  FieldType,
  LogLevel,
  NestedFields,
  RelationshipEdge,
  RunReceipt,
  ScalarFieldType,
  SchemaEntry,
  UnifiedSchema,
} from './types.js';
