/**
 * docschema — All shared types and interfaces
 *
 * This is the ONLY file every other file imports.
 * No circular dependencies. No file imports from an adapter.
 */

// ─── Field Types ─────────────────────────────────────────────────────────────

export type ScalarFieldType = 'string' | 'boolean' | 'integer' | 'float' | 'json' | 'unknown';

export type FieldType = ScalarFieldType | 'string[]' | 'array' | `array<${string}>`;

/** Field path (dot-segmented for nesting) → inferred type. */
export type FieldMap = Record<string, FieldType>;

/**
 * A raw nested sample structure. The renderer flattens these with
 * underscore-joined keys instead of printing them as a single field.
 */
export type NestedFields = { [key: string]: unknown };

export type SchemaEntry = FieldType | NestedFields;

export interface CollectionSchema {
  name: string;
  fields: Record<string, SchemaEntry>;
}

// ─── Relationships ───────────────────────────────────────────────────────────

export interface RelationshipEdge {
  source: string;
  target: string;
  /** Field path that triggered the match. */
  field: string;
}

export interface UnifiedSchema {
  collections: CollectionSchema[];
  relationships: RelationshipEdge[];
}

// ─── Field Filters ───────────────────────────────────────────────────────────

export interface FieldFilters {
  includeFields?: string[];
  excludeFields?: string[];
}

// ─── Run Receipt ─────────────────────────────────────────────────────────────

export interface RunReceipt {
  outputPath: string;
  collections: number;
  skippedCollections: number;
  fields: number;
  relationships: number;
  corrected: boolean;
  duration: number;
  success: boolean;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface CorrectionConfig {
  enabled: boolean;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  maxTokens: number;
}

export interface DocSchemaConfig {
  mongodb: {
    database: string;
    uri?: string;
  };
  output: {
    directory: string;
    format: string;
  };
  schema: {
    sampleSize: number;
    includeFields: string[];
    excludeFields: string[];
  };
  correction: CorrectionConfig;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type DocSchemaErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'MISSING_CREDENTIALS'
  | 'SAMPLING_FAILED'
  | 'EXTERNAL_SERVICE_FAILED'
  | 'WRITE_FAILED'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DocSchemaEvents {
  log: { level: LogLevel; message: string; timestamp: Date };
  connected: { dbName: string; collections: number };
  'collection-sampled': { collection: string; documents: number; fields: number; durationMs: number };
  'sampling-failed': { collection: string; code: DocSchemaErrorCode; message: string };
  'relationship-found': RelationshipEdge;
  'correction-failed': { code: DocSchemaErrorCode; message: string };
  'run-complete': RunReceipt;
}
