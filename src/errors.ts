/**
 * docschema Error System — Normalized errors with fix instructions
 *
 * Driver, filesystem, and service failures are normalized into DocSchemaError
 * instances. Fatal codes stop the run; the rest degrade a piece of the output.
 */

import type { DocSchemaErrorCode } from './types.js';

// ─── DocSchemaError ──────────────────────────────────────────────────────────

export class DocSchemaError extends Error {
  readonly code: DocSchemaErrorCode;
  readonly originalError: unknown;
  readonly collection?: string;
  readonly fatal: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: DocSchemaErrorCode;
    message: string;
    fix: string;
    originalError?: unknown;
    collection?: string;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'DocSchemaError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.collection = opts.collection;
    this.fatal = ERROR_FATAL[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_FATAL: Record<DocSchemaErrorCode, boolean> = {
  CONFIGURATION_ERROR: true,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: true,
  MISSING_CREDENTIALS: true,
  SAMPLING_FAILED: false,
  EXTERNAL_SERVICE_FAILED: false,
  WRITE_FAILED: true,
  TIMEOUT: false,
  INTERNAL_ERROR: true,
};

// ─── MongoDB Error Mapping ───────────────────────────────────────────────────

export function mapMongoError(err: unknown, collection?: string): DocSchemaError {
  if (err instanceof DocSchemaError) return err;

  const code = readProperty(err, 'code');
  const message = errorMessage(err);

  // Authentication
  if (code === 18 || message.includes('Authentication failed') || message.includes('EAUTH')) {
    return new DocSchemaError({
      code: 'AUTHENTICATION_FAILED',
      message: `MongoDB authentication failed.`,
      fix: `Check the username and password in MONGODB_URI.`,
      originalError: err,
      collection,
    });
  }

  // Connection refused / unknown host
  if (message.includes('ECONNREFUSED') || message.includes('ENOTFOUND')) {
    return new DocSchemaError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to MongoDB.`,
      fix: `Verify MONGODB_URI is correct and the server is running. Check firewall and network access.`,
      originalError: err,
      collection,
    });
  }

  // Server selection gives up when no member is reachable
  if (message.includes('Server selection timed out')) {
    return new DocSchemaError({
      code: 'CONNECTION_FAILED',
      message: `MongoDB server selection timed out.`,
      fix: `Verify MONGODB_URI points at a reachable server or replica set.`,
      originalError: err,
      collection,
    });
  }

  // Timeout
  if (message.includes('timed out') || message.includes('maxTimeMS')) {
    return new DocSchemaError({
      code: 'TIMEOUT',
      message: `MongoDB operation timed out on "${collection ?? 'unknown'}".`,
      fix: `Lower schema.sample_size or retry when the server is less busy.`,
      originalError: err,
      collection,
    });
  }

  // Fallback
  return new DocSchemaError({
    code: 'INTERNAL_ERROR',
    message: `MongoDB error on "${collection ?? 'unknown'}": ${message}`,
    fix: `Check the original error for details.`,
    originalError: err,
    collection,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  const message = readProperty(err, 'message');
  return typeof message === 'string' ? message : String(err);
}

function readProperty(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  return (err as Record<string, unknown>)[key];
}
