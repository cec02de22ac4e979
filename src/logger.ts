/**
 * docschema Logger — Structured run logging
 *
 * Created once per run and injected into every component. Each call emits a
 * `log` event, and the domain helpers additionally emit their typed event.
 * Nothing is printed here; reporters subscribe to the emitter.
 */

import type { DocSchemaErrorCode, DocSchemaEvents, LogLevel, RelationshipEdge, RunReceipt } from './types.js';
import { DocSchemaEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
}

export class DocSchemaLogger {
  readonly emitter: DocSchemaEventEmitter;
  private config: LoggerConfig;
  private flushed = false;

  constructor(config: LoggerConfig, emitter: DocSchemaEventEmitter = new DocSchemaEventEmitter()) {
    this.config = config;
    this.emitter = emitter;
  }

  debug(message: string): void {
    if (this.config.verbose) this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  // ─── Domain Events ─────────────────────────────────────────────────────

  connected(dbName: string, collections: number): void {
    this.info(`Connected to database "${dbName}" (${collections} collections)`);
    this.emit('connected', { dbName, collections });
  }

  collectionSampled(collection: string, documents: number, fields: number, durationMs: number): void {
    this.info(
      `Completed analysis of '${collection}' - Found ${fields} unique fields in ${(durationMs / 1000).toFixed(2)} seconds`,
    );
    this.emit('collection-sampled', { collection, documents, fields, durationMs });
  }

  samplingFailed(collection: string, code: DocSchemaErrorCode, message: string): void {
    this.warn(`Error getting collection fields for '${collection}': ${message}`);
    this.emit('sampling-failed', { collection, code, message });
  }

  relationshipFound(edge: RelationshipEdge): void {
    this.info(`Found relationship: ${edge.source} -> ${edge.target} (via ${edge.field})`);
    this.emit('relationship-found', edge);
  }

  correctionFailed(code: DocSchemaErrorCode, message: string): void {
    this.warn(`Diagram correction failed, keeping uncorrected text: ${message}`);
    this.emit('correction-failed', { code, message });
  }

  /**
   * End the run. Emits `run-complete` once; later calls are ignored.
   */
  flush(receipt: RunReceipt): void {
    if (this.flushed) return;
    this.flushed = true;
    this.emit('run-complete', receipt);
  }

  private log(level: LogLevel, message: string): void {
    this.emit('log', { level, message, timestamp: new Date() });
  }

  private emit<E extends keyof DocSchemaEvents>(event: E, payload: DocSchemaEvents[E]): void {
    if (!this.config.enabled) return;
    this.emitter.emit(event, payload);
  }
}
