/**
 * docschema Document Source Interface
 *
 * The pipeline reads documents only through this interface. MongoSource is the
 * production implementation; tests provide an in-memory one.
 */

export type SampledDocument = Record<string, unknown>;

export interface DocumentSource {
  readonly dbName: string;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;

  // ─── Introspection ────────────────────────────────────────────────
  listCollections(): Promise<string[]>;

  /**
   * Random sample of up to `size` documents, in no particular order. Fewer
   * are returned when the collection holds fewer.
   */
  sample(collection: string, size: number): AsyncIterable<SampledDocument>;
}
