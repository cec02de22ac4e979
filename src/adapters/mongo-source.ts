/**
 * docschema MongoDB Source
 *
 * Wraps the official driver. Sampling uses the `$sample` aggregation stage,
 * so documents come back in random order.
 */

import { MongoClient } from 'mongodb';
import type { BSONSerializeOptions, Db, Document } from 'mongodb';
import type { DocumentSource, SampledDocument } from './source.js';
import { DocSchemaError, mapMongoError } from '../errors.js';

/**
 * int64 values decode as `bigint` instead of `Long`, so they classify as
 * integers. Whole-number doubles still decode as JS integers.
 */
export const SAMPLE_BSON_OPTIONS: Pick<BSONSerializeOptions, 'useBigInt64'> = { useBigInt64: true };

export interface MongoSourceConfig {
  uri: string;
  dbName: string;
  serverSelectionTimeoutMS?: number;
}

export class MongoSource implements DocumentSource {
  readonly dbName: string;

  private config: MongoSourceConfig;
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(config: MongoSourceConfig) {
    this.config = config;
    this.dbName = config.dbName;
  }

  async connect(): Promise<void> {
    const client = new MongoClient(this.config.uri, {
      serverSelectionTimeoutMS: this.config.serverSelectionTimeoutMS ?? 10000,
    });
    try {
      await client.connect();
      await client.db('admin').command({ ping: 1 });
    } catch (err) {
      await client.close();
      throw mapMongoError(err);
    }
    this.client = client;
    this.db = client.db(this.config.dbName);
  }

  async close(): Promise<void> {
    if (!this.client) return;
    await this.client.close();
    this.client = null;
    this.db = null;
  }

  async listCollections(): Promise<string[]> {
    try {
      const collections = await this.requireDb().listCollections({}, { nameOnly: true }).toArray();
      return collections.map(c => c.name);
    } catch (err) {
      throw mapMongoError(err);
    }
  }

  async *sample(collection: string, size: number): AsyncIterable<SampledDocument> {
    const cursor = this.requireDb()
      .collection(collection)
      .aggregate<Document>([{ $sample: { size } }], SAMPLE_BSON_OPTIONS);
    try {
      for await (const doc of cursor) {
        yield doc;
      }
    } catch (err) {
      throw mapMongoError(err, collection);
    } finally {
      await cursor.close();
    }
  }

  private requireDb(): Db {
    if (!this.db) {
      throw new DocSchemaError({
        code: 'CONNECTION_FAILED',
        message: `MongoDB source for "${this.dbName}" is not connected.`,
        fix: `Call connect() before reading collections.`,
      });
    }
    return this.db;
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
