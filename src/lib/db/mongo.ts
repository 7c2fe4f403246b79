/**
 * MongoDB store adapter
 * Opens one mongoose connection and exposes its native collections behind
 * the DocumentDatabase interface. A connection failure at startup yields an
 * unavailable store instead of stopping the process.
 */

import logger from 'jet-logger';
import { createConnection, mongo } from 'mongoose';
import { StoreUnavailableError } from './errors';
import { unavailableStore } from './store';
import { CollectionName } from './constants';
import {
  DocumentCollection,
  DocumentDatabase,
  DocumentFilter,
  FindOptions,
  NewDocument,
  ObjectId,
  Store,
  StoredDocument,
} from './types';

export interface StoreConfig {
  url?: string;
  name?: string;
  timeoutMs: number;
}

function isConnectionError(error: unknown): error is Error {
  return (
    error instanceof mongo.MongoNetworkError ||
    error instanceof mongo.MongoServerSelectionError ||
    error instanceof mongo.MongoNotConnectedError
  );
}

/**
 * Runs a driver call, turning connection-level failures into
 * StoreUnavailableError. Any other error is rethrown untouched.
 */
export async function withConnectionGuard<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isConnectionError(error)) {
      logger.warn(`[Store] Lost connection: ${error.message}`);
      throw new StoreUnavailableError(error.message);
    }
    throw error;
  }
}

class MongoDocumentCollection implements DocumentCollection {
  constructor(private readonly collection: mongo.Collection) {}

  find(filter: DocumentFilter, options: FindOptions): Promise<StoredDocument[]> {
    return withConnectionGuard(() =>
      this.collection.find(filter, { limit: options.limit, sort: options.sort }).toArray(),
    );
  }

  findOne(filter: DocumentFilter): Promise<StoredDocument | null> {
    return withConnectionGuard(() => this.collection.findOne(filter));
  }

  async insertOne(document: NewDocument): Promise<ObjectId> {
    const _id = new mongo.ObjectId();
    await withConnectionGuard(() => this.collection.insertOne({ ...document, _id }));
    return _id;
  }

  async updateOne(filter: DocumentFilter, set: NewDocument): Promise<number> {
    const result = await withConnectionGuard(() => this.collection.updateOne(filter, { $set: set }));
    return result.matchedCount;
  }

  countDocuments(filter: DocumentFilter): Promise<number> {
    return withConnectionGuard(() => this.collection.countDocuments(filter));
  }
}

class MongoDocumentDatabase implements DocumentDatabase {
  constructor(private readonly db: mongo.Db) {}

  get name(): string {
    return this.db.databaseName;
  }

  collection(name: CollectionName): DocumentCollection {
    return new MongoDocumentCollection(this.db.collection(name));
  }

  async listCollectionNames(): Promise<string[]> {
    const collections = await withConnectionGuard(() =>
      this.db.listCollections({}, { nameOnly: true }).toArray(),
    );
    return collections.map((collection) => collection.name);
  }
}

/**
 * Connects to MongoDB. Never rejects: without a URL, or when the server
 * cannot be reached, the returned store is `unavailable`.
 */
export async function connectStore(config: StoreConfig): Promise<Store> {
  if (!config.url) {
    logger.warn('[Store] DATABASE_URL is not set, running without a database');
    return unavailableStore('DATABASE_URL is not set');
  }

  try {
    const connection = await createConnection(config.url, {
      dbName: config.name,
      serverSelectionTimeoutMS: config.timeoutMs,
    }).asPromise();

    const db = connection.db;
    if (!db) {
      await connection.close();
      return unavailableStore('Connection has no database handle');
    }

    logger.info(`[Store] Connected to database "${db.databaseName}"`);
    return {
      status: 'available',
      db: new MongoDocumentDatabase(db),
      close: () => connection.close(),
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.err(`[Store] Connection failed: ${reason}`);
    return unavailableStore(reason);
  }
}
