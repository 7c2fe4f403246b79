import logger from 'jet-logger';
import { StoreUnavailableError } from './errors';
import { CollectionName } from './constants';
import { DocumentDatabase, NewDocument, ObjectId, Store, UnavailableStore } from './types';

export function unavailableStore(reason: string): UnavailableStore {
  return { status: 'unavailable', reason };
}

/**
 * Returns the database of an available store, or throws StoreUnavailableError.
 */
export function requireDatabase(store: Store): DocumentDatabase {
  if (store.status === 'unavailable') {
    throw new StoreUnavailableError(store.reason);
  }
  return store.db;
}

/**
 * Inserts a document stamped with `created_at` and `updated_at`.
 */
export async function createDocument(
  db: DocumentDatabase,
  collectionName: CollectionName,
  data: NewDocument,
  now: Date = new Date(),
): Promise<ObjectId> {
  return db.collection(collectionName).insertOne({ ...data, created_at: now, updated_at: now });
}

/**
 * Runs a read against the store, answering `[]` instead of failing when the
 * store is unavailable or drops the connection mid-query.
 */
export async function readOrEmpty<T>(store: Store, read: (db: DocumentDatabase) => Promise<T[]>): Promise<T[]> {
  if (store.status === 'unavailable') {
    return [];
  }
  try {
    return await read(store.db);
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      logger.warn(`[Store] Read degraded to an empty result: ${error.reason}`);
      return [];
    }
    throw error;
  }
}
