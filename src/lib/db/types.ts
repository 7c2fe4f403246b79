// Storage-level types shared by the store adapter and the repositories

import { mongo } from 'mongoose';
import { CollectionName } from './constants';

export type ObjectId = mongo.ObjectId;

export type StoredDocument = {
  _id: ObjectId;
  [field: string]: unknown;
};

/** Wire form of a stored document: `_id` rendered as a hex string. */
export type SerializedDocument = {
  _id?: string;
  [field: string]: unknown;
};

export type NewDocument = {
  [field: string]: unknown;
};

export type DocumentFilter = mongo.Filter<mongo.Document>;

export type SortSpec = Record<string, 1 | -1>;

export interface FindOptions {
  limit: number;
  sort?: SortSpec;
}

export interface DocumentCollection {
  find(filter: DocumentFilter, options: FindOptions): Promise<StoredDocument[]>;
  findOne(filter: DocumentFilter): Promise<StoredDocument | null>;
  insertOne(document: NewDocument): Promise<ObjectId>;
  /** Applies `$set` to the first match and returns how many documents matched. */
  updateOne(filter: DocumentFilter, set: NewDocument): Promise<number>;
  countDocuments(filter: DocumentFilter): Promise<number>;
}

export interface DocumentDatabase {
  readonly name: string;
  collection(name: CollectionName): DocumentCollection;
  listCollectionNames(): Promise<string[]>;
}

export type AvailableStore = {
  status: 'available';
  db: DocumentDatabase;
  close(): Promise<void>;
};

export type UnavailableStore = {
  status: 'unavailable';
  reason: string;
};

/**
 * The database capability handed to every service. A store that could not
 * connect at startup is still a Store, just the `unavailable` variant.
 */
export type Store = AvailableStore | UnavailableStore;
