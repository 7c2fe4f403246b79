import { CollectionName } from '../constants';
import { DocumentDatabase, StoredDocument } from '../types';

export function findBySlug(
  db: DocumentDatabase,
  collectionName: CollectionName,
  slug: string,
): Promise<StoredDocument | null> {
  return db.collection(collectionName).findOne({ slug });
}
