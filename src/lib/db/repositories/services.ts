import { SERVICE_COLLECTION } from '../constants';
import { createDocument } from '../store';
import { DocumentDatabase, ObjectId, StoredDocument } from '../types';
import type { ServiceInput } from '@/entities/services/services.dto';

export function findServices(db: DocumentDatabase, limit: number): Promise<StoredDocument[]> {
  return db.collection(SERVICE_COLLECTION).find({}, { limit });
}

export function insertService(db: DocumentDatabase, service: ServiceInput): Promise<ObjectId> {
  return createDocument(db, SERVICE_COLLECTION, service);
}
