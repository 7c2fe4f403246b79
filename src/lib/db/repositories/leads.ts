import { LEAD_COLLECTION } from '../constants';
import { createDocument } from '../store';
import { DocumentDatabase, ObjectId, StoredDocument } from '../types';
import type { ScoredLead } from '@/entities/leads/leads.dto';

export function insertLead(db: DocumentDatabase, lead: ScoredLead): Promise<ObjectId> {
  return createDocument(db, LEAD_COLLECTION, lead);
}

// Newest first
export function findRecentLeads(db: DocumentDatabase, limit: number): Promise<StoredDocument[]> {
  return db.collection(LEAD_COLLECTION).find({}, { limit, sort: { created_at: -1 } });
}
