import { PROPERTY_COLLECTION } from '../constants';
import { createDocument } from '../store';
import { isValidId, toObjectId } from '../object-id';
import { DocumentDatabase, NewDocument, ObjectId, StoredDocument } from '../types';
import type { PropertyFilter } from '../../utils/property-filter';
import { propertySchema } from '@/entities/properties/properties.dto';
import type { PropertyInput, PropertyStatus } from '@/entities/properties/properties.dto';

export type SlugOrIdFilter = {
  $or: Array<{ slug: string } | { _id: ObjectId }>;
};

/**
 * One predicate matching either the slug or, when the identifier is a valid
 * ObjectId string, the `_id`. Other strings only ever match by slug.
 */
export function slugOrIdFilter(identifier: string): SlugOrIdFilter {
  const filter: SlugOrIdFilter = { $or: [{ slug: identifier }] };
  if (isValidId(identifier)) {
    filter.$or.push({ _id: toObjectId(identifier) });
  }
  return filter;
}

export function findProperties(db: DocumentDatabase, filter: PropertyFilter, limit: number): Promise<StoredDocument[]> {
  return db.collection(PROPERTY_COLLECTION).find(filter, { limit });
}

export function findPropertyBySlugOrId(db: DocumentDatabase, identifier: string): Promise<StoredDocument | null> {
  return db.collection(PROPERTY_COLLECTION).findOne(slugOrIdFilter(identifier));
}

export function insertProperty(db: DocumentDatabase, property: PropertyInput): Promise<ObjectId> {
  return createDocument(db, PROPERTY_COLLECTION, property);
}

/** Every schema field, with `null` for the optional ones the input leaves out. */
export function replacementFields(property: PropertyInput): NewDocument {
  const fields: NewDocument = {};
  for (const field of propertySchema.keyof().options) {
    fields[field] = property[field] ?? null;
  }
  return fields;
}

/**
 * Overwrites every property field and refreshes `updated_at`; returns the
 * matched count. `created_at` is kept.
 */
export function replaceProperty(
  db: DocumentDatabase,
  id: ObjectId,
  property: PropertyInput,
  now: Date = new Date(),
): Promise<number> {
  return db
    .collection(PROPERTY_COLLECTION)
    .updateOne({ _id: id }, { ...replacementFields(property), updated_at: now });
}

export function updatePropertyStatus(db: DocumentDatabase, id: ObjectId, status: PropertyStatus): Promise<number> {
  return db.collection(PROPERTY_COLLECTION).updateOne({ _id: id }, { status });
}

export function countProperties(db: DocumentDatabase): Promise<number> {
  return db.collection(PROPERTY_COLLECTION).countDocuments({});
}
