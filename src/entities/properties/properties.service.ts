import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { RouteError } from '@/other/errorHandler';
import { readOrEmpty, requireDatabase } from '../../lib/db/store';
import { serializeDoc } from '../../lib/db/serialize';
import { isValidId, toObjectId } from '../../lib/db/object-id';
import { SerializedDocument, Store } from '../../lib/db/types';
import { buildPropertyFilter } from '../../lib/utils/property-filter';
import {
  findProperties,
  findPropertyBySlugOrId,
  insertProperty,
  replaceProperty,
  updatePropertyStatus,
} from '../../lib/db/repositories/properties';
import {
  CreatedResponse,
  PropertyInput,
  PropertyListQuery,
  PropertyStatus,
  UpdatedResponse,
} from './properties.dto';

export const PROPERTY_NOT_FOUND = 'Property not found';
export const INVALID_ID = 'Invalid id';

export class PropertiesService {
  constructor(private readonly store: Store) {}

  list(query: PropertyListQuery): Promise<SerializedDocument[]> {
    const filter = buildPropertyFilter(query.search);
    return readOrEmpty(this.store, async (db) => {
      const docs = await findProperties(db, filter, query.limit);
      return docs.map((doc) => serializeDoc(doc));
    });
  }

  async get(identifier: string): Promise<SerializedDocument> {
    const db = requireDatabase(this.store);
    const doc = await findPropertyBySlugOrId(db, identifier);
    if (!doc) {
      throw new RouteError(HttpStatusCodes.NOT_FOUND, PROPERTY_NOT_FOUND);
    }
    return serializeDoc(doc);
  }

  async create(property: PropertyInput): Promise<CreatedResponse> {
    const db = requireDatabase(this.store);
    const id = await insertProperty(db, property);
    return { id: id.toHexString() };
  }

  async replace(id: string, property: PropertyInput): Promise<UpdatedResponse> {
    const db = requireDatabase(this.store);
    const matched = await replaceProperty(db, this.parseId(id), property);
    return this.updated(matched);
  }

  async updateStatus(id: string, status: PropertyStatus): Promise<UpdatedResponse> {
    const db = requireDatabase(this.store);
    const matched = await updatePropertyStatus(db, this.parseId(id), status);
    return this.updated(matched);
  }

  private parseId(id: string) {
    if (!isValidId(id)) {
      throw new RouteError(HttpStatusCodes.BAD_REQUEST, INVALID_ID);
    }
    return toObjectId(id);
  }

  private updated(matched: number): UpdatedResponse {
    if (matched === 0) {
      throw new RouteError(HttpStatusCodes.NOT_FOUND, PROPERTY_NOT_FOUND);
    }
    return { updated: true };
  }
}
