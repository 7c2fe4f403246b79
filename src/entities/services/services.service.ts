import { readOrEmpty, requireDatabase } from '../../lib/db/store';
import { serializeDoc } from '../../lib/db/serialize';
import { SerializedDocument, Store } from '../../lib/db/types';
import { findServices, insertService } from '../../lib/db/repositories/services';
import type { CreatedResponse } from '../properties/properties.dto';
import { ServiceInput } from './services.dto';

export class ServicesService {
  constructor(private readonly store: Store) {}

  list(limit: number): Promise<SerializedDocument[]> {
    return readOrEmpty(this.store, async (db) => {
      const docs = await findServices(db, limit);
      return docs.map((doc) => serializeDoc(doc));
    });
  }

  async create(service: ServiceInput): Promise<CreatedResponse> {
    const db = requireDatabase(this.store);
    const id = await insertService(db, service);
    return { id: id.toHexString() };
  }
}
