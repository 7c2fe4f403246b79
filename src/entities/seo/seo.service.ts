import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { RouteError } from '@/other/errorHandler';
import { requireDatabase } from '../../lib/db/store';
import { serializeDoc } from '../../lib/db/serialize';
import { PROPERTY_COLLECTION, SERVICE_COLLECTION } from '../../lib/db/constants';
import { findBySlug } from '../../lib/db/repositories/documents';
import { SerializedDocument, Store } from '../../lib/db/types';
import { isRecord } from '../../lib/utils/is-record';

// Collections whose documents carry an embedded SEO record
const SEO_COLLECTIONS = [PROPERTY_COLLECTION, SERVICE_COLLECTION] as const;

type SeoCollection = typeof SEO_COLLECTIONS[number];

function toSeoCollection(kind: string): SeoCollection | undefined {
  const normalized = kind.toLowerCase();
  return SEO_COLLECTIONS.find((name) => name === normalized);
}

export class SeoService {
  constructor(private readonly store: Store) {}

  /**
   * SEO record of the document with this slug; `{}` when it has none.
   */
  async get(kind: string, slug: string): Promise<SerializedDocument> {
    const db = requireDatabase(this.store);
    const collection = toSeoCollection(kind);
    if (!collection) {
      throw new RouteError(HttpStatusCodes.NOT_FOUND, 'Not found');
    }

    const doc = await findBySlug(db, collection, slug);
    if (!doc) {
      throw new RouteError(HttpStatusCodes.NOT_FOUND, 'Not found');
    }
    return isRecord(doc.seo) ? serializeDoc(doc.seo) : {};
  }
}
