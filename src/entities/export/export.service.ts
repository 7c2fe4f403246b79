import { requireDatabase } from '../../lib/db/store';
import { countProperties } from '../../lib/db/repositories/properties';
import { Store } from '../../lib/db/types';
import { CrmExportResponse } from './export.dto';

export class ExportService {
  constructor(private readonly store: Store) {}

  // Placeholder export: reports how many properties would be sent
  async exportPropertiesToCrm(limit: number): Promise<CrmExportResponse> {
    const db = requireDatabase(this.store);
    const total = await countProperties(db);
    return { exported: Math.min(total, limit) };
  }
}
