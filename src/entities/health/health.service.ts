import { API_NAME, DIAGNOSTIC_COLLECTIONS_LIMIT } from '../../config/constants';
import { Store } from '../../lib/db/types';
import { DiagnosticsResponse, RootResponse } from './health.dto';

const MAX_ERROR_LENGTH = 120;

export class HealthService {
  constructor(
    private readonly store: Store,
    private readonly databaseUrlConfigured: boolean,
  ) {}

  root(): RootResponse {
    return { name: API_NAME, status: 'ok' };
  }

  /**
   * Reports database connectivity. Never rejects: a failing database shows
   * up in the `database` field.
   */
  async diagnostics(): Promise<DiagnosticsResponse> {
    const response: DiagnosticsResponse = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: this.databaseUrlConfigured ? '✅ Set' : '❌ Not Set',
      database_name: '❌ Not Set',
      connection_status: 'Not Connected',
      collections: [],
    };

    if (this.store.status === 'unavailable') {
      return response;
    }

    try {
      const { db } = this.store;
      response.database = '✅ Connected & Working';
      response.database_name = db.name;
      response.connection_status = 'Connected';
      response.collections = (await db.listCollectionNames()).slice(0, DIAGNOSTIC_COLLECTIONS_LIMIT);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      response.database = `❌ Error: ${message.slice(0, MAX_ERROR_LENGTH)}`;
    }
    return response;
  }
}
