import { z } from 'zod';
import { limitParam } from '../../lib/utils/validation';
import { DEFAULT_EXPORT_LIMIT } from '../../config/constants';

export const crmExportQuerySchema = z.object({
  limit: limitParam(DEFAULT_EXPORT_LIMIT),
});

export interface CrmExportResponse {
  exported: number;
}
