import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseWith } from '../../lib/utils/validation';
import { ExportService } from './export.service';
import { crmExportQuerySchema } from './export.dto';

/**
 * GET /api/export/crm
 */
export function exportToCrm(service: ExportService) {
  return async (req: Request, res: Response): Promise<void> => {
    const { limit } = parseWith(crmExportQuerySchema, req.query);
    res.status(HttpStatusCodes.OK).json(await service.exportPropertiesToCrm(limit));
  };
}
