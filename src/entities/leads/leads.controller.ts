import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseWith } from '../../lib/utils/validation';
import { LeadsService } from './leads.service';
import { leadListQuerySchema, leadSchema } from './leads.dto';

/**
 * POST /api/leads
 * Responds with the stored id and the computed score
 */
export function createLead(service: LeadsService) {
  return async (req: Request, res: Response): Promise<void> => {
    const lead = parseWith(leadSchema, req.body);
    res.status(HttpStatusCodes.CREATED).json(await service.create(lead));
  };
}

/**
 * GET /api/leads
 * Newest first
 */
export function listLeads(service: LeadsService) {
  return async (req: Request, res: Response): Promise<void> => {
    const { limit } = parseWith(leadListQuerySchema, req.query);
    res.status(HttpStatusCodes.OK).json(await service.list(limit));
  };
}
