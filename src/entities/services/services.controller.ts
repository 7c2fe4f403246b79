import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseWith } from '../../lib/utils/validation';
import { ServicesService } from './services.service';
import { serviceListQuerySchema, serviceSchema } from './services.dto';

export function listServices(service: ServicesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const { limit } = parseWith(serviceListQuerySchema, req.query);
    res.status(HttpStatusCodes.OK).json(await service.list(limit));
  };
}

export function createService(service: ServicesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const input = parseWith(serviceSchema, req.body);
    res.status(HttpStatusCodes.CREATED).json(await service.create(input));
  };
}
