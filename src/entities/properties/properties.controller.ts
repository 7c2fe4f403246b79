import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseWith } from '../../lib/utils/validation';
import { PropertiesService } from './properties.service';
import { propertyListQuerySchema, propertySchema, propertyStatusUpdateSchema } from './properties.dto';

/**
 * GET /api/properties
 * Filtered search; an unavailable database yields an empty list
 */
export function listProperties(service: PropertiesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const query = parseWith(propertyListQuerySchema, req.query);
    res.status(HttpStatusCodes.OK).json(await service.list(query));
  };
}

/**
 * GET /api/properties/:identifier
 * Accepts either the slug or the id
 */
export function getProperty(service: PropertiesService) {
  return async (req: Request, res: Response): Promise<void> => {
    res.status(HttpStatusCodes.OK).json(await service.get(req.params.identifier));
  };
}

/**
 * POST /api/properties
 */
export function createProperty(service: PropertiesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const property = parseWith(propertySchema, req.body);
    res.status(HttpStatusCodes.CREATED).json(await service.create(property));
  };
}

/**
 * PUT /api/properties/:id
 * Full replace: optional fields left out are cleared
 */
export function replaceProperty(service: PropertiesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const property = parseWith(propertySchema, req.body);
    res.status(HttpStatusCodes.OK).json(await service.replace(req.params.id, property));
  };
}

/**
 * PATCH /api/properties/:id/status
 */
export function updatePropertyStatus(service: PropertiesService) {
  return async (req: Request, res: Response): Promise<void> => {
    const { status } = parseWith(propertyStatusUpdateSchema, req.body);
    res.status(HttpStatusCodes.OK).json(await service.updateStatus(req.params.id, status));
  };
}
