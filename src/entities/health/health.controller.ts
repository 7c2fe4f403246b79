import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { HealthService } from './health.service';

export function getRoot(service: HealthService) {
  return (req: Request, res: Response): void => {
    res.status(HttpStatusCodes.OK).json(service.root());
  };
}

// Connectivity report; always 200, failures show up in the body
export function getDiagnostics(service: HealthService) {
  return async (req: Request, res: Response): Promise<void> => {
    res.status(HttpStatusCodes.OK).json(await service.diagnostics());
  };
}
