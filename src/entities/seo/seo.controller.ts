import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseWith } from '../../lib/utils/validation';
import { SeoService } from './seo.service';
import { seoParamsSchema } from './seo.dto';

/**
 * GET /api/seo/:kind/:slug
 */
export function getSeo(service: SeoService) {
  return async (req: Request, res: Response): Promise<void> => {
    const { kind, slug } = parseWith(seoParamsSchema, req.params);
    res.status(HttpStatusCodes.OK).json(await service.get(kind, slug));
  };
}
