import { z } from 'zod';
import { seoSchema } from '../seo/seo.dto';
import { limitParam } from '../../lib/utils/validation';
import { DEFAULT_LIST_LIMIT } from '../../config/constants';

export const serviceSchema = z.object({
  name: z.string(),
  slug: z.string().min(1),
  summary: z.string().nullish(),
  description: z.string().nullish(),
  gallery: z.array(z.string().url()).default([]),
  categories: z.array(z.string()).default([]),
  seo: seoSchema.nullish(),
});

export type ServiceInput = z.infer<typeof serviceSchema>;

export const serviceListQuerySchema = z.object({
  limit: limitParam(DEFAULT_LIST_LIMIT),
});
