import { z } from 'zod';
import { DEFAULT_SCHEMA_TYPE } from '../../config/constants';

export const seoSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  keywords: z.array(z.string()).nullish(),
  schema_type: z.string().nullish().default(DEFAULT_SCHEMA_TYPE),
});

export const seoParamsSchema = z.object({
  kind: z.string().min(1),
  slug: z.string().min(1),
});

