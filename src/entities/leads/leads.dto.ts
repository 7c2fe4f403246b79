import { z } from 'zod';
import { limitParam } from '../../lib/utils/validation';
import { DEFAULT_LEAD_SOURCE, DEFAULT_LIST_LIMIT } from '../../config/constants';

export const leadSchema = z.object({
  name: z.string(),
  email: z.string().nullish(),
  phone: z.string().nullish(),
  message: z.string().nullish(),
  source: z.string().nullish().default(DEFAULT_LEAD_SOURCE),
  property_id: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  utm: z.record(z.string()).nullish(),
  // Accepted for compatibility, replaced by the computed score
  score: z.number().int().nullish(),
});

export type LeadInput = z.infer<typeof leadSchema>;

export type ScoredLead = Omit<LeadInput, 'score'> & { score: number };

export const leadListQuerySchema = z.object({
  limit: limitParam(DEFAULT_LIST_LIMIT),
});

export interface CreatedLeadResponse {
  id: string;
  score: number;
}
