import { z } from 'zod';
import { ValidationError } from '@/other/errorHandler';
import { MAX_LIST_LIMIT } from '@/config/constants';

/**
 * Parses untrusted input with a zod schema, throwing ValidationError with
 * one entry per failing field.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

function blankToUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

/** Query string parameter; `?name=` counts as not given. */
export function queryParam<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(blankToUndefined, schema);
}

/** Result limit from a query string: positive, defaulted, capped at MAX_LIST_LIMIT. */
export function limitParam(defaultLimit: number) {
  return queryParam(
    z.coerce
      .number()
      .int()
      .positive()
      .default(defaultLimit)
      .transform((limit) => Math.min(limit, MAX_LIST_LIMIT)),
  );
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/** Boolean query flag; anything but the usual spellings is rejected. */
export const booleanParam = z
  .string()
  .transform((value, ctx) => {
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a boolean' });
    return z.NEVER;
  });
