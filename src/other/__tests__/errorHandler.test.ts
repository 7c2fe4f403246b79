import { z } from 'zod';
import { RouteError, ValidationError, toErrorResponse } from '../errorHandler';
import { StoreUnavailableError } from '@/lib/db/errors';
import HttpStatusCodes from '@/constants/HttpStatusCodes';

describe('toErrorResponse', () => {
  it('answers validation errors with 422 and field details', () => {
    const error = new ValidationError([{ path: 'price', message: 'Too small' }]);
    expect(toErrorResponse(error)).toStrictEqual({
      status: HttpStatusCodes.UNPROCESSABLE_ENTITY,
      body: { error: 'Validation failed', details: [{ path: 'price', message: 'Too small' }] },
    });
  });

  it('keeps the status of a RouteError', () => {
    expect(toErrorResponse(new RouteError(HttpStatusCodes.NOT_FOUND, 'Property not found'))).toStrictEqual({
      status: 404,
      body: { error: 'Property not found' },
    });
  });

  it('answers an unavailable store with 500 and a fixed message', () => {
    expect(toErrorResponse(new StoreUnavailableError('offline'))).toStrictEqual({
      status: 500,
      body: { error: 'Database not available' },
    });
  });

  it('hides unexpected errors behind a 500', () => {
    expect(toErrorResponse(new Error('secret detail'))).toStrictEqual({
      status: 500,
      body: { error: 'Internal server error' },
    });
  });
});

describe('ValidationError.fromZodError', () => {
  it('joins nested paths and names root issues', () => {
    const nested = z.object({ seo: z.object({ keywords: z.array(z.string()) }) }).safeParse({ seo: { keywords: [1] } });
    const root = z.string().safeParse(5);
    if (nested.success || root.success) {
      throw new Error('Expected both parses to fail');
    }

    expect(ValidationError.fromZodError(nested.error).details.map((detail) => detail.path)).toStrictEqual([
      'seo.keywords.0',
    ]);
    expect(ValidationError.fromZodError(root.error).details.map((detail) => detail.path)).toStrictEqual(['(root)']);
  });
});
