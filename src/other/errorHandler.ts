import { NextFunction, Request, Response } from 'express';
import logger from 'jet-logger';
import { ZodError } from 'zod';
import HttpStatusCodes from '../constants/HttpStatusCodes';
import { StoreUnavailableError } from '../lib/db/errors';

/**
 * Error with the HTTP status it should be answered with.
 */
export class RouteError extends Error {
  public readonly status: HttpStatusCodes;

  constructor(status: HttpStatusCodes, message: string) {
    super(message);
    this.name = 'RouteError';
    this.status = status;
  }
}

export interface FieldIssue {
  path: string;
  message: string;
}

export class ValidationError extends RouteError {
  public readonly details: FieldIssue[];

  constructor(details: FieldIssue[]) {
    super(HttpStatusCodes.UNPROCESSABLE_ENTITY, 'Validation failed');
    this.name = 'ValidationError';
    this.details = details;
  }

  static fromZodError(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message,
      })),
    );
  }
}

export interface ErrorBody {
  error: string;
  details?: FieldIssue[];
}

export interface ErrorResponse {
  status: HttpStatusCodes;
  body: ErrorBody;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { status: error.status, body: { error: error.message, details: error.details } };
  }
  if (error instanceof RouteError) {
    return { status: error.status, body: { error: error.message } };
  }
  if (error instanceof StoreUnavailableError) {
    return { status: HttpStatusCodes.INTERNAL_SERVER_ERROR, body: { error: error.message } };
  }
  return { status: HttpStatusCodes.INTERNAL_SERVER_ERROR, body: { error: 'Internal server error' } };
}

/**
 * Last middleware in the chain; every thrown or rejected error ends here.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const { status, body } = toErrorResponse(error);
  if (error instanceof StoreUnavailableError) {
    logger.warn(`[Server] ${req.method} ${req.originalUrl}: ${body.error} (${error.reason})`);
  } else if (status === HttpStatusCodes.INTERNAL_SERVER_ERROR) {
    logger.err(`[Server] ${req.method} ${req.originalUrl} failed`);
    logger.err(error, true);
  }

  res.status(status).json(body);
}
