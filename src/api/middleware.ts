/**
 * API Middleware: error mapping and handling.
 */

import { NextFunction, Request, Response } from 'express';
import { TypedError, apiError, createTypedError, errorDomain, toTypedError, validationError } from '../domain/errors';
import { isRecord } from '../guards';
import { logger } from '../logger';

/** HTTP status for a typed error, by code. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.endsWith('.NOT_FOUND')) return 404;
  switch (errorDomain(error)) {
    case 'VALIDATION':
    case 'CONFIG':
    case 'PIPELINE':
      return 400;
    case 'MATRIX':
      return 422;
    case 'RUN':
      return 409;
    default:
      return 500;
  }
}

/** Answer a request with the typed error envelope. */
export function sendError(res: Response, err: unknown): void {
  const typedError = toTypedError(err);
  const status = getHttpStatus(typedError);
  if (status >= 500) {
    logger.error('Unhandled request error', {
      code: typedError.code,
      message: typedError.message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('Request error', { code: typedError.code, status });
  }
  res.status(status).json(apiError(typedError));
}

/** Malformed JSON bodies are rejected by express.json() before any route runs. */
function isBodyParseError(err: unknown): boolean {
  return isRecord(err) && err.type === 'entity.parse.failed';
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }
  sendError(res, err);
}

/** 404 for unknown API paths, in the error envelope. */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(
    apiError(
      createTypedError({
        code: 'ROUTE.NOT_FOUND',
        message: `No route for ${req.method} ${req.path}`,
      }),
    ),
  );
}
