/**
 * API middleware — error handling and query parsing helpers.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, createTypedError, hasTypedError, TypedError } from '../domain/errors';
import { ListOptions } from '../storage/store';
import { logger } from '../logger';

/** Request error carrying a typed error for `errorHandler`. */
export class RequestError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'RequestError';
  }
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (hasTypedError(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'RUN.ALREADY_RUNNING' || error.code === 'ARTIFACT.ALREADY_PUBLISHED') return 409;
  if (error.code.startsWith('TRIGGER.')) return 422;
  if (error.code.startsWith('RUN.')) return 422;
  return 500;
}

/** First value of a query parameter, if it is a plain string. */
export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/** Parse `limit`/`offset`; limit defaults to 100 and is capped at 1000. */
export function parsePagination(query: Record<string, unknown>): Required<ListOptions> {
  const rawLimit = parseInt(queryString(query.limit) ?? '100', 10);
  const rawOffset = parseInt(queryString(query.offset) ?? '0', 10);
  return {
    limit: Number.isNaN(rawLimit) || rawLimit < 1 ? 100 : Math.min(rawLimit, 1000),
    offset: Number.isNaN(rawOffset) || rawOffset < 0 ? 0 : rawOffset,
  };
}
