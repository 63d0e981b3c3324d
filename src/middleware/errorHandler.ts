import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from '../config';
import {
  AssemblyError,
  NotFoundError,
  RunTimeoutError,
  StorageError,
  ValidationError,
} from '../errors';

interface ErrorMapping {
  status: ContentfulStatusCode;
  error: string;
}

export function classifyError(error: Error): ErrorMapping {
  if (error instanceof ValidationError) return { status: 400, error: 'Invalid request' };
  if (error instanceof NotFoundError) return { status: 404, error: 'Not found' };
  if (error instanceof StorageError) return { status: 503, error: 'Storage unavailable' };
  if (error instanceof AssemblyError) return { status: 502, error: 'Team assembly failed' };
  if (error instanceof RunTimeoutError) return { status: 504, error: 'Team run timed out' };
  return { status: 500, error: 'Internal server error' };
}

/**
 * Registered with app.onError so errors thrown by any handler land here.
 */
export function errorHandler(error: Error, c: Context): Response {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  const { status, error: label } = classifyError(error);
  const details = {
    path: c.req.path,
    method: c.req.method,
    status,
    error: error.message,
  };
  if (status >= 500) {
    logger.error({ ...details, stack: error.stack }, 'Request error');
  } else {
    logger.warn(details, 'Request rejected');
  }

  return c.json({ error: label, message: error.message }, status);
}
