import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';

import { isMonitorError } from '../errors';

export type ErrorResponse = {
  error: {
    code: string;
    message: string;
  };
};

export class AppError extends Error {
  constructor(
    public readonly status: ContentfulStatusCode,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

function errorBody(code: string, message: string): ErrorResponse {
  return { error: { code, message } };
}

export function handleNotFound(c: Context): Response {
  return c.json(errorBody('NOT_FOUND', 'Not Found'), 404);
}

export function handleError(err: unknown, c: Context): Response {
  if (err instanceof AppError) {
    return c.json(errorBody(err.code, err.message), err.status);
  }
  if (err instanceof ZodError) {
    const message = err.issues[0]?.message ?? 'Invalid argument';
    return c.json(errorBody('INVALID_ARGUMENT', message), 400);
  }
  if (isMonitorError(err, 'STATE_STORE_IO_ERROR')) {
    console.error(`http: state store failure: ${err.message}`);
    return c.json(errorBody('STATE_STORE_UNAVAILABLE', 'State store unavailable'), 503);
  }

  console.error('http: unhandled error', err);
  return c.json(errorBody('INTERNAL', 'Internal Server Error'), 500);
}
