import { timingSafeEqual } from 'node:crypto';

import { createMiddleware } from 'hono/factory';

import { AppError } from './errors';

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

// Bearer-token guard for the trigger endpoints.
export function requireBearerToken(getToken: () => string | undefined) {
  return createMiddleware(async (c, next) => {
    const expected = getToken();
    if (!expected) {
      throw new AppError(500, 'INTERNAL', 'Trigger token is not configured');
    }

    const header = c.req.header('authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header.trim());
    const provided = match?.[1];
    if (!provided || !tokensMatch(expected, provided)) {
      throw new AppError(401, 'UNAUTHORIZED', 'Unauthorized');
    }

    await next();
  });
}
