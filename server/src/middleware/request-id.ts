import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createRequestLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    logger: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Accept a well-formed caller `X-Request-ID` (capped at 64 chars) or mint one,
 * echo it back, and bind a request-scoped logger to the context.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  const candidate = raw?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();

  c.set('requestId', requestId);
  c.set('logger', createRequestLogger(requestId, { method: c.req.method, path: c.req.path }));
  c.header('X-Request-ID', requestId);
  await next();
}
