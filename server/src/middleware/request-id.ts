import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    /** Logger bound to this request's id */
    log: Logger;
  }
}

export const REQUEST_ID_HEADER = 'X-Request-ID';

const MAX_REQUEST_ID_LENGTH = 64;
const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/** Caller-supplied id when it is safe to echo and log, otherwise a fresh UUID. */
export function resolveRequestId(raw: string | undefined): string {
  const candidate = raw?.trim().slice(0, MAX_REQUEST_ID_LENGTH);
  return candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
  c.set('requestId', requestId);
  c.set('log', logger.child({ request_id: requestId }));
  c.header(REQUEST_ID_HEADER, requestId);
  await next();
}
