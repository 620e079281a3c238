import { ZodError } from 'zod';
import type { ToolFailure } from './types.js';

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ECONNABORTED',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);
const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const RATE_LIMIT_PATTERNS = ['rate limit', 'rate_limit', 'too many requests', 'quota exceeded'];
const TIMEOUT_PATTERNS = ['timed out', 'timeout', 'aborted due to timeout'];

/** Non-2xx response from a provider. */
export class ProviderHttpError extends Error {
  readonly status: number;
  readonly headers: Headers;

  constructor(provider: string, status: number, body: string, headers: Headers = new Headers()) {
    super(`${provider} responded ${status}${body ? `: ${body.slice(0, 300)}` : ''}`);
    this.name = 'ProviderHttpError';
    this.status = status;
    this.headers = headers;
  }
}

/** Provider needs credentials that were not configured. */
export class MissingCredentialsError extends Error {
  constructor(provider: string, variable: string) {
    super(`${provider} requires ${variable} to be set`);
    this.name = 'MissingCredentialsError';
  }
}

function readProp(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  if (typeof headers !== 'object' || headers === null) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? readProp(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const status = readProp(error, 'status');
  if (typeof status === 'number') return status;
  const statusCode = readProp(error, 'statusCode');
  if (typeof statusCode === 'number') return statusCode;

  const responseStatus = readProp(readProp(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readProp(error, 'code');
  if (typeof code === 'string') return code.toUpperCase();
  // undici wraps socket errors: TypeError('fetch failed', { cause })
  const causeCode = readProp(readProp(error, 'cause'), 'code');
  return typeof causeCode === 'string' ? causeCode.toUpperCase() : null;
}

/**
 * Retry-After in milliseconds, from either delta-seconds or an HTTP date.
 * Returns 0 when absent or unparseable.
 */
export function getRetryAfterMs(error: unknown, now = Date.now()): number {
  const retryAfter = readHeader(readProp(error, 'headers'), 'retry-after')
    ?? readHeader(readProp(readProp(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : 0;
  }
  const date = Date.parse(retryAfter);
  return Number.isNaN(date) ? 0 : Math.max(0, date - now);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map anything a backend throws onto the uniform failure taxonomy so
 * agents have a single handling path regardless of provider.
 */
export function classifyToolError(error: unknown): ToolFailure {
  const detail = describe(error);

  if (error instanceof MissingCredentialsError) {
    return { kind: 'AuthError', detail };
  }
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return { kind: 'MalformedResponse', detail };
  }

  const status = getStatusCode(error);
  if (status != null) {
    if (status === 429) {
      const retryAfter = getRetryAfterMs(error);
      return retryAfter > 0
        ? { kind: 'RateLimited', detail, retry_after_ms: retryAfter }
        : { kind: 'RateLimited', detail };
    }
    if (status === 401 || status === 403) return { kind: 'AuthError', detail };
    if (status === 404) return { kind: 'NotFound', detail };
    if (status === 408 || status === 504) return { kind: 'Timeout', detail };
    if (status >= 500) return { kind: 'TransportError', detail };
    if (status >= 400) return { kind: 'MalformedResponse', detail };
  }

  const code = getErrorCode(error);
  if (code && TIMEOUT_ERROR_CODES.has(code)) return { kind: 'Timeout', detail };
  if (code && TRANSPORT_ERROR_CODES.has(code)) return { kind: 'TransportError', detail };

  const msg = detail.toLowerCase();
  if (RATE_LIMIT_PATTERNS.some((p) => msg.includes(p))) return { kind: 'RateLimited', detail };
  if (TIMEOUT_PATTERNS.some((p) => msg.includes(p))) return { kind: 'Timeout', detail };

  return { kind: 'TransportError', detail };
}
