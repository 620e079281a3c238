import { ProviderHttpError } from '../failures.js';

export interface FetchJsonOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal: AbortSignal;
}

/**
 * Fetch a provider endpoint and parse the JSON body.
 * Non-2xx responses throw ProviderHttpError carrying status and headers;
 * an unparseable body throws SyntaxError.
 */
export async function fetchJson(provider: string, url: string, options: FetchJsonOptions): Promise<unknown> {
  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers: {
      Accept: 'application/json',
      ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...options.headers,
    },
    body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
    signal: options.signal,
  });

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new ProviderHttpError(provider, response.status, text, response.headers);
  }

  const text = await response.text();
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

export function truncate(text: string, max: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > max ? `${clean.slice(0, max - 3)}...` : clean;
}

/** Keep only absolute http(s) URLs; providers occasionally return relative or empty links. */
export function safeUrl(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}
