import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;
  let exceeded = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        exceeded = true;
        break;
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  if (exceeded) {
    await reader.cancel();
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parse a JSON body with a byte-size guard that holds even when
 * Content-Length is absent or wrong. An empty body parses as `{}`.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const contentLength = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
