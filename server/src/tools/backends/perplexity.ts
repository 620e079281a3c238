import { z } from 'zod';
import { MissingCredentialsError } from '../failures.js';
import type { SearchResult, ToolBackend } from '../types.js';
import { fetchJson, safeUrl, truncate } from './http.js';
import { baseQuerySchema } from './query.js';

const PERPLEXITY_URL = 'https://api.perplexity.ai/chat/completions';
const MODEL = 'sonar-pro';

const SYSTEM_PROMPT = `You are a business research analyst. Answer with a numbered list.
Put one finding per line in the form "Short title: one or two factual sentences".
Cite sources with [n] markers. If you are not sure about something, leave it out.`;

const perplexityQuerySchema = baseQuerySchema.extend({
  temperature: z.number().min(0).max(1).default(0.2),
});

export type PerplexityQuery = z.infer<typeof perplexityQuerySchema>;

const perplexityResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string() }),
  })).min(1),
  citations: z.array(z.string()).optional(),
});

const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)])\s*/;
const CITATION_MARKER = /\[(\d+)\]/;

/**
 * Split a list-style answer into one result per finding.
 * "Title: body [2]" lines become { title, snippet, url: citations[1] }.
 */
export function parseFindings(content: string, citations: string[], source: string): SearchResult[] {
  const findings: SearchResult[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(LIST_MARKER, '').replace(/\*\*/g, '').trim();
    if (!line || line.endsWith(':') || line.startsWith('#')) continue;

    const citation = CITATION_MARKER.exec(line);
    const url = citation ? safeUrl(citations[Number(citation[1]) - 1]) : undefined;
    const text = line.replace(/\[\d+\]/g, '').trim();

    const colon = text.indexOf(':');
    const hasTitle = colon > 0 && colon <= 120;
    const title = hasTitle ? text.slice(0, colon).trim() : truncate(text, 80);
    const snippet = hasTitle ? text.slice(colon + 1).trim() : text;
    if (!title) continue;

    findings.push({ title, url, snippet: truncate(snippet, 600), source });
  }
  return findings;
}

export interface PerplexityBackendOptions {
  id: string;
  description: string;
  apiKey?: string;
}

export function createPerplexityBackend(options: PerplexityBackendOptions): ToolBackend<PerplexityQuery> {
  return {
    id: options.id,
    description: options.description,
    querySchema: perplexityQuerySchema,
    async search(query, { signal }): Promise<SearchResult[]> {
      if (!options.apiKey) {
        throw new MissingCredentialsError('Perplexity', 'PERPLEXITY_API_KEY');
      }
      const raw = await fetchJson('Perplexity', PERPLEXITY_URL, {
        method: 'POST',
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body: {
          model: MODEL,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: query.query },
          ],
          temperature: query.temperature,
          max_tokens: 2048,
        },
        signal,
      });
      const data = perplexityResponseSchema.parse(raw);
      const content = data.choices[0]?.message.content ?? '';
      return parseFindings(content, data.citations ?? [], options.id).slice(0, query.max_results);
    },
  };
}
