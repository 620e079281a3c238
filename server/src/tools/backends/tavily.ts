import { z } from 'zod';
import { MissingCredentialsError } from '../failures.js';
import type { SearchResult, ToolBackend } from '../types.js';
import { fetchJson, safeUrl, truncate } from './http.js';
import { baseQuerySchema } from './query.js';

const TAVILY_URL = 'https://api.tavily.com/search';

const tavilyQuerySchema = baseQuerySchema.extend({
  /** News lookback window; only meaningful for the news topic */
  days: z.number().int().min(1).max(365).optional(),
});

export type TavilyQuery = z.infer<typeof tavilyQuerySchema>;

const tavilyResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string(),
    url: z.string(),
    content: z.string().default(''),
  })),
});

export interface TavilyBackendOptions {
  id: string;
  description: string;
  apiKey?: string;
  topic: 'general' | 'news';
}

export function createTavilyBackend(options: TavilyBackendOptions): ToolBackend<TavilyQuery> {
  return {
    id: options.id,
    description: options.description,
    querySchema: tavilyQuerySchema,
    async search(query, { signal }): Promise<SearchResult[]> {
      if (!options.apiKey) {
        throw new MissingCredentialsError('Tavily', 'TAVILY_API_KEY');
      }
      const raw = await fetchJson('Tavily', TAVILY_URL, {
        method: 'POST',
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body: {
          query: query.query,
          topic: options.topic,
          max_results: query.max_results,
          search_depth: 'basic',
          ...(options.topic === 'news' && query.days ? { days: query.days } : {}),
        },
        signal,
      });
      const data = tavilyResponseSchema.parse(raw);
      return data.results
        .filter((r) => r.title.trim().length > 0)
        .slice(0, query.max_results)
        .map((r) => ({
          title: truncate(r.title, 200),
          url: safeUrl(r.url),
          snippet: truncate(r.content, 600),
          source: options.id,
        }));
    },
  };
}
