import { z } from 'zod';
import { MissingCredentialsError } from '../failures.js';
import type { SearchResult, ToolBackend } from '../types.js';
import { fetchJson, safeUrl, truncate } from './http.js';
import { baseQuerySchema } from './query.js';

const KAGGLE_DATASETS_URL = 'https://www.kaggle.com/api/v1/datasets/list';

const kaggleResponseSchema = z.array(z.object({
  ref: z.string().min(1),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  url: z.string().nullish(),
}));

export type KaggleQuery = z.infer<typeof baseQuerySchema>;

export interface KaggleBackendOptions {
  id: string;
  description: string;
  username?: string;
  key?: string;
}

export function createKaggleBackend(options: KaggleBackendOptions): ToolBackend<KaggleQuery> {
  return {
    id: options.id,
    description: options.description,
    querySchema: baseQuerySchema,
    async search(query, { signal }): Promise<SearchResult[]> {
      if (!options.username || !options.key) {
        throw new MissingCredentialsError('Kaggle', 'KAGGLE_USERNAME and KAGGLE_KEY');
      }
      const params = new URLSearchParams({ search: query.query, page: '1' });
      const auth = Buffer.from(`${options.username}:${options.key}`).toString('base64');
      const raw = await fetchJson('Kaggle', `${KAGGLE_DATASETS_URL}?${params.toString()}`, {
        headers: { Authorization: `Basic ${auth}` },
        signal,
      });
      return kaggleResponseSchema.parse(raw).slice(0, query.max_results).map((entry) => ({
        title: entry.title?.trim() || entry.ref,
        url: safeUrl(entry.url) ?? `https://www.kaggle.com/datasets/${entry.ref}`,
        snippet: truncate(entry.subtitle ?? '', 400),
        source: options.id,
      }));
    },
  };
}
