import { z } from 'zod';
import type { SearchResult, ToolBackend } from '../types.js';
import { fetchJson, truncate } from './http.js';
import { baseQuerySchema } from './query.js';

const HF_DATASETS_URL = 'https://huggingface.co/api/datasets';

const hfResponseSchema = z.array(z.object({
  id: z.string().min(1),
  description: z.string().nullish(),
  downloads: z.number().nullish(),
  tags: z.array(z.string()).nullish(),
}));

export type HuggingFaceQuery = z.infer<typeof baseQuerySchema>;

export interface HuggingFaceBackendOptions {
  id: string;
  description: string;
  token?: string;
}

function describeDataset(entry: z.infer<typeof hfResponseSchema>[number]): string {
  if (entry.description) return truncate(entry.description, 400);
  const tags = (entry.tags ?? []).filter((t) => !t.includes(':')).slice(0, 5);
  const downloads = entry.downloads != null ? `${entry.downloads} downloads` : '';
  return [tags.join(', '), downloads].filter(Boolean).join(' · ');
}

export function createHuggingFaceBackend(options: HuggingFaceBackendOptions): ToolBackend<HuggingFaceQuery> {
  return {
    id: options.id,
    description: options.description,
    querySchema: baseQuerySchema,
    async search(query, { signal }): Promise<SearchResult[]> {
      const params = new URLSearchParams({
        search: query.query,
        limit: String(query.max_results),
        sort: 'downloads',
        direction: '-1',
      });
      const raw = await fetchJson('Hugging Face', `${HF_DATASETS_URL}?${params.toString()}`, {
        headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
        signal,
      });
      return hfResponseSchema.parse(raw).slice(0, query.max_results).map((entry) => ({
        title: entry.id,
        url: `https://huggingface.co/datasets/${entry.id}`,
        snippet: describeDataset(entry),
        source: options.id,
      }));
    },
  };
}
