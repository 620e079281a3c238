import { z } from 'zod';
import { ProviderHttpError } from '../failures.js';
import type { SearchResult, ToolBackend } from '../types.js';
import { fetchJson, truncate } from './http.js';
import { baseQuerySchema } from './query.js';

const GITHUB_SEARCH_URL = 'https://api.github.com/search/repositories';

export type GitHubQuery = z.infer<typeof baseQuerySchema>;

const githubResponseSchema = z.object({
  items: z.array(z.object({
    full_name: z.string(),
    html_url: z.string().url(),
    description: z.string().nullable(),
    stargazers_count: z.number().default(0),
    language: z.string().nullable().optional(),
  })),
});

export interface GitHubBackendOptions {
  id: string;
  description: string;
  token?: string;
}

/**
 * GitHub reports an exhausted quota as 403 with x-ratelimit-remaining: 0.
 * Re-express it as a 429 so it classifies as RateLimited, not AuthError.
 */
export function normalizeGitHubError(err: unknown, now = Date.now()): unknown {
  if (!(err instanceof ProviderHttpError) || err.status !== 403) return err;
  if (err.headers.get('x-ratelimit-remaining') !== '0') return err;

  const headers = new Headers();
  const reset = Number(err.headers.get('x-ratelimit-reset'));
  if (Number.isFinite(reset) && reset > 0) {
    headers.set('retry-after', String(Math.max(1, Math.ceil(reset - now / 1000))));
  }
  return new ProviderHttpError('GitHub', 429, 'rate limit exceeded', headers);
}

export function createGitHubBackend(options: GitHubBackendOptions): ToolBackend<GitHubQuery> {
  return {
    id: options.id,
    description: options.description,
    querySchema: baseQuerySchema,
    async search(query, { signal }): Promise<SearchResult[]> {
      const params = new URLSearchParams({
        q: query.query,
        sort: 'stars',
        order: 'desc',
        per_page: String(query.max_results),
      });
      let raw: unknown;
      try {
        raw = await fetchJson('GitHub', `${GITHUB_SEARCH_URL}?${params.toString()}`, {
          headers: {
            Accept: 'application/vnd.github+json',
            'X-GitHub-Api-Version': '2022-11-28',
            'User-Agent': 'proposal-pipeline',
            ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
          },
          signal,
        });
      } catch (err) {
        throw normalizeGitHubError(err);
      }
      return githubResponseSchema.parse(raw).items.slice(0, query.max_results).map((repo) => ({
        title: repo.full_name,
        url: repo.html_url,
        snippet: truncate(
          [repo.description ?? '', repo.language ? `Language: ${repo.language}` : '', `${repo.stargazers_count} stars`]
            .filter(Boolean)
            .join(' · '),
          400,
        ),
        source: options.id,
      }));
    },
  };
}
