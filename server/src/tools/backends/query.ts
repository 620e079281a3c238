import { z } from 'zod';

export const MAX_QUERY_LENGTH = 400;

/** Fields every provider query shares. */
export const baseQuerySchema = z.object({
  query: z.string().trim().min(1).max(MAX_QUERY_LENGTH),
  max_results: z.number().int().min(1).max(20).default(5),
});

export type BaseQuery = z.infer<typeof baseQuerySchema>;

/**
 * Collapse whitespace and cut to the provider query limit, on a word
 * boundary when there is one.
 */
export function boundedQuery(text: string, max = MAX_QUERY_LENGTH): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= max) return collapsed;
  const cut = collapsed.slice(0, max);
  const lastSpace = cut.lastIndexOf(' ');
  return lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
}
