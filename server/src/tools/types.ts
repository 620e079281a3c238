/**
 * ToolGateway types: the uniform contract between agents and external
 * search providers.
 */

import { z } from 'zod';

export const TOOL_FAILURE_KINDS = [
  'RateLimited',
  'AuthError',
  'NotFound',
  'MalformedResponse',
  'Timeout',
  'TransportError',
] as const;

export type ToolFailureKind = (typeof TOOL_FAILURE_KINDS)[number];

/** Failure kinds worth another attempt; the rest are configuration or logic errors. */
export const RETRYABLE_FAILURES: ReadonlySet<ToolFailureKind> = new Set<ToolFailureKind>([
  'RateLimited',
  'Timeout',
  'TransportError',
]);

export const searchResultSchema = z.object({
  title: z.string().min(1),
  url: z.string().url().optional(),
  snippet: z.string(),
  source: z.string().min(1),
});

export type SearchResult = z.infer<typeof searchResultSchema>;

export const searchResultListSchema = z.array(searchResultSchema);

export interface ToolFailure {
  kind: ToolFailureKind;
  detail: string;
  /** Provider-requested wait before retrying (RateLimited only) */
  retry_after_ms?: number;
}

export type ToolOutcome =
  | { status: 'success'; payload: SearchResult[] }
  | ({ status: 'failure' } & ToolFailure);

/** One invocation of an external provider. Ephemeral: lives for one agent execution. */
export interface ToolCall {
  provider_id: string;
  query: unknown;
  attempt: number;
  outcome: ToolOutcome;
  duration_ms: number;
}

export interface BackendCallOptions {
  signal: AbortSignal;
}

/**
 * A named external provider. `search` receives a query that already passed
 * `querySchema` and returns normalized results, or throws; the gateway maps
 * whatever it throws onto the failure taxonomy.
 */
export interface ToolBackend<TQuery = unknown> {
  readonly id: string;
  readonly description: string;
  readonly querySchema: z.ZodType<TQuery, z.ZodTypeDef, unknown>;
  search(query: TQuery, options: BackendCallOptions): Promise<SearchResult[]>;
}

export function isRetryable(outcome: ToolOutcome): boolean {
  return outcome.status === 'failure' && RETRYABLE_FAILURES.has(outcome.kind);
}
