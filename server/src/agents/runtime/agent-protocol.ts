/**
 * Agent Protocol: the uniform contract every pipeline agent implements.
 *
 * An agent receives a context (request, committed upstream artifacts, a
 * retrying tool-call function) and produces exactly one artifact. Agents
 * hold no state between runs and never see uncommitted upstream output.
 */

import { AgentFailure } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import type { SearchResult, ToolFailure } from '../../tools/types.js';
import type {
  AgentInputs,
  AgentKind,
  AgentOutput,
  ArtifactKind,
  ProposalRequest,
} from '../types.js';

// ─── Tool calls ──────────────────────────────────────────────────────

export interface ToolCallOptions {
  /** Required calls decide agent failure; optional ones only degrade a section */
  required: boolean;
  /** Names the section this call feeds, for logs and degraded-section bookkeeping */
  label: string;
}

interface ToolCallResultBase {
  provider_id: string;
  label: string;
  required: boolean;
  attempts: number;
}

export type ToolCallResult =
  | (ToolCallResultBase & { ok: true; results: SearchResult[] })
  | (ToolCallResultBase & { ok: false; failure: ToolFailure });

// ─── Agent Context ───────────────────────────────────────────────────

export interface AgentContext {
  readonly runId: string;
  readonly request: ProposalRequest;
  /** Upstream artifacts committed before this task was dispatched */
  readonly inputs: AgentInputs;
  /** Dependencies this task is running without */
  readonly degraded: readonly ArtifactKind[];
  /** Aborted when the run is cancelled or this task is cut off */
  readonly signal: AbortSignal;
  readonly log: Logger;

  hasProvider: (providerId: string) => boolean;

  /**
   * Invoke a provider through the gateway, retrying transient failures.
   * Resolves with the final outcome; rejects only on cancellation or a
   * caller defect (unknown provider, invalid query).
   */
  callTool: (providerId: string, query: unknown, options: ToolCallOptions) => Promise<ToolCallResult>;
}

// ─── Agent ───────────────────────────────────────────────────────────

export interface ProposalAgent<K extends AgentKind = AgentKind> {
  readonly kind: K;
  readonly description: string;
  run: (ctx: AgentContext) => Promise<AgentOutput[K]>;
}

/**
 * Throw AllRequiredCallsExhausted when every required call failed.
 * Agents call this after joining their tool calls.
 */
export function assertRequiredCalls(agent: AgentKind, results: ToolCallResult[]): void {
  const required = results.filter((r) => r.required);
  if (required.length === 0 || required.some((r) => r.ok)) return;

  const reasons = required.map((r) =>
    r.ok ? `${r.label}: ok` : `${r.label} (${r.provider_id}): ${r.failure.kind} after ${r.attempts} attempt(s)`,
  );
  throw new AgentFailure(agent, 'AllRequiredCallsExhausted', `All required lookups failed: ${reasons.join('; ')}`);
}

/** Labels of calls that did not succeed, for an artifact's missing_sections. */
export function failedLabels(results: ToolCallResult[]): string[] {
  return results.filter((r) => !r.ok).map((r) => r.label);
}
