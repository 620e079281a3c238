/**
 * Agent Context: builds the per-task context handed to an agent.
 *
 * The context is task-local: tool-call records and retry counts accumulate
 * here and are read back by the coordinator only after the agent settles.
 */

import type { Logger } from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import type { ToolGateway } from '../../tools/tool-gateway.js';
import { isRetryable } from '../../tools/types.js';
import type { AgentInputs, ArtifactKind, ProposalRequest } from '../types.js';
import type { AgentContext, ToolCallOptions, ToolCallResult } from './agent-protocol.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface CreateContextParams {
  runId: string;
  request: ProposalRequest;
  inputs: AgentInputs;
  degraded: ArtifactKind[];
  signal: AbortSignal;
  gateway: ToolGateway;
  retry: RetryPolicy;
  log: Logger;
}

export interface ContextInternals {
  retryCount: () => number;
}

export function createAgentContext(params: CreateContextParams): {
  ctx: AgentContext;
  internals: ContextInternals;
} {
  const { gateway, retry, signal, log } = params;
  let retries = 0;

  const callTool = async (
    providerId: string,
    query: unknown,
    options: ToolCallOptions,
  ): Promise<ToolCallResult> => {
    const { result, attempts } = await withRetry(
      (attempt) => gateway.invoke(providerId, query, { signal, attempt }),
      {
        maxAttempts: retry.maxAttempts,
        baseDelay: retry.baseDelayMs,
        shouldRetry: (call) => isRetryable(call.outcome),
        retryAfterMs: (call) => (call.outcome.status === 'failure' ? call.outcome.retry_after_ms ?? 0 : 0),
        onRetry: (attempt, call) => {
          retries += 1;
          const kind = call.outcome.status === 'failure' ? call.outcome.kind : 'unknown';
          log.info({ provider: providerId, label: options.label, attempt, kind }, 'Retrying tool call');
        },
        signal,
      },
    );

    const base = {
      provider_id: providerId,
      label: options.label,
      required: options.required,
      attempts,
    };
    if (result.outcome.status === 'success') {
      return { ...base, ok: true, results: result.outcome.payload };
    }
    const { status: _status, ...failure } = result.outcome;
    return { ...base, ok: false, failure };
  };

  const ctx: AgentContext = {
    runId: params.runId,
    request: params.request,
    inputs: params.inputs,
    degraded: [...params.degraded],
    signal,
    log,
    hasProvider: (providerId) => gateway.has(providerId),
    callTool,
  };

  return {
    ctx,
    internals: {
      retryCount: () => retries,
    },
  };
}
