/**
 * ToolGateway: uniform transport + normalization layer over named
 * search providers.
 *
 * Validates queries before dispatch, enforces a per-call timeout regardless
 * of backend behaviour, and folds every backend error into the ToolFailure
 * taxonomy. Retry policy belongs to callers; the gateway never retries.
 */

import { createCombinedAbortSignal } from '../lib/abort.js';
import { CancelledError, ToolGatewayError } from '../lib/errors.js';
import logger, { type Logger } from '../lib/logger.js';
import { classifyToolError } from './failures.js';
import {
  searchResultListSchema,
  type BackendCallOptions,
  type SearchResult,
  type ToolBackend,
  type ToolCall,
  type ToolOutcome,
} from './types.js';

type PreparedCall =
  | { success: true; query: unknown; run: (options: BackendCallOptions) => Promise<SearchResult[]> }
  | { success: false; issues: string[] };

// Type-erased view of a backend so the registry can hold heterogeneous query types.
interface RegisteredBackend {
  id: string;
  description: string;
  prepare: (raw: unknown) => PreparedCall;
}

export interface ToolGatewayOptions {
  /** Upper bound for every call, enforced here rather than by the backend */
  timeoutMs: number;
  logger?: Logger;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  attempt?: number;
}

export interface ProviderDescription {
  id: string;
  description: string;
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class ToolGateway {
  private readonly backends = new Map<string, RegisteredBackend>();
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: ToolGatewayOptions) {
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? logger.child({ component: 'tool-gateway' });
  }

  register<TQuery>(backend: ToolBackend<TQuery>): this {
    if (this.backends.has(backend.id)) {
      throw new ToolGatewayError(backend.id, `Provider already registered: ${backend.id}`);
    }
    this.backends.set(backend.id, {
      id: backend.id,
      description: backend.description,
      prepare: (raw) => {
        const parsed = backend.querySchema.safeParse(raw);
        if (!parsed.success) {
          return {
            success: false,
            issues: parsed.error.issues.map((i) => `${i.path.join('.') || 'query'}: ${i.message}`),
          };
        }
        const query = parsed.data;
        return { success: true, query, run: (options) => backend.search(query, options) };
      },
    });
    return this;
  }

  has(providerId: string): boolean {
    return this.backends.has(providerId);
  }

  list(): ProviderDescription[] {
    return [...this.backends.values()].map(({ id, description }) => ({ id, description }));
  }

  /**
   * Invoke one provider once. Resolves with a ToolCall whose outcome is a
   * success or a classified failure; rejects only for caller defects
   * (ToolGatewayError) or when the caller's signal is aborted (CancelledError).
   */
  async invoke(providerId: string, query: unknown, options: InvokeOptions = {}): Promise<ToolCall> {
    const backend = this.backends.get(providerId);
    if (!backend) {
      throw new ToolGatewayError(providerId, `Unknown provider: ${providerId}`);
    }
    const prepared = backend.prepare(query);
    if (!prepared.success) {
      throw new ToolGatewayError(providerId, `Invalid query for ${providerId}: ${prepared.issues.join('; ')}`);
    }

    const callerSignal = options.signal;
    if (callerSignal?.aborted) throw this.cancellation(callerSignal);

    const attempt = options.attempt ?? 1;
    const startedAt = Date.now();
    const { signal, timedOut, cleanup } = createCombinedAbortSignal(callerSignal, this.timeoutMs);

    let outcome: ToolOutcome;
    try {
      const payload = await raceAbort(prepared.run({ signal }), signal);
      const checked = searchResultListSchema.safeParse(payload);
      outcome = checked.success
        ? { status: 'success', payload: checked.data }
        : {
            status: 'failure',
            kind: 'MalformedResponse',
            detail: `${providerId} returned results that do not match the result shape`,
          };
    } catch (err) {
      if (callerSignal?.aborted) throw this.cancellation(callerSignal);
      outcome = timedOut()
        ? { status: 'failure', kind: 'Timeout', detail: `${providerId} did not respond within ${this.timeoutMs}ms` }
        : { status: 'failure', ...classifyToolError(err) };
    } finally {
      cleanup();
    }

    const durationMs = Date.now() - startedAt;
    if (outcome.status === 'success') {
      this.log.debug({ provider: providerId, attempt, results: outcome.payload.length, duration_ms: durationMs }, 'Tool call succeeded');
    } else {
      this.log.warn({ provider: providerId, attempt, kind: outcome.kind, detail: outcome.detail, duration_ms: durationMs }, 'Tool call failed');
    }

    return {
      provider_id: providerId,
      query: prepared.query,
      attempt,
      outcome,
      duration_ms: durationMs,
    };
  }

  private cancellation(signal: AbortSignal): Error {
    return signal.reason instanceof CancelledError ? signal.reason : new CancelledError();
  }
}
