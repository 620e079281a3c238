/**
 * Error types shared across the gateway, agents and coordinator.
 *
 * Tool-level failures are values (see tools/types.ts), not exceptions.
 * The classes here cover caller defects, agent failures and cancellation.
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Unknown provider or a query that does not match the provider's schema. */
export class ToolGatewayError extends Error {
  readonly providerId: string;

  constructor(providerId: string, message: string) {
    super(message);
    this.name = 'ToolGatewayError';
    this.providerId = providerId;
  }
}

export class StageGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StageGraphError';
  }
}

export type AgentFailureKind = 'AllRequiredCallsExhausted' | 'InternalAssemblyError';

export class AgentFailure extends Error {
  readonly kind: AgentFailureKind;
  readonly agent: string;

  constructor(agent: string, kind: AgentFailureKind, message: string) {
    super(message);
    this.name = 'AgentFailure';
    this.agent = agent;
    this.kind = kind;
  }
}

/** Raised into in-flight work when a run is cancelled or cut off. */
export class CancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
