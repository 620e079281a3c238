/**
 * Pipeline Coordinator
 *
 * Executes the stage graph for each run: asks the graph which tasks are
 * ready, dispatches them (bounded by max_parallelism), records artifacts
 * as tasks settle, and finalizes the run once the terminal stage ends.
 *
 * The coordinator is the only writer of run state. Agents see frozen
 * snapshots of committed artifacts and report back through the promise
 * their task returns.
 *
 * No provider calls here, only coordination.
 */

import { randomUUID } from 'node:crypto';
import type { PipelineSettings } from '../lib/config.js';
import { AgentFailure, CancelledError, StageGraphError, errorMessage } from '../lib/errors.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { linkAbort } from '../lib/abort.js';
import { recordRunFinished, recordRunStarted } from '../lib/metrics.js';
import type { ToolGateway } from '../tools/tool-gateway.js';
import { createAgentContext } from './runtime/agent-context.js';
import type { AgentRegistry } from './runtime/agent-registry.js';
import { RunStore } from './run-store.js';
import { proposalRequestSchema, type ProposalRequestInput } from './schemas/proposal-request.js';
import {
  createDefaultStageGraph,
  evaluateReadiness,
  nextWakeDelay,
  stageOf,
  validateStageGraph,
  type ReadinessDecision,
  type StageGraph,
} from './stage-graph.js';
import {
  TERMINAL_RUN_STATUSES,
  TERMINAL_TASK_STATUSES,
  type AgentInputs,
  type AgentKind,
  type AgentTask,
  type Artifact,
  type ArtifactByKind,
  type ArtifactKind,
  type PipelineRun,
  type ProposalDocument,
  type RunFailureKind,
  type RunResult,
  type TaskStatus,
} from './types.js';

export interface CoordinatorOptions {
  gateway: ToolGateway;
  agents: AgentRegistry;
  settings: PipelineSettings;
  graph?: StageGraph;
}

export type CancelOutcome = 'cancelled' | 'not_found' | 'already_terminal';

// ─── Internal types ───────────────────────────────────────────────────

type TaskSettlement =
  | { agent: AgentKind; ok: true; artifact: Artifact; retries: number }
  | { agent: AgentKind; ok: false; error: unknown; retries: number };

interface RunRecord {
  run: PipelineRun;
  artifacts: Partial<ArtifactByKind>;
  document: ProposalDocument | null;
  controller: AbortController;
  taskControllers: Map<AgentKind, AbortController>;
  done: Promise<void>;
  startedAtMs: number;
  toolRetries: number;
  expiresAt: number | null;
  log: Logger;
}

// ─── Helpers ──────────────────────────────────────────────────────────

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function commitArtifact(store: Partial<ArtifactByKind>, artifact: Artifact): void {
  const frozen = deepFreeze(artifact);
  switch (frozen.kind) {
    case 'research_profile':
      store.research_profile = frozen;
      break;
    case 'market_trends':
      store.market_trends = frozen;
      break;
    case 'resource_bundle':
      store.resource_bundle = frozen;
      break;
    case 'proposal_document':
      store.proposal_document = frozen;
      break;
  }
}

function pickInputs(store: Partial<ArtifactByKind>, kinds: readonly ArtifactKind[]): AgentInputs {
  const research = kinds.includes('research_profile') ? store.research_profile : undefined;
  const market = kinds.includes('market_trends') ? store.market_trends : undefined;
  const resources = kinds.includes('resource_bundle') ? store.resource_bundle : undefined;
  return {
    ...(research ? { research_profile: research } : {}),
    ...(market ? { market_trends: market } : {}),
    ...(resources ? { resource_bundle: resources } : {}),
  };
}

function statusMap(tasks: AgentTask[]): Partial<Record<AgentKind, TaskStatus>> {
  const statuses: Partial<Record<AgentKind, TaskStatus>> = {};
  for (const task of tasks) statuses[task.agent] = task.status;
  return statuses;
}

function nowIso(): string {
  return new Date().toISOString();
}

// ─── Coordinator ──────────────────────────────────────────────────────

export class Coordinator {
  private readonly gateway: ToolGateway;
  private readonly agents: AgentRegistry;
  private readonly settings: PipelineSettings;
  private readonly graph: StageGraph;
  private readonly runs = new RunStore<RunRecord>();
  private shuttingDown = false;

  constructor(options: CoordinatorOptions) {
    this.gateway = options.gateway;
    this.agents = options.agents;
    this.settings = options.settings;
    this.graph = options.graph ?? createDefaultStageGraph(options.settings);

    validateStageGraph(this.graph);
    const unregistered = this.graph.stages.filter((s) => !this.agents.has(s.agent)).map((s) => s.agent);
    if (unregistered.length > 0) {
      throw new StageGraphError(`No agent registered for stage(s): ${unregistered.join(', ')}`);
    }
  }

  // ─── Public API ─────────────────────────────────────────────────────

  /** Create a run and start executing it in the background. */
  submit(input: ProposalRequestInput): string {
    if (this.shuttingDown) {
      throw new Error('Coordinator is shutting down');
    }
    const request = proposalRequestSchema.parse(input);
    const runId = randomUUID();

    const tasks: AgentTask[] = this.graph.stages.map((stage) => ({
      agent: stage.agent,
      produces: stage.produces,
      depends_on: stage.dependencies.map((d) => d.artifact),
      status: 'waiting',
      retry_count: 0,
      last_error: null,
      failure_kind: null,
      degraded_inputs: [],
      started_at: null,
      finished_at: null,
    }));

    const record: RunRecord = {
      run: {
        run_id: runId,
        request,
        status: 'pending',
        created_at: nowIso(),
        started_at: null,
        completed_at: null,
        tasks,
        missing_sections: [],
        failure: null,
      },
      artifacts: {},
      document: null,
      controller: new AbortController(),
      taskControllers: new Map(),
      done: Promise.resolve(),
      startedAtMs: Date.now(),
      toolRetries: 0,
      expiresAt: null,
      log: createRunLogger(runId, { company: request.company }),
    };
    this.runs.set(runId, record);
    recordRunStarted();

    record.done = this.execute(record).catch((err: unknown) => {
      record.log.error({ error: errorMessage(err) }, 'Coordinator error');
      this.failRun(record, 'AssemblerDefect', `Coordinator error: ${errorMessage(err)}`);
    });

    return runId;
  }

  getStatus(runId: string): PipelineRun | null {
    const record = this.runs.get(runId);
    return record ? structuredClone(record.run) : null;
  }

  getResult(runId: string): RunResult {
    const record = this.runs.get(runId);
    if (!record) return { state: 'not_found' };

    const { status, failure } = record.run;
    if ((status === 'completed' || status === 'partially_failed') && record.document) {
      return { state: 'ready', status, document: record.document };
    }
    if (status === 'failed') {
      return { state: 'failed', failure: failure ?? { kind: 'AssemblerDefect', detail: 'Run failed' } };
    }
    return { state: 'not_ready', status };
  }

  /** Resolves once the run reaches a terminal status. */
  async waitForRun(runId: string): Promise<PipelineRun | null> {
    const record = this.runs.get(runId);
    if (!record) return null;
    await record.done;
    return structuredClone(record.run);
  }

  cancel(runId: string, detail = 'Run cancelled by request'): CancelOutcome {
    const record = this.runs.get(runId);
    if (!record) return 'not_found';
    if (TERMINAL_RUN_STATUSES.has(record.run.status)) return 'already_terminal';

    record.controller.abort(new CancelledError(detail));
    // Completed artifacts are discarded with the run
    record.artifacts = {};
    record.document = null;
    this.closeOpenTasks(record, detail);
    this.finishRun(record, 'failed', { kind: 'Cancelled', detail });
    record.log.info({ detail }, 'Run cancelled');
    return 'cancelled';
  }

  /** Cancel every active run and wait for their loops to exit. */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const records = this.runs.values();
    for (const record of records) {
      if (!TERMINAL_RUN_STATUSES.has(record.run.status)) {
        this.cancel(record.run.run_id, 'Coordinator shutting down');
      }
    }
    await Promise.all(records.map((r) => r.done));
  }

  activeRunCount(): number {
    return this.runs.values().filter((r) => !TERMINAL_RUN_STATUSES.has(r.run.status)).length;
  }

  // ─── Run loop ───────────────────────────────────────────────────────

  private async execute(record: RunRecord): Promise<void> {
    const { run, log } = record;
    const { max_run_duration_ms, finalize_reserve_ms, max_parallelism } = this.settings;
    const cutoffAtMs = max_run_duration_ms - finalize_reserve_ms;
    const signal = record.controller.signal;

    run.status = 'running';
    run.started_at = nowIso();
    record.startedAtMs = Date.now();
    log.info({ industry: run.request.industry }, 'Run started');

    const inflight = new Map<AgentKind, Promise<TaskSettlement>>();
    const aborted = new Promise<null>((resolve) => {
      signal.addEventListener('abort', () => resolve(null), { once: true });
    });
    let cutoffApplied = false;

    while (!TERMINAL_RUN_STATUSES.has(run.status)) {
      // A settled terminal task wins over the deadline
      if (this.tryFinalize(record, inflight)) break;

      const elapsed = Date.now() - record.startedAtMs;

      if (elapsed >= max_run_duration_ms) {
        record.controller.abort(new CancelledError('Run deadline exceeded'));
        this.closeOpenTasks(record, `Run exceeded ${max_run_duration_ms}ms`, 'RunTimeout');
        this.finishRun(record, 'failed', {
          kind: 'RunTimeout',
          detail: `Run did not finish within ${max_run_duration_ms}ms`,
        });
        break;
      }

      if (!cutoffApplied && elapsed >= cutoffAtMs) {
        cutoffApplied = true;
        this.cutOffUpstream(record, inflight, elapsed);
      }

      const decisions = evaluateReadiness(this.graph, {
        statuses: statusMap(run.tasks),
        elapsed_ms: elapsed,
      });
      for (const decision of decisions) this.applyDecision(record, decision);

      for (const task of run.tasks) {
        if (task.status !== 'ready' || inflight.size >= max_parallelism) continue;
        inflight.set(task.agent, this.startTask(record, task));
      }

      if (this.tryFinalize(record, inflight)) break;

      if (inflight.size === 0 && !run.tasks.some((t) => t.status === 'ready')) {
        const wake = nextWakeDelay(this.graph, { statuses: statusMap(run.tasks), elapsed_ms: elapsed });
        if (wake === null) {
          this.closeOpenTasks(record, 'Stage graph stalled');
          this.finishRun(record, 'failed', {
            kind: 'DependencyTimeout',
            detail: `No stage can make progress; ${this.graph.terminal} never became ready`,
          });
          break;
        }
      }

      const delay = this.nextDelay(record, elapsed, cutoffApplied ? null : cutoffAtMs - elapsed);
      const settlement = await this.waitForEvent([...inflight.values()], delay, aborted);
      if (settlement) {
        inflight.delete(settlement.agent);
        this.recordSettlement(record, settlement);
      }
    }
  }

  private nextDelay(record: RunRecord, elapsed: number, untilCutoff: number | null): number {
    const candidates = [this.settings.max_run_duration_ms - elapsed];
    if (untilCutoff !== null) candidates.push(untilCutoff);
    const wake = nextWakeDelay(this.graph, { statuses: statusMap(record.run.tasks), elapsed_ms: elapsed });
    if (wake !== null) candidates.push(wake);
    return Math.max(0, Math.min(...candidates));
  }

  private async waitForEvent(
    pending: Array<Promise<TaskSettlement>>,
    delayMs: number,
    aborted: Promise<null>,
  ): Promise<TaskSettlement | null> {
    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), delayMs);
    });
    try {
      return await Promise.race([...pending, elapsed, aborted]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ─── Tasks ──────────────────────────────────────────────────────────

  private findTask(record: RunRecord, agent: AgentKind): AgentTask | undefined {
    return record.run.tasks.find((t) => t.agent === agent);
  }

  private applyDecision(record: RunRecord, decision: ReadinessDecision): void {
    const task = this.findTask(record, decision.agent);
    if (!task || task.status !== 'waiting') return;

    if (decision.action === 'dispatch') {
      task.status = 'ready';
      task.degraded_inputs = decision.degraded;
      if (decision.degraded.length > 0) {
        record.log.info({ agent: task.agent, degraded: decision.degraded }, 'Dispatching with degraded inputs');
      }
      return;
    }

    task.status = 'skipped';
    task.failure_kind = decision.reason;
    task.last_error = decision.detail;
    task.finished_at = nowIso();
    record.log.warn({ agent: task.agent, reason: decision.reason }, decision.detail);
  }

  private startTask(record: RunRecord, task: AgentTask): Promise<TaskSettlement> {
    const agentKind = task.agent;
    const stage = stageOf(this.graph, agentKind);
    const available = (stage?.dependencies ?? [])
      .map((d) => d.artifact)
      .filter((kind) => !task.degraded_inputs.includes(kind));

    task.status = 'running';
    task.started_at = nowIso();

    const controller = new AbortController();
    const detach = linkAbort(record.controller.signal, controller);
    record.taskControllers.set(agentKind, controller);

    const log = record.log.child({ agent: agentKind });
    const { ctx, internals } = createAgentContext({
      runId: record.run.run_id,
      request: record.run.request,
      inputs: pickInputs(record.artifacts, available),
      degraded: task.degraded_inputs,
      signal: controller.signal,
      gateway: this.gateway,
      retry: {
        maxAttempts: this.settings.tool_max_attempts,
        baseDelayMs: this.settings.tool_retry_base_delay_ms,
      },
      log,
    });

    log.debug({ inputs: Object.keys(ctx.inputs) }, 'Task dispatched');

    const run = async (): Promise<TaskSettlement> => {
      try {
        const agent = this.agents.get(agentKind);
        if (!agent) throw new Error(`No agent registered for ${agentKind}`);
        const artifact = await agent.run(ctx);
        return { agent: agentKind, ok: true, artifact, retries: internals.retryCount() };
      } catch (error) {
        return { agent: agentKind, ok: false, error, retries: internals.retryCount() };
      } finally {
        // Stops tool calls the agent left running, such as siblings of a failed call
        controller.abort(new CancelledError('Task settled'));
        detach();
        record.taskControllers.delete(agentKind);
      }
    };
    return run();
  }

  private recordSettlement(record: RunRecord, settlement: TaskSettlement): void {
    const task = this.findTask(record, settlement.agent);
    if (!task) return;
    record.toolRetries += settlement.retries;
    if (task.status !== 'running') {
      record.log.debug({ agent: task.agent, status: task.status }, 'Ignoring late task result');
      return;
    }

    task.retry_count = settlement.retries;
    task.finished_at = nowIso();

    if (settlement.ok && settlement.artifact.kind === task.produces) {
      commitArtifact(record.artifacts, settlement.artifact);
      if (settlement.artifact.kind === 'proposal_document') {
        record.document = settlement.artifact;
      }
      task.status = 'succeeded';
      record.log.info({ agent: task.agent, retries: settlement.retries }, 'Task succeeded');
      return;
    }

    task.status = 'failed';
    if (settlement.ok) {
      task.failure_kind = 'InternalAssemblyError';
      task.last_error = `Expected ${task.produces}, got ${settlement.artifact.kind}`;
    } else {
      task.failure_kind = settlement.error instanceof AgentFailure ? settlement.error.kind : 'InternalAssemblyError';
      task.last_error = errorMessage(settlement.error);
    }
    record.log.warn(
      { agent: task.agent, failure_kind: task.failure_kind, error: task.last_error },
      'Task failed',
    );
  }

  /**
   * Fail every unfinished upstream task so the terminal stage can still
   * run inside the finalize reserve.
   */
  private cutOffUpstream(record: RunRecord, inflight: Map<AgentKind, Promise<TaskSettlement>>, elapsed: number): void {
    for (const task of record.run.tasks) {
      if (task.agent === this.graph.terminal || TERMINAL_TASK_STATUSES.has(task.status)) continue;

      const wasRunning = task.status === 'running';
      if (wasRunning) {
        record.taskControllers.get(task.agent)?.abort(new CancelledError('Upstream cut-off reached'));
        inflight.delete(task.agent);
      }
      task.status = wasRunning ? 'failed' : 'skipped';
      task.failure_kind = 'RunTimeout';
      task.last_error = `Cut off after ${elapsed}ms to leave time for ${this.graph.terminal}`;
      task.finished_at = nowIso();
      record.log.warn({ agent: task.agent }, 'Upstream task cut off');
    }
  }

  /** Abort and close every task that has not reached a terminal status. */
  private closeOpenTasks(record: RunRecord, detail: string, failureKind: AgentTask['failure_kind'] = null): void {
    for (const task of record.run.tasks) {
      if (TERMINAL_TASK_STATUSES.has(task.status)) continue;
      record.taskControllers.get(task.agent)?.abort(new CancelledError(detail));
      task.status = 'skipped';
      task.last_error = detail;
      task.failure_kind = failureKind;
      task.finished_at = nowIso();
    }
  }

  // ─── Finalization ───────────────────────────────────────────────────

  private tryFinalize(record: RunRecord, inflight: Map<AgentKind, Promise<TaskSettlement>>): boolean {
    const terminal = this.findTask(record, this.graph.terminal);
    if (!terminal || !TERMINAL_TASK_STATUSES.has(terminal.status)) return false;

    // Anything still open can no longer affect the document
    this.closeOpenTasks(record, 'Run finalized before this task finished');
    inflight.clear();

    if (terminal.status === 'succeeded' && record.document) {
      const { document } = record;
      record.run.missing_sections = [...document.missing_sections];
      this.finishRun(record, document.complete ? 'completed' : 'partially_failed', null);
      return true;
    }

    if (terminal.status === 'skipped') {
      this.finishRun(record, 'failed', {
        kind: 'DependencyTimeout',
        detail: terminal.last_error ?? `${terminal.agent} could not start`,
      });
      return true;
    }

    this.finishRun(record, 'failed', {
      kind: 'AssemblerDefect',
      detail: terminal.last_error ?? `${terminal.agent} failed`,
    });
    return true;
  }

  private failRun(record: RunRecord, kind: RunFailureKind, detail: string): void {
    if (TERMINAL_RUN_STATUSES.has(record.run.status)) return;
    record.controller.abort(new CancelledError(detail));
    this.closeOpenTasks(record, detail);
    this.finishRun(record, 'failed', { kind, detail });
  }

  private finishRun(
    record: RunRecord,
    status: 'completed' | 'partially_failed' | 'failed',
    failure: PipelineRun['failure'],
  ): void {
    const { run } = record;
    if (TERMINAL_RUN_STATUSES.has(run.status)) return;

    run.status = status;
    run.failure = failure;
    run.completed_at = nowIso();
    record.expiresAt = Date.now() + this.settings.run_retention_ms;

    const durationMs = Date.now() - record.startedAtMs;
    recordRunFinished(status, durationMs, record.toolRetries);
    record.log.info(
      { status, duration_ms: durationMs, missing_sections: run.missing_sections, failure },
      'Run finished',
    );
  }
}
