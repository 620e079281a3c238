/**
 * StageGraph: declarative dependencies between agents.
 *
 * Readiness is a pure function of task statuses and elapsed run time, so
 * the coordinator can re-evaluate it after every event without hidden
 * state. Adding an agent means adding a stage, not new control flow.
 */

import { StageGraphError } from '../lib/errors.js';
import type { PipelineSettings } from '../lib/config.js';
import type { AgentKind, ArtifactKind, TaskStatus } from './types.js';

export type DependencyMode = 'required' | 'optional';

export interface StageDependency {
  artifact: ArtifactKind;
  /** optional: the dependent may proceed without it once it fails or times out */
  mode: DependencyMode;
  /** Wait budget, measured from run start */
  wait_timeout_ms: number;
}

export interface StageDefinition {
  agent: AgentKind;
  produces: ArtifactKind;
  dependencies: StageDependency[];
}

export interface StageGraph {
  stages: StageDefinition[];
  /** The stage whose completion ends the run */
  terminal: AgentKind;
}

export type DependencyState = 'available' | 'failed' | 'timed_out' | 'pending';

export interface ReadinessSnapshot {
  statuses: Readonly<Partial<Record<AgentKind, TaskStatus>>>;
  elapsed_ms: number;
}

export type ReadinessDecision =
  | { agent: AgentKind; action: 'dispatch'; available: ArtifactKind[]; degraded: ArtifactKind[] }
  | { agent: AgentKind; action: 'skip'; reason: 'DependencyFailed' | 'DependencyTimeout'; detail: string };

export function createDefaultStageGraph(
  settings: Pick<PipelineSettings, 'research_wait_timeout_ms' | 'upstream_wait_timeout_ms'>,
): StageGraph {
  const upstream = (artifact: ArtifactKind): StageDependency => ({
    artifact,
    mode: 'optional',
    wait_timeout_ms: settings.upstream_wait_timeout_ms,
  });

  return {
    terminal: 'final_proposal',
    stages: [
      { agent: 'research', produces: 'research_profile', dependencies: [] },
      { agent: 'market_standards', produces: 'market_trends', dependencies: [] },
      {
        agent: 'resource_asset',
        produces: 'resource_bundle',
        dependencies: [
          { artifact: 'research_profile', mode: 'optional', wait_timeout_ms: settings.research_wait_timeout_ms },
        ],
      },
      {
        agent: 'final_proposal',
        produces: 'proposal_document',
        dependencies: [upstream('research_profile'), upstream('market_trends'), upstream('resource_bundle')],
      },
    ],
  };
}

/**
 * Reject graphs with duplicate agents or producers, dependencies nobody
 * produces, a missing terminal stage, or cycles.
 */
export function validateStageGraph(graph: StageGraph): void {
  const producers = new Map<ArtifactKind, AgentKind>();
  const agents = new Set<AgentKind>();
  for (const stage of graph.stages) {
    if (agents.has(stage.agent)) throw new StageGraphError(`Duplicate stage for agent ${stage.agent}`);
    agents.add(stage.agent);
    if (producers.has(stage.produces)) {
      throw new StageGraphError(`Artifact ${stage.produces} has more than one producer`);
    }
    producers.set(stage.produces, stage.agent);
  }
  if (!agents.has(graph.terminal)) {
    throw new StageGraphError(`Terminal stage ${graph.terminal} is not declared`);
  }

  for (const stage of graph.stages) {
    for (const dep of stage.dependencies) {
      if (!producers.has(dep.artifact)) {
        throw new StageGraphError(`${stage.agent} depends on ${dep.artifact}, which no stage produces`);
      }
      if (dep.wait_timeout_ms <= 0) {
        throw new StageGraphError(`${stage.agent} has a non-positive wait for ${dep.artifact}`);
      }
    }
  }

  // Kahn's algorithm: every stage must be reachable in topological order
  const indegree = new Map<AgentKind, number>();
  const dependents = new Map<AgentKind, AgentKind[]>();
  for (const stage of graph.stages) {
    indegree.set(stage.agent, stage.dependencies.length);
    for (const dep of stage.dependencies) {
      const producer = producers.get(dep.artifact);
      if (!producer) continue;
      dependents.set(producer, [...(dependents.get(producer) ?? []), stage.agent]);
    }
  }
  const queue = graph.stages.filter((s) => s.dependencies.length === 0).map((s) => s.agent);
  let visited = 0;
  while (queue.length > 0) {
    const agent = queue.shift();
    if (!agent) break;
    visited += 1;
    for (const next of dependents.get(agent) ?? []) {
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }
  if (visited !== graph.stages.length) {
    throw new StageGraphError('Stage graph contains a dependency cycle');
  }
}

export function producerOf(graph: StageGraph, artifact: ArtifactKind): StageDefinition | undefined {
  return graph.stages.find((s) => s.produces === artifact);
}

export function stageOf(graph: StageGraph, agent: AgentKind): StageDefinition | undefined {
  return graph.stages.find((s) => s.agent === agent);
}

export function dependencyState(
  graph: StageGraph,
  dep: StageDependency,
  snapshot: ReadinessSnapshot,
): DependencyState {
  const producer = producerOf(graph, dep.artifact);
  const status = producer ? snapshot.statuses[producer.agent] : undefined;
  if (status === 'succeeded') return 'available';
  if (status === 'failed' || status === 'skipped' || !producer) return 'failed';
  return snapshot.elapsed_ms >= dep.wait_timeout_ms ? 'timed_out' : 'pending';
}

/**
 * Decide, for every task still waiting, whether it can be dispatched now,
 * must be skipped, or keeps waiting (no decision). Decisions follow the
 * graph's stage order.
 */
export function evaluateReadiness(graph: StageGraph, snapshot: ReadinessSnapshot): ReadinessDecision[] {
  const decisions: ReadinessDecision[] = [];

  for (const stage of graph.stages) {
    if (snapshot.statuses[stage.agent] !== 'waiting') continue;

    const available: ArtifactKind[] = [];
    const degraded: ArtifactKind[] = [];
    let pending = false;
    let blocked: ReadinessDecision | null = null;

    for (const dep of stage.dependencies) {
      const state = dependencyState(graph, dep, snapshot);
      if (state === 'available') {
        available.push(dep.artifact);
      } else if (state === 'pending') {
        pending = true;
      } else if (dep.mode === 'optional') {
        degraded.push(dep.artifact);
      } else {
        blocked = {
          agent: stage.agent,
          action: 'skip',
          reason: state === 'timed_out' ? 'DependencyTimeout' : 'DependencyFailed',
          detail: state === 'timed_out'
            ? `Required ${dep.artifact} not available within ${dep.wait_timeout_ms}ms`
            : `Required ${dep.artifact} failed upstream`,
        };
        break;
      }
    }

    if (blocked) {
      decisions.push(blocked);
    } else if (!pending) {
      decisions.push({ agent: stage.agent, action: 'dispatch', available, degraded });
    }
  }

  return decisions;
}

/**
 * Milliseconds until the next pending dependency wait expires, or null
 * when no waiting task has a pending dependency.
 */
export function nextWakeDelay(graph: StageGraph, snapshot: ReadinessSnapshot): number | null {
  let next: number | null = null;
  for (const stage of graph.stages) {
    if (snapshot.statuses[stage.agent] !== 'waiting') continue;
    for (const dep of stage.dependencies) {
      if (dependencyState(graph, dep, snapshot) !== 'pending') continue;
      const remaining = dep.wait_timeout_ms - snapshot.elapsed_ms;
      next = next === null ? remaining : Math.min(next, remaining);
    }
  }
  return next;
}
