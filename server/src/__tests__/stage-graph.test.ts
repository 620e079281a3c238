import { describe, expect, it } from 'vitest';
import {
  createDefaultStageGraph,
  dependencyState,
  evaluateReadiness,
  nextWakeDelay,
  validateStageGraph,
  type StageGraph,
} from '../agents/stage-graph.js';
import { StageGraphError } from '../lib/errors.js';

const graph = createDefaultStageGraph({ research_wait_timeout_ms: 100, upstream_wait_timeout_ms: 500 });

describe('createDefaultStageGraph', () => {
  it('declares the four stages with final_proposal as terminal', () => {
    expect(graph.stages.map((s) => s.agent)).toEqual(['research', 'market_standards', 'resource_asset', 'final_proposal']);
    expect(graph.terminal).toBe('final_proposal');
    expect(() => validateStageGraph(graph)).not.toThrow();
  });

  it('lets resource_asset wait on research only for the research budget', () => {
    const resource = graph.stages[2];
    expect(resource.dependencies).toEqual([
      { artifact: 'research_profile', mode: 'optional', wait_timeout_ms: 100 },
    ]);
  });
});

describe('validateStageGraph', () => {
  it('rejects a cycle', () => {
    const cyclic: StageGraph = {
      terminal: 'final_proposal',
      stages: [
        { agent: 'research', produces: 'research_profile', dependencies: [{ artifact: 'resource_bundle', mode: 'optional', wait_timeout_ms: 10 }] },
        { agent: 'resource_asset', produces: 'resource_bundle', dependencies: [{ artifact: 'research_profile', mode: 'optional', wait_timeout_ms: 10 }] },
        { agent: 'final_proposal', produces: 'proposal_document', dependencies: [] },
      ],
    };
    expect(() => validateStageGraph(cyclic)).toThrow('Stage graph contains a dependency cycle');
  });

  it('rejects a dependency nobody produces', () => {
    const dangling: StageGraph = {
      terminal: 'final_proposal',
      stages: [
        { agent: 'final_proposal', produces: 'proposal_document', dependencies: [{ artifact: 'market_trends', mode: 'required', wait_timeout_ms: 10 }] },
      ],
    };
    expect(() => validateStageGraph(dangling)).toThrow('final_proposal depends on market_trends, which no stage produces');
  });

  it('rejects duplicate producers and a missing terminal', () => {
    expect(() => validateStageGraph({
      terminal: 'final_proposal',
      stages: [
        { agent: 'research', produces: 'research_profile', dependencies: [] },
        { agent: 'market_standards', produces: 'research_profile', dependencies: [] },
      ],
    })).toThrow('Artifact research_profile has more than one producer');

    expect(() => validateStageGraph({
      terminal: 'final_proposal',
      stages: [{ agent: 'research', produces: 'research_profile', dependencies: [] }],
    })).toThrow(StageGraphError);
  });

  it('rejects a non-positive wait', () => {
    expect(() => validateStageGraph({
      terminal: 'resource_asset',
      stages: [
        { agent: 'research', produces: 'research_profile', dependencies: [] },
        { agent: 'resource_asset', produces: 'resource_bundle', dependencies: [{ artifact: 'research_profile', mode: 'optional', wait_timeout_ms: 0 }] },
      ],
    })).toThrow('resource_asset has a non-positive wait for research_profile');
  });
});

describe('dependencyState', () => {
  const dep = graph.stages[2].dependencies[0];

  it('follows the producer status and the wait budget', () => {
    expect(dependencyState(graph, dep, { statuses: { research: 'succeeded' }, elapsed_ms: 0 })).toBe('available');
    expect(dependencyState(graph, dep, { statuses: { research: 'failed' }, elapsed_ms: 0 })).toBe('failed');
    expect(dependencyState(graph, dep, { statuses: { research: 'skipped' }, elapsed_ms: 0 })).toBe('failed');
    expect(dependencyState(graph, dep, { statuses: { research: 'running' }, elapsed_ms: 99 })).toBe('pending');
    expect(dependencyState(graph, dep, { statuses: { research: 'running' }, elapsed_ms: 100 })).toBe('timed_out');
  });
});

describe('evaluateReadiness', () => {
  const allWaiting = {
    research: 'waiting',
    market_standards: 'waiting',
    resource_asset: 'waiting',
    final_proposal: 'waiting',
  } as const;

  it('dispatches stages without dependencies first', () => {
    const decisions = evaluateReadiness(graph, { statuses: allWaiting, elapsed_ms: 0 });
    expect(decisions).toEqual([
      { agent: 'research', action: 'dispatch', available: [], degraded: [] },
      { agent: 'market_standards', action: 'dispatch', available: [], degraded: [] },
    ]);
  });

  it('dispatches resource_asset degraded once research times out', () => {
    const decisions = evaluateReadiness(graph, {
      statuses: { research: 'running', market_standards: 'succeeded', resource_asset: 'waiting', final_proposal: 'waiting' },
      elapsed_ms: 150,
    });
    expect(decisions).toEqual([
      { agent: 'resource_asset', action: 'dispatch', available: [], degraded: ['research_profile'] },
    ]);
  });

  it('dispatches final_proposal with whatever upstream succeeded', () => {
    const decisions = evaluateReadiness(graph, {
      statuses: { research: 'succeeded', market_standards: 'failed', resource_asset: 'succeeded', final_proposal: 'waiting' },
      elapsed_ms: 50,
    });
    expect(decisions).toEqual([
      {
        agent: 'final_proposal',
        action: 'dispatch',
        available: ['research_profile', 'resource_bundle'],
        degraded: ['market_trends'],
      },
    ]);
  });

  it('skips a stage whose required dependency failed', () => {
    const strict: StageGraph = {
      terminal: 'final_proposal',
      stages: [
        { agent: 'research', produces: 'research_profile', dependencies: [] },
        { agent: 'final_proposal', produces: 'proposal_document', dependencies: [{ artifact: 'research_profile', mode: 'required', wait_timeout_ms: 100 }] },
      ],
    };
    expect(evaluateReadiness(strict, { statuses: { research: 'failed', final_proposal: 'waiting' }, elapsed_ms: 10 })).toEqual([
      { agent: 'final_proposal', action: 'skip', reason: 'DependencyFailed', detail: 'Required research_profile failed upstream' },
    ]);
    expect(evaluateReadiness(strict, { statuses: { research: 'running', final_proposal: 'waiting' }, elapsed_ms: 100 })).toEqual([
      {
        agent: 'final_proposal',
        action: 'skip',
        reason: 'DependencyTimeout',
        detail: 'Required research_profile not available within 100ms',
      },
    ]);
  });
});

describe('nextWakeDelay', () => {
  it('returns the time until the nearest pending wait expires', () => {
    expect(nextWakeDelay(graph, {
      statuses: { research: 'running', market_standards: 'running', resource_asset: 'waiting', final_proposal: 'waiting' },
      elapsed_ms: 40,
    })).toBe(60);
  });

  it('returns null when nothing is waiting on a pending dependency', () => {
    expect(nextWakeDelay(graph, {
      statuses: { research: 'succeeded', market_standards: 'succeeded', resource_asset: 'running', final_proposal: 'ready' },
      elapsed_ms: 40,
    })).toBeNull();
  });
});
