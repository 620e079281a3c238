import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Coordinator } from '../agents/coordinator.js';
import { createMarketStandardsAgent } from '../agents/market-standards.js';
import { assembleProposal, NOT_AVAILABLE } from '../agents/proposal-assembler.js';
import { createResearchAgent } from '../agents/research.js';
import { createResourceAssetAgent } from '../agents/resource-asset.js';
import type { ProposalAgent } from '../agents/runtime/agent-protocol.js';
import { AgentRegistry } from '../agents/runtime/agent-registry.js';
import type { PipelineRun, ProposalDocument, ProposalSectionId } from '../agents/types.js';
import { StageGraphError } from '../lib/errors.js';
import { getMetrics, resetMetricsForTests } from '../lib/metrics.js';
import { PROVIDERS } from '../tools/backends/index.js';
import { ProviderHttpError } from '../tools/failures.js';
import { ToolGateway } from '../tools/tool-gateway.js';
import type { BaseQuery } from '../tools/backends/query.js';
import type { BackendCallOptions } from '../tools/types.js';
import {
  ACME_REQUEST,
  COMPANY_RESULTS,
  TEST_SETTINGS,
  TREND_RESULTS,
  USE_CASE_RESULTS,
  createPipelineFixture,
  type PipelineFixture,
} from './helpers/pipeline-fixture.js';
import { delayed, hangUntilAborted, rateLimited, serverError } from './helpers/scripted-backend.js';

function section(document: ProposalDocument, id: ProposalSectionId) {
  const found = document.sections.find((s) => s.id === id);
  if (!found) throw new Error(`missing section ${id}`);
  return found;
}

function task(run: PipelineRun | null, agent: string) {
  const found = run?.tasks.find((t) => t.agent === agent);
  if (!found) throw new Error(`missing task ${agent}`);
  return found;
}

async function runToEnd(fixture: PipelineFixture) {
  const runId = fixture.coordinator.submit(ACME_REQUEST);
  const run = await fixture.coordinator.waitForRun(runId);
  return { runId, run, result: fixture.coordinator.getResult(runId) };
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Coordinator', () => {
  let fixture: PipelineFixture | null = null;

  beforeEach(() => {
    resetMetricsForTests();
  });

  afterEach(async () => {
    await fixture?.coordinator.shutdown();
    fixture = null;
  });

  it('completes a run when every provider succeeds', async () => {
    fixture = createPipelineFixture();
    const { run, result } = await runToEnd(fixture);

    expect(run?.status).toBe('completed');
    expect(run?.missing_sections).toEqual([]);
    expect(run?.failure).toBeNull();
    expect(run?.tasks.map((t) => t.status)).toEqual(['succeeded', 'succeeded', 'succeeded', 'succeeded']);

    if (result.state !== 'ready') throw new Error(`unexpected ${result.state}`);
    expect(result.status).toBe('completed');
    expect(result.document.complete).toBe(true);
    expect(result.document.sections.map((s) => s.id)).toEqual(['summary', 'trends', 'use_cases', 'feasibility', 'resources']);
    expect(result.document.sections.every((s) => s.available)).toBe(true);
    expect(result.document.sections.flatMap((s) => s.paragraphs)).not.toContain(NOT_AVAILABLE);
    expect(section(result.document, 'trends').paragraphs).toHaveLength(3);
    expect(section(result.document, 'resources').links.map((l) => l.url)).toEqual([
      'https://huggingface.co/datasets/acme/freight-routes',
      'https://huggingface.co/datasets/open/supply-demand',
      'https://github.com/example/route-optimizer',
    ]);
  });

  it('refines resource queries with the research focus terms', async () => {
    fixture = createPipelineFixture();
    await runToEnd(fixture);

    expect(fixture.backends[PROVIDERS.datasetRegistry].queries[0].query).toBe('supply-chain freight routing telematics');
    expect(fixture.backends[PROVIDERS.codeHost].queries[0].query).toBe('supply-chain freight routing telematics');
  });

  it('ends partially failed with resources unavailable when both resource providers stay rate limited', async () => {
    fixture = createPipelineFixture({
      overrides: {
        dataset_registry: [rateLimited('Hugging Face')],
        code_host: [rateLimited('GitHub')],
      },
    });
    const { run, result } = await runToEnd(fixture);

    expect(run?.status).toBe('partially_failed');
    expect(run?.missing_sections).toEqual(['resources']);
    expect(fixture.backends[PROVIDERS.datasetRegistry].calls()).toBe(3);
    expect(fixture.backends[PROVIDERS.codeHost].calls()).toBe(3);

    const resourceTask = task(run, 'resource_asset');
    expect(resourceTask.status).toBe('failed');
    expect(resourceTask.failure_kind).toBe('AllRequiredCallsExhausted');
    expect(resourceTask.retry_count).toBe(4);

    if (result.state !== 'ready') throw new Error(`unexpected ${result.state}`);
    expect(section(result.document, 'resources').paragraphs).toEqual([NOT_AVAILABLE]);
    expect(section(result.document, 'summary').available).toBe(true);
    expect(section(result.document, 'trends').available).toBe(true);
    expect(section(result.document, 'use_cases').available).toBe(true);
    expect(section(result.document, 'feasibility').paragraphs[0]).toBe(
      'Dataset and code repository availability could not be assessed.',
    );
  });

  it('keeps the run alive when research fails entirely and degrades the resource query', async () => {
    const competitorsRejected = async (query: BaseQuery) => {
      if (query.query.startsWith('Key competitors')) throw new ProviderHttpError('Perplexity', 401, 'invalid api key');
      return USE_CASE_RESULTS;
    };
    fixture = createPipelineFixture({
      overrides: {
        web_search: [new ProviderHttpError('Tavily', 401, 'invalid api key')],
        business_analysis: [competitorsRejected],
      },
    });
    const { run, result } = await runToEnd(fixture);

    expect(run?.status).toBe('partially_failed');
    expect(run?.missing_sections).toEqual(['summary']);
    expect(task(run, 'research').failure_kind).toBe('AllRequiredCallsExhausted');
    expect(task(run, 'resource_asset').degraded_inputs).toEqual(['research_profile']);
    expect(fixture.backends[PROVIDERS.datasetRegistry].queries[0].query).toBe('supply-chain');

    if (result.state !== 'ready') throw new Error(`unexpected ${result.state}`);
    expect(section(result.document, 'summary').paragraphs).toEqual([NOT_AVAILABLE]);
    expect(section(result.document, 'feasibility').available).toBe(true);
  });

  it('completes a run for the longest accepted names', async () => {
    fixture = createPipelineFixture();
    const runId = fixture.coordinator.submit({ company: 'A'.repeat(200), industry: 'b'.repeat(120) });
    const run = await fixture.coordinator.waitForRun(runId);

    expect(run?.status).toBe('completed');
    expect(run?.missing_sections).toEqual([]);
    expect(run?.tasks.map((t) => t.status)).toEqual(['succeeded', 'succeeded', 'succeeded', 'succeeded']);
  });

  it('builds the summary from competitors alone when both web searches fail', async () => {
    fixture = createPipelineFixture({ overrides: { web_search: [serverError('Tavily')] } });
    const { run, result } = await runToEnd(fixture);

    expect(task(run, 'research').status).toBe('succeeded');
    expect(task(run, 'resource_asset').degraded_inputs).toEqual([]);
    expect(run?.status).toBe('completed');
    if (result.state !== 'ready') throw new Error(`unexpected ${result.state}`);
    expect(section(result.document, 'summary').paragraphs).toEqual([
      'Acme Logistics operates in the supply-chain industry.',
      'Key competitors: Globex Freight, Initech Shipping.',
    ]);
  });

  it('dispatches resource lookups with the bare industry keyword once the research wait expires', async () => {
    fixture = createPipelineFixture({
      settings: { research_wait_timeout_ms: 50, tool_timeout_ms: 2_000 },
      overrides: { web_search: [delayed(150, COMPANY_RESULTS)] },
    });
    const { run, result } = await runToEnd(fixture);

    expect(fixture.backends[PROVIDERS.datasetRegistry].queries[0].query).toBe('supply-chain');
    expect(task(run, 'resource_asset').degraded_inputs).toEqual(['research_profile']);
    expect(task(run, 'research').status).toBe('succeeded');
    expect(run?.status).toBe('completed');

    if (result.state !== 'ready') throw new Error(`unexpected ${result.state}`);
    expect(section(result.document, 'feasibility').paragraphs[0]).toBe(
      '2 datasets and 1 code repository were identified for "supply-chain".',
    );
  });

  it('retries transient failures and still completes', async () => {
    fixture = createPipelineFixture({
      overrides: { market_data: [serverError('Tavily'), TREND_RESULTS] },
    });
    const { run } = await runToEnd(fixture);

    expect(run?.status).toBe('completed');
    expect(fixture.backends[PROVIDERS.marketData].calls()).toBe(2);
    expect(task(run, 'market_standards').retry_count).toBe(1);
  });

  it('cuts off a hung upstream agent so the proposal is still produced in time', async () => {
    fixture = createPipelineFixture({
      settings: { tool_timeout_ms: 5_000, max_run_duration_ms: 800, finalize_reserve_ms: 300 },
      overrides: { market_data: [hangUntilAborted] },
    });
    const { run } = await runToEnd(fixture);

    expect(run?.status).toBe('partially_failed');
    expect(run?.missing_sections).toEqual(['trends', 'use_cases']);
    expect(task(run, 'market_standards').status).toBe('failed');
    expect(task(run, 'market_standards').failure_kind).toBe('RunTimeout');
    expect(task(run, 'final_proposal').degraded_inputs).toEqual(['market_trends']);

    const startedAt = Date.parse(run?.started_at ?? '');
    const completedAt = Date.parse(run?.completed_at ?? '');
    expect(completedAt - startedAt).toBeLessThan(800);
  });

  it('fails the run with AssemblerDefect when the final agent cannot assemble', async () => {
    const agents = new AgentRegistry()
      .register(createResearchAgent({ maxResults: 5 }))
      .register(createMarketStandardsAgent({ maxResults: 5 }))
      .register(createResourceAssetAgent({ maxResults: 5 }))
      .register({
        kind: 'final_proposal',
        description: 'broken assembler',
        run: async () => {
          throw new Error('boom');
        },
      });
    fixture = createPipelineFixture({ agents });
    const { run, result } = await runToEnd(fixture);

    expect(run?.status).toBe('failed');
    expect(run?.failure).toEqual({ kind: 'AssemblerDefect', detail: 'boom' });
    expect(result).toEqual({ state: 'failed', failure: { kind: 'AssemblerDefect', detail: 'boom' } });
  });

  it('fails with RunTimeout when the final stage outlives the run deadline', async () => {
    const agents = new AgentRegistry()
      .register(createResearchAgent({ maxResults: 5 }))
      .register(createMarketStandardsAgent({ maxResults: 5 }))
      .register(createResourceAssetAgent({ maxResults: 5 }))
      .register({
        kind: 'final_proposal',
        description: 'never finishes',
        run: (ctx) => new Promise<ProposalDocument>((_resolve, reject) => {
          ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
        }),
      });
    fixture = createPipelineFixture({
      agents,
      settings: { max_run_duration_ms: 400, finalize_reserve_ms: 100 },
    });
    const { run } = await runToEnd(fixture);

    expect(run?.status).toBe('failed');
    expect(run?.failure?.kind).toBe('RunTimeout');
    expect(task(run, 'final_proposal').status).toBe('skipped');
    expect(task(run, 'final_proposal').failure_kind).toBe('RunTimeout');
  });

  it('cancels a run, aborting in-flight tool calls and discarding artifacts', async () => {
    const signals: AbortSignal[] = [];
    fixture = createPipelineFixture({
      settings: { tool_timeout_ms: 5_000 },
      overrides: {
        web_search: [(query, options: BackendCallOptions) => {
          signals.push(options.signal);
          return hangUntilAborted(query, options);
        }],
      },
    });
    const runId = fixture.coordinator.submit(ACME_REQUEST);
    await sleep(20);

    expect(fixture.coordinator.cancel(runId)).toBe('cancelled');
    const run = await fixture.coordinator.waitForRun(runId);

    expect(run?.status).toBe('failed');
    expect(run?.failure).toEqual({ kind: 'Cancelled', detail: 'Run cancelled by request' });
    expect(task(run, 'research').status).toBe('skipped');
    expect(signals.length).toBeGreaterThan(0);
    expect(signals.every((s) => s.aborted)).toBe(true);
    expect(fixture.coordinator.getResult(runId)).toEqual({
      state: 'failed',
      failure: { kind: 'Cancelled', detail: 'Run cancelled by request' },
    });
    expect(fixture.coordinator.cancel(runId)).toBe('already_terminal');
  });

  it('reports unknown runs', () => {
    fixture = createPipelineFixture();
    expect(fixture.coordinator.getStatus('missing')).toBeNull();
    expect(fixture.coordinator.getResult('missing')).toEqual({ state: 'not_found' });
    expect(fixture.coordinator.cancel('missing')).toBe('not_found');
  });

  it('reports not_ready while a run is in progress', async () => {
    fixture = createPipelineFixture({
      settings: { tool_timeout_ms: 5_000 },
      overrides: { web_search: [hangUntilAborted] },
    });
    const runId = fixture.coordinator.submit(ACME_REQUEST);

    expect(fixture.coordinator.getStatus(runId)?.status).toBe('running');
    expect(fixture.coordinator.getResult(runId)).toEqual({ state: 'not_ready', status: 'running' });
  });

  it('rejects blank requests', () => {
    fixture = createPipelineFixture();
    expect(() => fixture?.coordinator.submit({ company: '  ', industry: 'retail' })).toThrow('company is required');
  });

  it('refuses a stage graph with no agent behind a stage', () => {
    const agents = new AgentRegistry().register(createResearchAgent({ maxResults: 5 }));
    expect(() => new Coordinator({
      gateway: new ToolGateway({ timeoutMs: 100 }),
      agents,
      settings: TEST_SETTINGS,
    })).toThrow(StageGraphError);
  });

  it('records run metrics on completion', async () => {
    fixture = createPipelineFixture();
    await runToEnd(fixture);

    const { runs } = getMetrics();
    expect(runs.counters.submitted).toBe(1);
    expect(runs.counters.completed).toBe(1);
    expect(runs.counters.active).toBe(0);
    expect(runs.duration.count).toBe(1);
  });
});

describe('Coordinator scheduling', () => {
  interface RegistryHooks {
    research?: ProposalAgent<'research'>['run'];
    /** Runs inside the final stage just before it returns */
    onFinal?: () => void;
  }

  function instrumentedRegistry(
    log: { active: number; maxActive: number; frozenInputs: boolean[] },
    hooks: RegistryHooks = {},
  ) {
    const track = async <T>(work: () => T): Promise<T> => {
      log.active += 1;
      log.maxActive = Math.max(log.maxActive, log.active);
      await sleep(20);
      log.active -= 1;
      return work();
    };

    return new AgentRegistry()
      .register({
        kind: 'research',
        description: 'stub',
        run: hooks.research ?? ((ctx) => track(() => ({
          kind: 'research_profile' as const,
          company: ctx.request.company,
          industry: ctx.request.industry,
          summary: 'stub summary',
          highlights: [],
          competitors: [],
          focus_terms: ['routing'],
          sources: [],
          missing_sections: [],
        }))),
      })
      .register({
        kind: 'market_standards',
        description: 'stub',
        run: (ctx) => track(() => ({
          kind: 'market_trends' as const,
          industry: ctx.request.industry,
          trends: [],
          use_cases: [],
          missing_sections: [],
        })),
      })
      .register({
        kind: 'resource_asset',
        description: 'stub',
        run: (ctx) => track(() => {
          log.frozenInputs.push(Object.isFrozen(ctx.inputs.research_profile));
          return {
            kind: 'resource_bundle' as const,
            query: ctx.request.industry,
            query_terms: [],
            degraded_query: false,
            datasets: [],
            repositories: [],
            missing_sections: [],
          };
        }),
      })
      .register({
        kind: 'final_proposal',
        description: 'stub',
        run: (ctx) => track(() => {
          const document = assembleProposal({
            request: ctx.request,
            research: ctx.inputs.research_profile,
            market: ctx.inputs.market_trends,
            resources: ctx.inputs.resource_bundle,
          });
          hooks.onFinal?.();
          return document;
        }),
      });
  }

  it('never runs more tasks at once than max_parallelism', async () => {
    const log = { active: 0, maxActive: 0, frozenInputs: [] as boolean[] };
    const fixture = createPipelineFixture({
      agents: instrumentedRegistry(log),
      settings: { max_parallelism: 1 },
    });
    const runId = fixture.coordinator.submit(ACME_REQUEST);
    const run = await fixture.coordinator.waitForRun(runId);

    expect(run?.status).toBe('completed');
    expect(log.maxActive).toBe(1);
  });

  it('runs research and market standards concurrently when allowed', async () => {
    const log = { active: 0, maxActive: 0, frozenInputs: [] as boolean[] };
    const fixture = createPipelineFixture({ agents: instrumentedRegistry(log) });
    const runId = fixture.coordinator.submit(ACME_REQUEST);
    await fixture.coordinator.waitForRun(runId);

    expect(log.maxActive).toBe(2);
  });

  it('hands downstream agents frozen artifacts', async () => {
    const log = { active: 0, maxActive: 0, frozenInputs: [] as boolean[] };
    const fixture = createPipelineFixture({ agents: instrumentedRegistry(log) });
    const runId = fixture.coordinator.submit(ACME_REQUEST);
    await fixture.coordinator.waitForRun(runId);

    expect(log.frozenInputs).toEqual([true]);
  });

  it('finalizes a run whose last stage settles after the deadline', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    try {
      const log = { active: 0, maxActive: 0, frozenInputs: [] as boolean[] };
      const fixture = createPipelineFixture({
        agents: instrumentedRegistry(log, {
          onFinal: () => vi.setSystemTime(Date.now() + TEST_SETTINGS.max_run_duration_ms * 3),
        }),
      });
      const runId = fixture.coordinator.submit(ACME_REQUEST);
      const run = await fixture.coordinator.waitForRun(runId);

      expect(run?.status).toBe('completed');
      expect(run?.failure).toBeNull();
      expect(task(run, 'final_proposal').status).toBe('succeeded');
    } finally {
      vi.useRealTimers();
    }
  });

  it('cancels tool calls an agent leaves running when it settles', async () => {
    const signals: AbortSignal[] = [];
    const log = { active: 0, maxActive: 0, frozenInputs: [] as boolean[] };
    const fixture = createPipelineFixture({
      settings: { tool_timeout_ms: 5_000 },
      overrides: {
        web_search: [(query, options) => {
          signals.push(options.signal);
          return hangUntilAborted(query, options);
        }],
      },
      agents: instrumentedRegistry(log, {
        research: async (ctx) => {
          await Promise.all([
            ctx.callTool(PROVIDERS.webSearch, { query: 'acme' }, { required: true, label: 'company_profile' }),
            ctx.callTool(PROVIDERS.businessAnalysis, { query: '' }, { required: true, label: 'competitors' }),
          ]);
          throw new Error('unreachable');
        },
      }),
    });
    const runId = fixture.coordinator.submit(ACME_REQUEST);
    const run = await fixture.coordinator.waitForRun(runId);

    expect(task(run, 'research').status).toBe('failed');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });
});
