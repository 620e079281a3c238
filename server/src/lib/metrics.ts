/**
 * In-process counters for HTTP requests and pipeline runs, exposed on
 * /metrics. Module-level state: one set of metrics per process.
 */

import type { RunStatus } from '../agents/types.js';

const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000];
const RUN_DURATION_BUCKETS_MS = [5000, 15000, 30000, 60000, 120000, 180000, 300000];

/** Fixed-bucket histogram; percentiles are reported as bucket upper bounds. */
class BucketHistogram {
  private count = 0;
  private sumMs = 0;
  private readonly counts: number[];

  constructor(private readonly buckets: readonly number[]) {
    this.counts = new Array<number>(buckets.length + 1).fill(0);
  }

  observe(ms: number): void {
    this.count += 1;
    this.sumMs += ms;
    const idx = this.buckets.findIndex((limit) => ms <= limit);
    this.counts[idx >= 0 ? idx : this.buckets.length] += 1;
  }

  private percentile(p: number): number {
    const last = this.buckets[this.buckets.length - 1];
    if (this.count <= 0) return 0;
    const target = Math.max(1, Math.ceil(this.count * p));
    let running = 0;
    for (let i = 0; i < this.counts.length; i += 1) {
      running += this.counts[i];
      if (running >= target) return i < this.buckets.length ? this.buckets[i] : last;
    }
    return last;
  }

  snapshot() {
    return {
      count: this.count,
      avg_ms: this.count > 0 ? Math.round((this.sumMs / this.count) * 100) / 100 : 0,
      p50_ms_upper_bound: this.percentile(0.5),
      p95_ms_upper_bound: this.percentile(0.95),
      p99_ms_upper_bound: this.percentile(0.99),
      buckets_ms: [...this.buckets],
      histogram: [...this.counts],
    };
  }

  reset(): void {
    this.count = 0;
    this.sumMs = 0;
    this.counts.fill(0);
  }
}

// ─── Requests ────────────────────────────────────────────────────────

const requestCounters = {
  total: 0,
  status_2xx: 0,
  status_4xx: 0,
  status_5xx: 0,
  status_429: 0,
};

const requestLatency = new BucketHistogram(LATENCY_BUCKETS_MS);

export function recordRequestMetric(status: number, latencyMs: number): void {
  requestCounters.total += 1;
  if (status >= 200 && status < 300) requestCounters.status_2xx += 1;
  else if (status >= 400 && status < 500) requestCounters.status_4xx += 1;
  else if (status >= 500) requestCounters.status_5xx += 1;
  if (status === 429) requestCounters.status_429 += 1;
  requestLatency.observe(latencyMs);
}

// ─── Runs ────────────────────────────────────────────────────────────

type FinishedRunStatus = Extract<RunStatus, 'completed' | 'partially_failed' | 'failed'>;

const runCounters = {
  submitted: 0,
  active: 0,
  completed: 0,
  partially_failed: 0,
  failed: 0,
  tool_retries: 0,
};

const runDuration = new BucketHistogram(RUN_DURATION_BUCKETS_MS);

export function recordRunStarted(): void {
  runCounters.submitted += 1;
  runCounters.active += 1;
}

export function recordRunFinished(status: FinishedRunStatus, durationMs: number, toolRetries: number): void {
  runCounters.active = Math.max(0, runCounters.active - 1);
  runCounters[status] += 1;
  runCounters.tool_retries += toolRetries;
  runDuration.observe(durationMs);
}

export function getMetrics() {
  return {
    requests: { counters: { ...requestCounters }, latency: requestLatency.snapshot() },
    runs: { counters: { ...runCounters }, duration: runDuration.snapshot() },
  };
}

export function resetMetricsForTests(): void {
  Object.assign(requestCounters, { total: 0, status_2xx: 0, status_4xx: 0, status_5xx: 0, status_429: 0 });
  Object.assign(runCounters, {
    submitted: 0, active: 0, completed: 0, partially_failed: 0, failed: 0, tool_retries: 0,
  });
  requestLatency.reset();
  runDuration.reset();
}
