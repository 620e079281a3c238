import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Coordinator } from './agents/coordinator.js';
import type { AppConfig } from './lib/config.js';
import { getMetrics, recordRequestMetric } from './lib/metrics.js';
import { getRateLimitStats } from './middleware/rate-limit.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createRunsRouter } from './routes/runs.js';
import type { ToolGateway } from './tools/tool-gateway.js';

export interface AppDeps {
  coordinator: Coordinator;
  gateway: ToolGateway;
  config: Pick<AppConfig, 'env' | 'allowed_origins' | 'http'>;
  /** Reports whether the process is draining; new submissions are refused meanwhile */
  isShuttingDown?: () => boolean;
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

export function createApp(deps: AppDeps) {
  const { coordinator, gateway, config } = deps;
  const isShuttingDown = deps.isShuttingDown ?? (() => false);
  const isProduction = config.env === 'production';
  const startTime = Date.now();
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    let status = 500;
    try {
      const bypass = c.req.path === '/health' || c.req.path === '/metrics';
      if (isShuttingDown() && !bypass) {
        status = 503;
        return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
      }
      await next();
      status = c.res.status;
    } finally {
      recordRequestMetric(status, Date.now() - startedAt);
    }
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({
    // Block all CORS in production if not configured
    origin: config.allowed_origins ?? (isProduction ? [] : DEV_ORIGINS),
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: isShuttingDown() ? 'draining' : 'ok',
      providers: gateway.list().map((p) => p.id),
      active_runs: coordinator.activeRunCount(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    const metricsKey = config.http.metrics_key;
    if (metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    } else if (isProduction) {
      return c.json({ error: 'Not found' }, 404);
    }

    const memUsage = process.memoryUsage();
    const { requests, runs } = getMetrics();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      shutting_down: isShuttingDown(),
      active_runs: coordinator.activeRunCount(),
      run_runtime: runs,
      http_runtime: requests,
      rate_limit_runtime: getRateLimitStats(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  app.route('/api/runs', createRunsRouter(coordinator, {
    submitRateLimitPerMinute: config.http.submit_rate_limit_per_minute,
    trustProxy: config.http.trust_proxy,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    c.get('log').error({ err }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
