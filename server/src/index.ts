import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { Coordinator } from './agents/coordinator.js';
import { createDefaultAgentRegistry } from './agents/default-agents.js';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import logger from './lib/logger.js';
import { createDefaultGateway } from './tools/backends/index.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  if (config.env === 'production' && !config.allowed_origins) {
    logger.error('ALLOWED_ORIGINS not set in production; all cross-origin requests will be blocked');
  }

  const gateway = createDefaultGateway(config);
  const coordinator = new Coordinator({
    gateway,
    agents: createDefaultAgentRegistry(config.pipeline),
    settings: config.pipeline,
  });
  const app = createApp({ coordinator, gateway, config, isShuttingDown: () => shuttingDown });

  logger.info({ port: config.port, providers: gateway.list().map((p) => p.id) }, 'Proposal pipeline server starting');
  const httpServer = serve({ fetch: app.fetch, port: config.port });
  server = httpServer;
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown initiated');

    // Cancel in-flight runs so their tool calls stop before the process exits
    const drained = coordinator.shutdown().catch((err: unknown) => {
      logger.warn({ error: errorMessage(err) }, 'Coordinator shutdown failed');
    });

    httpServer.close(() => {
      void Promise.race([
        drained,
        new Promise((resolve) => setTimeout(resolve, 3_000)),
      ]).finally(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });
    });

    // Force exit after 10s if connections don't drain
    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return httpServer;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
