#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { Coordinator } from './agents/coordinator.js';
import { createDefaultAgentRegistry } from './agents/default-agents.js';
import { renderProposalMarkdown } from './agents/proposal-assembler.js';
import { proposalRequestSchema, type ProposalRequestInput } from './agents/schemas/proposal-request.js';
import { loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import logger from './lib/logger.js';
import { proposalFileName } from './routes/runs.js';
import { createDefaultGateway } from './tools/backends/index.js';

const USAGE = 'Usage: proposal-pipeline --company <name> --industry <name> [--out <dir>]';

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  partially_failed: 2,
  usage: 64,
} as const;

export type CliArgs =
  | { ok: true; request: ProposalRequestInput; outDir: string }
  | { ok: false; message: string };

export function parseCliArgs(argv: string[]): CliArgs {
  let values: { company?: string; industry?: string; out?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        company: { type: 'string', short: 'c' },
        industry: { type: 'string', short: 'i' },
        out: { type: 'string', short: 'o' },
      },
      strict: true,
    }));
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }

  const parsed = proposalRequestSchema.safeParse({ company: values.company ?? '', industry: values.industry ?? '' });
  if (!parsed.success) {
    return { ok: false, message: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, request: parsed.data, outDir: values.out ?? process.cwd() };
}

export async function runCli(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (!args.ok) {
    process.stderr.write(`${args.message}\n${USAGE}\n`);
    return EXIT_CODES.usage;
  }

  const config = loadConfig();
  const coordinator = new Coordinator({
    gateway: createDefaultGateway(config),
    agents: createDefaultAgentRegistry(config.pipeline),
    settings: config.pipeline,
  });

  const runId = coordinator.submit(args.request);
  const onInterrupt = () => coordinator.cancel(runId, 'Interrupted');
  process.once('SIGINT', onInterrupt);

  try {
    const run = await coordinator.waitForRun(runId);
    const result = coordinator.getResult(runId);
    if (result.state !== 'ready' || !run) {
      const detail = result.state === 'failed' ? `${result.failure.kind}: ${result.failure.detail}` : result.state;
      process.stderr.write(`Run failed (${detail})\n`);
      return EXIT_CODES.failed;
    }

    await mkdir(args.outDir, { recursive: true });
    const completedAt = run.completed_at ? new Date(run.completed_at) : new Date();
    const filePath = path.join(args.outDir, proposalFileName(result.document.company, completedAt));
    await writeFile(filePath, renderProposalMarkdown(result.document), 'utf8');

    logger.info({ run_id: runId, status: result.status, file: filePath }, 'Proposal written');
    process.stdout.write(`${filePath}\n`);
    if (result.status === 'partially_failed') {
      process.stderr.write(`Missing sections: ${result.document.missing_sections.join(', ')}\n`);
    }
    return EXIT_CODES[result.status];
  } finally {
    process.off('SIGINT', onInterrupt);
    await coordinator.shutdown();
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(fileURLToPath(import.meta.url));
}

if (isMainModule()) {
  void runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'Proposal run failed');
      process.exitCode = EXIT_CODES.failed;
    },
  );
}
