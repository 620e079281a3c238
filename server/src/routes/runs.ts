import { Hono } from 'hono';
import type { Coordinator } from '../agents/coordinator.js';
import { renderProposalMarkdown } from '../agents/proposal-assembler.js';
import { proposalRequestSchema } from '../agents/schemas/proposal-request.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';

const MAX_SUBMIT_BODY_BYTES = 8_000;
const RUN_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export interface RunsRouterOptions {
  submitRateLimitPerMinute: number;
  trustProxy?: boolean;
}

/** File name for a downloaded proposal: ai_proposal_<company>_<timestamp>.md */
export function proposalFileName(company: string, completedAt: Date): string {
  const slug = company.trim().replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'proposal';
  const iso = completedAt.toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
  return `ai_proposal_${slug}_${stamp}.md`;
}

export function createRunsRouter(coordinator: Coordinator, options: RunsRouterOptions) {
  const runs = new Hono();

  // POST /runs: Submit a proposal request
  runs.post(
    '/',
    rateLimitMiddleware({
      maxRequests: options.submitRateLimitPerMinute,
      windowMs: 60_000,
      trustProxy: options.trustProxy,
    }),
    async (c) => {
      const parsedBody = await parseJsonBodyWithLimit(c, MAX_SUBMIT_BODY_BYTES);
      if (!parsedBody.ok) return parsedBody.response;

      const parsed = proposalRequestSchema.safeParse(parsedBody.data);
      if (!parsed.success) {
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const runId = coordinator.submit(parsed.data);
      const status = coordinator.getStatus(runId);
      c.get('log').info({ run_id: runId, company: parsed.data.company }, 'Run submitted');
      return c.json({ run_id: runId, status: status?.status ?? 'pending' }, 202);
    },
  );

  // GET /runs/:runId: Status snapshot
  runs.get('/:runId', (c) => {
    const runId = c.req.param('runId');
    if (!RUN_ID_RE.test(runId)) {
      return c.json({ error: 'Invalid run id' }, 400);
    }
    const run = coordinator.getStatus(runId);
    if (!run) return c.json({ error: 'Run not found' }, 404);
    return c.json({ run });
  });

  // GET /runs/:runId/result: Final document, or why there is none
  runs.get('/:runId/result', (c) => {
    const runId = c.req.param('runId');
    if (!RUN_ID_RE.test(runId)) {
      return c.json({ error: 'Invalid run id' }, 400);
    }
    const result = coordinator.getResult(runId);

    switch (result.state) {
      case 'not_found':
        return c.json({ error: 'Run not found' }, 404);
      case 'not_ready':
        return c.json({ status: 'not_ready', run_status: result.status }, 202);
      case 'failed':
        return c.json({ error: 'Run failed', failure: result.failure }, 409);
      case 'ready': {
        const markdown = renderProposalMarkdown(result.document);
        if (c.req.query('format') === 'markdown') {
          const completedAt = coordinator.getStatus(runId)?.completed_at;
          const fileName = proposalFileName(result.document.company, completedAt ? new Date(completedAt) : new Date());
          c.header('Content-Type', 'text/markdown; charset=utf-8');
          c.header('Content-Disposition', `attachment; filename="${fileName}"`);
          return c.body(markdown);
        }
        return c.json({ status: result.status, document: result.document, markdown });
      }
    }
  });

  // POST /runs/:runId/cancel
  runs.post('/:runId/cancel', (c) => {
    const runId = c.req.param('runId');
    if (!RUN_ID_RE.test(runId)) {
      return c.json({ error: 'Invalid run id' }, 400);
    }
    const outcome = coordinator.cancel(runId);
    if (outcome === 'cancelled') c.get('log').info({ run_id: runId }, 'Run cancelled');
    if (outcome === 'not_found') return c.json({ error: 'Run not found' }, 404);
    if (outcome === 'already_terminal') {
      return c.json({ error: 'Run already finished', run: coordinator.getStatus(runId) }, 409);
    }
    return c.json({ run: coordinator.getStatus(runId) });
  });

  return runs;
}
