import { Router, Request, Response } from 'express';
import type { RunStore } from '../pipeline/runStore';

const MAX_LIMIT = 200;

export function parseLimit(raw: unknown, fallback: number): number {
  const n = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(n, MAX_LIMIT);
}

/** Tail of the latest run's status log. */
export function statusRouter(runs: RunStore, defaultLimit: number): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const run = runs.latest();
    if (!run) return res.json({ runId: null, status: 'idle', events: [] });
    const limit = parseLimit(req.query.limit, defaultLimit);
    return res.json({
      runId: run.id,
      status: run.status,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      events: run.ctx.recent(limit)
    });
  });

  return router;
}
