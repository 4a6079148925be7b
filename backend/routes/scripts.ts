import { Router, Request, Response, NextFunction } from 'express';
import type { RunStore } from '../pipeline/runStore';
import type { ScriptResult } from '../scriptService';

export type ScriptGenerator = { generate(): Promise<ScriptResult> };

export function scriptsRouter(scripts: ScriptGenerator, runs: RunStore): Router {
  const router = Router();

  /** Write a new script without rendering it. Shares the run gate since it records topic history. */
  router.post('/', async (_req: Request, res: Response, next: NextFunction) => {
    const job = runs.exclusive(() => scripts.generate());
    if (!job) {
      return res.status(409).json({ error: 'A run is already in progress', runId: runs.active?.id ?? null });
    }
    try {
      const { title, angle, source, usedFallback, script, scenes } = await job;
      return res.status(201).json({ title, angle, source, usedFallback, script, scenes });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
