import { Router, Request, Response } from 'express';
import path from 'path';
import type { RunRecord, RunStore } from '../pipeline/runStore';

function summary(run: RunRecord) {
  return { id: run.id, status: run.status, startedAt: run.startedAt, finishedAt: run.finishedAt };
}

/** Media URL for a file under the output dir, or null when it lies elsewhere. */
export function mediaUrl(outputDir: string, filePath: string): string | null {
  const rel = path.relative(outputDir, filePath);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return null;
  return `/media/${rel.split(path.sep).join('/')}`;
}

export function runsRouter(runs: RunStore, outputDir: string): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const script = typeof body === 'object' && body !== null && 'script' in body && typeof body.script === 'string' ? body.script : undefined;
    const upload = typeof body === 'object' && body !== null && 'upload' in body && body.upload === true;
    const run = runs.start({ script, upload });
    if (!run) {
      const active = runs.active;
      return res.status(409).json({ error: 'A run is already in progress', runId: active?.id ?? null });
    }
    return res.status(202).json({ runId: run.id, status: run.status });
  });

  router.get('/', (_req: Request, res: Response) => {
    res.json(runs.list().map(summary));
  });

  router.get('/:id', (req: Request, res: Response) => {
    const run = runs.get(req.params.id);
    if (!run) return res.status(404).json({ error: 'Run not found' });
    const result = run.result;
    return res.json({
      ...summary(run),
      errorMessage: run.errorMessage,
      title: result?.title,
      angle: result?.angle,
      scenes: result?.scenes,
      timeline: result?.timeline,
      mediaUrl: result ? mediaUrl(outputDir, result.videoPath) : null,
      upload: result?.upload ?? null,
      uploadError: result?.uploadError ?? null,
      events: run.ctx.all()
    });
  });

  return router;
}
