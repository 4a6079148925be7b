import { Router, Request, Response } from 'express';

const router = Router();

/** Liveness: process is up */
router.get('/health', (_req: Request, res: Response) => {
  res.json({ ok: true });
});

export default router;
