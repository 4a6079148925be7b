import { Router, Request, Response, NextFunction } from 'express';
import { parseScript } from '../scriptService';

export function scenesRouter(characterNames: readonly string[]): Router {
  const router = Router();

  router.post('/parse', (req: Request, res: Response, next: NextFunction) => {
    const script: unknown = req.body?.script;
    if (typeof script !== 'string' || !script.trim()) {
      return res.status(400).json({ error: 'script must be a non-empty string' });
    }
    try {
      const { title, scenes } = parseScript(script, characterNames);
      return res.json({ title, scenes });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
