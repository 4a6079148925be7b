import { Router } from 'express';
import type { RunStore } from '../pipeline/runStore';
import health from './health';
import { runsRouter } from './runs';
import { scenesRouter } from './scenes';
import { scriptsRouter, type ScriptGenerator } from './scripts';
import { statusRouter } from './status';

export type RouteServices = {
  runs: RunStore;
  scripts: ScriptGenerator;
  characterNames: readonly string[];
  statusTail: number;
  outputDir: string;
};

export function createRoutes(services: RouteServices): Router {
  const router = Router();

  router.use(health);
  router.use('/api/status', statusRouter(services.runs, services.statusTail));
  router.use('/api/scenes', scenesRouter(services.characterNames));
  router.use('/api/scripts', scriptsRouter(services.scripts, services.runs));
  router.use('/api/runs', runsRouter(services.runs, services.outputDir));

  return router;
}
