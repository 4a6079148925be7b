#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { config } from './backend/config';
import { logger } from './backend/logger';
import { createPipelineDeps, pipelineSettings, runPipeline } from './backend/pipeline';

// Usage: narrated-shorts [script.txt] [--upload | --no-upload]
function parseArgs(argv: string[]): { scriptPath?: string; upload: boolean } {
  let upload = config.youtube.autoUpload;
  let scriptPath: string | undefined;
  for (const arg of argv) {
    if (arg === '--upload') upload = true;
    else if (arg === '--no-upload') upload = false;
    else if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}`);
    else scriptPath = arg;
  }
  return { scriptPath, upload };
}

async function main() {
  const { scriptPath, upload } = parseArgs(process.argv.slice(2));
  const script = scriptPath ? fs.readFileSync(path.resolve(scriptPath), 'utf-8') : undefined;
  if (scriptPath) logger.step('MAIN', `Using script from ${scriptPath}`);

  const result = await runPipeline(createPipelineDeps(config), pipelineSettings(config), { script, upload });

  const summaryPath = path.join(path.dirname(result.videoPath), 'run.json');
  fs.writeFileSync(
    summaryPath,
    JSON.stringify(
      {
        runId: result.runId,
        title: result.title,
        angle: result.angle,
        scenes: result.scenes,
        timeline: result.timeline,
        metadata: result.metadata,
        upload: result.upload,
        uploadError: result.uploadError
      },
      null,
      2
    )
  );

  logger.step('MAIN', `Done: ${result.videoPath} (${result.timeline.totalDuration}s)`);
  if (result.upload) logger.step('MAIN', `Live at ${result.upload.url}`);
  if (result.uploadError) logger.warn(`Upload skipped: ${result.uploadError}`);
}

main().catch((err) => {
  logger.error('Fatal error', err);
  process.exit(1);
});
