import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { ParseError } from './errors';
import type { RunResult } from './pipeline';
import { RunStore } from './pipeline/runStore';
import type { ScriptResult } from './scriptService';

describe('http routes', () => {
  let serverUrl = '';
  let server: Server | null = null;
  let releaseRun: (result: RunResult) => void = () => {};
  let scriptFails = false;

  const runs = new RunStore(
    (opts) =>
      new Promise<RunResult>((resolve) => {
        opts.ctx?.info('SCRIPT', 'Writing script');
        releaseRun = resolve;
      })
  );

  const script: ScriptResult = {
    title: 'Reply-all apocalypse',
    angle: 'office_email',
    source: 'template',
    usedFallback: true,
    script: 'Scene 1\nNarrator: "Reply all."',
    scenes: [{ id: 1, visual: '', narration: 'Reply all.' }]
  };

  beforeAll(async () => {
    const app = createApp({
      runs,
      scripts: {
        async generate() {
          if (scriptFails) throw new ParseError(12);
          return script;
        }
      },
      characterNames: ['Manager'],
      statusTail: 20,
      outputDir: '/srv/out'
    });
    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address = server?.address();
    if (!address || typeof address === 'string') throw new Error('server did not bind a port');
    serverUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
  });

  const post = (path: string, body: unknown) =>
    fetch(`${serverUrl}${path}`, { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(body) });

  it('answers health checks', async () => {
    const res = await fetch(`${serverUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('reports idle status before any run', async () => {
    const res = await fetch(`${serverUrl}/api/status`);
    expect(await res.json()).toEqual({ runId: null, status: 'idle', events: [] });
  });

  it('parses a script into scenes', async () => {
    const res = await post('/api/scenes/parse', {
      script: 'Scene 1: Open\nVisual: A stand-up meeting that sat down\nManager: "Quick sync, everyone."'
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      title: 'A stand-up meeting that sat down',
      scenes: [{ id: 1, visual: 'A stand-up meeting that sat down', narration: 'Quick sync, everyone.' }]
    });
  });

  it('maps a script without scenes to 422', async () => {
    const res = await post('/api/scenes/parse', { script: 'no markers here' });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'No scenes found in script (15 chars)', code: 'PARSE_FAILED' });
  });

  it('rejects a missing script with 400', async () => {
    const res = await post('/api/scenes/parse', {});
    expect(res.status).toBe(400);
  });

  it('generates a script on demand', async () => {
    const res = await post('/api/scripts', {});
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ title: 'Reply-all apocalypse', angle: 'office_email', usedFallback: true });

    scriptFails = true;
    const failed = await post('/api/scripts', {});
    scriptFails = false;
    expect(failed.status).toBe(422);
  });

  it('starts one run at a time and exposes its status', async () => {
    const started = await post('/api/runs', { upload: false });
    expect(started.status).toBe(202);
    const body: unknown = await started.json();
    const runId = typeof body === 'object' && body !== null && 'runId' in body && typeof body.runId === 'string' ? body.runId : '';
    expect(runId).not.toBe('');

    const conflict = await post('/api/runs', {});
    expect(conflict.status).toBe(409);
    expect(await conflict.json()).toEqual({ error: 'A run is already in progress', runId });

    const scriptDuringRun = await post('/api/scripts', {});
    expect(scriptDuringRun.status).toBe(409);
    expect(await scriptDuringRun.json()).toEqual({ error: 'A run is already in progress', runId });

    const status = await (await fetch(`${serverUrl}/api/status?limit=1`)).json();
    expect(status).toMatchObject({
      runId,
      status: 'running',
      events: [{ stage: 'SCRIPT', level: 'info', message: 'Writing script' }]
    });

    releaseRun({
      runId,
      title: 't',
      angle: '',
      scenes: [],
      timeline: { segments: [], totalDuration: 0, droppedSceneIds: [] },
      videoPath: `/srv/out/runs/${runId}/short.mp4`,
      metadata: null,
      upload: null,
      uploadError: null,
      events: []
    });
    await runs.get(runId)?.finished;

    const run = await (await fetch(`${serverUrl}/api/runs/${runId}`)).json();
    expect(run).toMatchObject({ id: runId, status: 'done', mediaUrl: `/media/runs/${runId}/short.mp4` });
  });

  it('returns 404 for an unknown run', async () => {
    const res = await fetch(`${serverUrl}/api/runs/nope`);
    expect(res.status).toBe(404);
  });
});
