import path from 'path';
import { describe, expect, it } from 'vitest';
import { AssemblyError, ProviderExhaustedError, UploadError } from '../errors';
import type { ImageRequest } from '../imageService';
import { RunContext } from '../runContext';
import type { Scene } from '../sceneParser';
import type { ScriptResult } from '../scriptService';
import type { Timeline } from '../timedAssembler';
import type { EncodeOptions } from '../videoEncoder';
import type { SpeechSynthesizer } from '../voiceService';
import { runPipeline, type PipelineDeps, type PipelineSettings } from './index';

const scenes: Scene[] = [
  { id: 1, visual: 'A desk at dawn', narration: 'Rise and grind.' },
  { id: 2, visual: 'A printer on fire', narration: 'this line will fail' },
  { id: 3, visual: 'An empty parking lot', narration: 'Same time tomorrow.' }
];

const generated: ScriptResult = {
  title: 'A desk at dawn',
  angle: 'office_meetings',
  scenes,
  script: 'Scene 1\nVisual: A desk at dawn\nNarrator: Rise and grind.',
  source: 'fake',
  usedFallback: false
};

const settings: PipelineSettings = {
  outputDir: '/srv/out',
  video: { width: 1080, height: 1920, fps: 24, maxDurationSec: 30 },
  voice: { voiceId: 'v', modelId: 'm', speed: 1, stability: 0.5, similarityBoost: 0.4 },
  sceneConcurrency: 2,
  jsonAttempts: 1,
  characterNames: []
};

function fakes(overrides: Partial<PipelineDeps> = {}) {
  const encoded: Array<{ timeline: Timeline; opts: EncodeOptions }> = [];
  const imageRequests: ImageRequest[] = [];
  let scriptCalls = 0;
  const synthesizer: SpeechSynthesizer = {
    name: 'fake-tts',
    async synthesize(text, outPath) {
      if (text.includes('fail')) throw new Error('tts down');
      return outPath;
    }
  };
  const deps: PipelineDeps = {
    scripts: {
      async generate() {
        scriptCalls++;
        return generated;
      }
    },
    images: {
      async run(req) {
        imageRequests.push(req);
        return { value: req.outPath, source: 'fake-image', usedFallback: false, attempts: [] };
      }
    },
    synthesizer,
    encoder: {
      async encode(timeline, opts) {
        encoded.push({ timeline, opts });
        return opts.outputPath;
      }
    },
    measureAudio: async () => 2,
    uploader: null,
    generators: [],
    ...overrides
  };
  return { deps, encoded, imageRequests, scriptCalls: () => scriptCalls };
}

describe('runPipeline', () => {
  it('renders every scene and leaves a scene silent when its voiceover fails', async () => {
    const { deps, encoded, imageRequests } = fakes();
    const ctx = new RunContext('run-1');

    const result = await runPipeline(deps, settings, { ctx });

    const runDir = path.join('/srv/out', 'runs', 'run-1');
    expect(imageRequests.map((r) => r.outPath)).toEqual([1, 2, 3].map((id) => path.join(runDir, 'images', `scene_0${id}.png`)));
    expect(result.timeline.segments.map((s) => s.duration)).toEqual([2.3, 5, 2.3]);
    expect(result.timeline.segments[1].audioRef).toBeNull();
    expect(result.timeline.totalDuration).toBe(9.6);
    expect(result.videoPath).toBe(path.join(runDir, 'short.mp4'));
    expect(encoded[0].opts).toEqual({
      fps: 24,
      width: 1080,
      height: 1920,
      outputPath: path.join(runDir, 'short.mp4'),
      workDir: path.join(runDir, 'parts')
    });
    expect(result).toMatchObject({ runId: 'run-1', title: 'A desk at dawn', angle: 'office_meetings', upload: null, uploadError: null });
    expect(result.events).toContainEqual(
      expect.objectContaining({ stage: 'AUDIO', level: 'warn', message: 'Scene 2 left silent: tts down' })
    );
    expect(result.events[result.events.length - 1]).toMatchObject({ stage: 'DONE', message: 'Run finished' });
  });

  it('still succeeds when the upload fails', async () => {
    const { deps } = fakes({
      uploader: {
        async upload() {
          throw new UploadError('YouTube upload failed: quotaExceeded');
        }
      }
    });

    const result = await runPipeline(deps, settings, { upload: true });

    expect(result.upload).toBeNull();
    expect(result.uploadError).toBe('YouTube upload failed: quotaExceeded');
    expect(result.metadata?.title).toMatch(/^Everyday Satire - /);
    expect(result.events).toContainEqual(expect.objectContaining({ stage: 'UPLOAD', level: 'error' }));
  });

  it('reports a missing uploader instead of failing', async () => {
    const { deps } = fakes();
    const result = await runPipeline(deps, settings, { upload: true });
    expect(result.uploadError).toBe('No uploader configured');
  });

  it('aborts before encoding when nothing fits the timeline', async () => {
    const { deps, encoded } = fakes();
    const ctx = new RunContext('run-2');

    await expect(runPipeline(deps, { ...settings, video: { ...settings.video, maxDurationSec: 0.5 } }, { ctx })).rejects.toBeInstanceOf(
      AssemblyError
    );

    expect(encoded).toHaveLength(0);
    const last = ctx.recent(1)[0];
    expect(last).toMatchObject({ stage: 'ASSEMBLE', level: 'error', message: 'assemble failed: Timeline is empty after assembling 3 scene(s)' });
  });

  it('aborts when the image chain is exhausted', async () => {
    const { deps } = fakes({
      images: {
        async run() {
          throw new ProviderExhaustedError('image', []);
        }
      }
    });
    await expect(runPipeline(deps, settings)).rejects.toBeInstanceOf(ProviderExhaustedError);
  });

  it('uses a supplied script instead of generating one', async () => {
    const { deps, scriptCalls } = fakes();
    const script = 'Scene 1: Only\nVisual: A lonely stapler on a desk\nNarrator: "Nobody asked for this."';

    const result = await runPipeline(deps, settings, { script });

    expect(scriptCalls()).toBe(0);
    expect(result.angle).toBe('');
    expect(result.scenes).toEqual([{ id: 1, visual: 'A lonely stapler on a desk', narration: 'Nobody asked for this.' }]);
    expect(result.title).toBe('A lonely stapler on a desk');
  });

  it('generates a script when the supplied one is too short', async () => {
    const { deps, scriptCalls } = fakes();
    await runPipeline(deps, settings, { script: 'Scene 1: hi' });
    expect(scriptCalls()).toBe(1);
  });
});
