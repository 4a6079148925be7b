import path from 'path';
import { nanoid } from 'nanoid';
import type { Config } from '../config';
import { mapWithConcurrency } from '../concurrency';
import { errorMessage } from '../errors';
import type { ChainOutcome } from '../fallbackChain';
import { createImageChain, imagePath, type ImageRequest } from '../imageService';
import { createTextGenerators, type TextGenerator } from '../llmClient';
import { getAudioDurationSeconds } from '../media';
import { buildMetadata, type UploadMetadata } from '../metadataService';
import { RunContext, type StatusEvent } from '../runContext';
import type { Scene } from '../sceneParser';
import { createScriptService, parseScript, type ScriptResult } from '../scriptService';
import { assembleTimeline, type AssemblyInput, type Timeline } from '../timedAssembler';
import { TopicHistory } from '../topicHistory';
import { FfmpegEncoder, type VideoEncoder } from '../videoEncoder';
import { audioPath, createSynthesizer, voiceOptions, type SpeechSynthesizer, type VoiceOptions } from '../voiceService';
import { createUploader, type UploadResult, type VideoUploader } from '../youtubeUploader';

/** Shorter scripts are treated as missing and a new one is generated. */
export const MIN_SCRIPT_LENGTH = 50;

export type PipelineDeps = {
  scripts: { generate(ctx?: RunContext): Promise<ScriptResult> };
  images: { run(input: ImageRequest): Promise<ChainOutcome<string>> };
  /** null renders every scene silent */
  synthesizer: SpeechSynthesizer | null;
  encoder: VideoEncoder;
  measureAudio: (audioRef: string) => Promise<number>;
  uploader: VideoUploader | null;
  /** Used for upload metadata */
  generators: readonly TextGenerator[];
};

export type PipelineSettings = {
  outputDir: string;
  video: { width: number; height: number; fps: number; maxDurationSec: number };
  voice: VoiceOptions;
  sceneConcurrency: number;
  jsonAttempts: number;
  characterNames: readonly string[];
};

export type RunOptions = {
  /** Script text to use instead of generating one */
  script?: string;
  upload?: boolean;
  ctx?: RunContext;
};

export type RunResult = {
  runId: string;
  title: string;
  /** '' when the script was supplied */
  angle: string;
  scenes: Scene[];
  timeline: Timeline;
  videoPath: string;
  metadata: UploadMetadata | null;
  upload: UploadResult | null;
  uploadError: string | null;
  events: StatusEvent[];
};

export function createRunId(): string {
  return `${Date.now().toString(36)}-${nanoid(6)}`;
}

/** Run a stage, recording its failure on the context before rethrowing. */
async function stage<T>(ctx: RunContext, name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    ctx.fail(name, `${name.toLowerCase()} failed`, err);
    throw err;
  }
}

/**
 * Script → scenes → images and voiceover → timed assembly → encode → optional upload.
 * Upload problems are reported in the result; every other failure aborts the run.
 */
export async function runPipeline(deps: PipelineDeps, settings: PipelineSettings, opts: RunOptions = {}): Promise<RunResult> {
  const ctx = opts.ctx ?? new RunContext(createRunId());
  const runDir = path.join(settings.outputDir, 'runs', ctx.runId);
  ctx.info('START', `Run started in ${runDir}`);

  const supplied = opts.script?.trim() ?? '';
  const { title, angle, scenes, script } = await stage(ctx, 'SCRIPT', async () => {
    if (supplied.length >= MIN_SCRIPT_LENGTH) {
      const parsed = parseScript(supplied, settings.characterNames);
      ctx.info('SCRIPT', `Using supplied script (${parsed.scenes.length} scenes)`);
      return { ...parsed, angle: '', script: supplied };
    }
    return deps.scripts.generate(ctx);
  });
  ctx.info('SCRIPT', `"${title}"`);

  const images = await stage(ctx, 'IMAGE', () =>
    mapWithConcurrency(scenes, settings.sceneConcurrency, async (scene) => {
      const outcome = await deps.images.run({
        sceneId: scene.id,
        visual: scene.visual || scene.narration,
        outPath: imagePath(path.join(runDir, 'images'), scene.id)
      });
      ctx.info('IMAGE', `Scene ${scene.id} ready (${outcome.source})`);
      return outcome.value;
    })
  );

  const synthesizer = deps.synthesizer;
  if (!synthesizer) ctx.warn('AUDIO', 'No voice provider configured, scenes will be silent');
  const audio = await Promise.all(
    scenes.map(async (scene): Promise<string | null> => {
      if (!synthesizer || !scene.narration) return null;
      try {
        const ref = await synthesizer.synthesize(scene.narration, audioPath(path.join(runDir, 'audio'), scene.id), settings.voice);
        ctx.info('AUDIO', `Scene ${scene.id} voiced`);
        return ref;
      } catch (err) {
        ctx.warn('AUDIO', `Scene ${scene.id} left silent: ${errorMessage(err)}`);
        return null;
      }
    })
  );

  const inputs: AssemblyInput[] = scenes.map((scene, i) => ({ sceneId: scene.id, imageRef: images[i], audioRef: audio[i] }));
  const timeline = await stage(ctx, 'ASSEMBLE', () =>
    assembleTimeline(inputs, settings.video.maxDurationSec, { measureAudio: deps.measureAudio })
  );
  ctx.info('ASSEMBLE', `${timeline.segments.length} segments, ${timeline.totalDuration}s`);
  if (timeline.droppedSceneIds.length) {
    ctx.warn('ASSEMBLE', `Dropped scenes ${timeline.droppedSceneIds.join(', ')} to fit ${settings.video.maxDurationSec}s`);
  }

  const videoPath = await stage(ctx, 'ENCODE', () =>
    deps.encoder.encode(timeline, {
      fps: settings.video.fps,
      width: settings.video.width,
      height: settings.video.height,
      outputPath: path.join(runDir, 'short.mp4'),
      workDir: path.join(runDir, 'parts')
    })
  );
  ctx.info('ENCODE', `Video written to ${videoPath}`);

  let metadata: UploadMetadata | null = null;
  let upload: UploadResult | null = null;
  let uploadError: string | null = null;
  if (opts.upload) {
    if (!deps.uploader) {
      uploadError = 'No uploader configured';
      ctx.warn('UPLOAD', uploadError);
    } else {
      metadata = await buildMetadata(script, { generators: deps.generators, attempts: settings.jsonAttempts });
      try {
        upload = await deps.uploader.upload(videoPath, metadata);
        ctx.info('UPLOAD', `Uploaded ${upload.url}`);
      } catch (err) {
        uploadError = errorMessage(err);
        ctx.fail('UPLOAD', 'Upload failed', err);
      }
    }
  }

  ctx.info('DONE', 'Run finished');
  return { runId: ctx.runId, title, angle, scenes, timeline, videoPath, metadata, upload, uploadError, events: ctx.all() };
}

export function pipelineSettings(cfg: Config): PipelineSettings {
  return {
    outputDir: cfg.outputDir,
    video: { ...cfg.video },
    voice: voiceOptions(cfg),
    sceneConcurrency: cfg.pipeline.sceneConcurrency,
    jsonAttempts: cfg.pipeline.jsonAttempts,
    characterNames: cfg.script.cast
  };
}

export function createPipelineDeps(cfg: Config): PipelineDeps {
  const history = new TopicHistory({
    filePath: cfg.history.filePath,
    maxEntries: cfg.history.maxEntries,
    titleWindow: cfg.history.recentTitleWindow
  });
  const generators = createTextGenerators(cfg);
  return {
    scripts: createScriptService(cfg, generators, history),
    images: createImageChain(cfg),
    synthesizer: createSynthesizer(cfg),
    encoder: new FfmpegEncoder(),
    measureAudio: getAudioDurationSeconds,
    uploader: createUploader(cfg),
    generators
  };
}
