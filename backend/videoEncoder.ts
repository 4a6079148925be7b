import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import { logger } from './logger';
import type { Timeline } from './timedAssembler';

export type EncodeOptions = {
  fps: number;
  width: number;
  height: number;
  outputPath: string;
  /** Per-segment intermediates go here; defaults to a parts/ dir beside the output */
  workDir?: string;
};

export interface VideoEncoder {
  encode(timeline: Timeline, opts: EncodeOptions): Promise<string>;
}

export const ZOOM_GAIN = 0.04;

/**
 * Fill the frame and crop the overflow, e.g. 1080x1920 for 9:16. With a duration the
 * still slowly zooms in, reaching 1 + ZOOM_GAIN at the end of the segment.
 */
export function frameFilter(width: number, height: number, fps: number, duration?: number): string {
  const fill = `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height}`;
  if (duration === undefined) return `${fill},fps=${fps},format=yuv420p`;
  const frames = Math.max(1, Math.round(duration * fps));
  const zoom =
    `zoompan=z='1+${ZOOM_GAIN}*on/${frames}':x='iw/2-(iw/zoom/2)':y='ih/2-(ih/zoom/2)'` +
    `:d=1:s=${width}x${height}:fps=${fps}`;
  return `${fill},${zoom},format=yuv420p`;
}

/** Audio trimmed to what the segment may play, then padded with silence to the segment length. */
export function audioFilter(audioDuration: number | null): string {
  return audioDuration !== null ? `atrim=0:${audioDuration},asetpts=PTS-STARTPTS,apad` : 'anull';
}

export function concatList(files: readonly string[]): string {
  return files.map((p) => `file '${p.replace(/\\/g, '/').replace(/'/g, "'\\''")}'`).join('\n');
}

function run(command: ffmpeg.FfmpegCommand, label: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    command
      .on('start', () => logger.step('FFMPEG', `${label}: started`))
      .on('end', () => resolve())
      .on('error', (err: Error) => {
        logger.step('FFMPEG', `${label}: ${err.message}`);
        reject(err);
      })
      .run();
  });
}

/**
 * One still-image clip per segment with its audio (or silence), then a stream-copy concat.
 * Every part shares codec settings so the concat never re-encodes.
 */
export class FfmpegEncoder implements VideoEncoder {
  async encode(timeline: Timeline, opts: EncodeOptions): Promise<string> {
    const workDir = opts.workDir ?? path.join(path.dirname(opts.outputPath), 'parts');
    fs.mkdirSync(workDir, { recursive: true });
    fs.mkdirSync(path.dirname(opts.outputPath), { recursive: true });

    const parts: string[] = [];
    for (const [i, seg] of timeline.segments.entries()) {
      const partPath = path.join(workDir, `part_${String(i + 1).padStart(2, '0')}.mp4`);
      const duration = seg.duration.toFixed(3);
      const command = ffmpeg().input(seg.imageRef).inputOptions(['-loop 1', `-t ${duration}`]);
      if (seg.audioRef) command.input(seg.audioRef);
      else command.input('anullsrc=channel_layout=stereo:sample_rate=44100').inputFormat('lavfi');
      command
        .outputOptions([
          '-vf', frameFilter(opts.width, opts.height, opts.fps, seg.duration),
          '-af', audioFilter(seg.audioRef ? seg.audioDuration : null),
          '-map 0:v:0',
          '-map 1:a:0',
          '-t', duration,
          '-c:v libx264',
          '-preset veryfast',
          '-pix_fmt yuv420p',
          '-c:a aac',
          '-ar 44100',
          '-ac 2'
        ])
        .output(partPath);
      await run(command, `scene ${seg.sceneId} (${duration}s)`);
      parts.push(partPath);
    }

    const listPath = path.join(workDir, 'files.txt');
    fs.writeFileSync(listPath, concatList(parts));
    logger.step('FFMPEG', `Wrote concat list (${parts.length} file(s))`);
    const concat = ffmpeg()
      .input(listPath)
      .inputOptions(['-f concat', '-safe 0'])
      .outputOptions(['-c copy', '-movflags +faststart'])
      .output(opts.outputPath);
    await run(concat, 'concat');
    return opts.outputPath;
  }
}
