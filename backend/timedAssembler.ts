import { AssemblyError } from './errors';

export const AUDIO_PADDING_SEC = 0.3;
export const DEFAULT_SEGMENT_SEC = 5.0;
export const MIN_SEGMENT_SEC = 1.0;

export type AssemblyInput = {
  sceneId: number;
  imageRef?: string | null;
  audioRef?: string | null;
  /** Used when the audio length cannot be measured */
  explicitDuration?: number;
};

export type MediaSegment = {
  sceneId: number;
  imageRef: string;
  audioRef: string | null;
  /** Seconds on screen */
  duration: number;
  /** Seconds of audio actually played; never longer than duration */
  audioDuration: number | null;
  audioTruncated: boolean;
};

export type Timeline = {
  segments: MediaSegment[];
  totalDuration: number;
  /** Inputs that did not make it into the timeline */
  droppedSceneIds: number[];
};

/** Measured audio length in seconds per audio ref; absent or non-positive means unknown. */
export type AudioLengths = ReadonlyMap<string, number>;

const round3 = (n: number) => Math.round(n * 1000) / 1000;

/**
 * Walk inputs in order and fill the duration cap. Later segments are dropped
 * whole rather than shrinking earlier ones; a sliver under MIN_SEGMENT_SEC ends the timeline.
 */
export function buildTimeline(inputs: readonly AssemblyInput[], cap: number, audioLengths: AudioLengths = new Map()): Timeline {
  const segments: MediaSegment[] = [];
  let total = 0;

  for (const input of inputs) {
    if (!input.imageRef) continue;

    const audioLength = input.audioRef ? audioLengths.get(input.audioRef) : undefined;
    const hasAudio = audioLength !== undefined && audioLength > 0;
    let duration: number;
    if (hasAudio) duration = audioLength + AUDIO_PADDING_SEC;
    else if (input.explicitDuration !== undefined && input.explicitDuration > 0) duration = input.explicitDuration;
    else duration = DEFAULT_SEGMENT_SEC;

    const remaining = round3(cap - total);
    if (remaining <= 0) break;
    duration = round3(Math.min(duration, remaining));
    if (duration < MIN_SEGMENT_SEC) break;

    const audioDuration = hasAudio ? round3(Math.min(audioLength, duration)) : null;
    segments.push({
      sceneId: input.sceneId,
      imageRef: input.imageRef,
      audioRef: hasAudio && input.audioRef ? input.audioRef : null,
      duration,
      audioDuration,
      audioTruncated: hasAudio && audioLength > duration
    });
    total = round3(Math.min(cap, total + duration));
  }

  if (segments.length === 0) throw new AssemblyError(inputs.length);
  const kept = new Set(segments.map((s) => s.sceneId));
  return {
    segments,
    totalDuration: total,
    droppedSceneIds: inputs.map((i) => i.sceneId).filter((id) => !kept.has(id))
  };
}

export type AssembleOptions = {
  measureAudio: (audioRef: string) => Promise<number>;
};

/** Measure every audio track, then build the timeline. A failed measurement counts as unknown length. */
export async function assembleTimeline(
  inputs: readonly AssemblyInput[],
  cap: number,
  opts: AssembleOptions
): Promise<Timeline> {
  const refs = [...new Set(inputs.map((i) => i.audioRef).filter((r): r is string => !!r))];
  const measured = await Promise.all(
    refs.map(async (ref): Promise<[string, number]> => {
      try {
        return [ref, await opts.measureAudio(ref)];
      } catch {
        return [ref, 0];
      }
    })
  );
  return buildTimeline(inputs, cap, new Map(measured));
}
