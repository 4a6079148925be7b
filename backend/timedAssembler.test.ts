import { describe, expect, it } from 'vitest';
import { AssemblyError } from './errors';
import { assembleTimeline, buildTimeline, type AssemblyInput } from './timedAssembler';

const inputs = (n: number, extra: Partial<AssemblyInput> = {}): AssemblyInput[] =>
  Array.from({ length: n }, (_, i) => ({ sceneId: i + 1, imageRef: `img_${i + 1}.png`, ...extra }));

describe('buildTimeline', () => {
  it('fills a 30s cap with four of five 8s segments', () => {
    const timeline = buildTimeline(inputs(5, { explicitDuration: 8 }), 30);

    expect(timeline.segments.map((s) => s.duration)).toEqual([8, 8, 8, 6]);
    expect(timeline.totalDuration).toBe(30);
    expect(timeline.droppedSceneIds).toEqual([5]);
  });

  it('pads measured audio and truncates audio that outlasts its clamped segment', () => {
    const refs = inputs(5).map((input, i) => ({ ...input, audioRef: `a_${i + 1}.mp3` }));
    const lengths = new Map<string, number>(refs.map((r) => [r.audioRef, 7.7]));

    const timeline = buildTimeline(refs, 30, lengths);

    expect(timeline.segments).toHaveLength(4);
    expect(timeline.segments[0]).toEqual({
      sceneId: 1,
      imageRef: 'img_1.png',
      audioRef: 'a_1.mp3',
      duration: 8,
      audioDuration: 7.7,
      audioTruncated: false
    });
    expect(timeline.segments[3]).toMatchObject({ duration: 6, audioDuration: 6, audioTruncated: true });
    expect(timeline.totalDuration).toBe(30);
  });

  it('uses the default duration when there is no audio and no override', () => {
    const timeline = buildTimeline(inputs(2), 30);
    expect(timeline.segments.map((s) => s.duration)).toEqual([5, 5]);
    expect(timeline.segments[0].audioRef).toBeNull();
    expect(timeline.segments[0].audioDuration).toBeNull();
  });

  it('prefers measured audio over an explicit duration', () => {
    const timeline = buildTimeline([{ sceneId: 1, imageRef: 'i', audioRef: 'a', explicitDuration: 9 }], 30, new Map([['a', 2]]));
    expect(timeline.segments[0].duration).toBe(2.3);
  });

  it('treats unmeasurable audio as absent', () => {
    const timeline = buildTimeline([{ sceneId: 1, imageRef: 'i', audioRef: 'a' }], 30, new Map([['a', 0]]));
    expect(timeline.segments[0]).toMatchObject({ duration: 5, audioRef: null, audioDuration: null });
  });

  it('skips inputs without an image', () => {
    const timeline = buildTimeline([{ sceneId: 1 }, { sceneId: 2, imageRef: 'x' }], 30);
    expect(timeline.segments.map((s) => s.sceneId)).toEqual([2]);
    expect(timeline.droppedSceneIds).toEqual([1]);
  });

  it('stops rather than adding a sliver under one second', () => {
    const timeline = buildTimeline(inputs(3, { explicitDuration: 14.5 }), 29.8);
    // 14.5 + 14.5 = 29, leaving 0.8
    expect(timeline.segments).toHaveLength(2);
    expect(timeline.totalDuration).toBe(29);
  });

  it('keeps the output a prefix of the input order', () => {
    const timeline = buildTimeline(inputs(6, { explicitDuration: 7 }), 20);
    expect(timeline.segments.map((s) => s.sceneId)).toEqual([1, 2, 3]);
    expect(timeline.totalDuration).toBe(20);
  });

  it('throws AssemblyError when nothing fits', () => {
    expect(() => buildTimeline([{ sceneId: 1, imageRef: 'x' }], 0.5)).toThrow(AssemblyError);
    expect(() => buildTimeline([], 30)).toThrow(AssemblyError);
  });
});

describe('assembleTimeline', () => {
  it('measures each audio track once and ignores failed measurements', async () => {
    const calls: string[] = [];
    const measureAudio = async (ref: string) => {
      calls.push(ref);
      if (ref === 'bad.mp3') throw new Error('ffprobe failed');
      return 3.7;
    };

    const timeline = await assembleTimeline(
      [
        { sceneId: 1, imageRef: 'a.png', audioRef: 'good.mp3' },
        { sceneId: 2, imageRef: 'b.png', audioRef: 'bad.mp3' },
        { sceneId: 3, imageRef: 'c.png', audioRef: null }
      ],
      30,
      { measureAudio }
    );

    expect(calls.sort()).toEqual(['bad.mp3', 'good.mp3']);
    expect(timeline.segments.map((s) => s.duration)).toEqual([4, 5, 5]);
    expect(timeline.totalDuration).toBe(14);
  });
});
