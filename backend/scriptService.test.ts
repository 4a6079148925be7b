import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Angle } from './angles';
import { ParseError } from './errors';
import type { TextGenerator } from './llmClient';
import { buildScriptPrompt, parseScript, ScriptService, templateScript } from './scriptService';
import { TopicHistory } from './topicHistory';

const pool: Angle[] = [
  { angle: 'a1', topic: 'Meetings that could be emails', visualHint: 'A conference room full of sleeping cartoon coworkers' },
  { angle: 'a2', topic: 'Smart fridges with opinions', visualHint: 'A fridge lecturing a man about his snacks' },
  { angle: 'a3', topic: 'Gym memberships in February', visualHint: 'An empty gym with one confused treadmill' }
];

const SCRIPT = [
  'Scene 1: Intro',
  'Visual: A printer surrounded by angry coworkers',
  'Narrator: "It only jams when you are late."',
  '',
  'Scene 2: End',
  'Visual: Empty office',
  'Narrator: "See you tomorrow."'
].join('\n');

function replying(...outputs: string[]): TextGenerator & { calls: number } {
  const gen = {
    name: 'fake',
    calls: 0,
    async generate() {
      gen.calls++;
      return outputs[Math.min(gen.calls - 1, outputs.length - 1)];
    }
  };
  return gen;
}

let dir: string;
let history: TopicHistory;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'script-'));
  history = new TopicHistory({ filePath: path.join(dir, 'history.json') });
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const service = (generators: TextGenerator[]) =>
  new ScriptService({ generators, history, pool, maxAngles: 3, random: () => 0, retryDelayMs: 0, sleep: async () => {} });

describe('ScriptService.generate', () => {
  it('returns the provider script and records it in history', async () => {
    const result = await service([replying(SCRIPT)]).generate();

    expect(result).toMatchObject({
      title: 'A printer surrounded by angry coworkers',
      angle: 'a1',
      source: 'fake',
      usedFallback: false,
      script: SCRIPT
    });
    expect(result.scenes.map((s) => s.id)).toEqual([1, 2]);
    expect(history.entries()).toMatchObject([{ title: 'A printer surrounded by angry coworkers', angle: 'a1' }]);
  });

  it('writes the template script when no provider is configured', async () => {
    const result = await service([]).generate();

    expect(result.source).toBe('template');
    expect(result.usedFallback).toBe(true);
    expect(result.title).toBe('A conference room full of sleeping cartoon coworkers');
    expect(result.scenes).toHaveLength(4);
    expect(result.scenes[0].narration).toBe("Today's breaking news: Meetings that could be emails. Again.");
  });

  it('moves to another angle when the title repeats a recent one, accepting it on the last angle', async () => {
    history.add('A printer surrounded by angry coworkers', 'older');
    const gen = replying(SCRIPT);

    const result = await service([gen]).generate();

    expect(result.angle).toBe('a3');
    expect(gen.calls).toBe(3);
    expect(history.entries().map((e) => e.angle)).toEqual(['older', 'a3']);
  });

  it('moves to another angle when the output does not parse', async () => {
    const gen = replying('just rambling, no scenes', SCRIPT);
    const result = await service([gen]).generate();
    expect(result.angle).toBe('a2');
    expect(gen.calls).toBe(2);
  });

  it('throws ParseError when no angle produced a usable script', async () => {
    await expect(service([replying('nothing here')]).generate()).rejects.toBeInstanceOf(ParseError);
    expect(history.entries()).toEqual([]);
  });

  it('skips angles used by recent runs', async () => {
    history.add('Something else entirely', 'a1');
    const result = await service([replying(SCRIPT)]).generate();
    expect(result.angle).toBe('a2');
  });
});

describe('parseScript', () => {
  it('routes JSON output through recovery', () => {
    const raw = '```json\n{"title": "Inbox zero is a lie", "scenes": [{"visual": "Inbox", "narration": "Nope."}]}\n```';
    expect(parseScript(raw)).toEqual({
      title: 'Inbox zero is a lie',
      scenes: [{ id: 1, visual: 'Inbox', narration: 'Nope.' }]
    });
  });

  it('throws ParseError for JSON without scenes', () => {
    expect(() => parseScript('{"title": "x"}')).toThrow(ParseError);
  });

  it('parses a scene script that opens with a bracketed cue', () => {
    const raw = [
      '[Upbeat music]',
      'Scene 1: Hook',
      'Visual: A desk',
      'Narrator: "Hello there friends"',
      '',
      'Scene 2: End',
      'Visual: A door',
      'Narrator: "Goodbye for now"'
    ].join('\n');
    expect(parseScript(raw, [])).toEqual({
      title: 'Hello there friends',
      scenes: [
        { id: 1, visual: 'A desk', narration: 'Hello there friends' },
        { id: 2, visual: 'A door', narration: 'Goodbye for now' }
      ]
    });
  });
});

describe('buildScriptPrompt', () => {
  it('lists titles to avoid', () => {
    const prompt = buildScriptPrompt({
      angle: pool[0],
      now: new Date(2026, 9, 19),
      recentTitles: ['Old one', 'Older one'],
      todayTitles: ['Morning one']
    });
    expect(prompt).toContain('Today is Monday, October 19, 2026.');
    expect(prompt).toContain("TODAY'S ANGLE: Meetings that could be emails");
    expect(prompt).toContain('  - Old one\n  - Older one');
    expect(prompt.endsWith('Already made today: Morning one. Pick a different take.')).toBe(true);
  });
});

describe('templateScript', () => {
  it('always parses into four scenes', () => {
    for (const angle of pool) expect(parseScript(templateScript(angle)).scenes).toHaveLength(4);
  });
});
