import { config } from './config';
import { ParseError } from './errors';
import { isJsonObject, type JsonValue } from './jsonRecovery';
import { cleanText, flattenInline } from './textCleaner';

export type Scene = Readonly<{
  /** 1-based index taken from the script's own marker */
  id: number;
  visual: string;
  narration: string;
}>;

export type ParseOptions = {
  /** Speaker labels (besides Narrator) whose lines count as narration */
  characterNames?: readonly string[];
};

export const MAX_VISUAL_LENGTH = 500;
export const NARRATION_SEPARATOR = ' ... ';

/** Returns null when the scene would carry no content or has an invalid id. */
export function createScene(id: number, visual: string, narration: string): Scene | null {
  if (!Number.isInteger(id) || id < 1) return null;
  const v = visual.slice(0, MAX_VISUAL_LENGTH);
  if (!v && !narration) return null;
  return Object.freeze({ id, visual: v, narration });
}

type Marker = { index: number; start: number; end: number };

// Marker lines start with Scene N after optional decoration; anything after the index is its title.
const MARKER = /^[^\p{L}\p{N}\n]*Scene[ \t]*(\d+)\b[^\n]*$/gimu;

/** Pass one: every marker line, last occurrence of an index kept, in text order. */
export function findMarkers(text: string): Marker[] {
  const byIndex = new Map<number, Marker>();
  for (const m of text.matchAll(MARKER)) {
    const start = m.index ?? 0;
    const index = parseInt(m[1], 10);
    byIndex.set(index, { index, start, end: start + m[0].length });
  }
  return [...byIndex.values()].sort((a, b) => a.start - b.start);
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const FIELD_LABELS = ['Narrator', 'Narration', 'Camera', 'Text', 'Background', 'Audience', 'End', 'Sound', 'SFX', 'Music'];

function speakerPattern(names: readonly string[]): RegExp {
  const alternatives = ['Narrator', 'Narration', ...names].map(escapeRegExp).join('|');
  return new RegExp(`^[ \\t>*_-]*(?:${alternatives})[ \\t]*(?:\\([^)\\n]*\\))?[*_ \\t]*:[*_]*[ \\t]*(.*)$`, 'i');
}

function stopPattern(names: readonly string[]): RegExp {
  const alternatives = [...FIELD_LABELS, ...names].map(escapeRegExp).join('|');
  return new RegExp(
    `^[ \\t>*_-]*(?:(?:${alternatives})[ \\t]*(?:\\([^)\\n]*\\))?[*_ \\t]*:|[\\p{L}][\\p{L} .'-]{0,40}\\([^)\\n]*\\)[*_ \\t]*:|\\()`,
    'iu'
  );
}

const VISUAL_LABEL = /[*_]{0,2}\bVisual(?:\s+description)?[*_]{0,2}[ \t]*[:\-—–][*_]{0,2}[ \t]*/i;
const RULE_LINE = /^\s*[-*_=]{3,}\s*$/;

/** Text after the Visual label up to the next field label line. */
export function extractVisual(body: string, names: readonly string[] = []): string {
  const label = VISUAL_LABEL.exec(body);
  if (!label) return '';
  const stop = stopPattern(names);
  const lines = body.slice(label.index + label[0].length).split('\n');
  const kept: string[] = [lines[0]];
  for (const line of lines.slice(1)) {
    if (stop.test(line)) break;
    if (RULE_LINE.test(line)) continue;
    kept.push(line);
  }
  return flattenInline(cleanText(kept.join('\n'), { inline: true })).slice(0, MAX_VISUAL_LENGTH);
}

function firstQuoted(text: string): string {
  const m = /^["“]([^"“”]*)["”]?/.exec(text.trim());
  return m ? m[1] : text;
}

const QUOTED_SPAN = /["“]([^"“”]{5,})["”]/g;

/** Labelled speaker lines in order; any long quoted span when there are none. */
export function extractNarration(body: string, names: readonly string[] = []): string {
  const speaker = speakerPattern(names);
  const lines = body.split('\n');
  const fragments: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    const m = speaker.exec(lines[i]);
    if (!m) continue;
    let said = m[1].trim();
    if (!said) {
      const next = lines.slice(i + 1).find((l) => l.trim() !== '');
      if (next === undefined || speaker.test(next)) continue;
      said = next.trim();
    }
    fragments.push(firstQuoted(said));
  }
  if (fragments.length === 0) {
    for (const m of body.matchAll(QUOTED_SPAN)) fragments.push(m[1]);
  }
  return fragments
    .map((f) => flattenInline(cleanText(f, { inline: true, stripQuotes: true })))
    .filter(Boolean)
    .join(NARRATION_SEPARATOR);
}

/**
 * Split free-form script text into scenes. Markers decide the bodies; field
 * extraction works inside one body only. Never throws; see requireScenes.
 */
export function parseScenes(raw: string, opts: ParseOptions = {}): Scene[] {
  const names = opts.characterNames ?? config.script.cast;
  const text = raw.replace(/\r\n?/g, '\n');
  const markers = findMarkers(text);
  const scenes: Scene[] = [];
  markers.forEach((marker, i) => {
    const end = i + 1 < markers.length ? markers[i + 1].start : text.length;
    const body = text.slice(marker.end, end);
    if (!body.trim()) return;
    const scene = createScene(marker.index, extractVisual(body, names), extractNarration(body, names));
    if (scene) scenes.push(scene);
  });
  return scenes;
}

export function requireScenes(raw: string, opts: ParseOptions = {}): Scene[] {
  const scenes = parseScenes(raw, opts);
  if (scenes.length === 0) throw new ParseError(raw.length);
  return scenes;
}

function field(obj: { [key: string]: JsonValue }, keys: string[]): string {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return '';
}

/**
 * Scenes from a recovered JSON payload: either `{ scenes: [...] }` or a bare array.
 * Items without a usable numeric id are numbered by position.
 */
export function scenesFromJson(payload: JsonValue): Scene[] {
  const items = isJsonObject(payload) ? payload.scenes : payload;
  if (!Array.isArray(items)) return [];
  const scenes: Scene[] = [];
  const seen = new Set<number>();
  items.forEach((item, i) => {
    if (!isJsonObject(item)) return;
    const rawId = item.id ?? item.scene;
    let id = typeof rawId === 'number' ? rawId : typeof rawId === 'string' ? parseInt(rawId, 10) : i + 1;
    if (!Number.isInteger(id) || id < 1 || seen.has(id)) id = i + 1;
    const visual = flattenInline(cleanText(field(item, ['visual', 'prompt', 'description', 'image']), { inline: true }));
    const narration = flattenInline(
      cleanText(field(item, ['narration', 'voiceover', 'dialogue', 'text']), { inline: true, stripQuotes: true })
    );
    const scene = createScene(id, visual, narration);
    if (scene && !seen.has(scene.id)) {
      seen.add(scene.id);
      scenes.push(scene);
    }
  });
  return scenes;
}
