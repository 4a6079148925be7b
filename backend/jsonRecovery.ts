import { RecoveryError } from './errors';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const MAX_UNWRAP_DEPTH = 3;
const REASONING_BLOCK = /<(think|thinking|reasoning|reflection)>[\s\S]*?<\/\1>/gi;
const PAIRS = [
  ['{', '}'],
  ['[', ']']
] as const;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Cheap shape check used to route script output to recovery instead of the scene parser. */
export function looksLikeJson(text: string): boolean {
  const body = stripReasoning(stripFence(text)).trimStart();
  return body.startsWith('{') || body.startsWith('[');
}

export function stripFence(text: string): string {
  let out = text.trim();
  if (!out.startsWith('```')) return out;
  const newline = out.indexOf('\n');
  out = newline >= 0 ? out.slice(newline + 1) : out.slice(3);
  if (out.trimEnd().endsWith('```')) out = out.trimEnd().slice(0, -3);
  return out.trim();
}

export function stripReasoning(text: string): string {
  return text.replace(REASONING_BLOCK, '').trim();
}

function tryParse(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function isContainer(value: JsonValue | undefined): value is JsonObject | JsonValue[] {
  return typeof value === 'object' && value !== null;
}

/**
 * Decode the first complete object or array at the start of `text`, ignoring
 * whatever follows it. Returns the value and how many characters it spanned.
 */
export function decodeLeading(text: string): { value: JsonValue; length: number } | undefined {
  const open = text[0];
  if (open !== '{' && open !== '[') return undefined;
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) {
        const value = tryParse(text.slice(0, i + 1));
        return value === undefined ? undefined : { value, length: i + 1 };
      }
    }
  }
  return undefined;
}

function candidates(text: string): string[] {
  const out: string[] = [];
  for (const [open, close] of PAIRS) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start !== -1 && end > start) out.push(text.slice(start, end + 1));
  }
  return out;
}

/** Largest candidate that parses directly; failing that, the largest decodable prefix. */
function search(text: string): JsonValue | undefined {
  const found = candidates(text);
  let best: { value: JsonValue; length: number } | undefined;
  for (const candidate of found) {
    const value = tryParse(candidate);
    if (isContainer(value) && (!best || candidate.length > best.length)) {
      best = { value, length: candidate.length };
    }
  }
  if (best) return best.value;
  for (const candidate of found) {
    const decoded = decodeLeading(candidate);
    if (decoded && (!best || decoded.length > best.length)) best = decoded;
  }
  return best?.value;
}

export function repairLight(text: string): string {
  return text
    .replace(/,\s*([\]}])/g, '$1')
    .replace(/[\x00-\x1f\x7f]/g, ' ')
    .replace(/}\s*{/g, '},{');
}

export function repairFull(text: string): string {
  return repairLight(text).replace(/'/g, '"');
}

function recoverAt(raw: string, depth: number): JsonValue {
  const strategies: string[] = [];
  const text = stripReasoning(stripFence(raw));

  let value: JsonValue | undefined = tryParse(text);
  strategies.push('direct');
  if (!isContainer(value) && typeof value !== 'string') {
    value = search(text);
    strategies.push('candidates');
  }
  if (value === undefined) {
    value = search(repairLight(text));
    strategies.push('light-repair');
  }
  if (value === undefined) {
    value = search(repairFull(text));
    strategies.push('full-repair');
  }
  if (value === undefined) throw new RecoveryError(raw.length, strategies);

  if (typeof value === 'string' && depth < MAX_UNWRAP_DEPTH) {
    try {
      return recoverAt(value, depth + 1);
    } catch (err) {
      if (err instanceof RecoveryError) return value;
      throw err;
    }
  }
  return value;
}

/**
 * Pull a JSON value out of generated text: code fences, reasoning blocks,
 * surrounding prose, trailing commas, single quotes and double-encoded
 * payloads are all tolerated. Throws RecoveryError when nothing decodes.
 */
export function recoverJson(raw: string): JsonValue {
  return recoverAt(raw, 0);
}
