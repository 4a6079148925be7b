export type CleanOptions = {
  /** Collapse newlines (and the spaces around them) into single spaces */
  inline?: boolean;
  /** Remove quote characters wrapping the whole result */
  stripQuotes?: boolean;
};

const FENCE = /```[a-zA-Z0-9_-]*/g;
const MARKUP = /[*_#]/g;
const WRAPPING_QUOTES = /^["'“”‘’]+|["'“”‘’]+$/g;

/**
 * Strip markdown noise from generated text. Never fails; empty input gives ''.
 */
export function cleanText(text: string, opts: CleanOptions = {}): string {
  if (!text) return '';
  let out = text.replace(FENCE, '').replace(MARKUP, '');
  if (opts.inline) out = out.replace(/[ \t]*\r?\n+[ \t]*/g, ' ');
  out = out.trim();
  if (opts.stripQuotes) out = out.replace(WRAPPING_QUOTES, '').trim();
  return out;
}

export function flattenInline(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Narration as it should reach text-to-speech: no markup, no double quotes of any kind. */
export function toSpeakable(text: string): string {
  return flattenInline(cleanText(text, { inline: true }).replace(/["“”]/g, ''));
}

export function truncateMessage(text: string, max = 100): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3))}...`;
}
