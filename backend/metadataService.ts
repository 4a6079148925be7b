import { errorMessage } from './errors';
import { isJsonObject, type JsonValue } from './jsonRecovery';
import { generateJson, type TextGenerator } from './llmClient';
import { logger } from './logger';
import { flattenInline, truncateMessage } from './textCleaner';

export type UploadMetadata = {
  title: string;
  description: string;
  tags: string[];
};

export const MAX_TITLE_LENGTH = 100;
const MAX_TAGS = 15;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (n: number) => String(n).padStart(2, '0');

const FIRST_LINE = /Scene\s*1[^\n]*\n[\s\S]*?(?:Narrator|Visual)[^:\n]*:\s*["“]?([^"”\n]{10,80})/;

/** Short title-like summary used for history and duplicate checks. */
export function extractTitle(script: string, now: Date = new Date()): string {
  const match = FIRST_LINE.exec(script);
  if (match) return match[1].trim().slice(0, 80);
  const clean = script.replace(/[*#_\-=]/g, '').trim();
  if (clean) return clean.slice(0, 80);
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `Script ${stamp}`;
}

export function fallbackMetadata(now: Date = new Date()): UploadMetadata {
  return {
    title: `Everyday Satire - ${pad(now.getDate())} ${MONTHS[now.getMonth()]} | Comedy Cartoon #shorts`,
    description:
      'Everyday life, gently roasted in 3D cartoon form.\n\n' +
      '#shorts #satire #comedy #cartoon #officelife #funnyshorts #3Danimation',
    tags: ['shorts', 'satire', 'comedy', 'cartoon', '3d animation', 'office life', 'funny', 'everyday life']
  };
}

export function metadataPrompt(script: string): string {
  return `Based on this short comedy script, write YouTube Shorts metadata.

Script:
${script.slice(0, 500)}

Return a punchy, curiosity-driven title (max 60 chars), a short description (2-3 lines with hashtags) and relevant tags.

Return ONLY valid JSON, no markdown:
{"title": "Catchy title #shorts", "description": "Short description with hashtags", "tags": ["tag1", "tag2", "tag3"]}`;
}

/** Validate a recovered payload; null when it has no usable title. */
export function toMetadata(value: JsonValue): UploadMetadata | null {
  if (!isJsonObject(value)) return null;
  // Hashtags in the title are kept
  const title = typeof value.title === 'string' ? flattenInline(value.title).replace(/^["“]+|["”]+$/g, '').trim() : '';
  if (!title) return null;
  const description = typeof value.description === 'string' ? value.description.trim() : '';
  const rawTags = Array.isArray(value.tags) ? value.tags : [];
  const tags = rawTags
    .filter((t): t is string => typeof t === 'string')
    .map((t) => t.replace(/^#/, '').trim())
    .filter(Boolean)
    .slice(0, MAX_TAGS);
  return { title: truncateMessage(title, MAX_TITLE_LENGTH), description, tags };
}

export type BuildMetadataOptions = {
  generators: readonly TextGenerator[];
  attempts?: number;
  now?: Date;
};

/** Ask each generator in turn; fixed metadata when none gives a usable answer. */
export async function buildMetadata(script: string, opts: BuildMetadataOptions): Promise<UploadMetadata> {
  const prompt = metadataPrompt(script);
  for (const generator of opts.generators) {
    try {
      const metadata = toMetadata(await generateJson(generator, prompt, { attempts: opts.attempts }));
      if (metadata) return metadata;
      logger.warn('Metadata response had no title', { generator: generator.name });
    } catch (err) {
      logger.warn('Metadata generation failed', { generator: generator.name, error: errorMessage(err) });
    }
  }
  return fallbackMetadata(opts.now);
}
