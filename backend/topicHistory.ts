import fs from 'fs';
import path from 'path';
import { logger } from './logger';

export type HistoryEntry = {
  title: string;
  angle: string;
  /** YYYY-MM-DD, local time */
  date: string;
  /** HH:MM:SS, local time */
  time: string;
};

export type TopicHistoryOptions = {
  filePath: string;
  maxEntries?: number;
  /** Titles considered by isDuplicate */
  titleWindow?: number;
  now?: () => Date;
};

const pad = (n: number) => String(n).padStart(2, '0');

export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export function formatTime(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** Lowercase, drop anything that is not a letter, digit or space, collapse whitespace. */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function wordSet(title: string): Set<string> {
  const normalized = normalizeTitle(title);
  return new Set(normalized ? normalized.split(' ') : []);
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / (a.size + b.size - shared);
}

function isEntry(value: unknown): value is Record<string, unknown> & { title: string } {
  return typeof value === 'object' && value !== null && 'title' in value && typeof value.title === 'string';
}

function toEntry(raw: Record<string, unknown> & { title: string }): HistoryEntry {
  const str = (v: unknown) => (typeof v === 'string' ? v : '');
  return { title: raw.title, angle: str(raw.angle), date: str(raw.date), time: str(raw.time) };
}

/**
 * Bounded log of recently used titles and angles, persisted as a JSON array.
 * Every write re-reads the file, appends, trims and rewrites it. One writer at a time.
 */
export class TopicHistory {
  private readonly filePath: string;
  private readonly maxEntries: number;
  private readonly titleWindow: number;
  private readonly now: () => Date;

  constructor(opts: TopicHistoryOptions) {
    this.filePath = opts.filePath;
    this.maxEntries = Math.max(1, opts.maxEntries ?? 90);
    this.titleWindow = Math.max(1, opts.titleWindow ?? 30);
    this.now = opts.now ?? (() => new Date());
  }

  entries(): HistoryEntry[] {
    return this.load();
  }

  add(title: string, angle = ''): HistoryEntry {
    const at = this.now();
    const entry: HistoryEntry = { title, angle, date: formatDate(at), time: formatTime(at) };
    const all = this.load();
    all.push(entry);
    this.save(all.slice(-this.maxEntries));
    return entry;
  }

  recentTitles(n = 20): string[] {
    if (n <= 0) return [];
    return this.load().slice(-n).map((e) => e.title);
  }

  recentAngles(n = 10): string[] {
    if (n <= 0) return [];
    return this.load()
      .slice(-n)
      .map((e) => e.angle)
      .filter((a) => a !== '');
  }

  titlesToday(): string[] {
    const today = formatDate(this.now());
    return this.load()
      .filter((e) => e.date === today)
      .map((e) => e.title);
  }

  isDuplicate(candidate: string, threshold = 0.6): boolean {
    const words = wordSet(candidate);
    if (words.size === 0) return false;
    for (const title of this.recentTitles(this.titleWindow)) {
      const other = wordSet(title);
      if (other.size === 0) continue;
      if (jaccard(words, other) >= threshold) return true;
    }
    return false;
  }

  private load(): HistoryEntry[] {
    if (!fs.existsSync(this.filePath)) return [];
    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      if (!Array.isArray(data)) {
        logger.warn('Topic history is not a list, starting empty', { file: this.filePath });
        return [];
      }
      return data.filter(isEntry).map(toEntry);
    } catch (err) {
      logger.warn('Topic history unreadable, starting empty', {
        file: this.filePath,
        message: err instanceof Error ? err.message : String(err)
      });
      return [];
    }
  }

  private save(entries: HistoryEntry[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(entries, null, 2));
    fs.renameSync(tmp, this.filePath);
  }
}
