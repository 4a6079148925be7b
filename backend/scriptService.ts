import { pickAngle, ANGLES, type Angle } from './angles';
import type { Config } from './config';
import { ParseError, RecoveryError, errorMessage } from './errors';
import { FallbackChain, fromThrowing, type LocalFallback } from './fallbackChain';
import { isJsonObject, looksLikeJson, recoverJson, type JsonValue } from './jsonRecovery';
import type { TextGenerator } from './llmClient';
import { logger, type Logger } from './logger';
import { extractTitle } from './metadataService';
import type { RunContext } from './runContext';
import { parseScenes, scenesFromJson, type Scene } from './sceneParser';
import { cleanText } from './textCleaner';
import type { TopicHistory } from './topicHistory';

export type ParsedScript = {
  title: string;
  scenes: Scene[];
};

export type ScriptResult = ParsedScript & {
  script: string;
  angle: string;
  /** Provider that wrote it, or the template fallback */
  source: string;
  usedFallback: boolean;
};

export type PromptContext = {
  angle: Angle;
  now: Date;
  recentTitles: readonly string[];
  todayTitles: readonly string[];
};

export function buildScriptPrompt({ angle, now, recentTitles, todayTitles }: PromptContext): string {
  const date = now.toLocaleDateString('en-US', { weekday: 'long', month: 'long', day: 'numeric', year: 'numeric' });
  const month = now.toLocaleDateString('en-US', { month: 'long', year: 'numeric' });
  let avoid = '';
  if (recentTitles.length) {
    avoid += `\n\nDo NOT repeat these recent topics, write something completely different:\n${recentTitles
      .map((t) => `  - ${t}`)
      .join('\n')}`;
  }
  if (todayTitles.length) avoid += `\nAlready made today: ${todayTitles.join(', ')}. Pick a different take.`;

  return `You write satire for vertical YouTube Shorts.
Today is ${date}. Write a brand new comedy script.

TODAY'S ANGLE: ${angle.topic}
Visual inspiration: ${angle.visualHint}

Keep it VERY SHORT: about 30 seconds, 60-80 spoken words. Make it feel current for ${month}.

FORMAT, exactly 4 scenes:

Scene 1 -- Hook
Visual: [a funny 3D cartoon scene about ${angle.topic}]
Narrator: [one punchy sarcastic line]

Scene 2 -- Problem
Visual: [a visual gag about ${angle.topic}]
Narrator: [what everyone pretends is normal]

Scene 3 -- Punchline
Visual: [an unexpected visual twist]
Narrator: [sarcastic one-liner]

Scene 4 -- Ending
Visual: [an ordinary person's reaction shot]
Narrator: [final punchline]

RULES:
- Original, never a repeat of an earlier joke or setup
- Funny and sarcastic, never hateful or abusive
- No real people by name
- Each spoken line at most 15 words${avoid}`;
}

/** Deterministic four-scene script for an angle, used when no text provider answers. */
export function templateScript(angle: Angle): string {
  const topic = angle.topic.replace(/[.\s]+$/, '');
  return [
    'Scene 1 -- Hook',
    `Visual: ${angle.visualHint}`,
    `Narrator: "Today's breaking news: ${topic}. Again."`,
    '',
    'Scene 2 -- Problem',
    `Visual: A crowd of cartoon commuters staring at their phones, all reading about ${topic}`,
    'Narrator: "Everyone has an opinion. Nobody has a plan."',
    '',
    'Scene 3 -- Punchline',
    'Visual: A tiny cartoon committee forms a committee to study the committee',
    'Narrator: "Good news, a meeting has been scheduled to discuss it."',
    '',
    'Scene 4 -- Ending',
    'Visual: An ordinary person shrugging at the camera, holding a cold cup of coffee',
    'Narrator: "Same time tomorrow? Follow for more."'
  ].join('\n');
}

function parseStructured(script: string): ParsedScript | null {
  let payload: JsonValue;
  try {
    payload = recoverJson(script);
  } catch (err) {
    if (err instanceof RecoveryError) return null;
    throw err;
  }
  const scenes = scenesFromJson(payload);
  if (scenes.length === 0) return null;
  const rawTitle = isJsonObject(payload) && typeof payload.title === 'string' ? payload.title : '';
  const title = cleanText(rawTitle, { inline: true, stripQuotes: true }) || scenes[0].narration || scenes[0].visual;
  return { title: title.slice(0, 80), scenes };
}

/**
 * Scenes and a title from script text in either shape. JSON-looking text goes through
 * recovery first; a bracketed cue such as `[Upbeat music]` also looks like JSON, so when
 * recovery yields no scenes the marker parser gets the text. Throws ParseError when neither does.
 */
export function parseScript(script: string, characterNames?: readonly string[], now: Date = new Date()): ParsedScript {
  const structured = looksLikeJson(script) ? parseStructured(script) : null;
  if (structured) return structured;
  const scenes = parseScenes(script, { characterNames });
  if (scenes.length === 0) throw new ParseError(script.length);
  return { title: extractTitle(script, now), scenes };
}

type ScriptRequest = { prompt: string; angle: Angle };

export type ScriptServiceOptions = {
  generators: readonly TextGenerator[];
  history: TopicHistory;
  pool?: readonly Angle[];
  maxAngles?: number;
  recentAngleWindow?: number;
  duplicateThreshold?: number;
  characterNames?: readonly string[];
  retries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  logger?: Logger;
};

/**
 * Writes one script per call: picks an angle, asks the text providers (template
 * script as the last resort), parses, and records the title in history.
 */
export class ScriptService {
  private readonly chain: FallbackChain<ScriptRequest, string>;
  private readonly opts: ScriptServiceOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: ScriptServiceOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? logger;
    this.now = opts.now ?? (() => new Date());
    const template: LocalFallback<ScriptRequest, string> = {
      name: 'template',
      produce: async (req) => templateScript(req.angle)
    };
    this.chain = new FallbackChain({
      name: 'script',
      providers: opts.generators.map((g) =>
        fromThrowing(g.name, async (req: ScriptRequest) => {
          const text = (await g.generate(req.prompt)).trim();
          if (!text) throw new Error(`${g.name} returned an empty script`);
          return text;
        })
      ),
      fallback: template,
      retries: opts.retries,
      retryDelayMs: opts.retryDelayMs,
      sleep: opts.sleep,
      logger: this.logger
    });
  }

  async generate(ctx?: RunContext): Promise<ScriptResult> {
    const { history } = this.opts;
    const maxAngles = Math.max(1, this.opts.maxAngles ?? 3);
    const recent = history.recentAngles(this.opts.recentAngleWindow ?? 8);
    const tried: string[] = [];
    let lastError: unknown;

    for (let round = 1; round <= maxAngles; round++) {
      const angle = pickAngle({ recent, tried, pool: this.opts.pool ?? ANGLES, random: this.opts.random });
      tried.push(angle.angle);
      const last = round === maxAngles;
      this.note(ctx, 'info', `Angle ${round}/${maxAngles}: ${angle.angle}`);

      const now = this.now();
      const prompt = buildScriptPrompt({
        angle,
        now,
        recentTitles: history.recentTitles(10),
        todayTitles: history.titlesToday()
      });

      const outcome = await this.chain.run({ prompt, angle });

      let parsed: ParsedScript;
      try {
        parsed = parseScript(outcome.value, this.opts.characterNames, now);
      } catch (err) {
        if (!(err instanceof ParseError || err instanceof RecoveryError)) throw err;
        lastError = err;
        this.note(ctx, 'warn', `Script from ${outcome.source} did not parse: ${errorMessage(err)}`);
        continue;
      }

      if (!last && history.isDuplicate(parsed.title, this.opts.duplicateThreshold)) {
        this.note(ctx, 'warn', `"${parsed.title}" is too close to a recent video, trying another angle`);
        continue;
      }

      history.add(parsed.title, angle.angle);
      this.note(ctx, 'info', `Script ready from ${outcome.source} (${parsed.scenes.length} scenes)`);
      return {
        ...parsed,
        script: outcome.value,
        angle: angle.angle,
        source: outcome.source,
        usedFallback: outcome.usedFallback
      };
    }

    throw lastError ?? new ParseError(0);
  }

  private note(ctx: RunContext | undefined, level: 'info' | 'warn', message: string): void {
    if (ctx) ctx[level]('SCRIPT', message);
    else if (level === 'warn') this.logger.warn(message);
    else this.logger.step('SCRIPT', message);
  }
}

export function createScriptService(
  cfg: Config,
  generators: readonly TextGenerator[],
  history: TopicHistory
): ScriptService {
  return new ScriptService({
    generators,
    history,
    maxAngles: cfg.script.maxAngles,
    recentAngleWindow: cfg.history.recentAngleWindow,
    duplicateThreshold: cfg.history.duplicateThreshold,
    characterNames: cfg.script.cast,
    retries: cfg.pipeline.providerRetries,
    retryDelayMs: cfg.pipeline.retryDelayMs
  });
}
