import OpenAI from 'openai';
import type { Config } from './config';
import { RecoveryError } from './errors';
import { recoverJson, type JsonValue } from './jsonRecovery';
import { logger } from './logger';

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, system?: string): Promise<string>;
}

const DEFAULT_SYSTEM =
  'You write short, punchy, family-friendly comedy scripts for vertical videos. Follow the requested format exactly, with no preamble.';

/** Any OpenAI-compatible chat endpoint (OpenAI itself, xAI Grok via baseURL). */
export class ChatCompletionGenerator implements TextGenerator {
  constructor(
    readonly name: string,
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly temperature = 0.9
  ) {}

  async generate(prompt: string, system = DEFAULT_SYSTEM): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt }
      ]
    });
    const text = (res.choices[0]?.message?.content || '').trim();
    if (!text) throw new Error(`${this.name} returned an empty response`);
    return text;
  }
}

/** Configured text generators in preference order; providers without a key are left out. */
export function createTextGenerators(cfg: Config): TextGenerator[] {
  const generators: TextGenerator[] = [];
  const { openai, xai } = cfg.providers;
  if (openai.apiKey) {
    generators.push(new ChatCompletionGenerator('openai', new OpenAI({ apiKey: openai.apiKey }), openai.model));
  }
  if (xai.apiKey) {
    generators.push(
      new ChatCompletionGenerator('grok', new OpenAI({ apiKey: xai.apiKey, baseURL: xai.baseURL }), xai.model)
    );
  }
  return generators;
}

/**
 * Generate and recover JSON, repeating the whole cycle when the output cannot be
 * recovered. Generation errors are not retried here.
 */
export async function generateJson(
  generator: TextGenerator,
  prompt: string,
  opts: { attempts?: number; system?: string } = {}
): Promise<JsonValue> {
  const attempts = Math.max(1, opts.attempts ?? 3);
  let lastError: RecoveryError | undefined;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const raw = await generator.generate(prompt, opts.system);
    try {
      return recoverJson(raw);
    } catch (err) {
      if (!(err instanceof RecoveryError)) throw err;
      lastError = err;
      logger.warn(`JSON recovery failed (attempt ${attempt}/${attempts})`, { generator: generator.name, rawLength: err.rawLength });
    }
  }
  throw lastError ?? new RecoveryError(0, []);
}
