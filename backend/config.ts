/**
 * Central config from environment. Every value has a default except provider
 * credentials, which stay optional so that missing keys only drop that provider.
 */
import path from 'path';

type EnvSource = Record<string, string | undefined>;

function reader(source: EnvSource, isProd: boolean) {
  const env = (name: string, defaultValue?: string): string => {
    const raw = source[name]?.trim();
    const value = raw ? raw : defaultValue;
    if (isProd && (value === undefined || value === '')) {
      throw new Error(`Missing required env: ${name}`);
    }
    return value ?? '';
  };
  const optional = (name: string): string | undefined => {
    const value = source[name]?.trim();
    return value ? value : undefined;
  };
  const num = (name: string, defaultValue: number): number => {
    const raw = source[name];
    if (raw === undefined || raw.trim() === '') return defaultValue;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  };
  const int = (name: string, defaultValue: number): number => {
    const parsed = num(name, defaultValue);
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : defaultValue;
  };
  const bool = (name: string, defaultValue: boolean): boolean => {
    const raw = source[name]?.trim().toLowerCase();
    if (!raw) return defaultValue;
    return raw === '1' || raw === 'true' || raw === 'yes';
  };
  const list = (name: string, defaultValue: string[]): string[] => {
    const raw = source[name];
    if (!raw) return defaultValue;
    const items = raw.split(',').map((s) => s.trim()).filter(Boolean);
    return items.length ? items : defaultValue;
  };
  return { env, optional, num, int, bool, list };
}

export function loadConfig(source: EnvSource = process.env, cwd: string = process.cwd()) {
  const NODE_ENV = source.NODE_ENV || 'development';
  const isProd = NODE_ENV === 'production';
  const { env, optional, num, int, bool, list } = reader(source, isProd);
  const outputDir = path.resolve(cwd, env('OUTPUT_DIR', 'output'));

  return {
    env: NODE_ENV,
    isProd,

    port: int('PORT', 4000),

    video: {
      width: int('VIDEO_WIDTH', 1080),
      height: int('VIDEO_HEIGHT', 1920),
      fps: int('VIDEO_FPS', 24),
      /** Hard cap on the assembled timeline, in seconds */
      maxDurationSec: num('VIDEO_MAX_DURATION', 30)
    },

    providers: {
      openai: {
        apiKey: optional('OPENAI_API_KEY'),
        model: env('OPENAI_MODEL', 'gpt-4o-mini'),
        imageModel: env('OPENAI_IMAGE_MODEL', 'dall-e-3')
      },
      xai: {
        apiKey: optional('XAI_API_KEY'),
        baseURL: 'https://api.x.ai/v1',
        model: env('GROK_MODEL', 'grok-3-latest'),
        imageModel: env('XAI_IMAGE_MODEL', 'grok-2-image')
      },
      eleven: {
        apiKey: optional('ELEVEN_API_KEY')
      }
    },

    voice: {
      voiceId: env('NARRATOR_VOICE_ID', 'PlmstgXEUNQWiPyS27i2'),
      modelId: env('ELEVEN_MODEL_ID', 'eleven_multilingual_v2'),
      speed: num('VOICE_SPEED', 0.95),
      stability: num('VOICE_STABILITY', 0.5),
      similarityBoost: num('VOICE_SIMILARITY', 0.4)
    },

    history: {
      filePath: path.resolve(cwd, env('HISTORY_FILE', path.join('output', 'topic_history.json'))),
      maxEntries: int('HISTORY_MAX_ENTRIES', 90),
      duplicateThreshold: num('HISTORY_DUPLICATE_THRESHOLD', 0.6),
      recentTitleWindow: int('RECENT_TITLE_WINDOW', 30),
      recentAngleWindow: int('RECENT_ANGLE_WINDOW', 8)
    },

    pipeline: {
      sceneConcurrency: Math.max(1, int('SCENE_CONCURRENCY', 4)),
      providerRetries: int('PROVIDER_RETRIES', 2),
      retryDelayMs: int('PROVIDER_RETRY_DELAY_MS', 2000),
      jsonAttempts: Math.max(1, int('JSON_ATTEMPTS', 3)),
      statusTail: Math.max(1, int('STATUS_TAIL', 20))
    },

    script: {
      maxAngles: Math.max(1, int('SCRIPT_MAX_ANGLES', 3)),
      /** Speaker labels whose lines count as narration */
      cast: list('SCRIPT_CAST', ['Narrator', 'Host', 'Reporter', 'Anchor', 'Voiceover'])
    },

    youtube: {
      clientId: optional('YOUTUBE_CLIENT_ID'),
      clientSecret: optional('YOUTUBE_CLIENT_SECRET'),
      refreshToken: optional('YOUTUBE_REFRESH_TOKEN'),
      categoryId: env('YOUTUBE_CATEGORY_ID', '24'),
      privacyStatus: env('YOUTUBE_PRIVACY_STATUS', 'private'),
      madeForKids: bool('MADE_FOR_KIDS', false),
      autoUpload: bool('AUTO_UPLOAD', false)
    },

    /** Videos, images, audio and history live under here */
    outputDir
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
