import fs from 'fs';
import path from 'path';
import { ElevenLabsClient } from 'elevenlabs';
import type { Config } from './config';
import { writeAudioFromGeneratedStream } from './media';
import { toSpeakable } from './textCleaner';

export type VoiceOptions = {
  voiceId: string;
  modelId: string;
  speed: number;
  stability: number;
  similarityBoost: number;
};

export interface SpeechSynthesizer {
  readonly name: string;
  /** Writes the spoken text to `outPath` and returns it. */
  synthesize(text: string, outPath: string, voice: VoiceOptions): Promise<string>;
}

export function audioPath(dir: string, sceneId: number): string {
  return path.join(dir, `audio_scene_${String(sceneId).padStart(2, '0')}.mp3`);
}

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  readonly name = 'elevenlabs';

  constructor(private readonly eleven: Pick<ElevenLabsClient, 'generate'>) {}

  async synthesize(text: string, outPath: string, voice: VoiceOptions): Promise<string> {
    const spoken = toSpeakable(text);
    if (!spoken) throw new Error('Nothing to speak');
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    const audioStream = await this.eleven.generate({
      voice: voice.voiceId,
      text: spoken,
      model_id: voice.modelId,
      voice_settings: {
        stability: voice.stability,
        similarity_boost: voice.similarityBoost,
        style: 0,
        use_speaker_boost: true,
        speed: voice.speed
      }
    });
    await writeAudioFromGeneratedStream(outPath, audioStream);
    return outPath;
  }
}

export function voiceOptions(cfg: Config): VoiceOptions {
  return { ...cfg.voice };
}

/** null when no TTS key is configured; the pipeline then renders silent scenes. */
export function createSynthesizer(cfg: Config): SpeechSynthesizer | null {
  const apiKey = cfg.providers.eleven.apiKey;
  return apiKey ? new ElevenLabsSynthesizer(new ElevenLabsClient({ apiKey })) : null;
}
