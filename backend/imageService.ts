import fs from 'fs';
import path from 'path';
import axios from 'axios';
import ffmpeg from 'fluent-ffmpeg';
import OpenAI from 'openai';
import type { Config } from './config';
import { FallbackChain, fromThrowing, type LocalFallback, type Provider } from './fallbackChain';
import { logger } from './logger';

export type ImageRequest = {
  sceneId: number;
  visual: string;
  /** Where the PNG should be written */
  outPath: string;
};

type ImagePayload = { kind: 'b64'; data: string } | { kind: 'url'; url: string };

const MIN_IMAGE_BYTES = 1000;

export function buildImagePrompt(visual: string): string {
  const scene = visual.trim() || 'an ordinary office on an ordinary day';
  return (
    '3D cartoon animation still, cinematic lighting, vibrant saturated colors, expressive characters, ' +
    `no text or watermarks. Scene: ${scene.replace(/[.\s]+$/, '')}. 9:16 aspect ratio, vertical portrait format`
  ).slice(0, 2000);
}

export function imagePath(dir: string, sceneId: number): string {
  return path.join(dir, `scene_${String(sceneId).padStart(2, '0')}.png`);
}

function payloadFrom(item: { b64_json?: string | null; url?: string | null } | undefined): ImagePayload {
  if (item?.b64_json) return { kind: 'b64', data: item.b64_json };
  if (item?.url) return { kind: 'url', url: item.url };
  throw new Error('Image response carried neither b64_json nor url');
}

async function savePayload(payload: ImagePayload, outPath: string): Promise<string> {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  let bytes: Buffer;
  if (payload.kind === 'b64') {
    bytes = Buffer.from(payload.data, 'base64');
  } else {
    const res = await axios.get<ArrayBuffer>(payload.url, { responseType: 'arraybuffer', timeout: 30000 });
    bytes = Buffer.from(res.data);
  }
  if (bytes.length < MIN_IMAGE_BYTES) throw new Error(`Image too small (${bytes.length} bytes)`);
  fs.writeFileSync(outPath, bytes);
  return outPath;
}

export type XaiImageResponse = { data?: Array<{ b64_json?: string | null; url?: string | null }> };

export type XaiImagePost = (url: string, body: Record<string, unknown>, apiKey: string) => Promise<XaiImageResponse>;

const axiosImagePost: XaiImagePost = async (url, body, apiKey) => {
  const res = await axios.post<XaiImageResponse>(url, body, {
    headers: { Authorization: `Bearer ${apiKey}` },
    timeout: 90000
  });
  return res.data;
};

export function xaiImageProvider(
  apiKey: string,
  baseURL: string,
  model: string,
  post: XaiImagePost = axiosImagePost
): Provider<ImageRequest, string> {
  return fromThrowing('xai-image', async (req: ImageRequest) => {
    const data = await post(
      `${baseURL}/images/generations`,
      { model, prompt: buildImagePrompt(req.visual), n: 1, response_format: 'b64_json' },
      apiKey
    );
    return savePayload(payloadFrom(data.data?.[0]), req.outPath);
  });
}

export function openaiImageProvider(client: OpenAI, model: string): Provider<ImageRequest, string> {
  return fromThrowing('openai-image', async (req: ImageRequest) => {
    const res = await client.images.generate({
      model,
      prompt: buildImagePrompt(req.visual),
      n: 1,
      size: '1024x1792',
      quality: 'standard',
      response_format: 'b64_json'
    });
    return savePayload(payloadFrom(res.data[0]), req.outPath);
  });
}

const PALETTE = ['2b2d42', '8d99ae', 'ef233c', '3a86ff', 'ffbe0b', 'fb5607', '8338ec', '06d6a0', '118ab2', '073b4c'];

/** Same visual text, same colour. */
export function paletteColor(text: string): string {
  const hash = text.split('').reduce((sum, c) => (sum * 31 + c.charCodeAt(0)) >>> 0, 7);
  return PALETTE[hash % PALETTE.length];
}

/** Solid-colour frame from ffmpeg's lavfi colour source; needs no network. */
export function localImageRenderer(width: number, height: number): LocalFallback<ImageRequest, string> {
  return {
    name: 'local-color',
    produce: (req) =>
      new Promise<string>((resolve, reject) => {
        fs.mkdirSync(path.dirname(req.outPath), { recursive: true });
        ffmpeg()
          .input(`color=c=0x${paletteColor(req.visual)}:s=${width}x${height}:d=1`)
          .inputFormat('lavfi')
          .outputOptions(['-frames:v 1'])
          .output(req.outPath)
          .on('end', () => resolve(req.outPath))
          .on('error', (err: Error) => reject(err))
          .run();
      })
  };
}

export function createImageChain(cfg: Config): FallbackChain<ImageRequest, string> {
  const providers: Provider<ImageRequest, string>[] = [];
  const { xai, openai } = cfg.providers;
  if (xai.apiKey) providers.push(xaiImageProvider(xai.apiKey, xai.baseURL, xai.imageModel));
  if (openai.apiKey) providers.push(openaiImageProvider(new OpenAI({ apiKey: openai.apiKey }), openai.imageModel));
  if (!providers.length) logger.warn('No image provider configured, every scene uses the local renderer');
  return new FallbackChain({
    name: 'image',
    providers,
    fallback: localImageRenderer(cfg.video.width, cfg.video.height),
    retries: cfg.pipeline.providerRetries,
    retryDelayMs: cfg.pipeline.retryDelayMs
  });
}
