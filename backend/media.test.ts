import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeAudioFromGeneratedStream } from './media';

describe('writeAudioFromGeneratedStream', () => {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes every chunk of a web stream', async () => {
    const out = path.join(dir, 'audio_scene_01.mp3');
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array([1, 2, 3]));
        controller.enqueue(new Uint8Array([4, 5]));
        controller.close();
      }
    });

    await writeAudioFromGeneratedStream(out, stream);

    expect([...fs.readFileSync(out)]).toEqual([1, 2, 3, 4, 5]);
  });

  it('rejects with the read error when the web stream fails', async () => {
    const out = path.join(dir, 'audio_scene_02.mp3');
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error('tts stream dropped'));
      }
    });

    await expect(writeAudioFromGeneratedStream(out, stream)).rejects.toThrow('tts stream dropped');
  });

  it('rejects when the target cannot be written', async () => {
    const out = path.join(dir, 'missing', 'audio_scene_03.mp3');
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array([1]));
        controller.close();
      }
    });

    await expect(writeAudioFromGeneratedStream(out, stream)).rejects.toThrow('ENOENT');
  });
});
