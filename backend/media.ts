import fs from 'fs';
import ffmpeg from 'fluent-ffmpeg';

export function getAudioDurationSeconds(audioPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(audioPath, (err, data) => {
      if (err) return reject(err);
      const dur = data?.format?.duration;
      resolve(typeof dur === 'number' && dur > 0 ? dur : 0);
    });
  });
}

function isNodeReadable(stream: unknown): stream is NodeJS.ReadableStream {
  return typeof stream === 'object' && stream !== null && 'pipe' in stream && typeof stream.pipe === 'function';
}

/** TTS SDKs hand back either a Node stream or a web ReadableStream depending on runtime. */
export async function writeAudioFromGeneratedStream(
  audioPath: string,
  audioStream: NodeJS.ReadableStream | ReadableStream<Uint8Array>
): Promise<void> {
  const audioFile = fs.createWriteStream(audioPath);
  const finished = new Promise<void>((resolve, reject) => {
    audioFile.on('finish', () => resolve());
    audioFile.on('error', reject);
  });
  if (isNodeReadable(audioStream)) {
    audioStream.on('error', (err: Error) => audioFile.destroy(err));
    audioStream.pipe(audioFile);
    await finished;
    return;
  }
  // Settled outcome, so a write error during the read loop is held until awaited.
  const outcome = finished.then(
    () => null,
    (err: unknown) => err
  );
  const reader = audioStream.getReader();
  try {
    while (!audioFile.destroyed) {
      const { done, value } = await reader.read();
      if (done) break;
      audioFile.write(Buffer.from(value));
    }
    audioFile.end();
  } catch (err) {
    audioFile.destroy(err instanceof Error ? err : new Error(String(err)));
  } finally {
    reader.releaseLock();
  }
  const failure = await outcome;
  if (failure) throw failure;
}
