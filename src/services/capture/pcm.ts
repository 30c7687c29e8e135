import { AudioFormat, AudioFrame } from '../../types';

export const BYTES_PER_SAMPLE = 2; // s16le
const WAV_HEADER_BYTES = 44;

export const frameByteSize = (format: AudioFormat): number =>
  format.frameSize * format.channels * BYTES_PER_SAMPLE;

export const framesToMs = (frameCount: number, format: AudioFormat): number =>
  (frameCount * format.frameSize * 1000) / format.sampleRate;

/** Number of whole frames needed to cover `ms`, rounded up. */
export const msToFramesCeil = (ms: number, format: AudioFormat): number =>
  Math.ceil((ms * format.sampleRate) / (1000 * format.frameSize));

/** Number of whole frames that fit in `ms`, rounded down. */
export const msToFramesFloor = (ms: number, format: AudioFormat): number =>
  Math.floor((ms * format.sampleRate) / (1000 * format.frameSize));

/** Root-mean-square of the frame's samples, normalised to [0, 1]. */
export const computeRms = (pcm: Buffer): number => {
  let sumSquares = 0;
  let sampleCount = 0;

  for (let index = 0; index + 1 < pcm.length; index += BYTES_PER_SAMPLE) {
    const sample = pcm.readInt16LE(index) / 32768;
    sumSquares += sample * sample;
    sampleCount += 1;
  }

  if (sampleCount === 0) {
    return 0;
  }

  return Math.sqrt(sumSquares / sampleCount);
};

/** Canonical 44-byte RIFF/WAVE header followed by the frames' PCM16 payload. */
export const encodeWav = (frames: AudioFrame[], sampleRate: number, channels: number): Buffer => {
  const dataBytes = frames.reduce((total, frame) => total + frame.pcm.length, 0);
  const blockAlign = channels * BYTES_PER_SAMPLE;
  const output = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  output.write('RIFF', 0, 'ascii');
  output.writeUInt32LE(36 + dataBytes, 4);
  output.write('WAVE', 8, 'ascii');
  output.write('fmt ', 12, 'ascii');
  output.writeUInt32LE(16, 16);
  output.writeUInt16LE(1, 20);
  output.writeUInt16LE(channels, 22);
  output.writeUInt32LE(sampleRate, 24);
  output.writeUInt32LE(sampleRate * blockAlign, 28);
  output.writeUInt16LE(blockAlign, 32);
  output.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  output.write('data', 36, 'ascii');
  output.writeUInt32LE(dataBytes, 40);

  let offset = WAV_HEADER_BYTES;
  for (const frame of frames) {
    frame.pcm.copy(output, offset);
    offset += frame.pcm.length;
  }

  return output;
};
