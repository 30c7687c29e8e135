import { AudioFrame } from '../types';

/** Frame whose every sample is `amplitude`, so its RMS is |amplitude| / 32768. */
export const constantFrame = (sequence: number, amplitude: number, frameSize: number, channels = 1): AudioFrame => {
  const pcm = Buffer.alloc(frameSize * channels * 2);
  for (let offset = 0; offset < pcm.length; offset += 2) {
    pcm.writeInt16LE(amplitude, offset);
  }

  return { sequence, pcm };
};

/** Quiet room: RMS ~0.003, below the 0.005 cutoff, so the threshold is 0.015. */
export const QUIET_AMPLITUDE = 100;

/** Comfortably above a 0.015 threshold (RMS ~0.09). */
export const SPEECH_AMPLITUDE = 3000;

export class FrameFeed {
  private sequence = 0;

  public constructor(private readonly frameSize: number) {}

  public quiet(count: number): AudioFrame[] {
    return this.take(count, QUIET_AMPLITUDE);
  }

  public speech(count: number): AudioFrame[] {
    return this.take(count, SPEECH_AMPLITUDE);
  }

  private take(count: number, amplitude: number): AudioFrame[] {
    const frames: AudioFrame[] = [];
    for (let index = 0; index < count; index += 1) {
      this.sequence += 1;
      frames.push(constantFrame(this.sequence, amplitude, this.frameSize));
    }

    return frames;
  }
}
