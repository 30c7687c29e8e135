import { AudioFrame } from '../../types';

/**
 * Regroups arbitrarily sized PCM chunks into fixed-size frames numbered from 0.
 * Bytes short of a whole frame wait for the next chunk.
 */
export class PcmFrameSlicer {
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private nextSequence = 0;

  public constructor(private readonly frameBytes: number) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0) {
      throw new RangeError(`Frame size must be a positive whole number of bytes, got ${frameBytes}`);
    }
  }

  public get bufferedBytes(): number {
    return this.pendingBytes;
  }

  public get frameCount(): number {
    return this.nextSequence;
  }

  public push(chunk: Buffer): AudioFrame[] {
    if (chunk.length === 0) {
      return [];
    }

    this.pendingChunks.push(chunk);
    this.pendingBytes += chunk.length;

    const frames: AudioFrame[] = [];
    while (this.pendingBytes >= this.frameBytes) {
      frames.push({ sequence: this.nextSequence, pcm: this.readPendingBytes(this.frameBytes) });
      this.nextSequence += 1;
    }

    return frames;
  }

  /** Drops a partial trailing frame and returns how many bytes it held. */
  public discardPartial(): number {
    const dropped = this.pendingBytes;
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    return dropped;
  }

  private readPendingBytes(byteCount: number): Buffer {
    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return output;
  }
}
