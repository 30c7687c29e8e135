import { describe, expect, it } from 'vitest';
import { constantFrame } from '../../test/audioFixtures';
import { computeRms, encodeWav, frameByteSize, framesToMs, msToFramesCeil, msToFramesFloor } from './pcm';

const format = { sampleRate: 16000, channels: 1, frameSize: 1024 };

describe('computeRms', () => {
  it('returns 0 for an empty buffer', () => {
    expect(computeRms(Buffer.alloc(0))).toBe(0);
  });

  it('normalises a constant signal to its amplitude over 32768', () => {
    expect(computeRms(constantFrame(0, 16384, 32).pcm)).toBe(0.5);
    expect(computeRms(constantFrame(0, -8192, 32).pcm)).toBe(0.25);
  });

  it('ignores a trailing odd byte', () => {
    const pcm = Buffer.alloc(5);
    pcm.writeInt16LE(16384, 0);
    pcm.writeInt16LE(16384, 2);
    pcm[4] = 0x7f;

    expect(computeRms(pcm)).toBe(0.5);
  });
});

describe('frame timing', () => {
  it('sizes frames in bytes from samples and channels', () => {
    expect(frameByteSize(format)).toBe(2048);
    expect(frameByteSize({ ...format, channels: 2 })).toBe(4096);
  });

  it('converts between frames and milliseconds', () => {
    expect(framesToMs(10, { ...format, frameSize: 1600 })).toBe(1000);
    expect(msToFramesCeil(2500, format)).toBe(40);
    expect(msToFramesFloor(200, format)).toBe(3);
    expect(msToFramesFloor(200, { ...format, frameSize: 4096 })).toBe(0);
  });
});

describe('encodeWav', () => {
  it('writes a canonical PCM16 header followed by the frame payloads', () => {
    const frames = [constantFrame(1, 1, 2), constantFrame(2, 2, 2)];
    const wav = encodeWav(frames, 16000, 1);

    expect(wav.length).toBe(52);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(44);
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.toString('ascii', 12, 16)).toBe('fmt ');
    expect(wav.readUInt32LE(16)).toBe(16);
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(8);
    expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48), wav.readInt16LE(50)]).toEqual([
      1, 1, 2, 2
    ]);
  });

  it('derives byte rate and block align from the channel count', () => {
    const wav = encodeWav([], 48000, 2);

    expect(wav.length).toBe(44);
    expect(wav.readUInt32LE(28)).toBe(192000);
    expect(wav.readUInt16LE(32)).toBe(4);
    expect(wav.readUInt32LE(40)).toBe(0);
  });
});
