import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { QUIET_AMPLITUDE, SPEECH_AMPLITUDE, constantFrame } from '../test/audioFixtures';
import { VoiceActivityDetector, deriveCalibration } from './VoiceActivityDetector';

describe('deriveCalibration', () => {
  it('falls back to a 0.001 floor when every sample is near zero', () => {
    expect(deriveCalibration([0, 0, 0.00005])).toEqual({ noiseFloor: 0.001, silenceThreshold: 0.015 });
    expect(deriveCalibration([])).toEqual({ noiseFloor: 0.001, silenceThreshold: 0.015 });
  });

  it('uses the fixed quiet-room threshold below a 0.005 floor', () => {
    expect(deriveCalibration([0.0049, 0.0049, 0.0049]).silenceThreshold).toBe(0.015);
  });

  it('scales the floor by 2.5 and clamps it', () => {
    expect(deriveCalibration([0.01, 0.01, 0.01]).silenceThreshold).toBeCloseTo(0.025, 10);
    expect(deriveCalibration([0.005]).silenceThreshold).toBeCloseTo(0.0125, 10);
    expect(deriveCalibration([0.02, 0.02]).silenceThreshold).toBe(0.04);
    expect(deriveCalibration([0.3]).silenceThreshold).toBe(0.04);
  });

  it('takes the upper median so a single loud frame does not move the floor', () => {
    expect(deriveCalibration([0.008, 0.5, 0.008]).noiseFloor).toBe(0.008);
    expect(deriveCalibration([0.006, 0.008]).noiseFloor).toBe(0.008);
  });

  it('keeps the threshold inside its band for any warm-up window', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: 50, maxLength: 200 }),
        (samples) => {
          const { noiseFloor, silenceThreshold } = deriveCalibration(samples);

          if (noiseFloor < 0.005) {
            return silenceThreshold === 0.015;
          }

          return silenceThreshold >= 0.012 && silenceThreshold <= 0.04;
        }
      )
    );
  });
});

describe('VoiceActivityDetector', () => {
  it('calibrates on the frame that completes the window', () => {
    const detector = new VoiceActivityDetector(3);

    expect(detector.calibrate(constantFrame(1, QUIET_AMPLITUDE, 64))).toBeUndefined();
    expect(detector.calibrate(constantFrame(2, QUIET_AMPLITUDE, 64))).toBeUndefined();
    expect(detector.getCalibrationProgress()).toBeCloseTo(2 / 3, 10);

    const calibration = detector.calibrate(constantFrame(3, QUIET_AMPLITUDE, 64));

    expect(calibration?.noiseFloor).toBeCloseTo(100 / 32768, 10);
    expect(calibration?.silenceThreshold).toBe(0.015);
    expect(detector.isCalibrated()).toBe(true);
  });

  it('keeps the frozen calibration once complete', () => {
    const detector = new VoiceActivityDetector(1);
    const first = detector.calibrate(constantFrame(1, QUIET_AMPLITUDE, 64));
    const second = detector.calibrate(constantFrame(2, SPEECH_AMPLITUDE, 64));

    expect(second).toBe(first);
  });

  it('refuses to classify before calibration', () => {
    const detector = new VoiceActivityDetector(2);

    expect(() => detector.classify(constantFrame(1, SPEECH_AMPLITUDE, 64))).toThrow(
      'VoiceActivityDetector.classify called before calibration completed'
    );
  });

  it('treats loudness strictly above the threshold as speech', () => {
    const detector = new VoiceActivityDetector(1);
    detector.calibrate(constantFrame(1, 0, 64));

    expect(detector.classifyRms(0.015)).toBe('silence');
    expect(detector.classifyRms(0.0151)).toBe('speech');
    expect(detector.classify(constantFrame(2, SPEECH_AMPLITUDE, 64))).toBe('speech');
    expect(detector.classify(constantFrame(3, QUIET_AMPLITUDE, 64))).toBe('silence');
  });

  it('rejects an empty calibration window', () => {
    expect(() => new VoiceActivityDetector(0)).toThrow('calibrationFrames must be at least 1.');
  });
});
