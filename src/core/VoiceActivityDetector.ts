import { computeRms } from '../services/capture/pcm';
import { AudioFrame, Calibration, FrameClass } from '../types';

const NEAR_ZERO_RMS = 0.0001;
const FALLBACK_NOISE_FLOOR = 0.001;
const LOW_NOISE_CUTOFF = 0.005;
const QUIET_ROOM_THRESHOLD = 0.015;
const THRESHOLD_MULTIPLIER = 2.5;
const MIN_THRESHOLD = 0.012;
const MAX_THRESHOLD = 0.04;

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

/**
 * Noise floor and silence threshold from warm-up loudness samples.
 *
 * Near-zero samples are treated as device start-up artifacts. The floor is the
 * upper median of what remains, so a cough during warm-up does not move it.
 */
export const deriveCalibration = (rmsSamples: number[]): Calibration => {
  const usable = rmsSamples.filter((rms) => rms > NEAR_ZERO_RMS).sort((a, b) => a - b);
  const noiseFloor = usable.length > 0 ? usable[Math.floor(usable.length / 2)] : FALLBACK_NOISE_FLOOR;

  const silenceThreshold =
    noiseFloor < LOW_NOISE_CUTOFF
      ? QUIET_ROOM_THRESHOLD
      : clamp(noiseFloor * THRESHOLD_MULTIPLIER, MIN_THRESHOLD, MAX_THRESHOLD);

  return { noiseFloor, silenceThreshold };
};

export class VoiceActivityDetector {
  private readonly rmsHistory: number[] = [];
  private calibration: Calibration | undefined;

  public constructor(private readonly calibrationFrames = 50) {
    if (calibrationFrames < 1) {
      throw new Error('calibrationFrames must be at least 1.');
    }
  }

  public isCalibrated(): boolean {
    return this.calibration !== undefined;
  }

  public getCalibration(): Calibration | undefined {
    return this.calibration;
  }

  public getCalibrationProgress(): number {
    return this.rmsHistory.length / this.calibrationFrames;
  }

  /**
   * Records one warm-up frame. Returns the frozen calibration on the frame that
   * completes the window, `undefined` before it. Calls after calibration return
   * the existing result without recording anything.
   */
  public calibrate(frame: AudioFrame): Calibration | undefined {
    if (this.calibration) {
      return this.calibration;
    }

    this.rmsHistory.push(computeRms(frame.pcm));
    if (this.rmsHistory.length < this.calibrationFrames) {
      return undefined;
    }

    this.calibration = deriveCalibration(this.rmsHistory);
    this.rmsHistory.length = 0;
    return this.calibration;
  }

  public classify(frame: AudioFrame): FrameClass {
    return this.classifyRms(computeRms(frame.pcm));
  }

  public classifyRms(rms: number): FrameClass {
    if (!this.calibration) {
      throw new Error('VoiceActivityDetector.classify called before calibration completed');
    }

    return rms > this.calibration.silenceThreshold ? 'speech' : 'silence';
  }
}
