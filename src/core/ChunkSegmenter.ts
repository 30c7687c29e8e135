import { StructuredLogger } from '../logging/StructuredLogger';
import {
  computeRms,
  encodeWav,
  framesToMs,
  msToFramesCeil,
  msToFramesFloor
} from '../services/capture/pcm';
import { AudioChunk, AudioFrame, Calibration, FrameClass, SegmenterOptions } from '../types';
import { VoiceActivityDetector } from './VoiceActivityDetector';

const LEVEL_LOG_INTERVAL_FRAMES = 10;

export const DEFAULT_SEGMENTER_OPTIONS: SegmenterOptions = {
  sampleRate: 16000,
  channels: 1,
  frameSize: 1024,
  calibrationFrames: 50,
  voiceOnsetFrames: 3,
  preRollFrames: 5,
  silenceDurationMs: 2500,
  overlapDurationMs: 200,
  minSpeechMs: 500
};

export type SegmenterState =
  | { phase: 'calibrating' }
  | { phase: 'silent'; voiceRun: number }
  | { phase: 'speaking'; speechFrames: number; silenceRun: number };

type ActiveState = Exclude<SegmenterState, { phase: 'calibrating' }>;

export type SegmenterTransition =
  | { type: 'none' }
  | { type: 'speechStarted' }
  | { type: 'silenceStarted' }
  | { type: 'silenceCancelled'; silenceRun: number }
  | { type: 'chunkReady'; speechFrames: number };

export interface TransitionLimits {
  voiceOnsetFrames: number;
  silenceFramesToCommit: number;
  /** Speech frames credited on onset: the trigger run plus the pre-roll lead-in. */
  onsetSpeechFrames: number;
}

export type SegmenterEvent =
  | { type: 'calibrated'; calibration: Calibration }
  | { type: 'speechStarted'; frameSequence: number; rms: number }
  | { type: 'silenceStarted'; frameSequence: number; rms: number }
  | { type: 'chunkCommitted'; chunk: AudioChunk }
  | { type: 'chunkDiscarded'; speechDurationMs: number; frameCount: number };

/** One classified frame through the speech/silence state machine. */
export const advanceSegmenterState = (
  state: ActiveState,
  frameClass: FrameClass,
  limits: TransitionLimits
): { state: ActiveState; transition: SegmenterTransition } => {
  if (state.phase === 'silent') {
    if (frameClass === 'silence') {
      return { state: { phase: 'silent', voiceRun: 0 }, transition: { type: 'none' } };
    }

    const voiceRun = state.voiceRun + 1;
    if (voiceRun < limits.voiceOnsetFrames) {
      return { state: { phase: 'silent', voiceRun }, transition: { type: 'none' } };
    }

    return {
      state: { phase: 'speaking', speechFrames: limits.onsetSpeechFrames, silenceRun: 0 },
      transition: { type: 'speechStarted' }
    };
  }

  if (frameClass === 'speech') {
    return {
      state: { phase: 'speaking', speechFrames: state.speechFrames + 1, silenceRun: 0 },
      transition:
        state.silenceRun > 0
          ? { type: 'silenceCancelled', silenceRun: state.silenceRun }
          : { type: 'none' }
    };
  }

  const silenceRun = state.silenceRun + 1;
  if (silenceRun >= limits.silenceFramesToCommit) {
    return {
      state: { phase: 'silent', voiceRun: 0 },
      transition: { type: 'chunkReady', speechFrames: state.speechFrames }
    };
  }

  return {
    state: { phase: 'speaking', speechFrames: state.speechFrames, silenceRun },
    transition: silenceRun === 1 ? { type: 'silenceStarted' } : { type: 'none' }
  };
};

/**
 * Turns a stream of fixed-size frames into speech chunks.
 *
 * One instance serves one session. Calibration frames only feed the detector;
 * afterwards every frame enters the pre-roll FIFO, and frames are collected
 * into the open chunk from speech onset until `silenceDurationMs` of
 * uninterrupted silence (measured in frame time) commits it.
 */
export class ChunkSegmenter {
  private readonly options: SegmenterOptions;
  private readonly detector: VoiceActivityDetector;
  private readonly silenceFramesToCommit: number;
  private readonly overlapFrames: number;
  private state: SegmenterState = { phase: 'calibrating' };
  private preRoll: AudioFrame[] = [];
  private mainBuffer: AudioFrame[] = [];
  private overlapBuffer: AudioFrame[] = [];
  private framesSinceCalibration = 0;
  private committedChunks = 0;

  public constructor(
    options: Partial<SegmenterOptions> = {},
    private readonly logger?: StructuredLogger
  ) {
    this.options = { ...DEFAULT_SEGMENTER_OPTIONS, ...options };

    if (this.options.preRollFrames < this.options.voiceOnsetFrames) {
      throw new Error('preRollFrames must be at least voiceOnsetFrames.');
    }

    this.detector = new VoiceActivityDetector(this.options.calibrationFrames);
    this.silenceFramesToCommit = Math.max(1, msToFramesCeil(this.options.silenceDurationMs, this.options));
    this.overlapFrames = msToFramesFloor(this.options.overlapDurationMs, this.options);
  }

  public getState(): SegmenterState {
    return this.state;
  }

  public getCalibration(): Calibration | undefined {
    return this.detector.getCalibration();
  }

  public getCommittedChunkCount(): number {
    return this.committedChunks;
  }

  /** Silence elapsed inside the open chunk, in frame time. */
  public getSilenceDurationMs(): number {
    return this.state.phase === 'speaking' ? framesToMs(this.state.silenceRun, this.options) : 0;
  }

  public process(frame: AudioFrame): SegmenterEvent[] {
    if (this.state.phase === 'calibrating') {
      const calibration = this.detector.calibrate(frame);
      if (!calibration) {
        return [];
      }

      this.state = { phase: 'silent', voiceRun: 0 };
      this.logger?.info('Calibration complete', {
        noiseFloor: Number(calibration.noiseFloor.toFixed(4)),
        silenceThreshold: Number(calibration.silenceThreshold.toFixed(4))
      });
      return [{ type: 'calibrated', calibration }];
    }

    const rms = computeRms(frame.pcm);
    const frameClass = this.detector.classifyRms(rms);

    this.preRoll.push(frame);
    if (this.preRoll.length > this.options.preRollFrames) {
      this.preRoll.shift();
    }

    if (this.state.phase === 'speaking') {
      this.mainBuffer.push(frame);
    }

    this.logLevel(frame, rms, frameClass);

    const leadFrames = this.preRoll.slice(0, -this.options.voiceOnsetFrames).length;
    const { state, transition } = advanceSegmenterState(this.state, frameClass, {
      voiceOnsetFrames: this.options.voiceOnsetFrames,
      silenceFramesToCommit: this.silenceFramesToCommit,
      onsetSpeechFrames: leadFrames + this.options.voiceOnsetFrames
    });
    this.state = state;

    switch (transition.type) {
      case 'speechStarted':
        // Backdate the chunk to the pre-roll window, trigger frames included.
        this.mainBuffer = [...this.preRoll];
        this.logger?.info('Voice detected', {
          frameSequence: frame.sequence,
          rms: Number(rms.toFixed(4)),
          preRollFrames: leadFrames
        });
        return [{ type: 'speechStarted', frameSequence: frame.sequence, rms }];
      case 'silenceStarted':
        this.logger?.debug('Silence started', { frameSequence: frame.sequence, rms: Number(rms.toFixed(4)) });
        return [{ type: 'silenceStarted', frameSequence: frame.sequence, rms }];
      case 'silenceCancelled':
        this.logger?.debug('Speech resumed before chunk boundary', {
          frameSequence: frame.sequence,
          silenceMs: Math.round(framesToMs(transition.silenceRun, this.options))
        });
        return [];
      case 'chunkReady':
        return [this.commit(transition.speechFrames)];
      default:
        return [];
    }
  }

  /** Commits the open chunk, if any. Called once when the session stops. */
  public flush(): SegmenterEvent[] {
    if (this.state.phase !== 'speaking') {
      this.mainBuffer = [];
      return [];
    }

    const { speechFrames } = this.state;
    this.state = { phase: 'silent', voiceRun: 0 };
    return [this.commit(speechFrames)];
  }

  private commit(speechFrames: number): SegmenterEvent {
    const speechDurationMs = framesToMs(speechFrames, this.options);
    const bufferedFrames = this.mainBuffer;
    this.mainBuffer = [];

    if (speechDurationMs < this.options.minSpeechMs) {
      this.logger?.debug('Skipping chunk with insufficient speech', {
        speechDurationMs: Math.round(speechDurationMs),
        minSpeechMs: this.options.minSpeechMs,
        frameCount: bufferedFrames.length
      });
      return { type: 'chunkDiscarded', speechDurationMs, frameCount: bufferedFrames.length };
    }

    const frames = [...this.overlapBuffer, ...bufferedFrames];
    this.overlapBuffer = this.overlapFrames > 0 ? bufferedFrames.slice(-this.overlapFrames) : [];
    this.committedChunks += 1;

    const chunk: AudioChunk = {
      index: this.committedChunks,
      frames,
      wav: encodeWav(frames, this.options.sampleRate, this.options.channels),
      durationMs: framesToMs(frames.length, this.options),
      speechDurationMs
    };

    this.logger?.info('Chunk committed', {
      chunkIndex: chunk.index,
      durationMs: Math.round(chunk.durationMs),
      speechDurationMs: Math.round(speechDurationMs),
      frameCount: frames.length,
      overlapFrames: frames.length - bufferedFrames.length
    });

    return { type: 'chunkCommitted', chunk };
  }

  private logLevel(frame: AudioFrame, rms: number, frameClass: FrameClass): void {
    this.framesSinceCalibration += 1;
    if ((this.framesSinceCalibration - 1) % LEVEL_LOG_INTERVAL_FRAMES !== 0) {
      return;
    }

    this.logger?.debug('Audio level', {
      frameSequence: frame.sequence,
      rms: Number(rms.toFixed(4)),
      threshold: this.detector.getCalibration()?.silenceThreshold,
      status: frameClass
    });
  }
}
