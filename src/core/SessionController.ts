import { EventEmitter } from 'node:events';
import { DeviceError, TranscriptionError, describeError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import { TranscriptionClient } from '../services/asr/TranscriptionClient';
import { AudioSource } from '../services/capture/AudioSource';
import { ChunkOutcome, TranscriptSink } from '../services/output/TranscriptSink';
import { mergeChunkText } from '../services/transcript/TranscriptMerger';
import { AudioChunk, AudioFrame, Calibration, SegmenterOptions, SessionState } from '../types';
import { ChunkSegmenter, DEFAULT_SEGMENTER_OPTIONS, SegmenterEvent } from './ChunkSegmenter';

export interface SessionOptions extends SegmenterOptions {
  queueDepth: number;
  stopTimeoutMs: number;
  languageCode?: string;
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  ...DEFAULT_SEGMENTER_OPTIONS,
  queueDepth: 2,
  stopTimeoutMs: 5000
};

export interface SessionDependencies {
  source: AudioSource;
  transcriber: TranscriptionClient;
  sink?: TranscriptSink;
}

export type SessionEvent =
  | { type: 'calibrated'; calibration: Calibration }
  | { type: 'speechStarted'; frameSequence: number }
  | { type: 'silenceStarted'; frameSequence: number }
  | { type: 'chunkCommitted'; chunkIndex: number; durationMs: number; speechDurationMs: number }
  | { type: 'chunkDiscarded'; speechDurationMs: number }
  | { type: 'chunkDropped'; chunkIndex: number }
  | { type: 'transcriptionSucceeded'; chunkIndex: number; newText: string; transcript: string }
  | { type: 'transcriptionFailed'; chunkIndex: number; error: TranscriptionError };

interface QueuedChunk {
  chunk: AudioChunk;
  enqueuedAtMs: number;
  generation: number;
}

export declare interface SessionController {
  on(event: 'stateChanged', listener: (state: SessionState) => void): this;
  on(event: 'session', listener: (event: SessionEvent) => void): this;
}

/**
 * Owns one recording session at a time: frames are segmented on the capture
 * callback, committed chunks are handed to a single transcription worker loop,
 * and the merged transcript is only written from that loop.
 */
export class SessionController extends EventEmitter {
  private state: SessionState = { stage: 'idle' };
  private segmenter: ChunkSegmenter | undefined;
  private acceptingFrames = false;
  private transcript = '';
  private transcribedChunks = 0;
  private failedChunks = 0;
  private sessionGeneration = 0;
  private queue: QueuedChunk[] = [];
  private workerActive = false;
  private workerPromise: Promise<void> | undefined;
  private stopPromise: Promise<string> | undefined;
  private readonly latencyTracker = new LatencyTracker();

  public constructor(
    private readonly deps: SessionDependencies,
    private readonly logger?: StructuredLogger,
    private readonly options: SessionOptions = DEFAULT_SESSION_OPTIONS
  ) {
    super();
  }

  public getState(): SessionState {
    return this.state;
  }

  public getTranscript(): string {
    return this.transcript;
  }

  public getTranscribedChunkCount(): number {
    return this.transcribedChunks;
  }

  public isSessionActive(): boolean {
    return this.segmenter !== undefined;
  }

  /** Noise floor and threshold of the running session, once warm-up is done. */
  public getCalibration(): Calibration | undefined {
    return this.segmenter?.getCalibration();
  }

  public isCapturing(): boolean {
    return this.deps.source.isCapturing();
  }

  public async warmup(): Promise<void> {
    await this.deps.transcriber.warmup?.();
    this.logger?.info('Transcriber ready', { backend: this.deps.transcriber.name });
  }

  public async start(): Promise<void> {
    if (this.segmenter) {
      return;
    }

    this.sessionGeneration += 1;
    this.transcript = '';
    this.transcribedChunks = 0;
    this.failedChunks = 0;
    this.queue = [];
    this.latencyTracker.reset();
    this.segmenter = new ChunkSegmenter(this.options, this.logger);
    this.acceptingFrames = true;
    this.setState({ stage: 'calibrating', detail: 'Measuring background noise' });

    try {
      await this.deps.source.start({
        sampleRate: this.options.sampleRate,
        channels: this.options.channels,
        frameSize: this.options.frameSize,
        onFrame: (frame) => {
          this.handleFrame(frame);
        },
        onError: (error) => {
          this.handleDeviceFailure(error);
        }
      });
    } catch (error) {
      this.acceptingFrames = false;
      this.segmenter = undefined;

      const deviceError =
        error instanceof DeviceError ? error : new DeviceError(describeError(error), { cause: error });
      this.setState({ stage: 'error', detail: deviceError.message });
      this.logger?.error('Failed to start audio capture', { detail: deviceError.message });
      throw deviceError;
    }

    await this.callSink('beginSession', () => this.deps.sink?.beginSession?.(new Date()));

    this.logger?.info('Session started', {
      backend: this.deps.transcriber.name,
      sampleRate: this.options.sampleRate,
      frameSize: this.options.frameSize,
      silenceDurationMs: this.options.silenceDurationMs,
      minSpeechMs: this.options.minSpeechMs,
      queueDepth: this.options.queueDepth
    });
  }

  /**
   * Ends the session: stops capture, commits any open chunk, and waits up to
   * `stopTimeoutMs` for queued transcriptions. Resolves with the transcript.
   */
  public async stop(): Promise<string> {
    if (this.stopPromise) {
      return this.stopPromise;
    }

    if (!this.segmenter) {
      return '';
    }

    this.stopPromise = this.stopSession();

    try {
      return await this.stopPromise;
    } finally {
      this.stopPromise = undefined;
    }
  }

  public async shutdown(): Promise<void> {
    await this.stop();
    await this.deps.transcriber.shutdown?.().catch((error: unknown) => {
      this.logger?.warn('Transcriber shutdown failed', { detail: describeError(error) });
    });
  }

  private async stopSession(): Promise<string> {
    this.setState({ stage: 'stopping', detail: 'Flushing final chunk' });

    try {
      await this.deps.source.stop();
    } catch (error) {
      this.logger?.warn('Audio source did not stop cleanly', { detail: describeError(error) });
    }

    this.acceptingFrames = false;
    const segmenter = this.segmenter;
    if (segmenter) {
      for (const event of segmenter.flush()) {
        this.handleSegmenterEvent(event);
      }
    }

    const drained = await this.waitForDrain(this.options.stopTimeoutMs);
    if (!drained) {
      this.logger?.warn('Timed out waiting for in-flight transcription', {
        stopTimeoutMs: this.options.stopTimeoutMs,
        abandonedChunks: this.queue.length + 1
      });
      this.queue = [];
    }

    const finalText = this.transcript;
    await this.callSink('endSession', () => this.deps.sink?.endSession?.(finalText));

    this.logger?.info('Session complete', {
      chunks: this.transcribedChunks,
      failedChunks: this.failedChunks,
      chars: finalText.length,
      latencySummary: this.latencyTracker.summarize()
    });

    this.sessionGeneration += 1;
    this.segmenter = undefined;
    this.transcript = '';
    this.transcribedChunks = 0;
    this.failedChunks = 0;
    this.setState({ stage: 'idle' });

    return finalText;
  }

  private handleFrame(frame: AudioFrame): void {
    const segmenter = this.segmenter;
    if (!this.acceptingFrames || !segmenter) {
      return;
    }

    for (const event of segmenter.process(frame)) {
      this.handleSegmenterEvent(event);
    }
  }

  private handleSegmenterEvent(event: SegmenterEvent): void {
    switch (event.type) {
      case 'calibrated':
        this.emit('session', { type: 'calibrated', calibration: event.calibration });
        this.setState({ stage: 'listening' });
        return;
      case 'speechStarted':
        this.emit('session', { type: 'speechStarted', frameSequence: event.frameSequence });
        return;
      case 'silenceStarted':
        this.emit('session', { type: 'silenceStarted', frameSequence: event.frameSequence });
        return;
      case 'chunkDiscarded':
        this.emit('session', { type: 'chunkDiscarded', speechDurationMs: event.speechDurationMs });
        return;
      case 'chunkCommitted':
        this.emit('session', {
          type: 'chunkCommitted',
          chunkIndex: event.chunk.index,
          durationMs: event.chunk.durationMs,
          speechDurationMs: event.chunk.speechDurationMs
        });
        this.enqueueChunk(event.chunk);
        return;
    }
  }

  private handleDeviceFailure(error: Error): void {
    this.acceptingFrames = false;
    this.setState({ stage: 'error', detail: error.message });
    this.logger?.error('Audio capture failed during session', { detail: error.message });
  }

  private enqueueChunk(chunk: AudioChunk): void {
    if (this.queue.length >= this.options.queueDepth) {
      const dropped = this.queue.shift();
      if (dropped) {
        this.logger?.warn('Transcription backlog full; dropping oldest queued chunk', {
          chunkIndex: dropped.chunk.index,
          queueDepth: this.options.queueDepth
        });
        this.emit('session', { type: 'chunkDropped', chunkIndex: dropped.chunk.index });
        void this.deliver({ kind: 'dropped', chunkIndex: dropped.chunk.index });
      }
    }

    this.queue.push({ chunk, enqueuedAtMs: Date.now(), generation: this.sessionGeneration });
    this.ensureWorker();
  }

  private ensureWorker(): void {
    if (this.workerActive) {
      return;
    }

    this.workerActive = true;
    this.workerPromise = this.runWorker();
  }

  private async runWorker(): Promise<void> {
    try {
      while (true) {
        const next = this.queue.shift();
        if (!next) {
          break;
        }

        await this.transcribeChunk(next);
      }
    } finally {
      this.workerActive = false;
      this.workerPromise = undefined;

      // Chunks can land while the loop is finishing its last await.
      if (this.queue.length > 0) {
        this.ensureWorker();
      }
    }
  }

  private async waitForDrain(timeoutMs: number): Promise<boolean> {
    const drain = async (): Promise<boolean> => {
      while (this.workerPromise) {
        await this.workerPromise;
      }

      return true;
    };

    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timeoutHandle = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([drain(), timeout]);
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private async transcribeChunk(item: QueuedChunk): Promise<void> {
    const { chunk } = item;
    const startedAtMs = Date.now();
    const queueMs = startedAtMs - item.enqueuedAtMs;

    let rawText: string;
    try {
      const result = await this.deps.transcriber.transcribe(chunk.wav, {
        languageCode: this.options.languageCode
      });
      rawText = result.text.trim();
    } catch (error) {
      if (item.generation !== this.sessionGeneration) {
        return;
      }

      const failure =
        error instanceof TranscriptionError
          ? error
          : new TranscriptionError('server', describeError(error), undefined, { cause: error });
      this.failedChunks += 1;
      this.logger?.error('Chunk transcription failed', {
        chunkIndex: chunk.index,
        kind: failure.kind,
        status: failure.status,
        detail: failure.message
      });
      this.emit('session', { type: 'transcriptionFailed', chunkIndex: chunk.index, error: failure });
      await this.deliver({ kind: 'failed', chunkIndex: chunk.index, error: failure });
      return;
    }

    if (item.generation !== this.sessionGeneration) {
      this.logger?.debug('Discarding transcription from an ended session', { chunkIndex: chunk.index });
      return;
    }

    const transcribeMs = Date.now() - startedAtMs;
    let newText = '';

    if (rawText) {
      const merged = mergeChunkText(this.transcript, rawText);
      this.transcript = merged.merged;
      this.transcribedChunks += 1;
      newText = merged.newText;
    } else {
      this.logger?.warn('No text returned from chunk transcription', { chunkIndex: chunk.index });
    }

    this.latencyTracker.push({
      audioMs: chunk.durationMs,
      queueMs,
      transcribeMs,
      endToEndMs: Date.now() - item.enqueuedAtMs
    });

    this.logger?.info('Chunk transcribed', {
      chunkIndex: chunk.index,
      rawLength: rawText.length,
      newLength: newText.length,
      transcriptLength: this.transcript.length,
      queueMs,
      transcribeMs
    });

    this.emit('session', {
      type: 'transcriptionSucceeded',
      chunkIndex: chunk.index,
      newText,
      transcript: this.transcript
    });
    await this.deliver({
      kind: 'transcribed',
      chunkIndex: chunk.index,
      newText,
      transcript: this.transcript
    });
  }

  private async deliver(outcome: ChunkOutcome): Promise<void> {
    await this.callSink('handle', () => this.deps.sink?.handle(outcome));
  }

  private async callSink(
    hook: 'beginSession' | 'handle' | 'endSession',
    call: () => void | Promise<void> | undefined
  ): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.logger?.warn('Transcript sink failed', { hook, detail: describeError(error) });
    }
  }

  private setState(next: SessionState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}
