import { AudioSource, FrameStreamOptions } from '../services/capture/AudioSource';
import { ChunkOutcome, TranscriptSink } from '../services/output/TranscriptSink';
import { AudioFrame } from '../types';

/** In-process microphone: tests push frames and failures by hand. */
export class FakeAudioSource implements AudioSource {
  public startError: Error | undefined;
  public stopCalls = 0;
  public lastOptions: FrameStreamOptions | undefined;
  private stream: FrameStreamOptions | undefined;

  public isCapturing(): boolean {
    return this.stream !== undefined;
  }

  public async start(options: FrameStreamOptions): Promise<void> {
    if (this.startError) {
      throw this.startError;
    }

    this.lastOptions = options;
    this.stream = options;
  }

  public async stop(): Promise<void> {
    this.stopCalls += 1;
    this.stream = undefined;
  }

  public emit(frames: AudioFrame[]): void {
    for (const frame of frames) {
      this.stream?.onFrame(frame);
    }
  }

  public fail(error: Error): void {
    this.stream?.onError?.(error);
  }
}

export class RecordingSink implements TranscriptSink {
  public readonly outcomes: ChunkOutcome[] = [];
  public startedAt: Date | undefined;
  public finalTranscript: string | undefined;

  public beginSession(startedAt: Date): void {
    this.startedAt = startedAt;
  }

  public handle(outcome: ChunkOutcome): void {
    this.outcomes.push(outcome);
  }

  public endSession(transcript: string): void {
    this.finalTranscript = transcript;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve;
  });

  return { promise, resolve };
};
