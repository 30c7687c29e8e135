import { TranscriptionError } from '../../errors';

export type ChunkOutcome =
  | { kind: 'transcribed'; chunkIndex: number; newText: string; transcript: string }
  | { kind: 'failed'; chunkIndex: number; error: TranscriptionError }
  | { kind: 'dropped'; chunkIndex: number };

/**
 * Receives one outcome per committed chunk. Transcribed and failed outcomes
 * arrive in chunk order; a dropped outcome is reported as soon as the backlog
 * evicts its chunk, so it can precede outcomes of earlier chunks.
 */
export interface TranscriptSink {
  beginSession?: (startedAt: Date) => void | Promise<void>;
  handle(outcome: ChunkOutcome): void | Promise<void>;
  endSession?: (transcript: string) => void | Promise<void>;
}

/** Fans every call out to `sinks`, one after another, in the given order. */
export const combineSinks = (sinks: TranscriptSink[]): TranscriptSink => ({
  beginSession: async (startedAt) => {
    for (const sink of sinks) {
      await sink.beginSession?.(startedAt);
    }
  },
  handle: async (outcome) => {
    for (const sink of sinks) {
      await sink.handle(outcome);
    }
  },
  endSession: async (transcript) => {
    for (const sink of sinks) {
      await sink.endSession?.(transcript);
    }
  }
});
