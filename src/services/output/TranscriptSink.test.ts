import { describe, expect, it } from 'vitest';
import { ChunkOutcome, TranscriptSink, combineSinks } from './TranscriptSink';

describe('combineSinks', () => {
  it('forwards every hook to each sink in order', async () => {
    const calls: string[] = [];
    const first: TranscriptSink = {
      beginSession: () => {
        calls.push('first:begin');
      },
      handle: async (outcome) => {
        await Promise.resolve();
        calls.push(`first:${outcome.chunkIndex}`);
      },
      endSession: (transcript) => {
        calls.push(`first:end:${transcript}`);
      }
    };
    const second: TranscriptSink = {
      handle: (outcome) => {
        calls.push(`second:${outcome.chunkIndex}`);
      }
    };
    const outcome: ChunkOutcome = { kind: 'dropped', chunkIndex: 7 };
    const combined = combineSinks([first, second]);

    await combined.beginSession?.(new Date(0));
    await combined.handle(outcome);
    await combined.endSession?.('done');

    expect(calls).toEqual(['first:begin', 'first:7', 'second:7', 'first:end:done']);
  });
});
