import { describe, expect, it } from 'vitest';
import { LatencyTracker } from './LatencyTracker';

describe('LatencyTracker', () => {
  it('summarises an empty session as zeros', () => {
    expect(new LatencyTracker().summarize()).toEqual({
      chunks: 0,
      audioMs: 0,
      queueMs: { p50: 0, p95: 0, max: 0, avg: 0 },
      transcribeMs: { p50: 0, p95: 0, max: 0, avg: 0 },
      endToEndMs: { p50: 0, p95: 0, max: 0, avg: 0 },
      realtimeFactor: 0
    });
  });

  it('reports percentiles and the realtime factor across chunks', () => {
    const tracker = new LatencyTracker();
    tracker.push({ audioMs: 3000, queueMs: 0, transcribeMs: 600, endToEndMs: 600 });
    tracker.push({ audioMs: 2000, queueMs: 100, transcribeMs: 400, endToEndMs: 500 });
    tracker.push({ audioMs: 5000, queueMs: 50, transcribeMs: 1000, endToEndMs: 1050 });

    const summary = tracker.summarize();

    expect(summary.chunks).toBe(3);
    expect(summary.audioMs).toBe(10000);
    expect(summary.transcribeMs).toEqual({ p50: 600, p95: 1000, max: 1000, avg: 667 });
    expect(summary.queueMs).toEqual({ p50: 50, p95: 100, max: 100, avg: 50 });
    expect(summary.realtimeFactor).toBe(0.2);
  });

  it('starts over after reset', () => {
    const tracker = new LatencyTracker();
    tracker.push({ audioMs: 1000, queueMs: 1, transcribeMs: 1, endToEndMs: 2 });
    tracker.reset();

    expect(tracker.summarize().chunks).toBe(0);
  });
});
