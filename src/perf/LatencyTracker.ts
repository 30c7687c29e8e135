interface ChunkLatencySample {
  audioMs: number;
  queueMs: number;
  transcribeMs: number;
  endToEndMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  chunks: number;
  audioMs: number;
  queueMs: PercentileSummary;
  transcribeMs: PercentileSummary;
  endToEndMs: PercentileSummary;
  /** Transcription time over audio time, across the session. */
  realtimeFactor: number;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export class LatencyTracker {
  private samples: ChunkLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: ChunkLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    const audioMs = sum(this.samples.map((sample) => sample.audioMs));
    const transcribeMs = sum(this.samples.map((sample) => sample.transcribeMs));

    return {
      chunks: this.samples.length,
      audioMs: Math.round(audioMs),
      queueMs: asSummary(this.samples.map((sample) => sample.queueMs)),
      transcribeMs: asSummary(this.samples.map((sample) => sample.transcribeMs)),
      endToEndMs: asSummary(this.samples.map((sample) => sample.endToEndMs)),
      realtimeFactor: audioMs > 0 ? Number((transcribeMs / audioMs).toFixed(3)) : 0
    };
  }
}
