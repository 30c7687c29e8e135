export type TranscriptionBackend = 'elevenlabs' | 'local-worker';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SessionStage = 'idle' | 'calibrating' | 'listening' | 'stopping' | 'error';

export interface SessionState {
  stage: SessionStage;
  detail?: string;
}

export interface AudioFrame {
  sequence: number;
  pcm: Buffer;
}

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  frameSize: number;
}

export interface Calibration {
  noiseFloor: number;
  silenceThreshold: number;
}

export type FrameClass = 'speech' | 'silence';

export interface AudioChunk {
  index: number;
  frames: AudioFrame[];
  wav: Buffer;
  durationMs: number;
  speechDurationMs: number;
}

export interface TranscriptionResult {
  text: string;
  languageCode?: string;
}

export interface SegmenterOptions extends AudioFormat {
  calibrationFrames: number;
  voiceOnsetFrames: number;
  preRollFrames: number;
  silenceDurationMs: number;
  overlapDurationMs: number;
  minSpeechMs: number;
}

export interface AppConfig extends SegmenterOptions {
  queueDepth: number;
  stopTimeoutMs: number;
  transcriptionBackend: TranscriptionBackend;
  transcriptionTimeoutMs: number;
  languageCode: string;
  elevenLabsApiKey: string;
  elevenLabsModelId: string;
  elevenLabsUrl: string;
  workerCommand: string;
  workerArgs: string[];
  ffmpegBin: string;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  saveTranscripts: boolean;
  transcriptDir: string;
  logDir: string;
  logLevel: LogLevel;
}
