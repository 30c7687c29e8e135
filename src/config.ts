import os from 'node:os';
import path from 'node:path';
import { AppConfig, LogLevel, TranscriptionBackend } from './types';

const DEFAULT_ELEVENLABS_URL = 'https://api.elevenlabs.io/v1/speech-to-text';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const parseArgs = (value: string | undefined): string[] => {
  if (!value || !value.trim()) {
    return [];
  }

  return value.trim().split(/\s+/);
};

const resolveTranscriptionBackend = (value: string | undefined): TranscriptionBackend => {
  if (value === 'local-worker') {
    return 'local-worker';
  }

  return 'elevenlabs';
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info') {
    return value;
  }

  return 'info';
};

interface CaptureDefaults {
  inputFormat: string;
  inputDevice: string;
}

const getCaptureDefaults = (platform: NodeJS.Platform): CaptureDefaults => {
  if (platform === 'darwin') {
    return { inputFormat: 'avfoundation', inputDevice: ':0' };
  }

  if (platform === 'win32') {
    return { inputFormat: 'dshow', inputDevice: 'audio=default' };
  }

  return { inputFormat: 'pulse', inputDevice: 'default' };
};

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const homeDir = os.homedir();
  const captureDefaults = getCaptureDefaults(platform);

  return {
    sampleRate: parseIntOrDefault(env.CHUNKSCRIBE_SAMPLE_RATE, 16000),
    channels: parseIntOrDefault(env.CHUNKSCRIBE_CHANNELS, 1),
    frameSize: parseIntOrDefault(env.CHUNKSCRIBE_FRAME_SIZE, 1024),
    calibrationFrames: parseIntOrDefault(env.CHUNKSCRIBE_CALIBRATION_FRAMES, 50),
    voiceOnsetFrames: parseIntOrDefault(env.CHUNKSCRIBE_VOICE_ONSET_FRAMES, 3),
    preRollFrames: parseIntOrDefault(env.CHUNKSCRIBE_PRE_ROLL_FRAMES, 5),
    silenceDurationMs: parseIntOrDefault(env.CHUNKSCRIBE_SILENCE_DURATION_MS, 2500),
    overlapDurationMs: parseIntOrDefault(env.CHUNKSCRIBE_OVERLAP_DURATION_MS, 200),
    minSpeechMs: parseIntOrDefault(env.CHUNKSCRIBE_MIN_SPEECH_MS, 500),
    queueDepth: parseIntOrDefault(env.CHUNKSCRIBE_QUEUE_DEPTH, 2),
    stopTimeoutMs: parseIntOrDefault(env.CHUNKSCRIBE_STOP_TIMEOUT_MS, 5000),
    transcriptionBackend: resolveTranscriptionBackend(env.CHUNKSCRIBE_TRANSCRIPTION_BACKEND),
    transcriptionTimeoutMs: parseIntOrDefault(env.CHUNKSCRIBE_TRANSCRIPTION_TIMEOUT_MS, 30000),
    languageCode: env.CHUNKSCRIBE_LANGUAGE ?? 'en',
    elevenLabsApiKey: env.ELEVENLABS_API_KEY ?? '',
    elevenLabsModelId: env.CHUNKSCRIBE_ELEVENLABS_MODEL ?? 'scribe_v1',
    elevenLabsUrl: env.CHUNKSCRIBE_ELEVENLABS_URL ?? DEFAULT_ELEVENLABS_URL,
    workerCommand: env.CHUNKSCRIBE_WORKER_COMMAND ?? 'python3',
    workerArgs: parseArgs(env.CHUNKSCRIBE_WORKER_ARGS),
    ffmpegBin: env.CHUNKSCRIBE_FFMPEG_BIN ?? 'ffmpeg',
    ffmpegInputFormat: env.CHUNKSCRIBE_FFMPEG_FORMAT ?? captureDefaults.inputFormat,
    ffmpegInputDevice: env.CHUNKSCRIBE_FFMPEG_INPUT ?? captureDefaults.inputDevice,
    saveTranscripts: parseBoolOrDefault(env.CHUNKSCRIBE_SAVE_TRANSCRIPTS, true),
    transcriptDir:
      env.CHUNKSCRIBE_TRANSCRIPT_DIR ?? path.join(homeDir, 'Documents', 'ChunkscribeTranscripts'),
    logDir: env.CHUNKSCRIBE_LOG_DIR ?? path.join(homeDir, '.chunkscribe', 'logs'),
    logLevel: resolveLogLevel(env.CHUNKSCRIBE_LOG_LEVEL)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (![8000, 16000, 22050, 24000, 44100, 48000].includes(config.sampleRate)) {
    errors.push('CHUNKSCRIBE_SAMPLE_RATE must be one of: 8000, 16000, 22050, 24000, 44100, 48000.');
  }

  if (config.channels < 1 || config.channels > 2) {
    errors.push('CHUNKSCRIBE_CHANNELS must be 1 or 2.');
  }

  if (config.frameSize < 64 || config.frameSize > 16384) {
    errors.push('CHUNKSCRIBE_FRAME_SIZE must be between 64 and 16384 samples.');
  }

  if (config.calibrationFrames < 1 || config.calibrationFrames > 1000) {
    errors.push('CHUNKSCRIBE_CALIBRATION_FRAMES must be between 1 and 1000.');
  }

  if (config.voiceOnsetFrames < 1 || config.voiceOnsetFrames > 50) {
    errors.push('CHUNKSCRIBE_VOICE_ONSET_FRAMES must be between 1 and 50.');
  }

  if (config.preRollFrames < config.voiceOnsetFrames || config.preRollFrames > 200) {
    errors.push(
      'CHUNKSCRIBE_PRE_ROLL_FRAMES must be at least CHUNKSCRIBE_VOICE_ONSET_FRAMES and at most 200.'
    );
  }

  if (config.silenceDurationMs < 100 || config.silenceDurationMs > 30000) {
    errors.push('CHUNKSCRIBE_SILENCE_DURATION_MS must be between 100 and 30000 milliseconds.');
  }

  if (config.overlapDurationMs < 0 || config.overlapDurationMs > 5000) {
    errors.push('CHUNKSCRIBE_OVERLAP_DURATION_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.minSpeechMs < 0 || config.minSpeechMs > 30000) {
    errors.push('CHUNKSCRIBE_MIN_SPEECH_MS must be between 0 and 30000 milliseconds.');
  }

  if (config.queueDepth < 1 || config.queueDepth > 16) {
    errors.push('CHUNKSCRIBE_QUEUE_DEPTH must be between 1 and 16.');
  }

  if (config.stopTimeoutMs < 100 || config.stopTimeoutMs > 60000) {
    errors.push('CHUNKSCRIBE_STOP_TIMEOUT_MS must be between 100 and 60000 milliseconds.');
  }

  if (config.transcriptionTimeoutMs < 1000 || config.transcriptionTimeoutMs > 300000) {
    errors.push('CHUNKSCRIBE_TRANSCRIPTION_TIMEOUT_MS must be between 1000 and 300000 milliseconds.');
  }

  if (config.transcriptionBackend === 'elevenlabs' && !config.elevenLabsApiKey.trim()) {
    errors.push('ELEVENLABS_API_KEY must be set when CHUNKSCRIBE_TRANSCRIPTION_BACKEND=elevenlabs.');
  }

  if (config.transcriptionBackend === 'elevenlabs' && !/^https?:\/\//.test(config.elevenLabsUrl)) {
    errors.push('CHUNKSCRIBE_ELEVENLABS_URL must be an http(s) URL.');
  }

  if (config.transcriptionBackend === 'local-worker' && !config.workerCommand.trim()) {
    errors.push('CHUNKSCRIBE_WORKER_COMMAND must not be empty.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('CHUNKSCRIBE_FFMPEG_BIN must not be empty.');
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('CHUNKSCRIBE_FFMPEG_FORMAT must not be empty.');
  }

  if (config.saveTranscripts && !config.transcriptDir.trim()) {
    errors.push('CHUNKSCRIBE_TRANSCRIPT_DIR must not be empty when transcripts are saved.');
  }

  return errors;
};
