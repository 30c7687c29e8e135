#!/usr/bin/env node
import { runStartupChecks } from './bootstrap/startupChecks';
import { TerminalSink, runLiveTerminal } from './cli/liveTerminal';
import { resolveConfig, validateConfig } from './config';
import { SessionController } from './core/SessionController';
import { ConfigError } from './errors';
import { StructuredLogger } from './logging/StructuredLogger';
import { ElevenLabsClient } from './services/asr/ElevenLabsClient';
import { LocalWorkerClient } from './services/asr/LocalWorkerClient';
import { TranscriptionClient } from './services/asr/TranscriptionClient';
import { FfmpegAudioSource } from './services/capture/FfmpegAudioSource';
import { TranscriptFileSink } from './services/output/TranscriptFileSink';
import { TranscriptSink, combineSinks } from './services/output/TranscriptSink';
import { AppConfig } from './types';

const createTranscriber = (config: AppConfig, logger: StructuredLogger): TranscriptionClient => {
  if (config.transcriptionBackend === 'local-worker') {
    logger.info('Transcription backend selected', {
      backend: 'local-worker',
      command: config.workerCommand
    });
    return new LocalWorkerClient({
      command: config.workerCommand,
      args: config.workerArgs,
      timeoutMs: config.transcriptionTimeoutMs,
      sampleRate: config.sampleRate,
      languageCode: config.languageCode,
      logger
    });
  }

  logger.info('Transcription backend selected', {
    backend: 'elevenlabs',
    modelId: config.elevenLabsModelId
  });
  return new ElevenLabsClient({
    apiKey: config.elevenLabsApiKey,
    url: config.elevenLabsUrl,
    modelId: config.elevenLabsModelId,
    timeoutMs: config.transcriptionTimeoutMs,
    languageCode: config.languageCode,
    logger
  });
};

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new ConfigError(configErrors);
  }

  // Terminal output belongs to the transcript; log lines go to the file only.
  const logger = await StructuredLogger.create(config.logDir, {
    minLevel: config.logLevel,
    echo: false
  });
  logger.info('Chunkscribe bootstrap started', {
    logPath: logger.getLogPath(),
    backend: config.transcriptionBackend
  });

  await runStartupChecks(config, logger);

  const sinks: TranscriptSink[] = [new TerminalSink()];
  if (config.saveTranscripts) {
    sinks.push(new TranscriptFileSink(config.transcriptDir, logger));
  }

  const controller = new SessionController(
    {
      source: new FfmpegAudioSource({
        ffmpegBin: config.ffmpegBin,
        inputFormat: config.ffmpegInputFormat,
        inputDevice: config.ffmpegInputDevice,
        logger
      }),
      transcriber: createTranscriber(config, logger),
      sink: combineSinks(sinks)
    },
    logger,
    {
      sampleRate: config.sampleRate,
      channels: config.channels,
      frameSize: config.frameSize,
      calibrationFrames: config.calibrationFrames,
      voiceOnsetFrames: config.voiceOnsetFrames,
      preRollFrames: config.preRollFrames,
      silenceDurationMs: config.silenceDurationMs,
      overlapDurationMs: config.overlapDurationMs,
      minSpeechMs: config.minSpeechMs,
      queueDepth: config.queueDepth,
      stopTimeoutMs: config.stopTimeoutMs,
      languageCode: config.languageCode
    }
  );

  process.stdout.write(`Warming up ${config.transcriptionBackend} transcriber...\n`);
  await controller.warmup();
  process.stdout.write('Ready.\n');
  process.stdout.write(`Log file: ${logger.getLogPath()}\n`);

  await runLiveTerminal(controller);
  await logger.flush();
};

bootstrap()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Chunkscribe startup error: ${detail}\n`);
    process.exit(1);
  });
