import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { CommandResult, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

type CommandRunner = (
  command: string,
  args: string[],
  options?: { timeoutMs?: number }
) => Promise<CommandResult>;

const assertExecutable = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your Chunkscribe env config.`);
  }

  fs.accessSync(absolutePath, fsConstants.X_OK);
};

const probeBinary = async (
  runner: CommandRunner,
  command: string,
  args: string[],
  label: string
): Promise<void> => {
  let result: CommandResult;

  try {
    result = await runner(command, args, { timeoutMs: 8000 });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${label} could not be run (${command}): ${detail}`);
  }

  if (result.exitCode !== 0) {
    const suffix = result.stderr.trim() ? `\n${result.stderr.trim()}` : '';
    throw new Error(`${label} exited with code ${result.exitCode}${suffix}`);
  }
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  runner: CommandRunner = runCommand
): Promise<void> => {
  logger.info('Running startup checks');

  if (path.isAbsolute(config.ffmpegBin)) {
    assertExecutable(config.ffmpegBin, 'ffmpeg binary');
  }
  await probeBinary(runner, config.ffmpegBin, ['-version'], 'ffmpeg');

  if (config.transcriptionBackend === 'elevenlabs') {
    if (!config.elevenLabsApiKey.trim()) {
      throw new Error('ELEVENLABS_API_KEY is not set.');
    }
  } else if (path.isAbsolute(config.workerCommand)) {
    assertExecutable(config.workerCommand, 'Transcription worker command');
  }

  logger.info('Startup checks completed successfully', {
    backend: config.transcriptionBackend,
    ffmpegBin: config.ffmpegBin
  });
};
