import { ChildProcess, spawn } from 'node:child_process';
import { DeviceError } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioSource, FrameStreamOptions } from './AudioSource';
import { PcmFrameSlicer } from './PcmFrameSlicer';
import { frameByteSize } from './pcm';

const START_STABILITY_DELAY_MS = 300;
const STOP_TIMEOUT_MS = 2000;

export interface FfmpegAudioSourceOptions {
  ffmpegBin: string;
  inputFormat: string;
  inputDevice: string;
  logger?: StructuredLogger;
}

const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access to your terminal and retry.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return 'Microphone input device is unavailable. Check CHUNKSCRIBE_FFMPEG_FORMAT and CHUNKSCRIBE_FFMPEG_INPUT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

/**
 * Captures the microphone through an ffmpeg child process and slices its raw
 * s16le output into fixed-size frames.
 */
export class FfmpegAudioSource implements AudioSource {
  private process: ChildProcess | undefined;
  private slicer: PcmFrameSlicer | undefined;
  private stopping = false;
  private stream: FrameStreamOptions | undefined;

  public constructor(private readonly options: FfmpegAudioSourceOptions) {}

  public isCapturing(): boolean {
    return Boolean(this.process);
  }

  public async start(stream: FrameStreamOptions): Promise<void> {
    if (this.process) {
      throw new DeviceError('Audio source is already capturing');
    }

    const frameBytes = frameByteSize(stream);
    this.stream = stream;
    this.slicer = new PcmFrameSlicer(frameBytes);
    this.stopping = false;

    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.inputDevice,
      '-ac',
      String(stream.channels),
      '-ar',
      String(stream.sampleRate),
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ];

    const ffmpeg = spawn(this.options.ffmpegBin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stderrLog = '';
    let settled = false;

    ffmpeg.stderr.on('data', (chunk) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk) => {
      this.handleAudioData(Buffer.from(chunk));
    });

    ffmpeg.on('close', (code) => {
      if (this.process !== ffmpeg) {
        return;
      }

      this.process = undefined;
      if (!this.stopping) {
        const error = new DeviceError(normalizeMicError(`${stderrLog}\nexit code=${code}`));
        this.options.logger?.error('Audio capture ended unexpectedly', { code, detail: error.message });
        this.stream?.onError?.(error);
      }
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new DeviceError(`Unable to launch ${this.options.ffmpegBin}: ${error.message}`, { cause: error }));
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new DeviceError(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new DeviceError(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.options.logger?.info('Audio capture started', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: stream.sampleRate,
      channels: stream.channels,
      frameBytes
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      this.stream = undefined;
      return;
    }

    this.stopping = true;

    await new Promise<void>((resolve) => {
      const timeoutHandle = setTimeout(() => {
        current.kill('SIGKILL');
        resolve();
      }, STOP_TIMEOUT_MS);

      current.once('close', () => {
        clearTimeout(timeoutHandle);
        resolve();
      });

      current.kill('SIGINT');
    });

    this.process = undefined;
    const droppedBytes = this.slicer?.discardPartial() ?? 0;
    if (droppedBytes > 0) {
      this.options.logger?.debug('Dropping partial trailing frame', { bytes: droppedBytes });
    }

    this.options.logger?.info('Audio capture stopped', { frames: this.slicer?.frameCount ?? 0 });
    this.slicer = undefined;
    this.stream = undefined;
  }

  private handleAudioData(chunk: Buffer): void {
    const stream = this.stream;
    const slicer = this.slicer;
    if (!stream || !slicer) {
      return;
    }

    for (const frame of slicer.push(chunk)) {
      try {
        stream.onFrame(frame);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.options.logger?.warn('Frame handler failed', { detail, sequence: frame.sequence });
      }
    }
  }
}
