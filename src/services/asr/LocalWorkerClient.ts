import { TranscriptionError, TranscriptionErrorKind } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { TranscriptionResult } from '../../types';
import { WorkerFailureReason, WorkerRequestError } from '../process/JsonRequestTracker';
import { JsonWorker, PersistentJsonWorker } from '../process/PersistentJsonWorker';
import { TranscribeOptions, TranscriptionClient } from './TranscriptionClient';

const WARMUP_TIMEOUT_MS = 20000;

export interface LocalWorkerClientOptions {
  command: string;
  args: string[];
  timeoutMs: number;
  sampleRate: number;
  languageCode?: string;
  worker?: JsonWorker;
  logger?: StructuredLogger;
}

const KIND_BY_REASON: Record<WorkerFailureReason, TranscriptionErrorKind> = {
  timeout: 'timeout',
  exited: 'network',
  spawn: 'network',
  rejected: 'server'
};

const readText = (result: unknown): string | undefined => {
  if (typeof result !== 'object' || result === null || !('text' in result)) {
    return undefined;
  }

  return typeof result.text === 'string' ? result.text : undefined;
};

/**
 * Transcribes chunks with a self-hosted model running as a persistent JSON
 * worker process (`{"action":"transcribe","audioBase64":...}`).
 */
export class LocalWorkerClient implements TranscriptionClient {
  public readonly name = 'local-worker';
  private readonly worker: JsonWorker;

  public constructor(private readonly options: LocalWorkerClientOptions) {
    this.worker =
      options.worker ??
      new PersistentJsonWorker({
        name: 'transcriber',
        command: options.command,
        args: options.args,
        logger: options.logger
      });
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, WARMUP_TIMEOUT_MS);
  }

  public async transcribe(wav: Buffer, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    let result: unknown;

    try {
      result = await this.worker.request(
        {
          action: 'transcribe',
          audioBase64: wav.toString('base64'),
          sampleRate: this.options.sampleRate,
          languageCode: options.languageCode ?? this.options.languageCode
        },
        this.options.timeoutMs
      );
    } catch (error) {
      if (error instanceof WorkerRequestError) {
        throw new TranscriptionError(KIND_BY_REASON[error.reason], error.message, undefined, { cause: error });
      }

      const detail = error instanceof Error ? error.message : String(error);
      throw new TranscriptionError('network', detail, undefined, { cause: error });
    }

    const text = readText(result);
    if (text === undefined) {
      throw new TranscriptionError('server', 'Transcription worker returned no text field');
    }

    return { text };
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }
}
