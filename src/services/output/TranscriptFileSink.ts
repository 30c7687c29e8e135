import fs from 'node:fs/promises';
import path from 'node:path';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { ChunkOutcome, TranscriptSink } from './TranscriptSink';

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatSessionTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
  `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

/** Appends each session's transcribed fragments to `<dir>/<timestamp>_chunked.txt`. */
export class TranscriptFileSink implements TranscriptSink {
  private filePath: string | undefined;
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly transcriptDir: string,
    private readonly logger?: StructuredLogger
  ) {}

  public getFilePath(): string | undefined {
    return this.filePath;
  }

  public async beginSession(startedAt: Date): Promise<void> {
    await fs.mkdir(this.transcriptDir, { recursive: true });
    this.filePath = path.join(this.transcriptDir, `${formatSessionTimestamp(startedAt)}_chunked.txt`);
  }

  public async handle(outcome: ChunkOutcome): Promise<void> {
    const filePath = this.filePath;
    if (outcome.kind !== 'transcribed' || !outcome.newText.trim() || !filePath) {
      return;
    }

    const fragment = `${outcome.newText.trim()} `;
    const write = this.writeQueue.then(async () => {
      await fs.appendFile(filePath, fragment, 'utf8');
    });
    this.writeQueue = write.catch(() => undefined);

    await write;
    this.logger?.debug('Partial transcript appended', { filePath, chunkIndex: outcome.chunkIndex });
  }

  public async endSession(): Promise<void> {
    await this.writeQueue;
    if (this.filePath) {
      this.logger?.info('Transcript saved', { filePath: this.filePath });
    }
    this.filePath = undefined;
  }
}
