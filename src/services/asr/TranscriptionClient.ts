import { TranscriptionResult } from '../../types';

export interface TranscribeOptions {
  languageCode?: string;
}

/**
 * Turns one WAV-encoded chunk into text. Implementations bound every call with
 * a timeout and reject with `TranscriptionError`.
 */
export interface TranscriptionClient {
  readonly name: string;
  transcribe(wav: Buffer, options?: TranscribeOptions): Promise<TranscriptionResult>;
  warmup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
}
