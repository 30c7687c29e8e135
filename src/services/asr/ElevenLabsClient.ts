import { TranscriptionError } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { TranscriptionResult } from '../../types';
import { TranscribeOptions, TranscriptionClient } from './TranscriptionClient';

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ElevenLabsClientOptions {
  apiKey: string;
  url: string;
  modelId: string;
  timeoutMs: number;
  languageCode?: string;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
}

interface SpeechToTextResponse {
  text?: unknown;
  language_code?: unknown;
}

const isSpeechToTextResponse = (value: unknown): value is SpeechToTextResponse =>
  typeof value === 'object' && value !== null;

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

export class ElevenLabsClient implements TranscriptionClient {
  public readonly name = 'elevenlabs';
  private readonly fetchImpl: FetchLike;

  public constructor(private readonly options: ElevenLabsClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async transcribe(wav: Buffer, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (!this.options.apiKey) {
      throw new TranscriptionError('auth', 'No ElevenLabs API key configured');
    }

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'chunk.wav');
    form.append('model_id', this.options.modelId);
    form.append('tag_audio_events', 'false');

    const languageCode = options.languageCode ?? this.options.languageCode;
    if (languageCode) {
      form.append('language_code', languageCode);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'xi-api-key': this.options.apiKey },
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw this.timeoutError(error);
      }

      const detail = error instanceof Error ? error.message : String(error);
      throw new TranscriptionError('network', `Transcription request failed: ${detail}`, undefined, {
        cause: error
      });
    }

    if (!response.ok) {
      let body = '';
      try {
        body = await response.text();
      } catch (error) {
        if (isTimeoutError(error)) {
          throw this.timeoutError(error, response.status);
        }
      }
      this.options.logger?.error('Transcription API error', {
        status: response.status,
        body: body.slice(0, 500)
      });

      const kind = response.status === 401 || response.status === 403 ? 'auth' : 'server';
      throw new TranscriptionError(kind, `Transcription API error: ${response.status}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      // The timeout signal also covers reading the body.
      if (isTimeoutError(error)) {
        throw this.timeoutError(error, response.status);
      }
      throw new TranscriptionError('server', 'Transcription API returned invalid JSON', response.status, {
        cause: error
      });
    }

    if (!isSpeechToTextResponse(payload)) {
      throw new TranscriptionError('server', 'Transcription API returned an unexpected payload', response.status);
    }

    const text = typeof payload.text === 'string' ? payload.text : '';
    this.options.logger?.info('Transcription successful', { chars: text.length });

    return typeof payload.language_code === 'string'
      ? { text, languageCode: payload.language_code }
      : { text };
  }

  private timeoutError(cause: unknown, status?: number): TranscriptionError {
    return new TranscriptionError(
      'timeout',
      `Transcription request timed out after ${this.options.timeoutMs}ms`,
      status,
      { cause }
    );
  }
}
