export type TranscriptionErrorKind = 'timeout' | 'auth' | 'server' | 'network';

/** The audio input could not be opened or stopped delivering frames. */
export class DeviceError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceError';
  }
}

/**
 * A single chunk could not be transcribed. Recoverable: the session keeps
 * running and the chunk's audio is dropped.
 */
export class TranscriptionError extends Error {
  public constructor(
    public readonly kind: TranscriptionErrorKind,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranscriptionError';
  }
}

export class ConfigError extends Error {
  public constructor(public readonly problems: string[]) {
    super(`Invalid Chunkscribe configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
