import { StructuredLogger } from '../../logging/StructuredLogger';

export type WorkerFailureReason = 'timeout' | 'exited' | 'spawn' | 'rejected';

export class WorkerRequestError extends Error {
  public constructor(
    public readonly reason: WorkerFailureReason,
    message: string
  ) {
    super(message);
    this.name = 'WorkerRequestError';
  }
}

interface WorkerResponse {
  id?: string;
  ok?: boolean;
  result?: unknown;
  error?: string;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason: WorkerRequestError) => void;
  timeoutHandle: NodeJS.Timeout;
}

export interface OpenRequest {
  id: string;
  response: Promise<unknown>;
}

export const parseWorkerResponse = (line: string): WorkerResponse | undefined => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  return {
    id: typeof record.id === 'string' ? record.id : undefined,
    ok: typeof record.ok === 'boolean' ? record.ok : undefined,
    result: record.result,
    error: typeof record.error === 'string' ? record.error : undefined
  };
};

/**
 * Matches newline-delimited JSON responses to the requests awaiting them.
 * Responses echo the request `id` with `ok` and either `result` or `error`.
 */
export class JsonRequestTracker {
  private readonly pending = new Map<string, PendingRequest>();
  private nextRequestId = 0;
  private buffer = '';

  public constructor(
    private readonly workerName: string,
    private readonly logger?: StructuredLogger
  ) {}

  public get pendingCount(): number {
    return this.pending.size;
  }

  public open(timeoutMs: number): OpenRequest {
    this.nextRequestId += 1;
    const id = `${Date.now()}-${this.nextRequestId}`;

    const response = new Promise<unknown>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pending.delete(id);
        reject(new WorkerRequestError('timeout', `${this.workerName} worker request timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(id, { resolve, reject, timeoutHandle });
    });

    return { id, response };
  }

  public fail(id: string, error: WorkerRequestError): void {
    const entry = this.pending.get(id);
    if (!entry) {
      return;
    }

    clearTimeout(entry.timeoutHandle);
    this.pending.delete(id);
    entry.reject(error);
  }

  public failAll(error: WorkerRequestError): void {
    const ids = Array.from(this.pending.keys());
    for (const id of ids) {
      this.fail(id, error);
    }
  }

  /** Feeds raw stdout text; complete lines settle their requests. */
  public receive(text: string): void {
    this.buffer += text;

    let newlineIndex = this.buffer.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = this.buffer.slice(0, newlineIndex).trim();
      this.buffer = this.buffer.slice(newlineIndex + 1);
      if (line) {
        this.settle(line);
      }

      newlineIndex = this.buffer.indexOf('\n');
    }
  }

  public reset(): void {
    this.buffer = '';
  }

  private settle(line: string): void {
    const parsed = parseWorkerResponse(line);
    if (!parsed) {
      this.logger?.debug(`${this.workerName} worker emitted non-JSON line`, { line });
      return;
    }

    const entry = parsed.id ? this.pending.get(parsed.id) : undefined;
    if (!parsed.id || !entry) {
      this.logger?.debug(`${this.workerName} worker response for unknown request`, { responseId: parsed.id });
      return;
    }

    clearTimeout(entry.timeoutHandle);
    this.pending.delete(parsed.id);

    if (parsed.ok === false) {
      entry.reject(new WorkerRequestError('rejected', parsed.error ?? `${this.workerName} worker request failed`));
      return;
    }

    entry.resolve(parsed.result);
  }
}
