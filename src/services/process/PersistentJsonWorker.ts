import { spawn } from 'node:child_process';
import { Readable, Writable } from 'node:stream';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { JsonRequestTracker, WorkerRequestError } from './JsonRequestTracker';

const STOP_GRACE_MS = 1500;
const STDERR_TAIL_CHARS = 4000;

/** Request/response channel to a long-lived helper process. */
export interface JsonWorker {
  start(): Promise<void>;
  request(payload: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
  stop(): Promise<void>;
}

/** The slice of a child process the worker drives. */
export interface WorkerProcess {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'spawn' | 'close', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnWorkerProcess = (command: string, args: string[], env: NodeJS.ProcessEnv | undefined) => WorkerProcess;

export interface PersistentJsonWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  spawnProcess?: SpawnWorkerProcess;
  logger?: StructuredLogger;
}

const spawnPiped: SpawnWorkerProcess = (command, args, env) => spawn(command, args, { env, stdio: 'pipe' });

const tail = (text: string, limit: number): string => (text.length <= limit ? text : text.slice(text.length - limit));

/** Child process speaking newline-delimited JSON over stdin/stdout. */
export class PersistentJsonWorker implements JsonWorker {
  private child: WorkerProcess | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private stderrTail = '';
  private readonly tracker: JsonRequestTracker;

  public constructor(private readonly options: PersistentJsonWorkerOptions) {
    this.tracker = new JsonRequestTracker(options.name, options.logger);
  }

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (!this.startPromise) {
      this.startPromise = this.spawnWorker().finally(() => {
        this.startPromise = undefined;
      });
    }

    await this.startPromise;
  }

  public async request(payload: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    try {
      await this.start();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new WorkerRequestError('spawn', `${this.options.name} worker failed to start: ${detail}`);
    }

    const current = this.child;
    if (!current) {
      throw new WorkerRequestError('exited', `${this.options.name} worker is not running`);
    }

    const { id, response } = this.tracker.open(timeoutMs);
    current.stdin.write(`${JSON.stringify({ ...payload, id })}\n`, (error) => {
      if (error) {
        this.tracker.fail(
          id,
          new WorkerRequestError('exited', `${this.options.name} worker stdin closed: ${error.message}`)
        );
      }
    });

    return response;
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        current.kill('SIGKILL');
        resolve();
      }, STOP_GRACE_MS);

      current.once('close', () => {
        clearTimeout(killTimer);
        resolve();
      });

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  private spawnWorker(): Promise<void> {
    this.stopping = false;

    return new Promise<void>((resolve, reject) => {
      const spawnProcess = this.options.spawnProcess ?? spawnPiped;
      const child = spawnProcess(this.options.command, this.options.args, this.options.env);

      const onError = (error: Error): void => {
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);
        this.attach(child);
        resolve();
      });
    });
  }

  private attach(child: WorkerProcess): void {
    this.child = child;
    this.stderrTail = '';
    this.tracker.reset();

    child.stdout.on('data', (chunk: Buffer) => {
      this.tracker.receive(chunk.toString());
    });

    child.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      this.stderrTail = tail(`${this.stderrTail}${text}`, STDERR_TAIL_CHARS);
      this.options.logger?.warn(`${this.options.name} worker stderr`, { detail: text.trim() });
    });

    // EPIPE arrives here when the worker closes stdin before exiting.
    child.stdin.on('error', (error) => {
      this.options.logger?.warn(`${this.options.name} worker stdin error`, { detail: error.message });
      this.tracker.failAll(
        new WorkerRequestError('exited', `${this.options.name} worker stdin closed: ${error.message}`)
      );
    });

    child.on('error', (error) => {
      this.options.logger?.error(`${this.options.name} worker process error`, { detail: error.message });
    });

    child.on('close', (code, signal) => {
      if (this.stopping) {
        this.options.logger?.info(`${this.options.name} worker stopped`, { code, signal });
      } else {
        this.options.logger?.warn(`${this.options.name} worker exited`, {
          code,
          signal,
          stderr: this.stderrTail.trim()
        });
      }

      if (this.child === child) {
        this.child = undefined;
      }
      this.tracker.failAll(
        new WorkerRequestError('exited', `${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
      );
    });

    this.options.logger?.info(`${this.options.name} worker started`, {
      command: this.options.command,
      pid: child.pid
    });
  }
}
