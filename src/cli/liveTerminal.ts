import readline from 'node:readline';
import { SessionController } from '../core/SessionController';
import { ChunkOutcome, TranscriptSink } from '../services/output/TranscriptSink';

/** Types each chunk's new text into the terminal as it arrives. */
export class TerminalSink implements TranscriptSink {
  public constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  public beginSession(): void {
    this.output.write('\n');
  }

  public handle(outcome: ChunkOutcome): void {
    if (outcome.kind === 'transcribed') {
      this.output.write(outcome.newText);
      return;
    }

    if (outcome.kind === 'failed') {
      this.output.write(`\n[chunk ${outcome.chunkIndex} lost: ${outcome.error.kind}] `);
      return;
    }

    this.output.write(`\n[chunk ${outcome.chunkIndex} dropped: transcription backlog] `);
  }
}

export const formatStatus = (controller: SessionController): string => {
  const state = controller.getState();
  const calibration = controller.getCalibration();
  const parts = [
    `stage=${state.stage}`,
    ...(state.detail ? [`detail=${state.detail}`] : []),
    `capturing=${controller.isCapturing() ? 'yes' : 'no'}`,
    `chunks=${controller.getTranscribedChunkCount()}`,
    ...(calibration
      ? [`noiseFloor=${calibration.noiseFloor.toFixed(4)}`, `threshold=${calibration.silenceThreshold.toFixed(4)}`]
      : [])
  ];

  return `[status] ${parts.join(' ')}`;
};

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>             Start/stop a dictation session\n');
  process.stdout.write('  /status             Print current state\n');
  process.stdout.write('  /help               Show this help\n');
  process.stdout.write('  /quit               Exit\n');
  process.stdout.write('\n');
};

export const runLiveTerminal = async (controller: SessionController): Promise<void> => {
  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  controller.on('stateChanged', (state) => {
    if (state.stage === 'error' && state.detail) {
      process.stderr.write(`\n[state:error] ${state.detail}\n`);
      return;
    }

    if (state.stage === 'calibrating') {
      process.stdout.write('\n[calibrating: stay quiet for a moment]\n');
      return;
    }

    if (state.stage === 'listening') {
      process.stdout.write('[listening]\n');
      return;
    }

    if (state.stage === 'idle') {
      process.stdout.write('\n[idle]\n');
    }
  });

  controller.on('session', (event) => {
    if (event.type === 'chunkDiscarded') {
      process.stdout.write('[.]');
    }
  });

  printHelp();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const toggle = async (): Promise<void> => {
    if (!controller.isSessionActive()) {
      process.stdout.write('\n[start]\n');
      await controller.start();
      return;
    }

    process.stdout.write('\n[stop]\n');
    const transcript = await controller.stop();
    process.stdout.write('\n\n--- session transcript ---\n');
    process.stdout.write(`${transcript || '(no speech detected)'}\n`);
    process.stdout.write('--------------------------\n\n');
  };

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    await controller.shutdown();
    rl.close();
    process.stdout.write('\nBye.\n');
  };

  await new Promise<void>((resolve) => {
    // Raw-mode readline turns Ctrl+C into its own event instead of a signal.
    rl.on('SIGINT', () => {
      queue(shutdown);
    });
    process.on('SIGINT', () => {
      queue(shutdown);
    });

    rl.on('close', () => {
      queue(shutdown);
      resolve();
    });

    rl.on('line', (line) => {
      const input = line.trim();

      if (input === '/quit') {
        queue(shutdown);
        return;
      }

      if (input === '/status') {
        process.stdout.write(`${formatStatus(controller)}\n`);
        return;
      }

      if (input === '/help') {
        printHelp();
        return;
      }

      if (input.length > 0) {
        process.stdout.write('Unknown command. Use /help, /status, or /quit.\n');
        return;
      }

      queue(toggle);
    });
  });

  await commandChain;
};
