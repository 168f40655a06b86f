import { createInterface } from 'node:readline/promises';

/** Operator-facing console: status lines, the progress ticker and the sweep prompt. */
export interface OperatorConsole {
  write(text: string): void;
  line(text: string): void;
  ask(question: string, signal?: AbortSignal): Promise<string>;
}

export function createOperatorConsole(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): OperatorConsole {
  return {
    write(text) {
      output.write(text);
    },
    line(text) {
      output.write(`${text}\n`);
    },
    async ask(question, signal) {
      const rl = createInterface({ input, output });
      // readline swallows Ctrl-C while it owns the terminal; hand it back to the process.
      rl.once('SIGINT', () => {
        process.kill(process.pid, 'SIGINT');
      });
      try {
        return signal ? await rl.question(question, { signal }) : await rl.question(question);
      } finally {
        rl.close();
      }
    },
  };
}
