import { setInterval } from 'node:timers/promises';

const DEFAULT_INTERVAL_MS = 1000;

export interface ProgressOutput {
  write(text: string): void;
}

export interface ProgressTicker {
  /** Stops the ticker and resolves once its last line is written. */
  stop(): Promise<void>;
}

export interface ProgressTickerOptions {
  intervalMs?: number;
  now?: () => number;
}

export function startProgressTicker(
  label: string,
  output: ProgressOutput,
  options: ProgressTickerOptions = {},
): ProgressTicker {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const controller = new AbortController();
  const startedAt = now();

  const render = () => {
    const elapsed = Math.floor((now() - startedAt) / 1000);
    output.write(`\r[...] Processing: ${label}... ${elapsed}s`);
  };

  const finished = (async () => {
    render();
    try {
      for await (const _tick of setInterval(intervalMs, undefined, { signal: controller.signal })) {
        render();
      }
    } catch (cause) {
      if (!(cause instanceof Error && cause.name === 'AbortError')) throw cause;
    }
    output.write('\n');
  })();

  return {
    async stop() {
      controller.abort();
      await finished;
    },
  };
}
