import { open, stat } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { describeCause } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'stability' });

const DEFAULT_POLL_INTERVAL_MS = 1000;
const HEAD_BYTES = 1024;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export interface FileProbe {
  size(filePath: string): Promise<number>;
  readHead(filePath: string, bytes: number): Promise<void>;
}

export interface StabilityOptions {
  pollIntervalMs?: number;
  clock?: Clock;
  probe?: FileProbe;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
};

export const fileProbe: FileProbe = {
  async size(filePath) {
    return (await stat(filePath)).size;
  },
  async readHead(filePath, bytes) {
    const handle = await open(filePath, 'r');
    try {
      await handle.read(Buffer.alloc(bytes), 0, bytes, 0);
    } finally {
      await handle.close();
    }
  },
};

/**
 * Polls until the file size repeats (non-zero) and the file can be read, or
 * until `timeoutSeconds` elapse. Stat and read failures never abort the wait;
 * the file may be locked by the writer.
 */
export async function waitForStability(
  filePath: string,
  timeoutSeconds: number,
  options: StabilityOptions = {},
): Promise<boolean> {
  const clock = options.clock ?? systemClock;
  const probe = options.probe ?? fileProbe;
  const intervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const deadline = clock.now() + timeoutSeconds * 1000;

  let lastSize = -1;
  while (clock.now() < deadline) {
    try {
      const size = await probe.size(filePath);
      if (size === lastSize && size > 0) {
        await probe.readHead(filePath, HEAD_BYTES);
        log.debug({ filePath, sizeBytes: size }, 'File is stable');
        return true;
      }
      lastSize = size;
    } catch (cause) {
      log.debug({ filePath, details: describeCause(cause) }, 'File not readable yet');
    }
    await clock.sleep(intervalMs);
  }

  log.debug({ filePath, timeoutSeconds }, 'File did not stabilize');
  return false;
}
