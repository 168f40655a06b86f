import { watch } from 'chokidar';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'file-watcher' });

export interface WatchHandle {
  close(): Promise<void>;
}

/**
 * Watches the direct children of `dir` and reports every file created after
 * startup. Directory creations are not reported.
 */
export async function startWatcher(
  dir: string,
  onCreated: (filePath: string) => void,
): Promise<Result<WatchHandle, AppError>> {
  const watcher = watch(dir, {
    ignoreInitial: true,
    depth: 0,
    persistent: true,
  });

  watcher.on('add', (filePath: string) => {
    log.debug({ filePath }, 'File created');
    onCreated(filePath);
  });

  try {
    await new Promise<void>((resolve, reject) => {
      watcher.once('ready', () => resolve());
      watcher.once('error', (cause: unknown) => reject(cause));
    });
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ dir, errorCode: ErrorCode.WATCH_FAILED, details }, 'Watcher failed to start');
    await watcher.close();
    return err(createAppError(ErrorCode.WATCH_FAILED, `Could not watch ${dir}`, false, details));
  }

  watcher.on('error', (cause: unknown) => {
    log.error({ dir, errorCode: ErrorCode.WATCH_FAILED, details: describeCause(cause) }, 'Watcher error');
  });

  log.info({ dir }, 'Watcher started');
  return ok({
    close: async () => {
      await watcher.close();
      log.info({ dir }, 'Watcher stopped');
    },
  });
}
