import { once } from 'node:events';
import type { AppError } from '../domain/errors.js';
import type { Result } from '../domain/result.js';
import type { WatchHandle } from '../infrastructure/file-watcher.js';
import type { VisionModel } from '../infrastructure/llm/types.js';
import { logger } from '../infrastructure/logger.js';
import type { OperatorConsole } from '../infrastructure/operator-console.js';
import type { IntakePipeline } from '../services/intake/index.js';

const log = logger.child({ module: 'lifecycle' });

export type WatcherStarter = (
  dir: string,
  onCreated: (filePath: string) => void,
) => Promise<Result<WatchHandle, AppError>>;

export interface WatchSessionDeps {
  watchDir: string;
  modelName: string;
  startWatcher: WatcherStarter;
  pipeline: Pick<IntakePipeline, 'enqueue' | 'drain'>;
  model: Pick<VisionModel, 'unload'>;
  console: OperatorConsole;
  /** Aborted on SIGINT/SIGTERM. */
  signal: AbortSignal;
}

/**
 * Feeds watcher events into the pipeline until `signal` aborts, then shuts
 * down: close the watcher, let the in-flight run finish, unload the model.
 * Returns the process exit code.
 */
export async function watchUntilShutdown(deps: WatchSessionDeps): Promise<number> {
  const { pipeline, console: operator, signal } = deps;

  if (!signal.aborted) {
    const watch = await deps.startWatcher(deps.watchDir, (filePath) => {
      pipeline.enqueue(filePath, 'watch');
    });
    if (!watch.ok) {
      log.fatal({ errorCode: watch.error.code, details: watch.error.details }, watch.error.message);
      return 1;
    }

    operator.line(`\nWatching ${deps.watchDir} with ${deps.modelName}. Drop a file in to test!`);
    if (!signal.aborted) {
      await once(signal, 'abort');
    }

    operator.line('\nStopping watcher...');
    await watch.value.close();
  }

  await pipeline.drain();

  operator.line('Unloading model...');
  const unloaded = await deps.model.unload();
  if (unloaded.ok) {
    operator.line('Model unloaded.');
  } else {
    operator.line(`Could not unload model: ${unloaded.error.details ?? unloaded.error.message}`);
  }

  return 0;
}
