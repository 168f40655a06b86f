import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { SUPPORTED_EXTENSIONS, type SkipReason } from '../../domain/types.js';
import { createFileLogger, logger, type Logger } from '../../infrastructure/logger.js';
import { waitForStability } from '../stability/index.js';
import { prepareImage } from '../image-preparer/index.js';
import { proposeName } from '../naming/index.js';
import { sanitizeName } from '../sanitizer/index.js';
import { finalizeRename, removeTemporaryArtifact } from '../rename/index.js';
import { IntakeRun } from './run.js';
import type { IntakeDeps, IntakeOutcome, IntakeSource } from './types.js';

export type { IntakeDeps, IntakeOutcome, IntakeSource } from './types.js';
export { VALID_TRANSITIONS, isTerminalState } from './types.js';
export { IntakeRun } from './run.js';

const log = logger.child({ module: 'intake' });

export function isSupportedFile(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Runs one file at a time through stabilize -> prepare -> query -> sanitize ->
 * rename. Every per-file failure ends as an outcome; nothing thrown by a run
 * reaches the watcher.
 */
export class IntakePipeline {
  private readonly deps: IntakeDeps;
  private queue: Promise<void> = Promise.resolve();
  /** Paths this pipeline renamed files to; the watcher reports each once as a new file. */
  private readonly ownRenames = new Set<string>();

  constructor(deps: IntakeDeps) {
    this.deps = deps;
  }

  /**
   * Queues a watcher event behind any run in progress. Returns false for
   * unsupported files and for the creation event of a file this pipeline renamed.
   */
  enqueue(filePath: string, source: IntakeSource = 'watch'): boolean {
    if (!isSupportedFile(filePath)) {
      log.debug({ filePath }, 'Ignoring unsupported file');
      return false;
    }
    if (this.ownRenames.delete(filePath)) {
      log.debug({ filePath }, 'Ignoring a file this pipeline renamed');
      return false;
    }

    this.queue = this.queue.then(async () => {
      await this.processFile(filePath, source);
    });
    return true;
  }

  /** Resolves when every queued run has finished. */
  drain(): Promise<void> {
    return this.queue;
  }

  async processFile(filePath: string, source: IntakeSource = 'watch'): Promise<IntakeOutcome> {
    const fileLog = createFileLogger(filePath, source);
    const run = new IntakeRun(fileLog);

    try {
      return await this.execute(filePath, source, run, fileLog);
    } catch (cause) {
      const error = createAppError(
        ErrorCode.UNEXPECTED_ERROR,
        'Unexpected error while processing file',
        false,
        describeCause(cause),
      );
      return this.fail(filePath, run, error, fileLog);
    }
  }

  private async execute(
    filePath: string,
    source: IntakeSource,
    run: IntakeRun,
    fileLog: Logger,
  ): Promise<IntakeOutcome> {
    const { config, console: operator } = this.deps;

    if (!(await fileExists(filePath))) {
      fileLog.debug('File no longer exists');
      return this.skip(filePath, run, 'missing');
    }

    const t1 = run.transition('stabilizing');
    if (!t1.ok) return this.fail(filePath, run, t1.error, fileLog);

    const stable = await waitForStability(filePath, config.stabilityTimeoutSeconds, this.deps.stability);
    if (!stable) {
      operator.line(`[WARN] Timeout: File ${filePath} is still changing or locked.`);
      fileLog.warn(
        { errorCode: ErrorCode.FILE_UNSTABLE, timeoutSeconds: config.stabilityTimeoutSeconds },
        'File did not stabilize',
      );
      return this.skip(filePath, run, 'unstable');
    }

    const startedAt = Date.now();

    const t2 = run.transition('preparing');
    if (!t2.ok) return this.fail(filePath, run, t2.error, fileLog);

    const prepared = await prepareImage(filePath, {
      rasterizer: this.deps.rasterizer,
      tempDir: this.deps.tempDir,
    });
    if (!prepared.ok) return this.fail(filePath, run, prepared.error, fileLog);

    let temporaryArtifact = prepared.value.isTemporary ? prepared.value.sourcePath : null;
    try {
      const t3 = run.transition('querying');
      if (!t3.ok) return this.fail(filePath, run, t3.error, fileLog);

      const proposed = await proposeName(prepared.value.sourcePath, {
        model: this.deps.model,
        output: operator,
        label: basename(filePath),
        ticker: this.deps.ticker,
      });
      if (!proposed.ok) return this.fail(filePath, run, proposed.error, fileLog);

      const t4 = run.transition('sanitizing');
      if (!t4.ok) return this.fail(filePath, run, t4.error, fileLog);

      const sanitized = sanitizeName(proposed.value);
      if (!sanitized.ok) {
        const { rawText, reason } = sanitized.error;
        operator.line(`[WARN] Model returned unusable name: '${rawText}' - skipping`);
        fileLog.warn({ rawText, reason }, 'Model returned unusable name');
        run.transition('aborted');
        return { status: 'rejected', filePath, rejection: sanitized.error };
      }

      const t5 = run.transition('renaming');
      if (!t5.ok) return this.fail(filePath, run, t5.error, fileLog);

      const renamed = await finalizeRename(filePath, sanitized.value, temporaryArtifact, fileLog);
      if (!renamed.ok) return this.fail(filePath, run, renamed.error, fileLog);
      temporaryArtifact = null;
      // Sweep runs finish before the watcher starts, so only watched renames echo back.
      if (source === 'watch' && renamed.value.newPath !== filePath) {
        this.ownRenames.add(renamed.value.newPath);
      }

      run.transition('done');
      const elapsedMs = Date.now() - startedAt;
      operator.line(`[OK] Renamed to: ${basename(renamed.value.newPath)} (${(elapsedMs / 1000).toFixed(1)}s)`);
      return { status: 'renamed', filePath, newPath: renamed.value.newPath, elapsedMs };
    } finally {
      if (temporaryArtifact !== null) {
        await removeTemporaryArtifact(temporaryArtifact, fileLog);
      }
    }
  }

  private skip(filePath: string, run: IntakeRun, reason: SkipReason): IntakeOutcome {
    run.transition('aborted');
    return { status: 'skipped', filePath, reason };
  }

  private fail(filePath: string, run: IntakeRun, error: AppError, fileLog: Logger): IntakeOutcome {
    const failedAt = run.state;
    run.transition('aborted');

    const suffix = error.details ? `: ${error.details}` : '';
    this.deps.console.line(`[ERR] ${basename(filePath)}: ${error.message}${suffix}`);
    fileLog.error(
      { errorCode: error.code, retryable: error.retryable, failedAt, details: error.details },
      'Intake aborted',
    );
    return { status: 'failed', filePath, failedAt, error };
  }
}
