import { rename, rm, stat } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { RenameResult } from '../../domain/types.js';
import { logger, type Logger } from '../../infrastructure/logger.js';

/** Same directory, new base name, original extension kept verbatim. */
export function buildTargetPath(originalPath: string, cleanName: string): string {
  return join(dirname(originalPath), `${cleanName}${extname(originalPath)}`);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (cause) {
    if (cause instanceof Error && 'code' in cause && cause.code === 'ENOENT') return false;
    throw cause;
  }
}

export async function removeTemporaryArtifact(
  filePath: string,
  log: Logger = logger,
): Promise<Result<void, AppError>> {
  try {
    await rm(filePath, { force: true });
    log.debug({ temporaryPath: filePath }, 'Temporary image removed');
    return ok(undefined);
  } catch (cause) {
    const details = describeCause(cause);
    log.warn({ temporaryPath: filePath, errorCode: ErrorCode.CLEANUP_FAILED, details }, 'Failed to remove temporary image');
    return err(createAppError(ErrorCode.CLEANUP_FAILED, 'Failed to remove temporary image', true, details));
  }
}

/**
 * Renames the original next to itself. An existing target is never
 * overwritten: the rename fails with RENAME_TARGET_EXISTS instead.
 * Cleanup failures after a successful rename are logged only.
 */
export async function finalizeRename(
  originalPath: string,
  cleanName: string,
  temporaryArtifact: string | null,
  log: Logger = logger,
): Promise<Result<RenameResult, AppError>> {
  const newPath = buildTargetPath(originalPath, cleanName);

  if (newPath !== originalPath) {
    try {
      if (await pathExists(newPath)) {
        log.warn({ newPath, errorCode: ErrorCode.RENAME_TARGET_EXISTS }, 'Rename target already exists');
        return err(
          createAppError(ErrorCode.RENAME_TARGET_EXISTS, `Target '${newPath}' already exists`, false),
        );
      }
      await rename(originalPath, newPath);
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ newPath, errorCode: ErrorCode.RENAME_FAILED, details }, 'Rename failed');
      return err(createAppError(ErrorCode.RENAME_FAILED, 'Failed to rename file', true, details));
    }
  }

  log.info({ newPath }, 'File renamed');

  if (temporaryArtifact !== null) {
    await removeTemporaryArtifact(temporaryArtifact, log);
  }

  return ok({ newPath });
}
