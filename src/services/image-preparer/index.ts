import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';
import sharp from 'sharp';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { PreparedImage } from '../../domain/types.js';
import type { PdfRasterizer } from '../../infrastructure/pdf-rasterizer.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'image-preparer' });

export interface ImagePreparerDeps {
  rasterizer: PdfRasterizer;
  tempDir?: string;
  pid?: number;
}

/** One temporary JPEG per process, so concurrent instances never collide. */
export function temporaryImagePath(tempDir: string = tmpdir(), pid: number = process.pid): string {
  return join(tempDir, `scan-renamer-${pid}.jpg`);
}

export async function prepareImage(
  filePath: string,
  deps: ImagePreparerDeps,
): Promise<Result<PreparedImage, AppError>> {
  const ext = extname(filePath).toLowerCase();

  if (ext === '.png' || ext === '.jpg') {
    return ok({ sourcePath: filePath, isTemporary: false });
  }

  if (ext !== '.pdf') {
    return err(
      createAppError(ErrorCode.UNSUPPORTED_FILE_TYPE, `Unsupported file type '${ext}'`, false),
    );
  }

  const target = temporaryImagePath(deps.tempDir, deps.pid);
  try {
    const page = await deps.rasterizer.renderFirstPage(filePath);
    await sharp(page).jpeg().toFile(target);
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ filePath, errorCode: ErrorCode.PDF_RENDER_FAILED, retryable: false, details }, 'Failed to render PDF');
    return err(createAppError(ErrorCode.PDF_RENDER_FAILED, 'Failed to render first PDF page', false, details));
  }

  log.debug({ filePath, target }, 'PDF page rendered to JPEG');
  return ok({ sourcePath: target, isTemporary: true });
}
