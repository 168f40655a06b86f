import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { VisionModel, LLMResponse } from '../../infrastructure/llm/types.js';
import { logger } from '../../infrastructure/logger.js';
import { NAMING_PROMPT } from './prompt.js';
import { startProgressTicker, type ProgressOutput, type ProgressTickerOptions } from './progress.js';

export { NAMING_PROMPT } from './prompt.js';
export { startProgressTicker } from './progress.js';
export type { ProgressOutput, ProgressTicker, ProgressTickerOptions } from './progress.js';

const log = logger.child({ module: 'naming' });

export interface NamingDeps {
  model: VisionModel;
  output: ProgressOutput;
  /** Name shown next to the ticker; defaults to the image file name. */
  label?: string;
  ticker?: ProgressTickerOptions;
}

/** Asks the vision model for a filename. The ticker is fully stopped before this resolves. */
export async function proposeName(
  imagePath: string,
  deps: NamingDeps,
): Promise<Result<string, AppError>> {
  let image: Buffer;
  try {
    image = await readFile(imagePath);
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ imagePath, errorCode: ErrorCode.IMAGE_READ_FAILED, details }, 'Could not read image');
    return err(createAppError(ErrorCode.IMAGE_READ_FAILED, 'Could not read image for the model', false, details));
  }

  const ticker = startProgressTicker(deps.label ?? basename(imagePath), deps.output, deps.ticker);
  let response: Result<LLMResponse, AppError>;
  try {
    response = await deps.model.describeImage(NAMING_PROMPT, image, { temperature: 0 });
  } finally {
    await ticker.stop();
  }

  if (!response.ok) return response;

  const proposed = response.value.content.trim();
  log.debug({ imagePath, proposed, latencyMs: response.value.latencyMs }, 'Model proposed a name');
  return ok(proposed);
}
