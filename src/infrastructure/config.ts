import { resolve } from 'node:path';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { envSchema } from '../domain/schemas.js';

export interface AppConfig {
  readonly watchDir: string;
  readonly model: string;
  readonly ollamaHost: string;
  readonly stabilityTimeoutSeconds: number;
  readonly modelTimeoutSeconds: number;
  readonly pdfRenderScale: number;
  readonly sweepOnStart: boolean;
}

/** Builds the immutable runtime configuration once at startup. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, AppError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid configuration', false, details));
  }

  const values = parsed.data;
  return ok(
    Object.freeze({
      watchDir: resolve(values.WATCH_DIR),
      model: values.OLLAMA_MODEL,
      ollamaHost: values.OLLAMA_HOST,
      stabilityTimeoutSeconds: values.STABILITY_TIMEOUT_SECONDS,
      modelTimeoutSeconds: values.MODEL_TIMEOUT_SECONDS,
      pdfRenderScale: values.PDF_RENDER_SCALE,
      sweepOnStart: values.SWEEP_ON_START,
    }),
  );
}
