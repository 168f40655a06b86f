export const ErrorCode = {
  // Intake
  FILE_UNSTABLE: 'FILE_UNSTABLE',
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',

  // Image preparation
  IMAGE_READ_FAILED: 'IMAGE_READ_FAILED',
  PDF_RENDER_FAILED: 'PDF_RENDER_FAILED',

  // LLM naming
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_TIMEOUT: 'LLM_TIMEOUT',

  // Rename
  RENAME_TARGET_EXISTS: 'RENAME_TARGET_EXISTS',
  RENAME_FAILED: 'RENAME_FAILED',
  CLEANUP_FAILED: 'CLEANUP_FAILED',

  // Infrastructure
  CONFIG_INVALID: 'CONFIG_INVALID',
  WATCH_FAILED: 'WATCH_FAILED',
  MODEL_UNLOAD_FAILED: 'MODEL_UNLOAD_FAILED',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
