import type { AppError } from '../../domain/errors.js';
import type { IntakeState, SkipReason } from '../../domain/types.js';
import type { AppConfig } from '../../infrastructure/config.js';
import type { VisionModel } from '../../infrastructure/llm/types.js';
import type { OperatorConsole } from '../../infrastructure/operator-console.js';
import type { PdfRasterizer } from '../../infrastructure/pdf-rasterizer.js';
import type { StabilityOptions } from '../stability/index.js';
import type { ProgressTickerOptions } from '../naming/index.js';
import type { NameRejection } from '../sanitizer/index.js';

export type IntakeSource = 'watch' | 'sweep';

export type IntakeOutcome =
  | { status: 'renamed'; filePath: string; newPath: string; elapsedMs: number }
  | { status: 'skipped'; filePath: string; reason: SkipReason }
  | { status: 'rejected'; filePath: string; rejection: NameRejection }
  | { status: 'failed'; filePath: string; failedAt: IntakeState; error: AppError };

export interface IntakeDeps {
  config: Pick<AppConfig, 'stabilityTimeoutSeconds'>;
  model: VisionModel;
  rasterizer: PdfRasterizer;
  console: OperatorConsole;
  stability?: StabilityOptions;
  ticker?: ProgressTickerOptions;
  tempDir?: string;
}

const TERMINAL_STATES: ReadonlySet<IntakeState> = new Set(['done', 'aborted']);

export function isTerminalState(state: IntakeState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Linear pipeline: each step either advances or aborts, nothing is revisited. */
export const VALID_TRANSITIONS: Record<IntakeState, ReadonlySet<IntakeState>> = {
  detected: new Set<IntakeState>(['stabilizing', 'aborted']),
  stabilizing: new Set<IntakeState>(['preparing', 'aborted']),
  preparing: new Set<IntakeState>(['querying', 'aborted']),
  querying: new Set<IntakeState>(['sanitizing', 'aborted']),
  sanitizing: new Set<IntakeState>(['renaming', 'aborted']),
  renaming: new Set<IntakeState>(['done', 'aborted']),
  done: new Set<IntakeState>(),
  aborted: new Set<IntakeState>(),
};
