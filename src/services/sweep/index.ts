import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { OperatorConsole } from '../../infrastructure/operator-console.js';
import { logger } from '../../infrastructure/logger.js';
import { isSupportedFile, type IntakeOutcome, type IntakePipeline } from '../intake/index.js';

const log = logger.child({ module: 'sweep' });

const PROCESSED_NAME = /^\d{4}-/;

export const SELECTION_PROMPT = "\nEnter numbers to process (e.g. '1,3,5'), 'all', or 'skip': ";

/** Names such as "2025-01-01 - Sender - Summary.pdf" were produced by an earlier run. */
export function isProcessedName(fileName: string): boolean {
  return PROCESSED_NAME.test(fileName);
}

export async function listUnprocessed(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedFile(entry.name) && !isProcessedName(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Turns the operator's answer into 0-based indices: `all`, `skip`, or
 * comma-separated 1-based numbers. Anything unparsable or out of range is
 * dropped; repeats collapse to the first occurrence.
 */
export function parseSelection(answer: string, count: number): number[] {
  const normalized = answer.trim().toLowerCase();

  if (normalized === 'all') {
    return Array.from({ length: count }, (_, index) => index);
  }
  if (normalized === 'skip') {
    return [];
  }

  const indices: number[] = [];
  for (const part of normalized.split(',')) {
    const token = part.trim();
    if (!/^\d+$/.test(token)) continue;
    const index = Number.parseInt(token, 10) - 1;
    if (index >= 0 && index < count && !indices.includes(index)) {
      indices.push(index);
    }
  }
  return indices;
}

export interface SweepDeps {
  pipeline: Pick<IntakePipeline, 'processFile'>;
  console: OperatorConsole;
  signal?: AbortSignal;
}

/** Offers pre-existing unprocessed files to the operator and runs the chosen ones in order. */
export async function runSweep(dir: string, deps: SweepDeps): Promise<IntakeOutcome[]> {
  const { console: operator, signal } = deps;
  const candidates = await listUnprocessed(dir);

  if (candidates.length === 0) {
    log.info({ dir }, 'No unprocessed files found');
    return [];
  }

  operator.line(`\nFound ${candidates.length} unprocessed file(s):`);
  candidates.forEach((name, index) => operator.line(`  ${index + 1}. ${name}`));

  let answer: string;
  try {
    answer = await operator.ask(SELECTION_PROMPT, signal);
  } catch (cause) {
    if (signal?.aborted) {
      log.info('Sweep interrupted');
      return [];
    }
    throw cause;
  }

  const selected = parseSelection(answer, candidates.length).map((index) => candidates[index]);
  log.info({ candidates: candidates.length, selected: selected.length }, 'Sweep selection');

  const outcomes: IntakeOutcome[] = [];
  for (const name of selected) {
    if (signal?.aborted) break;
    outcomes.push(await deps.pipeline.processFile(join(dir, name), 'sweep'));
  }
  return outcomes;
}
