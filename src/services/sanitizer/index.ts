import { ok, err, type Result } from '../../domain/result.js';

const RESERVED_CHARACTERS = /[:/"?*<>|\\]/g;
const EDGE_DOTS_AND_SPACES = /^[. ]+|[. ]+$/g;

export const MIN_NAME_LENGTH = 5;

export interface NameRejection {
  reason: 'empty' | 'too_short';
  rawText: string;
}

export function sanitizeName(rawText: string): Result<string, NameRejection> {
  const name = rawText
    .replace(RESERVED_CHARACTERS, '')
    .trim()
    .replace(EDGE_DOTS_AND_SPACES, '');

  if (name.length === 0) {
    return err({ reason: 'empty', rawText });
  }
  // Counted in code points so a surrogate pair is one character.
  if ([...name].length < MIN_NAME_LENGTH) {
    return err({ reason: 'too_short', rawText });
  }
  return ok(name);
}
