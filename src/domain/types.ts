export const SUPPORTED_EXTENSIONS = ['.pdf', '.png', '.jpg'] as const;

export const INTAKE_STATES = [
  'detected',
  'stabilizing',
  'preparing',
  'querying',
  'sanitizing',
  'renaming',
  'done',
  'aborted',
] as const;

export type IntakeState = (typeof INTAKE_STATES)[number];

export interface PreparedImage {
  sourcePath: string;
  isTemporary: boolean;
}

export interface RenameResult {
  newPath: string;
}

export type SkipReason = 'missing' | 'unstable';
