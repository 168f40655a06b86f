import { basename } from 'node:path';
import pino from 'pino';

export const logger = pino(
  {
    name: 'scan-renamer',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);

export type Logger = typeof logger;

export function createFileLogger(filePath: string, source?: 'watch' | 'sweep') {
  return logger.child({
    file: basename(filePath),
    ...(source !== undefined && { source }),
  });
}
