import pino from 'pino';
import type { Level, Logger } from 'pino';

export interface LoggerOptions {
  level: Level;
  /** Also append logs to this file (directories are created). */
  file?: string | undefined;
  service?: string;
}

/** Paths censored before any log line is written. */
export const REDACTED_PATHS = [
  'password',
  '*.password',
  'encryptionKey',
  '*.encryptionKey',
  'authorization',
  '*.authorization',
  'headers.Authorization',
];

/**
 * Root logger for the bridge: JSON lines to stdout and, when configured,
 * the same lines appended to a log file.
 */
export function createLogger(options: LoggerOptions): Logger {
  const { level, file } = options;

  const streams = file
    ? [
        { level, stream: process.stdout },
        { level, stream: pino.destination({ dest: file, mkdir: true, sync: false }) },
      ]
    : [{ level, stream: process.stdout }];

  return pino(
    {
      level,
      base: { service: options.service ?? 'mesh-pager-bridge' },
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    },
    pino.multistream(streams),
  );
}
