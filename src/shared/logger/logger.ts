/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger factory (structured JSON logs).
 * - Keeps logging consistent across the CLI, the sync engine and the store.
 * - stdout belongs to command output, so every level goes to stderr.
 *
 * HOW TO USE:
 * - `createLogger({ level, file })` once in the composition root (app/di.ts).
 * - Prefer `withCommandContext(logger, ...)` inside CLI actions.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerOptions = {
  level: LogLevel;
  service: string;
  env: string;
  /** Optional path of an additional JSON log file. */
  file?: string | null;
  silent?: boolean;
};

export function createLogger(opts: LoggerOptions): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: [...LOG_LEVELS],
    }),
  ];

  if (opts.file) {
    transports.push(new winston.transports.File({ filename: opts.file }));
  }

  return winston.createLogger({
    level: opts.level,
    silent: opts.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    transports,
  });
}
