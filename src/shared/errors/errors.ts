/**
 * src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive used by the remote client, the store, the sync engine and the CLI.
 * - The CLI maps `exitCode` straight to the process exit code.
 * - Retry decisions read `retryable` / `code`, never error messages.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. okta/okta.errors.ts).
 */

export const APP_ERROR_CODES = [
  'VALIDATION_ERROR',
  'TRANSIENT',
  'RATE_LIMITED',
  'FATAL',
  'NOT_FOUND',
  'CONFLICT',
  'CANCELLED',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export const EXIT_CODES: Record<AppErrorCode, number> = {
  VALIDATION_ERROR: 2,
  TRANSIENT: 1,
  RATE_LIMITED: 1,
  FATAL: 1,
  NOT_FOUND: 3,
  CONFLICT: 1,
  CANCELLED: 130,
  INTERNAL: 1,
};

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;
  /** Only set for RATE_LIMITED. */
  readonly retryAfterMs?: number;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    meta?: AppErrorMeta;
    retryAfterMs?: number;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
    this.retryAfterMs = opts.retryAfterMs;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /** Transient and rate-limited failures may succeed when repeated. */
  get retryable(): boolean {
    return this.code === 'TRANSIENT' || this.code === 'RATE_LIMITED';
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static transient(message = 'Temporary failure', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'TRANSIENT', message, meta, cause });
  }

  static rateLimited(retryAfterMs: number, meta?: AppErrorMeta) {
    return new AppError({ code: 'RATE_LIMITED', message: 'Rate limited', retryAfterMs, meta });
  }

  static fatal(message = 'Fatal error', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'FATAL', message, meta, cause });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', message, meta });
  }

  static cancelled(message = 'Operation cancelled', meta?: AppErrorMeta) {
    return new AppError({ code: 'CANCELLED', message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'INTERNAL', message, meta, cause });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
