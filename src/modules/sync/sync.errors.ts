/**
 * src/modules/sync/sync.errors.ts
 *
 * WHY:
 * - Sync module owns the meaning of an aborted run.
 */

import { AppError, errorMessage, isAppError } from '../../shared/errors/errors';
import type { AppErrorMeta } from '../../shared/errors/errors';

export const SyncErrors = {
  /**
   * A page fetch failed after the client's own retries. AppErrors keep their
   * code (FATAL stays FATAL); anything else becomes INTERNAL.
   */
  runAborted(cause: unknown, meta?: AppErrorMeta) {
    if (isAppError(cause)) return cause;
    return AppError.internal(`Sync aborted: ${errorMessage(cause)}`, meta, cause);
  },
} as const;
