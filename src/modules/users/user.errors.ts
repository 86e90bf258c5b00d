/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/errors/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put user-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  invalidRemoteRecord(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(`Remote user record is invalid: ${reason}`, meta);
  },

  invalidProfileUpdate(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(`Invalid profile update: ${reason}`, meta);
  },

  /** Another mirrored user holds the email with a version at least as new. */
  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email is already used by another mirrored user', meta);
  },

  invalidPaging(meta?: AppErrorMeta) {
    return AppError.validationError('Page and limit must be positive integers', meta);
  },
} as const;
