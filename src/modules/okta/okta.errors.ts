/**
 * src/modules/okta/okta.errors.ts
 *
 * WHY:
 * - Okta module owns its remote-API semantics.
 * - Keeps shared/errors/errors.ts small and stable.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';

export const OktaErrors = {
  notConfigured(meta?: AppErrorMeta) {
    return AppError.fatal(
      'Okta API is not configured, run: okta-mirror config --org-url <url> --api-token <token>',
      meta,
    );
  },

  unexpectedResponse(message: string, meta?: AppErrorMeta) {
    return AppError.internal(`Unexpected Okta API response: ${message}`, meta);
  },
} as const;
