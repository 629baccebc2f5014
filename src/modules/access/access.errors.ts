/**
 * src/modules/access/access.errors.ts
 *
 * RULES:
 * - The client sees one message for every denial; the reason goes to meta (logs only).
 * - Denials send the client home.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccessErrors = {
  denied(meta?: AppErrorMeta) {
    return AppError.forbidden('Access denied.', meta).withRedirect('/');
  },
} as const;
