/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics (admin user management).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 * - Errors send the admin back to the user-management page.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

const USERS_PAGE = '/admin/users';

export const UserErrors = {
  invalidInput(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta).withRedirect(USERS_PAGE);
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Username already exists.', meta).withRedirect(USERS_PAGE);
  },

  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta).withRedirect(USERS_PAGE);
  },

  cannotDeactivateSelf(meta?: AppErrorMeta) {
    return AppError.conflict('You cannot deactivate your own account.', meta).withRedirect(
      USERS_PAGE,
    );
  },
} as const;
