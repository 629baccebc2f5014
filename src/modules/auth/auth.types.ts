/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Result types for credential checks and the login response.
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 * - The failure reason is for logs only; clients always see one generic message.
 */

import type { UserIdentity } from '../users/user.types';

export type AuthFailureReason = 'unknown_or_inactive' | 'wrong_password';

export type AuthenticateResult =
  | { ok: true; identity: UserIdentity }
  | { ok: false; reason: AuthFailureReason };

export type AuthResult = {
  status: 'AUTHENTICATED';
  user: UserIdentity;
};
