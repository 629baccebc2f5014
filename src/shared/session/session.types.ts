/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - A session only remembers WHO logged in. Unit, role and the active flag are
 *   re-read from the users table on every request, so admin changes apply at once.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict, and HMAC-signed.
 * - Never store passwords or password hashes in session data.
 */

import { z } from 'zod';

export const SessionDataSchema = z.object({
  userId: z.string().min(1),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in Redis. Full key: `session:{sessionId}`.
 */
export const SESSION_KEY_PREFIX = 'session';

/**
 * User-sessions index prefix in Redis. Full key: `session:user:{userId}`.
 *
 * - Redis has no safe "find all keys by pattern" at scale.
 * - SessionStore keeps a Redis SET per user with all active session IDs.
 * - Used by destroyAllForUser() when an admin deactivates the account.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
