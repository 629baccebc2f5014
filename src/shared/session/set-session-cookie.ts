/**
 * src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login sets and logout clears the same cookie with the same flags.
 * - Centralising here means the HttpOnly / SameSite=Strict / Secure (prod)
 *   rules are defined in one place and can never drift between controllers.
 *
 * RULES:
 * - No business logic here.
 * - Receives the already-signed cookie value (see session-cookie.ts).
 * - Receives isProduction from the caller (injected at construction time in each controller).
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

export function setSessionCookie(
  reply: FastifyReply,
  signedValue: string,
  isProduction: boolean,
): void {
  const parts = [`${SESSION_COOKIE_NAME}=${signedValue}`, 'Path=/', 'HttpOnly', 'SameSite=Strict'];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${SESSION_COOKIE_NAME}=`, 'Path=/', 'HttpOnly', 'SameSite=Strict', 'Max-Age=0'];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
