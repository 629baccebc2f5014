/**
 * src/shared/session/session-cookie.ts
 *
 * Signed cookie value: `<sessionId>.<hmac>`.
 * The session ID is a UUID, so it never contains the `.` separator.
 */

import type { KeyedHasher } from '../security/keyed-hasher';

export class SessionCookieSigner {
  constructor(private readonly hasher: KeyedHasher) {}

  sign(sessionId: string): string {
    return `${sessionId}.${this.hasher.hash(sessionId)}`;
  }

  /** Returns the session ID when the signature is valid, otherwise null. */
  unsign(cookieValue: string): string | null {
    const dot = cookieValue.lastIndexOf('.');
    if (dot <= 0 || dot === cookieValue.length - 1) return null;

    const sessionId = cookieValue.slice(0, dot);
    const signature = cookieValue.slice(dot + 1);

    return this.hasher.verify(sessionId, signature) ? sessionId : null;
  }
}
