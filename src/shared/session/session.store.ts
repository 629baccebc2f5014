/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management via Redis (through Cache interface).
 * - Sessions are instantly revocable via del(); no token revocation lists.
 * - TTL enforced at Redis level (no expired session can be read).
 *
 * USER-SESSION INDEX (destroyAllForUser):
 * - On create(): SADD session:user:{userId} {sessionId} with TTL refresh.
 * - On destroy(): SREM removes the session ID from the user index, then DELs the session.
 * - On destroyAllForUser(): SMEMBERS reads all session IDs → DEL each → DEL the index.
 *
 * RULES:
 * - Depends only on Cache interface. Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in middleware / set-session-cookie).
 * - No business rules.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { logger } from '../logger/logger';
import { SessionDataSchema } from './session.types';
import type { SessionData } from './session.types';
import { SESSION_KEY_PREFIX, SESSION_USER_INDEX_PREFIX } from './session.types';

function parseSessionData(raw: string): SessionData | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = SessionDataSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private userIndexKey(userId: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${userId}`;
  }

  /**
   * Creates a new session and returns the session ID.
   * Also registers the session ID in the per-user index (for destroyAllForUser).
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    // Index TTL tracks the newest session so it never expires before one of its members.
    await this.cache.sadd(this.userIndexKey(data.userId), sessionId, {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, missing or corrupted.
   * A corrupted payload is deleted.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const data = parseSessionData(raw);
    if (!data) {
      logger.warn('session.corrupted', { flow: 'session' });
      await this.cache.del(this.key(sessionId));
      return null;
    }

    return data;
  }

  /**
   * Destroys a single session (logout, stale user).
   * Also removes the session ID from the per-user index.
   */
  async destroy(sessionId: string): Promise<void> {
    const raw = await this.cache.get(this.key(sessionId));
    const data = raw ? parseSessionData(raw) : null;

    if (data) {
      await this.cache.srem(this.userIndexKey(data.userId), sessionId);
    }

    await this.cache.del(this.key(sessionId));
  }

  /**
   * Destroys ALL sessions for a user (account deactivated).
   *
   * Stale IDs (sessions already expired naturally) are harmless: DEL on a
   * non-existent key is a no-op.
   */
  async destroyAllForUser(userId: string): Promise<void> {
    const indexKey = this.userIndexKey(userId);
    const sessionIds = await this.cache.smembers(indexKey);

    await Promise.all(sessionIds.map((id) => this.cache.del(this.key(id))));
    await this.cache.del(indexKey);
  }
}
