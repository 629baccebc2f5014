/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - The session cookie carries `<sessionId>.<signature>`. The signature is
 *   HMAC-SHA256(sessionId, SESSION_SECRET), so a forged or tampered cookie is
 *   rejected before Redis is ever queried.
 *
 * KEY:
 * - SESSION_SECRET from environment (min 32 chars, validated at startup).
 * - Generate with: openssl rand -base64 32
 *
 * RULES:
 * - Deterministic: same (input, key) → same output.
 * - Compare signatures with verify() (constant time), never with ===.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
  verify(value: string, expectedHash: string): boolean;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /** HMAC-SHA256(value, key) as base64url. */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('base64url');
  }

  verify(value: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.hash(value));
    const expected = Buffer.from(expectedHash);

    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}
