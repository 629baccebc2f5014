/**
 * src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt behind PasswordHasher so the rest of the app never imports it.
 * - verify() reports a malformed stored hash as a mismatch (logged at warn).
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';
import { logger } from '../logger/logger';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plain, hash);
    } catch (err) {
      logger.warn('password_hasher.verify_failed', {
        flow: 'security',
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
