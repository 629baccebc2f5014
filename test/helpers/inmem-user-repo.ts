import { randomUUID } from 'node:crypto';
import type { UserRepo } from '../../src/modules/users/dal/user.repo';
import type { InsertUserResult, NewUser, User } from '../../src/modules/users/user.types';

/**
 * In-process stand-in for KyselyUserRepo.
 * - username UNIQUE behaves like the DB constraint.
 * - createdAt strictly increases per insert, so "newest first" is deterministic.
 */
export class InMemUserRepo implements UserRepo {
  private readonly users = new Map<string, User>();
  private lastCreatedMs = 0;

  private nextCreatedAt(): Date {
    this.lastCreatedMs = Math.max(Date.now(), this.lastCreatedMs + 1);
    return new Date(this.lastCreatedMs);
  }

  findById(userId: string): Promise<User | undefined> {
    const user = this.users.get(userId);
    return Promise.resolve(user ? { ...user } : undefined);
  }

  findActiveByUsername(username: string): Promise<User | undefined> {
    const user = [...this.users.values()].find((u) => u.username === username && u.isActive);
    return Promise.resolve(user ? { ...user } : undefined);
  }

  listNewestFirst(): Promise<User[]> {
    const users = [...this.users.values()].sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id),
    );
    return Promise.resolve(users.map((u) => ({ ...u })));
  }

  countAll(): Promise<number> {
    return Promise.resolve(this.users.size);
  }

  hasAdmin(): Promise<boolean> {
    return Promise.resolve([...this.users.values()].some((u) => u.role === 'admin'));
  }

  insertUser(user: NewUser): Promise<InsertUserResult> {
    if ([...this.users.values()].some((u) => u.username === user.username)) {
      return Promise.resolve({ ok: false, reason: 'username_taken' });
    }

    const created: User = {
      id: randomUUID(),
      ...user,
      isActive: true,
      createdAt: this.nextCreatedAt(),
      lastLoginAt: null,
    };
    this.users.set(created.id, created);

    return Promise.resolve({ ok: true, user: { ...created } });
  }

  setActive(userId: string, isActive: boolean): Promise<User | undefined> {
    const user = this.users.get(userId);
    if (!user) return Promise.resolve(undefined);

    user.isActive = isActive;
    return Promise.resolve({ ...user });
  }

  touchLastLogin(userId: string, at: Date): Promise<void> {
    const user = this.users.get(userId);
    if (user) user.lastLoginAt = at;
    return Promise.resolve();
  }
}
