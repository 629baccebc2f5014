/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for users and the identity every request acts as.
 * - Units and roles are closed sets; they are shared by access, records and admin.
 *
 * RULES:
 * - Keep aligned with DB schema (CHECK constraints in migrations/0001_users.ts).
 * - Avoid leaking DB naming (snake_case) outside the DAL.
 * - passwordHash never leaves the users module (see PublicUser).
 */

export const CONCRETE_UNITS = ['Unit A', 'Unit B'] as const;
export const USER_UNITS = [...CONCRETE_UNITS, 'Both'] as const;
export const USER_ROLES = ['admin', 'operator'] as const;

/** A business location a record belongs to. */
export type ConcreteUnit = (typeof CONCRETE_UNITS)[number];

/** A user's scope: one concrete unit, or both of them. */
export type UserUnit = (typeof USER_UNITS)[number];

export type UserRole = (typeof USER_ROLES)[number];

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  passwordHash: string;
  fullName: string;
  unit: UserUnit;
  role: UserRole;
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
};

export type PublicUser = Omit<User, 'passwordHash'>;

/** The authenticated actor. */
export type UserIdentity = {
  id: UserId;
  username: string;
  fullName: string;
  unit: UserUnit;
  role: UserRole;
};

export type NewUser = {
  username: string;
  passwordHash: string;
  fullName: string;
  unit: UserUnit;
  role: UserRole;
};

export type InsertUserResult =
  | { ok: true; user: User }
  | { ok: false; reason: 'username_taken' };

export function isConcreteUnit(value: string): value is ConcreteUnit {
  return CONCRETE_UNITS.some((u) => u === value);
}

export function isUserUnit(value: string): value is UserUnit {
  return USER_UNITS.some((u) => u === value);
}

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((r) => r === value);
}

export function toIdentity(user: User): UserIdentity {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    unit: user.unit,
    role: user.role,
  };
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    unit: user.unit,
    role: user.role,
    isActive: user.isActive,
    createdAt: user.createdAt,
    lastLoginAt: user.lastLoginAt,
  };
}
