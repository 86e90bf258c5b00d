/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the mirrored Okta user directory.
 * - A User exclusively owns its Profile; a UserType is shared by many users.
 *
 * RULES:
 * - Keep aligned with DB schema (shared/db/schema.ts).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Timestamps are canonical ISO-8601 UTC strings, remote-authoritative.
 */

export const USER_STATUSES = [
  'STAGED',
  'PROVISIONED',
  'ACTIVE',
  'RECOVERY',
  'PASSWORD_EXPIRED',
  'LOCKED_OUT',
  'SUSPENDED',
  'DEPROVISIONED',
] as const;

export type UserStatus = (typeof USER_STATUSES)[number];

export type UserId = string;

export type User = {
  id: UserId;
  status: UserStatus;
  typeId: string;

  createdAt: string;
  /** Remote lastUpdated; the upsert tie-break. */
  updatedAt: string;

  activatedAt: string | null;
  statusChangedAt: string | null;
  lastLoginAt: string | null;
  passwordChangedAt: string | null;
};

export type Profile = {
  userId: UserId;
  login: string | null;
  firstName: string;
  lastName: string;
  /** Lower-cased. */
  email: string;
  phone: string | null;

  // org-specific profile attributes
  secondEmail: string | null;
  placementOrg: string | null;
  portalAccessGroup: string | null;
  reportGroupList: string | null;
  ackNewBusiness: number | null;
};

export type UserTypeRef = {
  id: string;
  name: string | null;
};

/** The unit the store writes atomically: all three rows or none. */
export type UserRecord = {
  user: User;
  profile: Profile;
  type: UserTypeRef;
};

export type UserSelector = { id: UserId } | { email: string };

export const USER_SOURCES = ['local', 'remote'] as const;
export type UserSource = (typeof USER_SOURCES)[number];

/**
 * - inserted / updated: rows were written.
 * - unchanged: stored updatedAt equals the incoming one (no write).
 * - stale: stored updatedAt is newer (no write, never a regression).
 * - deleted: the id was deleted after this version was produced (no write).
 */
export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged' | 'stale' | 'deleted';

export type UserPage = {
  items: UserRecord[];
  total: number;
  offset: number;
  limit: number;
};
