/**
 * src/modules/users/user.mapper.ts
 *
 * WHY:
 * - Turns one raw Okta user into the UserRecord the store writes.
 * - Bad records are reported, not thrown: one malformed record must not fail a page.
 *
 * RULES:
 * - Pure: no I/O, no logging, no clock.
 * - Extra remote fields (_links, credentials, unknown profile attributes) are ignored.
 */

import { z } from 'zod';

import { USER_STATUSES } from './user.types';
import type { UserRecord } from './user.types';

const Timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const OptionalTimestamp = Timestamp.nullish().transform((value) => value ?? null);

const OptionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const RawUserSchema = z.object({
  id: z.string().trim().min(1),
  status: z.enum(USER_STATUSES),
  created: Timestamp,
  lastUpdated: Timestamp,
  activated: OptionalTimestamp,
  statusChanged: OptionalTimestamp,
  lastLogin: OptionalTimestamp,
  passwordChanged: OptionalTimestamp,
  type: z.object({
    id: z.string().trim().min(1),
    name: OptionalText,
  }),
  profile: z.object({
    firstName: z.string(),
    lastName: z.string(),
    email: z.string().trim().email(),
    login: OptionalText,
    mobilePhone: OptionalText,
    secondEmail: OptionalText,
    placementOrg: OptionalText,
    portalAccessGroup: OptionalText,
    reportGroupList: OptionalText,
    ackNewBusiness: z
      .number()
      .int()
      .nullish()
      .transform((value) => value ?? null),
  }),
});

export type RecordValidationError = {
  /** Remote id when the raw record carried a usable one. */
  id: string | null;
  reason: string;
};

export type MapResult =
  | { ok: true; record: UserRecord }
  | { ok: false; error: RecordValidationError };

function rawIdOf(raw: unknown): string | null {
  if (!raw || typeof raw !== 'object' || !('id' in raw)) return null;
  return typeof raw.id === 'string' && raw.id.trim() !== '' ? raw.id : null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(record)'}: ${issue.message}`)
    .join('; ');
}

export function mapRecord(raw: unknown): MapResult {
  const parsed = RawUserSchema.safeParse(raw);

  if (!parsed.success) {
    return { ok: false, error: { id: rawIdOf(raw), reason: describeIssues(parsed.error) } };
  }

  const r = parsed.data;

  return {
    ok: true,
    record: {
      user: {
        id: r.id,
        status: r.status,
        typeId: r.type.id,
        createdAt: r.created,
        updatedAt: r.lastUpdated,
        activatedAt: r.activated,
        statusChangedAt: r.statusChanged,
        lastLoginAt: r.lastLogin,
        passwordChangedAt: r.passwordChanged,
      },
      profile: {
        userId: r.id,
        login: r.profile.login,
        firstName: r.profile.firstName,
        lastName: r.profile.lastName,
        email: r.profile.email.toLowerCase(),
        phone: r.profile.mobilePhone,
        secondEmail: r.profile.secondEmail,
        placementOrg: r.profile.placementOrg,
        portalAccessGroup: r.profile.portalAccessGroup,
        reportGroupList: r.profile.reportGroupList,
        ackNewBusiness: r.profile.ackNewBusiness,
      },
      type: {
        id: r.type.id,
        name: r.type.name,
      },
    },
  };
}
