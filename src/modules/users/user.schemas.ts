/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Validates user-supplied input (CLI flags, JSON) before it reaches the remote API.
 *
 * RULES:
 * - Profile update keys use the remote attribute names (firstName, mobilePhone, ...).
 * - Unknown keys are rejected: a typo must not silently become a no-op update.
 */

import { z } from 'zod';

import { USER_SOURCES } from './user.types';

export const ProfileUpdateSchema = z
  .object({
    firstName: z.string().min(1),
    lastName: z.string().min(1),
    email: z.string().trim().email(),
    login: z.string().min(1),
    mobilePhone: z.string().nullable(),
    secondEmail: z.string().trim().email().nullable(),
    placementOrg: z.string().nullable(),
    portalAccessGroup: z.string().nullable(),
    reportGroupList: z.string().nullable(),
    ackNewBusiness: z.number().int().nullable(),
  })
  .partial()
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'at least one profile field is required',
  });

export type ProfileUpdateInput = z.infer<typeof ProfileUpdateSchema>;

export const UserSelectorSchema = z.union([
  z.object({ id: z.string().trim().min(1) }).strict(),
  z.object({ email: z.string().trim().email() }).strict(),
]);

export const UserSourceSchema = z.enum(USER_SOURCES);

export const PagingSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(1000).default(20),
});
