/**
 * src/modules/okta/users-api.ts
 *
 * WHY:
 * - The contract the core (sync engine, user service) depends on for the remote
 *   user directory. OktaUsersClient is the production implementation; tests
 *   use an in-process fake with the same semantics.
 *
 * RULES:
 * - Records are returned raw (unknown). Validation belongs to the record mapper.
 * - Failures are AppErrors: TRANSIENT, RATE_LIMITED, FATAL, NOT_FOUND, VALIDATION_ERROR.
 */

export type RawUser = unknown;

export type UsersPage = {
  records: RawUser[];
  /** Opaque; absent on the last page. */
  nextCursor?: string;
};

/** Remote profile attribute names, as the Okta API spells them. */
export type RemoteProfileUpdate = {
  firstName?: string;
  lastName?: string;
  email?: string;
  login?: string;
  mobilePhone?: string | null;
  secondEmail?: string | null;
  placementOrg?: string | null;
  portalAccessGroup?: string | null;
  reportGroupList?: string | null;
  ackNewBusiness?: number | null;
};

export type PasswordResetResult = {
  summary: string | null;
  resetPasswordUrl: string | null;
};

export type CallOptions = {
  signal?: AbortSignal;
};

export interface UsersApi {
  listUsersPage(cursor?: string, opts?: CallOptions): Promise<UsersPage>;
  getUserById(id: string, opts?: CallOptions): Promise<RawUser>;
  /** Resolves undefined when no user has that email. */
  findUserByEmail(email: string, opts?: CallOptions): Promise<RawUser | undefined>;
  updateUserProfile(id: string, profile: RemoteProfileUpdate, opts?: CallOptions): Promise<RawUser>;
  deleteUser(id: string, opts?: CallOptions): Promise<void>;
  resetPassword(id: string, params: { sendEmail: boolean }, opts?: CallOptions): Promise<PasswordResetResult>;
}
