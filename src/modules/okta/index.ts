/**
 * src/modules/okta/index.ts
 *
 * Public surface of the Okta module. Other modules import from here only.
 */

export { OktaUsersClient } from './okta.client';
export type { OktaClientOptions } from './okta.client';
export { iterateUserPages } from './okta.pagination';
export type { NumberedPage, PageIterationOptions } from './okta.pagination';
export { unconfiguredUsersApi } from './unconfigured-users-api';
export { OktaErrors } from './okta.errors';
export type {
  CallOptions,
  PasswordResetResult,
  RawUser,
  RemoteProfileUpdate,
  UsersApi,
  UsersPage,
} from './users-api';
