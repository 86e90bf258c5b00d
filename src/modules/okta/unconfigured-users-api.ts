/**
 * UsersApi stand-in used when no Okta credentials are configured.
 * Local-only commands (list, get --source local) keep working; any remote call
 * fails with a FATAL error that tells the user how to configure the CLI.
 */

import { OktaErrors } from './okta.errors';
import type { UsersApi } from './users-api';

export function unconfiguredUsersApi(): UsersApi {
  const fail = () => Promise.reject(OktaErrors.notConfigured());

  return {
    listUsersPage: fail,
    getUserById: fail,
    findUserByEmail: fail,
    updateUserProfile: fail,
    deleteUser: fail,
    resetPassword: fail,
  };
}
