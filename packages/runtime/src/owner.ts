import { userInfo } from 'node:os';

// Checked in order, as login shells and most CLIs do
const USER_ENV_KEYS = ['LOGNAME', 'USER', 'LNAME', 'USERNAME'] as const;

/**
 * Name of the user running the process.
 *
 * Resolved on every call so a record's default owner reflects whoever
 * creates it, not whoever imported the module.
 */
export function currentUser(env: NodeJS.ProcessEnv = process.env): string {
  for (const key of USER_ENV_KEYS) {
    const value = env[key];
    if (value) return value;
  }
  return userInfo().username;
}
