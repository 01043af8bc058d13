/**
 * Credential Service
 *
 * Form checks on the credentials a deployment request carries.
 * Both validators are pure: the first failing rule wins.
 */

import { MIN_PASSWORD_LENGTH } from '../constants';
import type { ValidationOutcome } from '../types';

function isPresent(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value.length > 0;
}

/**
 * Validate the administrator account requested for the deployment
 */
export function validateCredentials(
  username: string | null | undefined,
  password: string | null | undefined,
  passwordConfirm: string | null | undefined
): ValidationOutcome {
  if (!isPresent(username)) {
    return { ok: false, message: 'Administrator username not provided' };
  }
  if (!isPresent(password) || !isPresent(passwordConfirm)) {
    return { ok: false, message: 'Administrator password not provided' };
  }
  if (password !== passwordConfirm) {
    return { ok: false, message: 'Password entries do not match' };
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    return { ok: false, message: `Password must contain at least ${MIN_PASSWORD_LENGTH} characters` };
  }
  return { ok: true, message: '' };
}

/**
 * Validate that the credentials needed to reach the deployment machines
 * are present. Runs before the remote probe, which makes a real
 * network and authentication attempt.
 */
export function validateSshCredentials(
  keyName: string | null | undefined,
  rootPassword: string | null | undefined
): ValidationOutcome {
  if (!isPresent(keyName)) {
    return { ok: false, message: 'Deployment key name not provided' };
  }
  if (!isPresent(rootPassword)) {
    return { ok: false, message: 'Root password for deployment machines not provided' };
  }
  return { ok: true, message: '' };
}
