/**
 * Gate outcome type definitions
 */

/**
 * Outcome of a validation step.
 * On failure `message` holds exactly one reason.
 */
export interface ValidationOutcome {
  ok: boolean;
  message: string;
}

export enum GateErrorKind {
  /** Missing or malformed credentials or topology */
  INPUT = 'InputError',
  /** Unknown role or missing required role */
  SCHEMA = 'SchemaError',
  /** Timeout, unreachable host or refused connection */
  NETWORK = 'NetworkError',
  /** Remote authentication rejected */
  AUTH = 'AuthError',
  UNKNOWN = 'UnknownError',
  /** Lock already held */
  CONCURRENCY = 'ConcurrencyError',
  /** The deployment ran and failed */
  DEPLOY = 'DeployError',
}

export interface GateOutcome extends ValidationOutcome {
  kind?: GateErrorKind;
}

export function passed(message = ''): GateOutcome {
  return { ok: true, message };
}

export function rejected(kind: GateErrorKind, message: string): GateOutcome {
  return { ok: false, message, kind };
}
