/**
 * Remote preflight probe type definitions
 */

export enum ProbeFailureReason {
  TIMEOUT = 'Timeout',
  UNREACHABLE = 'Unreachable',
  CONNECTION_REFUSED = 'ConnectionRefused',
  AUTH_FAILED = 'AuthFailed',
  UNKNOWN = 'Unknown',
}

export interface ProbeResult {
  reachable: boolean;
  reason?: ProbeFailureReason;
  host: string;
  /** Operator-facing, host-qualified reason; empty when reachable */
  message: string;
}

/**
 * `first` probes one representative host, `all` probes every host
 */
export type ProbeMode = 'first' | 'all';
