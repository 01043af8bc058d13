/**
 * Remote Preflight Probe
 *
 * Opens one password-authenticated SSH session to a deployment host, runs
 * a no-op command and classifies the outcome. A single bounded attempt:
 * no retries.
 */

import { Client as SSHClient } from 'ssh2';
import { DEFAULT_SSH_PORT, DEFAULT_SSH_USER, PROBE_COMMAND } from '../constants';
import { printDebug } from '../utils/output';
import type { ProbeMode, ProbeResult, SSHPasswordConnection } from '../types';
import { ProbeFailureReason } from '../types';

/**
 * Runs `command` over a remote session and resolves once the session
 * has been closed. Rejects with the transport error on failure.
 * Must stop and release the session when `signal` aborts.
 */
export type SessionRunner = (
  conn: SSHPasswordConnection,
  command: string,
  options: { timeoutMs: number; signal: AbortSignal }
) => Promise<void>;

export interface ProbeOptions {
  user?: string;
  port?: number;
  runner?: SessionRunner;
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT']);
const UNREACHABLE_CODES = new Set(['EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN', 'ENOTFOUND', 'EAI_AGAIN']);
const REFUSED_CODES = new Set(['ECONNREFUSED']);

const REASON_MESSAGES: Record<ProbeFailureReason, (host: string) => string> = {
  [ProbeFailureReason.TIMEOUT]: (host) => `Connection timed out for ${host}`,
  [ProbeFailureReason.UNREACHABLE]: (host) => `Host unreachable error for ${host}`,
  [ProbeFailureReason.CONNECTION_REFUSED]: (host) => `Connection refused for ${host}`,
  [ProbeFailureReason.AUTH_FAILED]: (host) =>
    `Authentication failed for ${host} - Please ensure that the specified root password is correct`,
  [ProbeFailureReason.UNKNOWN]: (host) => `Unexpected runtime error connecting to ${host}`,
};

export function probeFailureMessage(reason: ProbeFailureReason, host: string): string {
  return REASON_MESSAGES[reason](host);
}

/**
 * Map a transport error onto a probe failure reason.
 * ssh2 tags handshake timeouts and rejected credentials with `level`;
 * socket failures carry the system error `code`.
 */
export function classifyProbeError(error: unknown): ProbeFailureReason {
  if (!(error instanceof Error)) {
    return ProbeFailureReason.UNKNOWN;
  }

  const level = 'level' in error && typeof error.level === 'string' ? error.level : undefined;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  if (level === 'client-timeout') return ProbeFailureReason.TIMEOUT;
  if (level === 'client-authentication') return ProbeFailureReason.AUTH_FAILED;

  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) return ProbeFailureReason.TIMEOUT;
    if (UNREACHABLE_CODES.has(code)) return ProbeFailureReason.UNREACHABLE;
    if (REFUSED_CODES.has(code)) return ProbeFailureReason.CONNECTION_REFUSED;
  }

  return ProbeFailureReason.UNKNOWN;
}

/**
 * Default session runner backed by ssh2
 */
export const runSsh2Session: SessionRunner = (conn, command, { timeoutMs, signal }) =>
  new Promise<void>((resolve, reject) => {
    const client = new SSHClient();
    let settled = false;

    const settle = (error?: Error): void => {
      if (settled) return;
      settled = true;
      signal.removeEventListener('abort', onAbort);
      client.end();
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const onAbort = (): void => settle(new Error('Session aborted'));

    if (signal.aborted) {
      settle(new Error('Session aborted'));
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    client.on('ready', () => {
      client.exec(command, (execErr, stream) => {
        if (execErr) {
          settle(execErr);
          return;
        }
        stream.on('close', () => settle());
        // Drain output so the channel can close
        stream.resume();
        stream.stderr.resume();
      });
    });

    client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
      finish(prompts.map(() => conn.password));
    });

    client.on('error', (error) => settle(error));

    client.on('close', () => settle(new Error('Connection closed before the command completed')));

    client.connect({
      host: conn.host,
      port: conn.port,
      username: conn.user,
      password: conn.password,
      tryKeyboard: true,
      hostVerifier: () => true,
      readyTimeout: timeoutMs,
    });
  });

function failure(host: string, reason: ProbeFailureReason): ProbeResult {
  return { reachable: false, reason, host, message: probeFailureMessage(reason, host) };
}

/**
 * Remote Preflight Probe - checks that deployment hosts accept the root password
 */
export class RemotePreflightProbe {
  private readonly user: string;
  private readonly port: number;
  private readonly runner: SessionRunner;

  constructor(options: ProbeOptions = {}) {
    this.user = options.user ?? DEFAULT_SSH_USER;
    this.port = options.port ?? DEFAULT_SSH_PORT;
    this.runner = options.runner ?? runSsh2Session;
  }

  /**
   * Probe the first host of the list.
   * Hosts are assumed to share network and root password, so one
   * reachable host stands for the fleet.
   */
  async probe(hosts: readonly string[], rootPassword: string, timeoutSeconds: number): Promise<ProbeResult> {
    const [host] = hosts;
    if (host === undefined) {
      return failure('', ProbeFailureReason.UNKNOWN);
    }
    return this.probeHost(host, rootPassword, timeoutSeconds);
  }

  /**
   * Probe every host in turn, stopping at the first failure
   */
  async probeAll(hosts: readonly string[], rootPassword: string, timeoutSeconds: number): Promise<ProbeResult> {
    if (hosts.length === 0) {
      return failure('', ProbeFailureReason.UNKNOWN);
    }

    let last: ProbeResult | undefined;
    for (const host of hosts) {
      last = await this.probeHost(host, rootPassword, timeoutSeconds);
      if (!last.reachable) {
        return last;
      }
    }
    return last ?? failure('', ProbeFailureReason.UNKNOWN);
  }

  async probeWithMode(
    mode: ProbeMode,
    hosts: readonly string[],
    rootPassword: string,
    timeoutSeconds: number
  ): Promise<ProbeResult> {
    return mode === 'all'
      ? this.probeAll(hosts, rootPassword, timeoutSeconds)
      : this.probe(hosts, rootPassword, timeoutSeconds);
  }

  /**
   * Probe a single host. The timeout bounds the whole attempt:
   * connection, authentication and the command.
   */
  async probeHost(host: string, rootPassword: string, timeoutSeconds: number): Promise<ProbeResult> {
    const timeoutMs = Math.max(1, Math.round(timeoutSeconds * 1000));
    const controller = new AbortController();
    const conn: SSHPasswordConnection = { host, port: this.port, user: this.user, password: rootPassword };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const session = this.runner(conn, PROBE_COMMAND, { timeoutMs, signal: controller.signal })
        .then(() => 'done' as const);
      const outcome = await Promise.race([session, deadline]);

      if (outcome === 'timeout') {
        // The aborted session rejects after the race is decided
        void session.catch((error: unknown) => {
          printDebug('Probe session closed after timeout', {
            host,
            error: error instanceof Error ? error.message : String(error),
          });
        });
        controller.abort();
        printDebug('Probe timed out', { host, timeoutSeconds });
        return failure(host, ProbeFailureReason.TIMEOUT);
      }

      printDebug('Probe succeeded', { host });
      return { reachable: true, host, message: '' };
    } catch (error) {
      const reason = classifyProbeError(error);
      printDebug('Probe failed', { host, reason, error: error instanceof Error ? error.message : String(error) });
      return failure(host, reason);
    } finally {
      clearTimeout(timer);
    }
  }
}
