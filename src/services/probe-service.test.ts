/**
 * Tests for the remote preflight probe
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  RemotePreflightProbe,
  classifyProbeError,
  probeFailureMessage,
  type SessionRunner,
} from './probe-service';
import { ProbeFailureReason } from '../types';

function transportError(message: string, fields: { code?: string; level?: string }): Error {
  return Object.assign(new Error(message), fields);
}

function failingRunner(error: unknown): SessionRunner {
  return async () => {
    throw error;
  };
}

/** Never settles until aborted */
const hangingRunner: SessionRunner = (_conn, _command, { signal }) =>
  new Promise<void>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')));
  });

afterEach(() => {
  vi.useRealTimers();
});

describe('classifyProbeError', () => {
  it('maps ssh2 levels', () => {
    expect(classifyProbeError(transportError('Timed out while waiting for handshake', { level: 'client-timeout' })))
      .toBe(ProbeFailureReason.TIMEOUT);
    expect(classifyProbeError(transportError('All configured authentication methods failed', { level: 'client-authentication' })))
      .toBe(ProbeFailureReason.AUTH_FAILED);
  });

  it('maps socket error codes', () => {
    expect(classifyProbeError(transportError('x', { code: 'ETIMEDOUT', level: 'client-socket' })))
      .toBe(ProbeFailureReason.TIMEOUT);
    expect(classifyProbeError(transportError('x', { code: 'EHOSTUNREACH' }))).toBe(ProbeFailureReason.UNREACHABLE);
    expect(classifyProbeError(transportError('x', { code: 'ENETUNREACH' }))).toBe(ProbeFailureReason.UNREACHABLE);
    expect(classifyProbeError(transportError('x', { code: 'ECONNREFUSED' }))).toBe(ProbeFailureReason.CONNECTION_REFUSED);
  });

  it('falls back to Unknown', () => {
    expect(classifyProbeError(new Error('channel open failure'))).toBe(ProbeFailureReason.UNKNOWN);
    expect(classifyProbeError(transportError('x', { code: 'EPIPE' }))).toBe(ProbeFailureReason.UNKNOWN);
    expect(classifyProbeError('not an error')).toBe(ProbeFailureReason.UNKNOWN);
  });
});

describe('RemotePreflightProbe', () => {
  it('opens a root session to the first host and runs a no-op command', async () => {
    const runner = vi.fn<SessionRunner>(async () => undefined);
    const probe = new RemotePreflightProbe({ runner });

    const result = await probe.probe(['host1', 'host2'], 'test-secret', 10);

    expect(result).toEqual({ reachable: true, host: 'host1', message: '' });
    expect(runner).toHaveBeenCalledTimes(1);
    const [conn, command, options] = runner.mock.calls[0];
    expect(conn).toEqual({ host: 'host1', port: 22, user: 'root', password: 'test-secret' });
    expect(command).toBe('ls');
    expect(options.timeoutMs).toBe(10000);
  });

  it('uses the configured user and port', async () => {
    const runner = vi.fn<SessionRunner>(async () => undefined);
    await new RemotePreflightProbe({ runner, user: 'deploy', port: 2222 }).probe(['host1'], 'test-secret', 5);
    expect(runner.mock.calls[0][0]).toEqual({ host: 'host1', port: 2222, user: 'deploy', password: 'test-secret' });
  });

  it('reports refused connections with the host', async () => {
    const probe = new RemotePreflightProbe({
      runner: failingRunner(transportError('connect ECONNREFUSED 10.0.0.5:22', { code: 'ECONNREFUSED' })),
    });

    expect(await probe.probe(['10.0.0.5'], 'test-secret', 10)).toEqual({
      reachable: false,
      reason: ProbeFailureReason.CONNECTION_REFUSED,
      host: '10.0.0.5',
      message: 'Connection refused for 10.0.0.5',
    });
  });

  it('reports rejected credentials distinctly', async () => {
    const probe = new RemotePreflightProbe({
      runner: failingRunner(transportError('All configured authentication methods failed', { level: 'client-authentication' })),
    });

    const result = await probe.probe(['node-a'], 'wrong-secret', 10);
    expect(result.reason).toBe(ProbeFailureReason.AUTH_FAILED);
    expect(result.message).toBe(
      'Authentication failed for node-a - Please ensure that the specified root password is correct'
    );
  });

  it('does not expose the raw error of an unclassified failure', async () => {
    const probe = new RemotePreflightProbe({
      runner: failingRunner(new Error('internal detail: key exchange blew up')),
    });

    const result = await probe.probe(['node-a'], 'test-secret', 10);
    expect(result.reason).toBe(ProbeFailureReason.UNKNOWN);
    expect(result.message).toBe('Unexpected runtime error connecting to node-a');
  });

  it('times out a session that never completes and aborts it', async () => {
    vi.useFakeTimers();
    let aborted = false;
    const runner: SessionRunner = (conn, command, options) => {
      options.signal.addEventListener('abort', () => {
        aborted = true;
      });
      return hangingRunner(conn, command, options);
    };
    const probe = new RemotePreflightProbe({ runner });

    const pending = probe.probe(['10.255.255.1'], 'test-secret', 2);
    await vi.advanceTimersByTimeAsync(2000);

    expect(await pending).toEqual({
      reachable: false,
      reason: ProbeFailureReason.TIMEOUT,
      host: '10.255.255.1',
      message: 'Connection timed out for 10.255.255.1',
    });
    expect(aborted).toBe(true);
  });

  it('returns within a bounded margin of the timeout', async () => {
    const probe = new RemotePreflightProbe({ runner: hangingRunner });

    const started = Date.now();
    const result = await probe.probe(['10.255.255.1'], 'test-secret', 0.2);
    const elapsed = Date.now() - started;

    expect(result.reachable).toBe(false);
    expect(result.reason).toBe(ProbeFailureReason.TIMEOUT);
    expect(elapsed).toBeLessThan(1500);
  });

  it('returns Unknown for an empty host list', async () => {
    const runner = vi.fn<SessionRunner>(async () => undefined);
    const result = await new RemotePreflightProbe({ runner }).probe([], 'test-secret', 10);
    expect(result).toEqual({
      reachable: false,
      reason: ProbeFailureReason.UNKNOWN,
      host: '',
      message: 'Unexpected runtime error connecting to ',
    });
    expect(runner).not.toHaveBeenCalled();
  });

  describe('probeAll', () => {
    it('probes every host when all are reachable', async () => {
      const runner = vi.fn<SessionRunner>(async () => undefined);
      const result = await new RemotePreflightProbe({ runner }).probeAll(['a', 'b', 'c'], 'test-secret', 10);
      expect(result).toEqual({ reachable: true, host: 'c', message: '' });
      expect(runner.mock.calls.map(([conn]) => conn.host)).toEqual(['a', 'b', 'c']);
    });

    it('stops at the first unreachable host', async () => {
      const runner = vi.fn<SessionRunner>(async (conn) => {
        if (conn.host === 'b') {
          throw transportError('connect EHOSTUNREACH', { code: 'EHOSTUNREACH' });
        }
      });
      const result = await new RemotePreflightProbe({ runner }).probeWithMode('all', ['a', 'b', 'c'], 'test-secret', 10);
      expect(result.message).toBe('Host unreachable error for b');
      expect(runner).toHaveBeenCalledTimes(2);
    });
  });

  it('probes only the first host in first mode', async () => {
    const runner = vi.fn<SessionRunner>(async () => undefined);
    await new RemotePreflightProbe({ runner }).probeWithMode('first', ['a', 'b'], 'test-secret', 10);
    expect(runner).toHaveBeenCalledTimes(1);
  });
});

describe('probeFailureMessage', () => {
  it('qualifies every reason with the host', () => {
    expect(probeFailureMessage(ProbeFailureReason.TIMEOUT, 'h')).toBe('Connection timed out for h');
    expect(probeFailureMessage(ProbeFailureReason.UNREACHABLE, 'h')).toBe('Host unreachable error for h');
  });
});
