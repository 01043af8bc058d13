/**
 * Tests for input validation
 */

import { describe, it, expect } from 'vitest';
import { parseTopology, validateGateConfig } from './validation';

describe('parseTopology', () => {
  it('keeps role order from a Map', () => {
    const result = parseTopology(new Map<unknown, unknown>([
      ['servers', ['host2', 'host3']],
      ['master', 'host1'],
    ]));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect([...result.data.entries()]).toEqual([
      ['servers', { kind: 'many', hosts: ['host2', 'host3'] }],
      ['master', { kind: 'single', host: 'host1' }],
    ]);
  });

  it('accepts a plain object', () => {
    const result = parseTopology({ master: '10.0.0.1', servers: ['10.0.0.2'] });
    expect(result.success && [...result.data.keys()]).toEqual(['master', 'servers']);
  });

  it('renders numeric hosts and role names as strings', () => {
    const result = parseTopology(new Map<unknown, unknown>([[42, [7]]]));
    expect(result.success && result.data.get('42')).toEqual({ kind: 'many', hosts: ['7'] });
  });

  it('treats an absent document as an empty topology', () => {
    const result = parseTopology(null);
    expect(result.success && result.data.size).toBe(0);
  });

  it('rejects a document that is not a mapping', () => {
    const result = parseTopology(['master', 'host1']);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error[0].path).toBe('root');
  });

  it('reports bad host values against the role name', () => {
    const result = parseTopology({ master: 'host1', servers: [{ ip: 'host2' }] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error[0].path.startsWith('servers')).toBe(true);
  });

  it('rejects empty host names', () => {
    const result = parseTopology({ master: '' });
    expect(result.success).toBe(false);
  });
});

describe('validateGateConfig', () => {
  it('fills defaults for an empty file', () => {
    const result = validateGateConfig(null);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      lock: { path: 'deploy-gate.lock', stale_after_minutes: 30 },
      probe: { user: 'root', port: 22, timeout: 10, mode: 'first' },
    });
  });

  it('accepts a full configuration', () => {
    const result = validateGateConfig({
      lock: { path: '/var/run/deploy-gate.lock' },
      probe: { port: 2222, mode: 'all' },
      roles: {
        critical: ['api', 'db'],
        aggregate: { stack: ['api', 'db'] },
      },
      deploy: { command: './deploy.sh' },
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.probe).toEqual({ user: 'root', port: 2222, timeout: 10, mode: 'all' });
    expect(result.data.roles).toEqual({ critical: ['api', 'db'], aggregate: { stack: ['api', 'db'] }, optional: [] });
    expect(result.data.deploy).toEqual({ command: './deploy.sh', args: [] });
  });

  it('rejects an aggregate role implying a non-critical role', () => {
    const result = validateGateConfig({
      roles: { critical: ['api'], aggregate: { stack: ['api', 'cache'] } },
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toEqual([{
      path: 'roles.aggregate.stack',
      message: 'Aggregate role "stack" implies "cache", which is not a critical role',
      code: 'custom',
    }]);
  });

  it('rejects an invalid probe mode with its path', () => {
    const result = validateGateConfig({ probe: { mode: 'some' } });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error[0].path).toBe('probe.mode');
  });
});
