/**
 * Tests for topology validation
 */

import { describe, it, expect } from 'vitest';
import {
  STANDARD_ROLE_SCHEMA,
  resolveNodeHosts,
  roleSchemaFromConfig,
  validateTopology,
} from './topology-service';
import { manyHosts, singleHost, type HostSpec, type RoleSchema } from '../types';

function topology(entries: [string, HostSpec][]): Map<string, HostSpec> {
  return new Map(entries);
}

describe('validateTopology', () => {
  it('accepts master + servers and summarizes roles in input order', () => {
    const outcome = validateTopology(topology([
      ['master', singleHost('host1')],
      ['servers', manyHosts(['host2', 'host3'])],
    ]));

    expect(outcome).toEqual({
      ok: true,
      message: 'master\n  - host1\nservers\n  - host2\n  - host3',
    });
  });

  it('reports critical roles a lone master leaves uncovered', () => {
    const outcome = validateTopology(topology([['master', singleHost('host1')]]));

    expect(outcome).toEqual({
      ok: false,
      message: 'Following required roles are not configured: appengine, database',
    });
  });

  it('accepts a controller with explicit appengine', () => {
    const outcome = validateTopology(topology([
      ['controller', singleHost('10.0.0.1')],
      ['appengine', manyHosts(['10.0.0.2'])],
    ]));
    expect(outcome.ok).toBe(true);
  });

  it('accepts every critical role listed individually plus optional roles', () => {
    const outcome = validateTopology(topology([
      ['appengine', singleHost('a')],
      ['loadbalancer', singleHost('b')],
      ['database', singleHost('c')],
      ['login', singleHost('d')],
      ['shadow', singleHost('e')],
      ['zookeeper', singleHost('f')],
      ['memcache', singleHost('g')],
      ['open', manyHosts(['h', 'i'])],
    ]));
    expect(outcome.ok).toBe(true);
  });

  it('lists every missing role in schema order', () => {
    const outcome = validateTopology(topology([['open', singleHost('host1')]]));
    expect(outcome.message).toBe(
      'Following required roles are not configured: appengine, loadbalancer, database, login, shadow, zookeeper'
    );
  });

  it('stops at the first unknown role', () => {
    const outcome = validateTopology(topology([
      ['master', singleHost('host1')],
      ['webserver', singleHost('host2')],
      ['servers', manyHosts(['host3'])],
      ['cache', singleHost('host4')],
    ]));

    expect(outcome).toEqual({ ok: false, message: 'Unknown server role: webserver' });
  });

  it('rejects an unknown role even when coverage would be complete', () => {
    const outcome = validateTopology(topology([
      ['bogus', singleHost('host0')],
      ['controller', singleHost('host1')],
      ['servers', singleHost('host2')],
    ]));
    expect(outcome.message).toBe('Unknown server role: bogus');
  });

  it('fails for an empty or absent topology', () => {
    expect(validateTopology(new Map())).toEqual({ ok: false, message: 'Topology configuration not provided' });
    expect(validateTopology(undefined).message).toBe('Topology configuration not provided');
  });

  it('does not modify the schema between runs', () => {
    validateTopology(topology([
      ['master', singleHost('host1')],
      ['servers', singleHost('host2')],
    ]));
    const outcome = validateTopology(topology([['master', singleHost('host1')]]));
    expect(outcome.message).toBe('Following required roles are not configured: appengine, database');
    expect(STANDARD_ROLE_SCHEMA.criticalRoles).toHaveLength(6);
  });

  it('validates against a custom schema', () => {
    const schema: RoleSchema = {
      criticalRoles: ['api', 'db'],
      aggregateRoles: new Map([['all-in-one', ['api', 'db']]]),
      optionalRoles: [],
    };
    expect(validateTopology(topology([['all-in-one', singleHost('box')]]), schema).ok).toBe(true);
    expect(validateTopology(topology([['api', singleHost('box')]]), schema).message).toBe(
      'Following required roles are not configured: db'
    );
    expect(validateTopology(topology([['master', singleHost('box')]]), schema).message).toBe(
      'Unknown server role: master'
    );
  });
});

describe('resolveNodeHosts', () => {
  it('returns distinct hosts in first-appearance order', () => {
    const hosts = resolveNodeHosts(topology([
      ['master', singleHost('host1')],
      ['servers', manyHosts(['host2', 'host1', 'host3'])],
      ['open', singleHost('host2')],
    ]));
    expect(hosts).toEqual(['host1', 'host2', 'host3']);
  });
});

describe('roleSchemaFromConfig', () => {
  it('falls back to the standard schema', () => {
    expect(roleSchemaFromConfig(undefined)).toBe(STANDARD_ROLE_SCHEMA);
  });

  it('builds a schema from the roles section', () => {
    const schema = roleSchemaFromConfig({
      critical: ['api', 'db'],
      aggregate: { stack: ['api', 'db'] },
      optional: ['metrics'],
    });
    expect(schema.criticalRoles).toEqual(['api', 'db']);
    expect(schema.aggregateRoles.get('stack')).toEqual(['api', 'db']);
    expect(schema.optionalRoles).toEqual(['metrics']);
  });
});
