/**
 * Topology Service
 *
 * Checks a requested cluster topology against a role schema: every role
 * must be known, and every critical role must be covered either directly
 * or through an aggregate role that implies it.
 */

import type { RolesConfig } from '../schemas';
import type { RoleSchema, TopologyRequest, ValidationOutcome } from '../types';
import { expandHosts } from '../types';

/**
 * Standard role schema
 */
export const STANDARD_ROLE_SCHEMA: RoleSchema = {
  criticalRoles: ['appengine', 'loadbalancer', 'database', 'login', 'shadow', 'zookeeper'],
  aggregateRoles: new Map([
    ['master', ['shadow', 'loadbalancer', 'zookeeper', 'login']],
    ['controller', ['shadow', 'loadbalancer', 'zookeeper', 'database', 'login']],
    ['servers', ['appengine', 'database', 'loadbalancer']],
  ]),
  optionalRoles: ['open', 'memcache'],
};

/**
 * Build a RoleSchema from the `roles` section of deploy-gate.yml,
 * falling back to the standard schema
 */
export function roleSchemaFromConfig(roles?: RolesConfig): RoleSchema {
  if (!roles) {
    return STANDARD_ROLE_SCHEMA;
  }
  return {
    criticalRoles: [...roles.critical],
    aggregateRoles: new Map(Object.entries(roles.aggregate)),
    optionalRoles: [...roles.optional],
  };
}

export function isKnownRole(role: string, schema: RoleSchema): boolean {
  return schema.criticalRoles.includes(role)
    || schema.aggregateRoles.has(role)
    || schema.optionalRoles.includes(role);
}

/**
 * Render one summary block: the role, then one line per host
 */
function renderRoleBlock(role: string, hosts: string[]): string {
  return [role, ...hosts.map((host) => `  - ${host}`)].join('\n');
}

/**
 * Validate a topology request.
 *
 * Unknown roles stop validation at the first offending entry; missing
 * critical roles are reported together, in schema order. On success the
 * message is a summary of the topology in request order.
 */
export function validateTopology(
  request: TopologyRequest | null | undefined,
  schema: RoleSchema = STANDARD_ROLE_SCHEMA
): ValidationOutcome {
  if (!request || request.size === 0) {
    return { ok: false, message: 'Topology configuration not provided' };
  }

  const remaining = new Set(schema.criticalRoles);
  const blocks: string[] = [];

  for (const [role, hosts] of request) {
    if (!isKnownRole(role, schema)) {
      return { ok: false, message: `Unknown server role: ${role}` };
    }

    remaining.delete(role);
    for (const implied of schema.aggregateRoles.get(role) ?? []) {
      remaining.delete(implied);
    }

    blocks.push(renderRoleBlock(role, expandHosts(hosts)));
  }

  if (remaining.size > 0) {
    return {
      ok: false,
      message: `Following required roles are not configured: ${[...remaining].join(', ')}`,
    };
  }

  return { ok: true, message: blocks.join('\n') };
}

/**
 * Distinct hosts of a topology in first-appearance order
 */
export function resolveNodeHosts(request: TopologyRequest): string[] {
  const hosts = new Set<string>();
  for (const spec of request.values()) {
    for (const host of expandHosts(spec)) {
      hosts.add(host);
    }
  }
  return [...hosts];
}
