/**
 * Topology type definitions
 */

/**
 * Role classification used to validate a topology.
 * Critical roles are listed in declaration order, which is also the order
 * used when reporting missing roles.
 */
export interface RoleSchema {
  criticalRoles: readonly string[];
  aggregateRoles: ReadonlyMap<string, readonly string[]>;
  optionalRoles: readonly string[];
}

/**
 * Hosts assigned to a role: either a single host or an ordered list
 */
export type HostSpec =
  | { kind: 'single'; host: string }
  | { kind: 'many'; hosts: readonly string[] };

/**
 * Role name → hosts, in the order the roles were declared
 */
export type TopologyRequest = ReadonlyMap<string, HostSpec>;

export function singleHost(host: string): HostSpec {
  return { kind: 'single', host };
}

export function manyHosts(hosts: readonly string[]): HostSpec {
  return { kind: 'many', hosts };
}

/**
 * Expand a HostSpec to the list of hosts it names
 */
export function expandHosts(spec: HostSpec): string[] {
  return spec.kind === 'single' ? [spec.host] : [...spec.hosts];
}
