/**
 * Schema validation for topology files (role → host or list of hosts)
 */

import { z } from 'zod';

/**
 * A host is a non-empty string; numbers are accepted and rendered as-is
 */
export const HostSchema = z.union([
  z.string().trim().min(1, 'Host cannot be empty'),
  z.number().transform(String),
]);

export const HostValueSchema = z.union([
  HostSchema,
  z.array(HostSchema),
]);

/**
 * Role names may come back from the YAML parser as numbers
 */
export const RoleKeySchema = z.union([
  z.string(),
  z.number().transform(String),
]);

/**
 * Topology entries in declaration order
 */
export const TopologyEntriesSchema = z.array(
  z.tuple([RoleKeySchema, HostValueSchema])
);

export type TopologyEntries = z.output<typeof TopologyEntriesSchema>;
