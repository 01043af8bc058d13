/**
 * Schema validation for deploy-gate.yml
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import {
  DEFAULT_LOCK_PATH,
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  LOCK_STALE_THRESHOLD_MINUTES,
} from '../constants';

const RoleNameSchema = z.string()
  .min(1, 'Role name cannot be empty')
  .max(63, 'Role name must be 63 characters or less');

/**
 * Deployment lock configuration schema
 */
export const LockConfigSchema = z.object({
  path: z.string()
    .min(1, 'Lock path cannot be empty')
    .default(DEFAULT_LOCK_PATH)
    .describe('Marker file whose presence means a deployment is in progress'),

  stale_after_minutes: z.number()
    .int()
    .positive()
    .default(LOCK_STALE_THRESHOLD_MINUTES)
    .describe('Age after which lock status reports the lock as stale'),
});

/**
 * Remote preflight probe configuration schema
 */
export const ProbeConfigSchema = z.object({
  user: z.string()
    .min(1)
    .max(32, 'Username must be 32 characters or less')
    .default(DEFAULT_SSH_USER)
    .describe('Privileged account used for the probe session'),

  port: z.number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_SSH_PORT)
    .describe('SSH port of the target hosts'),

  timeout: z.number()
    .positive('Probe timeout must be positive')
    .max(300, 'Probe timeout must be 300 seconds or less')
    .default(DEFAULT_PROBE_TIMEOUT)
    .describe('Timeout in seconds for the whole probe attempt'),

  mode: z.enum(['first', 'all'])
    .default('first')
    .describe('Probe the first resolved host only, or every host'),
});

/**
 * Role schema override
 */
export const RolesConfigSchema = z.object({
  critical: z.array(RoleNameSchema)
    .min(1, 'At least one critical role is required')
    .describe('Roles every topology must cover, in reporting order'),

  aggregate: z.record(RoleNameSchema, z.array(RoleNameSchema))
    .default({})
    .describe('Composite roles and the critical roles they satisfy'),

  optional: z.array(RoleNameSchema)
    .default([])
    .describe('Roles accepted but not required'),
}).superRefine((roles, ctx) => {
  const critical = new Set(roles.critical);
  for (const [name, implied] of Object.entries(roles.aggregate)) {
    for (const role of implied) {
      if (!critical.has(role)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['aggregate', name],
          message: `Aggregate role "${name}" implies "${role}", which is not a critical role`,
        });
      }
    }
  }
});

/**
 * External deployment command
 */
export const DeployConfigSchema = z.object({
  command: z.string()
    .min(1, 'Deploy command cannot be empty')
    .describe('Executable started once a deployment is admitted'),

  args: z.array(z.string())
    .default([])
    .describe('Arguments passed to the deploy command'),

  cwd: z.string()
    .optional()
    .describe('Working directory of the deploy command'),
});

/**
 * Complete deploy-gate.yml configuration schema
 */
export const GateConfigSchema = z.object({
  lock: LockConfigSchema.default({}),
  probe: ProbeConfigSchema.default({}),
  roles: RolesConfigSchema.optional(),
  deploy: DeployConfigSchema.optional(),
});

export type GateConfig = z.output<typeof GateConfigSchema>;
export type RolesConfig = z.output<typeof RolesConfigSchema>;
export type DeployConfig = z.output<typeof DeployConfigSchema>;
