/**
 * Lock commands - Manage the deployment lock
 * Prevents concurrent deployments against the same controller
 */

import type { Command } from 'commander';
import { registerLockAcquireCommand } from './acquire';
import { registerLockReleaseCommand } from './release';
import { registerLockStatusCommand } from './status';

/**
 * Register all lock commands under 'deploy-gate lock <cmd>'
 */
export function registerLockCommands(program: Command): void {
  const lock = program
    .command('lock')
    .description('Manage the deployment lock');

  registerLockAcquireCommand(lock);
  registerLockReleaseCommand(lock);
  registerLockStatusCommand(lock);
}
