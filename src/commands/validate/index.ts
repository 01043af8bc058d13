/**
 * Validate commands - Run individual admission checks
 */

import type { Command } from 'commander';
import { registerValidateCredentialsCommand } from './credentials';
import { registerValidateTopologyCommand } from './topology';

/**
 * Register all validation commands under 'deploy-gate validate <cmd>'
 */
export function registerValidateCommands(program: Command): void {
  const validate = program
    .command('validate')
    .description('Run individual admission checks');

  registerValidateCredentialsCommand(validate);
  registerValidateTopologyCommand(validate);
}
