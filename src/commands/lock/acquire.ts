/**
 * Lock acquire command - Manually acquire the deployment lock
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { printSuccess } from '../../utils/output';
import { errorFromOutcome, withErrorHandler } from '../../utils/errors';
import { createGate, loadCommandContext } from '../_helpers';

export function registerLockAcquireCommand(parent: Command): void {
  parent
    .command('acquire')
    .description('Acquire the deployment lock (prevents deployments)')
    .option('-m, --message <message>', 'Lock message/reason')
    .action(withErrorHandler(async (options: { message?: string }, command: Command) => {
      const { config } = loadCommandContext(command);
      const outcome = await createGate(config).acquire(options.message || 'Manual lock via CLI');
      if (!outcome.ok) {
        throw errorFromOutcome(outcome);
      }

      printSuccess(outcome.message);
      console.log('');
      console.log(chalk.gray('  Deployments are now blocked.'));
      console.log(chalk.gray('  Release with: deploy-gate lock release'));
      if (options.message) {
        console.log(chalk.gray(`  Reason: ${options.message}`));
      }
    }));
}
