/**
 * Lock status command - Show current lock status
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { printInfo, printSuccess, printWarning } from '../../utils/output';
import { errorFromOutcome, withErrorHandler } from '../../utils/errors';
import { createGate, loadCommandContext } from '../_helpers';

export function registerLockStatusCommand(parent: Command): void {
  parent
    .command('status')
    .description('Show deployment lock status')
    .action(withErrorHandler(async (_options: Record<string, never>, command: Command) => {
      const { config } = loadCommandContext(command);
      const outcome = await createGate(config).lockStatus();
      if (!outcome.ok || !outcome.status) {
        throw errorFromOutcome(outcome);
      }

      const { status } = outcome;
      if (!status.locked) {
        printSuccess('No active deployment lock');
        console.log(chalk.gray('  Deployments are allowed.'));
        return;
      }

      console.log('');
      if (!status.data) {
        printWarning('Lock file exists but could not be parsed');
        console.log(chalk.gray(`  File: ${config.lock.path}`));
        console.log(chalk.gray('  Release it with: deploy-gate lock release'));
        return;
      }

      if (status.isStale) {
        printWarning(`Lock is STALE (${status.durationMinutes} minutes old)`);
      } else {
        printInfo('Deployment is LOCKED');
      }

      console.log('');
      console.log(chalk.white('  Lock Details:'));
      console.log(chalk.gray(`    Holder:    ${status.data.performer}`));
      console.log(chalk.gray(`    Started:   ${status.data.started_at}`));
      console.log(chalk.gray(`    Duration:  ${status.durationMinutes} minutes`));
      if (status.data.message) {
        console.log(chalk.gray(`    Message:   ${status.data.message}`));
      }
      console.log('');

      if (status.isStale) {
        console.log(chalk.yellow('  The deployment holding this lock may have crashed.'));
        console.log(chalk.yellow('  Stale locks are never released automatically; run: deploy-gate lock release'));
      } else {
        console.log(chalk.gray('  A deployment is in progress. Wait for it to complete.'));
      }
    }));
}
