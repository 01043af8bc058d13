/**
 * Lock release command - Release the deployment lock
 */

import type { Command } from 'commander';
import inquirer from 'inquirer';
import { printInfo, printSuccess, printWarning } from '../../utils/output';
import { errorFromOutcome, withErrorHandler } from '../../utils/errors';
import { GateErrorKind } from '../../types';
import { canPrompt, createGate, loadCommandContext } from '../_helpers';

export function registerLockReleaseCommand(parent: Command): void {
  parent
    .command('release')
    .description('Release the deployment lock')
    .option('-y, --yes', 'Do not ask for confirmation when the lock is recent')
    .action(withErrorHandler(async (options: { yes?: boolean }, command: Command) => {
      const { config, globals } = loadCommandContext(command);
      const gate = createGate(config);

      const current = await gate.lockStatus();
      if (current.ok && current.status?.locked && !current.status.isStale && !options.yes && canPrompt(globals)) {
        printWarning(`Lock held by ${current.status.data?.performer ?? 'unknown'} for ${current.status.durationMinutes ?? 0} minutes`);
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: 'A deployment may still be running. Release the lock anyway?',
            default: false,
          },
        ]);
        if (!confirm) {
          printInfo('Lock kept');
          return;
        }
      }

      const outcome = await gate.release();
      if (outcome.ok) {
        printSuccess(outcome.message);
        return;
      }
      if (outcome.kind === GateErrorKind.INPUT) {
        printInfo(`${outcome.message}, nothing to release`);
        return;
      }
      throw errorFromOutcome(outcome);
    }));
}
