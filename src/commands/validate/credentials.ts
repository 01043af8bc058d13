/**
 * Validate credentials command - Check administrator credentials
 */

import type { Command } from 'commander';
import { ENV_ADMIN_PASSWORD, ENV_ADMIN_USER } from '../../constants';
import { printSuccess } from '../../utils/output';
import { errorFromOutcome, withErrorHandler } from '../../utils/errors';
import { canPrompt, createGate, loadCommandContext, promptSecret, resolveSecret } from '../_helpers';

interface CredentialsOptions {
  user?: string;
  password?: string;
  confirm?: string;
}

export function registerValidateCredentialsCommand(parent: Command): void {
  parent
    .command('credentials')
    .description('Validate the administrator username and password')
    .option('-u, --user <name>', `Administrator username (default: $${ENV_ADMIN_USER})`)
    .option('-p, --password <password>', `Administrator password (default: $${ENV_ADMIN_PASSWORD})`)
    .option('-c, --confirm <password>', 'Password confirmation (prompted when interactive)')
    .action(withErrorHandler(async (options: CredentialsOptions, command: Command) => {
      const { config, globals } = loadCommandContext(command);
      const gate = createGate(config);

      const user = options.user ?? process.env[ENV_ADMIN_USER];
      const prompted = options.password === undefined
        && process.env[ENV_ADMIN_PASSWORD] === undefined
        && canPrompt(globals);
      const password = await resolveSecret(options.password, ENV_ADMIN_PASSWORD, {
        message: 'Administrator password:',
        globals,
      });

      // A prompted password is confirmed by a second prompt; otherwise
      // the confirmation is --confirm, or the password itself
      const confirm = options.confirm ?? (prompted ? await promptSecret('Confirm password:') : password);

      const outcome = gate.validateCredentials(user, password, confirm);
      if (!outcome.ok) {
        throw errorFromOutcome(outcome);
      }
      printSuccess(`Credentials valid for ${user}`);
    }));
}
