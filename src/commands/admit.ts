/**
 * Admit command
 * Runs the full admission pipeline and, once admitted, the deployment:
 *
 *   credentials → ssh-credentials → topology → probe → lock → deploy
 *
 * The first failing stage stops the run. The lock is held only while
 * the deploy command runs.
 */

import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import {
  ENV_ADMIN_PASSWORD,
  ENV_ADMIN_USER,
  ENV_KEYNAME,
  ENV_ROOT_PASSWORD,
} from '../constants';
import { loadTopologyFile } from '../utils/config';
import { printHeader, printInfo, printSuccess, printWarning } from '../utils/output';
import { CLIError, ConfigError, ErrorCode, errorFromOutcome, withErrorHandler } from '../utils/errors';
import type { AdmissionStage } from '../services';
import { canPrompt, createGate, loadCommandContext, parseTimeout, promptSecret, resolveSecret } from './_helpers';

interface AdmitOptions {
  user?: string;
  password?: string;
  confirm?: string;
  keyname?: string;
  rootPassword?: string;
  timeout?: string;
  all?: boolean;
  message?: string;
  dryRun?: boolean;
}

const STAGE_LABELS: Record<AdmissionStage, string> = {
  'credentials': 'Checking administrator credentials...',
  'ssh-credentials': 'Checking SSH credentials...',
  'topology': 'Validating topology...',
  'probe': 'Probing deployment hosts...',
  'lock': 'Acquiring deployment lock...',
  'deploy': 'Deploying...',
};

export function registerAdmitCommand(program: Command): void {
  program
    .command('admit <file>')
    .description('Run every admission check, then the deployment')
    .option('-u, --user <name>', `Administrator username (default: $${ENV_ADMIN_USER})`)
    .option('-p, --password <password>', `Administrator password (default: $${ENV_ADMIN_PASSWORD})`)
    .option('-c, --confirm <password>', 'Administrator password confirmation')
    .option('-k, --keyname <name>', `Deployment key name (default: $${ENV_KEYNAME})`)
    .option('-r, --root-password <password>', `Root password of the hosts (default: $${ENV_ROOT_PASSWORD})`)
    .option('-t, --timeout <seconds>', 'Probe timeout in seconds (overrides probe.timeout)')
    .option('--all', 'Probe every host instead of the first one')
    .option('-m, --message <message>', 'Message recorded in the lock')
    .option('--dry-run', 'Run the checks only: no lock, no deployment')
    .action(withErrorHandler(async (file: string, options: AdmitOptions, command: Command) => {
      const { config, globals } = loadCommandContext(command);

      if (!options.dryRun && !config.deploy) {
        throw new ConfigError('No deploy command configured', 'Add a deploy.command entry to deploy-gate.yml, or use --dry-run');
      }

      const gate = createGate(config, {
        probeTimeout: parseTimeout(options.timeout),
        probeMode: options.all ? 'all' : undefined,
      });

      printHeader(options.dryRun ? 'Deployment admission (dry run)' : 'Deployment admission');
      console.log('');

      const topology = loadTopologyFile(file);

      const adminUser = options.user ?? process.env[ENV_ADMIN_USER]
        ?? (canPrompt(globals) ? await promptSecret('Administrator username:', false) : undefined);
      const passwordPrompted = options.password === undefined
        && process.env[ENV_ADMIN_PASSWORD] === undefined
        && canPrompt(globals);
      const adminPassword = await resolveSecret(options.password, ENV_ADMIN_PASSWORD, {
        message: 'Administrator password:',
        globals,
      });
      const adminPasswordConfirm = options.confirm
        ?? (passwordPrompted ? await promptSecret('Confirm password:') : adminPassword);
      const keyName = await resolveSecret(options.keyname, ENV_KEYNAME, {
        message: 'Deployment key name:',
        globals,
        masked: false,
      });
      const rootPassword = await resolveSecret(options.rootPassword, ENV_ROOT_PASSWORD, {
        message: 'Root password for deployment machines:',
        globals,
      });

      const spinner = ora();
      const outcome = await gate.admit(
        {
          adminUser,
          adminPassword,
          adminPasswordConfirm,
          keyName,
          rootPassword,
          topology,
          message: options.message,
        },
        {
          dryRun: options.dryRun,
          onStage: (stage) => {
            if (stage === 'deploy') {
              // Deploy output goes straight to the terminal
              if (spinner.isSpinning) {
                spinner.succeed();
              }
              printSuccess('Admitted');
              printInfo('Starting deployment');
              console.log('');
              return;
            }
            if (spinner.isSpinning) {
              spinner.succeed();
            }
            spinner.start(STAGE_LABELS[stage]);
          },
        }
      );

      if (!outcome.ok) {
        if (spinner.isSpinning) {
          spinner.fail();
        }
        if (outcome.lockReleased === false) {
          printWarning('The deployment lock could not be released; run: deploy-gate lock release');
        }
        if (outcome.deploy?.signal) {
          throw new CLIError(outcome.message, ErrorCode.INTERRUPTED);
        }
        throw errorFromOutcome(outcome);
      }

      if (spinner.isSpinning) {
        spinner.succeed();
      }

      if (outcome.summary) {
        console.log('');
        console.log(chalk.white('  Topology:'));
        for (const line of outcome.summary.split('\n')) {
          console.log(chalk.gray(`    ${line}`));
        }
      }

      console.log('');
      printSuccess(outcome.message);
      if (outcome.lockReleased === false) {
        printWarning('The deployment lock could not be released; run: deploy-gate lock release');
      }
    }));
}
