/**
 * Probe command - Check that the topology's hosts accept the root password
 */

import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { ENV_ROOT_PASSWORD } from '../constants';
import { loadTopologyFile } from '../utils/config';
import { printSuccess } from '../utils/output';
import { ErrorCode, ValidationError, errorFromOutcome, withErrorHandler } from '../utils/errors';
import { resolveNodeHosts } from '../services';
import { createGate, loadCommandContext, parseTimeout, resolveSecret } from './_helpers';

interface ProbeOptions {
  rootPassword?: string;
  timeout?: string;
  all?: boolean;
}

export function registerProbeCommand(program: Command): void {
  program
    .command('probe <file>')
    .description('Open an SSH session to the topology\'s hosts with the root password')
    .option('-r, --root-password <password>', `Root password (default: $${ENV_ROOT_PASSWORD})`)
    .option('-t, --timeout <seconds>', 'Probe timeout in seconds (overrides probe.timeout)')
    .option('--all', 'Probe every host instead of the first one')
    .action(withErrorHandler(async (file: string, options: ProbeOptions, command: Command) => {
      const { config, globals } = loadCommandContext(command);
      const mode = options.all ? 'all' : config.probe.mode;
      const gate = createGate(config, { probeTimeout: parseTimeout(options.timeout), probeMode: mode });

      const topology = loadTopologyFile(file);
      const topologyOutcome = gate.validateTopology(topology);
      if (!topologyOutcome.ok) {
        throw errorFromOutcome(topologyOutcome);
      }

      const rootPassword = await resolveSecret(options.rootPassword, ENV_ROOT_PASSWORD, {
        message: 'Root password for deployment machines:',
        globals,
      });
      if (!rootPassword) {
        throw new ValidationError('Root password not provided', ErrorCode.INVALID_ARGUMENT);
      }

      const hosts = resolveNodeHosts(topology);
      const spinner = ora(`Connecting to ${mode === 'all' ? `${hosts.length} host(s)` : hosts[0]}...`).start();
      const outcome = await gate.probeReachability(hosts, rootPassword);

      if (!outcome.ok) {
        spinner.fail('Probe failed');
        throw errorFromOutcome(outcome);
      }

      spinner.stop();
      printSuccess(`Connected to ${outcome.result?.host ?? hosts[0]}`);
      if (mode === 'first' && hosts.length > 1) {
        console.log(chalk.gray(`  ${hosts.length - 1} other host(s) not probed (use --all)`));
      }
    }));
}
