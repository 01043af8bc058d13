/**
 * Validate topology command - Check a topology file against the role schema
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadTopologyFile } from '../../utils/config';
import { printSuccess } from '../../utils/output';
import { errorFromOutcome, withErrorHandler } from '../../utils/errors';
import { resolveNodeHosts } from '../../services';
import { createGate, loadCommandContext } from '../_helpers';

export function registerValidateTopologyCommand(parent: Command): void {
  parent
    .command('topology <file>')
    .description('Validate a topology file (role → host or list of hosts)')
    .action(withErrorHandler(async (file: string, _options: Record<string, never>, command: Command) => {
      const { config } = loadCommandContext(command);
      const gate = createGate(config);

      const topology = loadTopologyFile(file);
      const outcome = gate.validateTopology(topology);
      if (!outcome.ok) {
        throw errorFromOutcome(outcome);
      }

      printSuccess('Topology is valid');
      console.log('');
      console.log(outcome.message);
      console.log('');
      console.log(chalk.gray(`  ${resolveNodeHosts(topology).length} distinct host(s)`));
    }));
}
