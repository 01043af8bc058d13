/**
 * deploy-gate CLI - Main entry point
 * Admission control for multi-node cluster deployments
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEPLOY_GATE_VERSION } from './constants';

// Commands
import { registerValidateCommands } from './commands/validate';
import { registerProbeCommand } from './commands/probe';
import { registerLockCommands } from './commands/lock';
import { registerAdmitCommand } from './commands/admit';

const program = new Command();

program
  .name('deploy-gate')
  .description('Admission control for multi-node cluster deployments')
  .version(DEPLOY_GATE_VERSION, '-v, --version', 'Show version information')
  .option('--config <path>', 'Path to deploy-gate.yml')
  .option('--debug', 'Show debug output')
  .option('--no-interactive', 'Never prompt for missing values')
  .option('--no-color', 'Disable colored output');

// Register all commands
registerValidateCommands(program);
registerProbeCommand(program);
registerLockCommands(program);
registerAdmitCommand(program);

// Default action (no command) - show quick help
program.action(() => {
  console.log(chalk.green('========================================================'));
  console.log(chalk.green(`   deploy-gate v${DEPLOY_GATE_VERSION}`));
  console.log(chalk.green('========================================================'));
  console.log('');
  console.log(chalk.cyan('Run with --help to see available commands'));
  console.log('');
  console.log(chalk.yellow('Checks:'));
  console.log('  deploy-gate validate credentials     Check administrator credentials');
  console.log('  deploy-gate validate topology <f>    Check a topology file');
  console.log('  deploy-gate probe <f>                SSH into the topology\'s hosts');
  console.log('');
  console.log(chalk.yellow('Deployment:'));
  console.log('  deploy-gate admit <f>                Run every check, then deploy');
  console.log('  deploy-gate admit <f> --dry-run      Run every check only');
  console.log('');
  console.log(chalk.yellow('Deployment lock:'));
  console.log('  deploy-gate lock status              Check lock status');
  console.log('  deploy-gate lock acquire             Block deployments');
  console.log('  deploy-gate lock release             Allow deployments');
});

// Error handling
program.showHelpAfterError('(add --help for additional information)');

// Parse arguments
await program.parseAsync(process.argv);
