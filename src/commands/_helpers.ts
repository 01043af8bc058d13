/**
 * Shared helpers for gate commands
 */

import type { Command } from 'commander';
import inquirer from 'inquirer';
import { loadGateConfig } from '../utils/config';
import { loadSecrets } from '../utils/secrets';
import { setVerbose } from '../utils/output';
import { ConfigError } from '../utils/errors';
import type { GateConfig } from '../schemas';
import {
  CommandDeployer,
  DeploymentGate,
  FileLocker,
  RemotePreflightProbe,
  roleSchemaFromConfig,
} from '../services';

/**
 * Options defined on the root program
 */
export interface GlobalOptions {
  config?: string;
  debug?: boolean;
  interactive: boolean;
}

export interface CommandContext {
  config: GateConfig;
  globals: GlobalOptions;
}

/**
 * Load secrets and configuration for a command
 */
export function loadCommandContext(command: Command): CommandContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  if (globals.debug) {
    setVerbose(true);
  }
  loadSecrets();
  return { config: loadGateConfig(globals.config), globals };
}

export function createLocker(config: GateConfig): FileLocker {
  return new FileLocker(config.lock.path, { staleAfterMinutes: config.lock.stale_after_minutes });
}

export function createProbe(config: GateConfig): RemotePreflightProbe {
  return new RemotePreflightProbe({ user: config.probe.user, port: config.probe.port });
}

/**
 * Build a DeploymentGate from deploy-gate.yml
 */
export function createGate(config: GateConfig, overrides: { probeTimeout?: number; probeMode?: 'first' | 'all' } = {}): DeploymentGate {
  return new DeploymentGate({
    schema: roleSchemaFromConfig(config.roles),
    probe: createProbe(config),
    locker: createLocker(config),
    deployer: config.deploy ? new CommandDeployer(config.deploy) : undefined,
    probeMode: overrides.probeMode ?? config.probe.mode,
    probeTimeout: overrides.probeTimeout ?? config.probe.timeout,
  });
}

/**
 * Whether prompts can be shown
 */
export function canPrompt(globals: GlobalOptions): boolean {
  return globals.interactive && Boolean(process.stdin.isTTY);
}

export async function promptSecret(message: string, masked = true): Promise<string> {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: masked ? 'password' : 'input',
      name: 'answer',
      message,
      mask: masked ? '*' : undefined,
    },
  ]);
  return answer;
}

/**
 * Value from the command line, then the environment, then an
 * interactive prompt when allowed
 */
export async function resolveSecret(
  value: string | undefined,
  envName: string,
  prompt: { message: string; globals: GlobalOptions; masked?: boolean }
): Promise<string | undefined> {
  const resolved = value ?? process.env[envName];
  if (resolved !== undefined || !canPrompt(prompt.globals)) {
    return resolved;
  }
  return promptSecret(prompt.message, prompt.masked ?? true);
}

/**
 * Parse a --timeout value in seconds
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`Invalid timeout: ${value}`, 'Use a positive number of seconds');
  }
  return seconds;
}
