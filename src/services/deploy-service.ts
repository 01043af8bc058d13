/**
 * Deploy Service
 *
 * The deployment itself runs outside the gate. A Deployer is the single
 * call the gate makes once a request is admitted; CommandDeployer starts
 * the configured deploy command and waits for it to exit.
 */

import { spawn } from 'child_process';
import type { DeployConfig } from '../schemas';
import type { TopologyRequest } from '../types';
import { expandHosts } from '../types';
import { printDebug } from '../utils/output';

export interface DeployOptions {
  keyName: string;
  rootPassword: string;
  hosts: readonly string[];
  topology: TopologyRequest;
}

export interface DeployOutcome {
  success: boolean;
  exitCode: number;
  message: string;
  /** Set when the command was stopped by a signal */
  signal?: NodeJS.Signals;
}

export interface Deployer {
  deploy(options: DeployOptions): Promise<DeployOutcome>;
}

export interface CommandDeployerOptions {
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
  /** Where SIGINT/SIGTERM are received; defaults to process */
  signalSource?: NodeJS.EventEmitter;
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Topology as a plain role → hosts object
 */
export function topologyToJson(topology: TopologyRequest): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const [role, spec] of topology) {
    result[role] = expandHosts(spec);
  }
  return result;
}

/**
 * Environment handed to the deploy command
 */
export function buildDeployEnv(options: DeployOptions): Record<string, string> {
  return {
    DEPLOY_GATE_KEYNAME: options.keyName,
    DEPLOY_GATE_ROOT_PASSWORD: options.rootPassword,
    DEPLOY_GATE_HOSTS: options.hosts.join(','),
    DEPLOY_GATE_TOPOLOGY: JSON.stringify(topologyToJson(options.topology)),
  };
}

/**
 * Runs the deploy command from deploy-gate.yml
 */
export class CommandDeployer implements Deployer {
  constructor(
    private readonly config: DeployConfig,
    private readonly options: CommandDeployerOptions = {}
  ) {}

  /**
   * While the command runs, SIGINT and SIGTERM are forwarded to it instead
   * of stopping this process, so the caller still sees the command exit.
   */
  deploy(options: DeployOptions): Promise<DeployOutcome> {
    const signalSource: NodeJS.EventEmitter = this.options.signalSource ?? process;

    return new Promise((resolve, reject) => {
      const proc = spawn(this.config.command, this.config.args, {
        cwd: this.config.cwd,
        env: { ...process.env, ...buildDeployEnv(options) },
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      proc.stdout.on('data', (data: Buffer) => {
        const str = data.toString();
        if (this.options.onStdout) {
          this.options.onStdout(str);
        } else {
          process.stdout.write(str);
        }
      });

      proc.stderr.on('data', (data: Buffer) => {
        const str = data.toString();
        if (this.options.onStderr) {
          this.options.onStderr(str);
        } else {
          process.stderr.write(str);
        }
      });

      const forward = (signal: NodeJS.Signals): void => {
        printDebug('Forwarding signal to deploy command', { signal, pid: proc.pid });
        proc.kill(signal);
      };
      for (const signal of FORWARDED_SIGNALS) {
        signalSource.on(signal, forward);
      }
      const detach = (): void => {
        for (const signal of FORWARDED_SIGNALS) {
          signalSource.off(signal, forward);
        }
      };

      proc.on('error', (error) => {
        detach();
        reject(new Error(`Deploy command could not be started: ${error.message}`));
      });

      proc.on('close', (code, signal) => {
        detach();
        if (signal) {
          resolve({
            success: false,
            exitCode: code ?? 1,
            message: `Deploy command was stopped by ${signal}`,
            signal,
          });
          return;
        }
        const exitCode = code ?? 1;
        resolve({
          success: exitCode === 0,
          exitCode,
          message: exitCode === 0
            ? 'Deployment completed'
            : `Deploy command exited with code ${exitCode}`,
        });
      });
    });
  }
}
