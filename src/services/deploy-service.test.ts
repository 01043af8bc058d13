/**
 * Tests for the deploy command runner
 */

import { EventEmitter } from 'events';
import { describe, it, expect } from 'vitest';
import { CommandDeployer, buildDeployEnv, topologyToJson, type DeployOptions } from './deploy-service';
import { manyHosts, singleHost, type HostSpec } from '../types';

const options: DeployOptions = {
  keyName: 'test-key',
  rootPassword: 'root-secret',
  hosts: ['host1', 'host2'],
  topology: new Map<string, HostSpec>([
    ['controller', singleHost('host1')],
    ['servers', manyHosts(['host2'])],
  ]),
};

describe('buildDeployEnv', () => {
  it('passes credentials, hosts and topology', () => {
    expect(buildDeployEnv(options)).toEqual({
      DEPLOY_GATE_KEYNAME: 'test-key',
      DEPLOY_GATE_ROOT_PASSWORD: 'root-secret',
      DEPLOY_GATE_HOSTS: 'host1,host2',
      DEPLOY_GATE_TOPOLOGY: '{"controller":["host1"],"servers":["host2"]}',
    });
  });
});

describe('topologyToJson', () => {
  it('expands every role to a host list', () => {
    expect(topologyToJson(options.topology)).toEqual({ controller: ['host1'], servers: ['host2'] });
  });
});

describe('CommandDeployer', () => {
  it('runs the command with the deployment environment', async () => {
    let stdout = '';
    const deployer = new CommandDeployer(
      {
        command: process.execPath,
        args: ['-e', 'process.stdout.write(process.env.DEPLOY_GATE_KEYNAME + " " + process.env.DEPLOY_GATE_HOSTS)'],
      },
      { onStdout: (data) => { stdout += data; } }
    );

    const outcome = await deployer.deploy(options);

    expect(outcome).toEqual({ success: true, exitCode: 0, message: 'Deployment completed' });
    expect(stdout).toBe('test-key host1,host2');
  });

  it('reports a non-zero exit code', async () => {
    const deployer = new CommandDeployer(
      { command: process.execPath, args: ['-e', 'process.exit(3)'] },
      { onStdout: () => undefined, onStderr: () => undefined }
    );

    expect(await deployer.deploy(options)).toEqual({
      success: false,
      exitCode: 3,
      message: 'Deploy command exited with code 3',
    });
  });

  it('rejects when the command cannot be started', async () => {
    const deployer = new CommandDeployer({ command: '/nonexistent/deploy-command', args: [] });
    await expect(deployer.deploy(options)).rejects.toThrow('Deploy command could not be started');
  });

  it('forwards SIGINT to the command and reports the interruption', async () => {
    const signals = new EventEmitter();
    const deployer = new CommandDeployer(
      {
        command: process.execPath,
        args: ['-e', 'process.stdout.write("ready"); setInterval(() => undefined, 1000)'],
      },
      {
        onStdout: () => { signals.emit('SIGINT', 'SIGINT'); },
        onStderr: () => undefined,
        signalSource: signals,
      }
    );

    expect(await deployer.deploy(options)).toEqual({
      success: false,
      exitCode: 1,
      message: 'Deploy command was stopped by SIGINT',
      signal: 'SIGINT',
    });
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('stops listening for signals once the command exits', async () => {
    const signals = new EventEmitter();
    const deployer = new CommandDeployer(
      { command: process.execPath, args: ['-e', ''] },
      { signalSource: signals }
    );

    await deployer.deploy(options);

    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });
});
