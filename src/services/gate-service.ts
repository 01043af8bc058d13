/**
 * Gate Service
 *
 * Admission control for a deployment. A request passes through the
 * stages in a fixed order and the first failing stage ends the run:
 *
 *   credentials → ssh-credentials → topology → probe → lock → deploy
 *
 * The lock is taken last, right before the deploy call, and released
 * once the call returns, fails or throws. Every operation returns an
 * outcome; nothing here throws.
 */

import { DEFAULT_PROBE_TIMEOUT } from '../constants';
import { printDebug } from '../utils/output';
import type { GateOutcome, ProbeMode, ProbeResult, RoleSchema, TopologyRequest } from '../types';
import { GateErrorKind, ProbeFailureReason, passed, rejected } from '../types';
import { validateCredentials, validateSshCredentials } from './credential-service';
import { STANDARD_ROLE_SCHEMA, resolveNodeHosts, validateTopology } from './topology-service';
import type { RemotePreflightProbe } from './probe-service';
import type { Locker, LockStatus } from './lock-service';
import type { Deployer, DeployOutcome } from './deploy-service';

export const NO_LOCK_MESSAGE = 'No deployment in progress';
export const LOCK_HELD_MESSAGE = 'A deployment is already in progress';

export type AdmissionStage =
  | 'credentials'
  | 'ssh-credentials'
  | 'topology'
  | 'probe'
  | 'lock'
  | 'deploy';

/**
 * Everything a deployment request carries
 */
export interface DeploymentRequest {
  adminUser?: string;
  adminPassword?: string;
  adminPasswordConfirm?: string;
  keyName?: string;
  rootPassword?: string;
  topology?: TopologyRequest | null;
  /** Recorded in the lock marker */
  message?: string;
}

export interface AdmissionOutcome extends GateOutcome {
  /** Stage that produced the outcome */
  stage: AdmissionStage;
  /** Topology summary, once the topology stage has passed */
  summary?: string;
  probe?: ProbeResult;
  deploy?: DeployOutcome;
  /** False when the lock could not be released after the deploy call */
  lockReleased?: boolean;
}

export interface LockStateOutcome extends GateOutcome {
  locked: boolean;
}

export interface AdmitOptions {
  onStage?: (stage: AdmissionStage) => void;
  /** Stop after the probe: no lock, no deployment */
  dryRun?: boolean;
}

export interface DeploymentGateOptions {
  schema?: RoleSchema;
  probe: RemotePreflightProbe;
  locker: Locker;
  /** Required to admit anything but a dry run */
  deployer?: Deployer;
  probeMode?: ProbeMode;
  /** Seconds */
  probeTimeout?: number;
}

const PROBE_ERROR_KINDS: Record<ProbeFailureReason, GateErrorKind> = {
  [ProbeFailureReason.TIMEOUT]: GateErrorKind.NETWORK,
  [ProbeFailureReason.UNREACHABLE]: GateErrorKind.NETWORK,
  [ProbeFailureReason.CONNECTION_REFUSED]: GateErrorKind.NETWORK,
  [ProbeFailureReason.AUTH_FAILED]: GateErrorKind.AUTH,
  [ProbeFailureReason.UNKNOWN]: GateErrorKind.UNKNOWN,
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DeploymentGate {
  private readonly schema: RoleSchema;
  private readonly probe: RemotePreflightProbe;
  private readonly locker: Locker;
  private readonly deployer?: Deployer;
  private readonly probeMode: ProbeMode;
  private readonly probeTimeout: number;

  constructor(options: DeploymentGateOptions) {
    this.schema = options.schema ?? STANDARD_ROLE_SCHEMA;
    this.probe = options.probe;
    this.locker = options.locker;
    this.deployer = options.deployer;
    this.probeMode = options.probeMode ?? 'first';
    this.probeTimeout = options.probeTimeout ?? DEFAULT_PROBE_TIMEOUT;
  }

  validateCredentials(username?: string, password?: string, passwordConfirm?: string): GateOutcome {
    const outcome = validateCredentials(username, password, passwordConfirm);
    return outcome.ok ? passed(outcome.message) : rejected(GateErrorKind.INPUT, outcome.message);
  }

  validateSshCredentials(keyName?: string, rootPassword?: string): GateOutcome {
    const outcome = validateSshCredentials(keyName, rootPassword);
    return outcome.ok ? passed(outcome.message) : rejected(GateErrorKind.INPUT, outcome.message);
  }

  validateTopology(request?: TopologyRequest | null): GateOutcome {
    const outcome = validateTopology(request, this.schema);
    if (outcome.ok) {
      return passed(outcome.message);
    }
    const missing = !request || request.size === 0;
    return rejected(missing ? GateErrorKind.INPUT : GateErrorKind.SCHEMA, outcome.message);
  }

  async probeReachability(hosts: readonly string[], rootPassword: string): Promise<GateOutcome & { result?: ProbeResult }> {
    if (hosts.length === 0) {
      return rejected(GateErrorKind.INPUT, 'No hosts to probe');
    }

    const result = await this.probe.probeWithMode(this.probeMode, hosts, rootPassword, this.probeTimeout);
    if (result.reachable) {
      return { ...passed(), result };
    }
    const kind = PROBE_ERROR_KINDS[result.reason ?? ProbeFailureReason.UNKNOWN];
    return { ...rejected(kind, result.message), result };
  }

  async isLocked(): Promise<LockStateOutcome> {
    try {
      const locked = await this.locker.isLocked();
      return {
        ...passed(locked ? 'A deployment is in progress' : 'No deployment in progress'),
        locked,
      };
    } catch (error) {
      printDebug('Lock check failed', { error: describeError(error) });
      return { ...rejected(GateErrorKind.UNKNOWN, 'Unexpected error while checking the deployment lock'), locked: false };
    }
  }

  async lockStatus(): Promise<GateOutcome & { status?: LockStatus }> {
    try {
      const status = await this.locker.status();
      return { ...passed(), status };
    } catch (error) {
      printDebug('Lock status failed', { error: describeError(error) });
      return rejected(GateErrorKind.UNKNOWN, 'Unexpected error while reading the deployment lock');
    }
  }

  async acquire(message?: string): Promise<GateOutcome> {
    try {
      const acquired = await this.locker.acquire({ message });
      return acquired
        ? passed('Deployment lock acquired')
        : rejected(GateErrorKind.CONCURRENCY, LOCK_HELD_MESSAGE);
    } catch (error) {
      printDebug('Lock acquire failed', { error: describeError(error) });
      return rejected(GateErrorKind.UNKNOWN, 'Unexpected error while acquiring the deployment lock');
    }
  }

  async release(): Promise<GateOutcome> {
    try {
      const released = await this.locker.release();
      return released
        ? passed('Deployment lock released')
        : rejected(GateErrorKind.INPUT, NO_LOCK_MESSAGE);
    } catch (error) {
      printDebug('Lock release failed', { error: describeError(error) });
      return rejected(GateErrorKind.UNKNOWN, 'Unexpected error while releasing the deployment lock');
    }
  }

  /**
   * Run every admission stage and, once admitted, the deployment.
   * The lock is released whatever the deploy call does.
   */
  async admit(request: DeploymentRequest, options: AdmitOptions = {}): Promise<AdmissionOutcome> {
    const enter = (stage: AdmissionStage): void => {
      options.onStage?.(stage);
    };

    enter('credentials');
    const credentials = this.validateCredentials(
      request.adminUser,
      request.adminPassword,
      request.adminPasswordConfirm
    );
    if (!credentials.ok) {
      return { ...credentials, stage: 'credentials' };
    }

    enter('ssh-credentials');
    const sshCredentials = this.validateSshCredentials(request.keyName, request.rootPassword);
    if (!sshCredentials.ok || !request.keyName || !request.rootPassword) {
      return { ...sshCredentials, stage: 'ssh-credentials' };
    }

    enter('topology');
    const topology = this.validateTopology(request.topology);
    if (!topology.ok || !request.topology) {
      return { ...topology, stage: 'topology' };
    }
    const summary = topology.message;
    const hosts = resolveNodeHosts(request.topology);

    enter('probe');
    const { result: probeResult, ...probe } = await this.probeReachability(hosts, request.rootPassword);
    if (!probe.ok) {
      return { ...probe, stage: 'probe', summary, probe: probeResult };
    }

    if (options.dryRun) {
      return { ...passed('Admission checks passed'), stage: 'probe', summary, probe: probeResult };
    }

    const deployer = this.deployer;
    if (!deployer) {
      return { ...rejected(GateErrorKind.INPUT, 'No deploy command configured'), stage: 'deploy', summary };
    }

    enter('lock');
    const lock = await this.acquire(request.message);
    if (!lock.ok) {
      return { ...lock, stage: 'lock', summary };
    }

    enter('deploy');
    let outcome: AdmissionOutcome;
    try {
      const deploy = await deployer.deploy({
        keyName: request.keyName,
        rootPassword: request.rootPassword,
        hosts,
        topology: request.topology,
      });
      outcome = deploy.success
        ? { ...passed(deploy.message), stage: 'deploy', summary, deploy }
        : { ...rejected(GateErrorKind.DEPLOY, deploy.message), stage: 'deploy', summary, deploy };
    } catch (error) {
      printDebug('Deploy call failed', { error: describeError(error) });
      outcome = {
        ...rejected(GateErrorKind.DEPLOY, 'Deployment failed with an unexpected runtime error'),
        stage: 'deploy',
        summary,
      };
    }

    const released = await this.release();
    return { ...outcome, lockReleased: released.ok };
  }
}
