/**
 * Application-wide constants
 */

// Read version from root package.json (single source of truth)
import packageJson from '../package.json';

export const DEPLOY_GATE_VERSION = packageJson.version;

/**
 * File paths (relative to the working directory)
 */
export const CONFIG_PATH = 'deploy-gate.yml';
export const ENV_FILE_PATH = '.env.deploy-gate';
export const DEFAULT_LOCK_PATH = 'deploy-gate.lock';

/**
 * Default values
 */
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SSH_USER = 'root';
export const DEFAULT_PROBE_TIMEOUT = 10;
export const LOCK_STALE_THRESHOLD_MINUTES = 30;

/** Command run on the probed host to confirm the session is usable */
export const PROBE_COMMAND = 'ls';

export const MIN_PASSWORD_LENGTH = 6;

/**
 * Environment variables read as defaults for CLI options
 */
export const ENV_ADMIN_USER = 'DEPLOY_GATE_ADMIN_USER';
export const ENV_ADMIN_PASSWORD = 'DEPLOY_GATE_ADMIN_PASSWORD';
export const ENV_ROOT_PASSWORD = 'DEPLOY_GATE_ROOT_PASSWORD';
export const ENV_KEYNAME = 'DEPLOY_GATE_KEYNAME';
