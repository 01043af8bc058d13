/**
 * Configuration utilities
 * Handles reading deploy-gate.yml and topology files
 */

import { readFileSync, existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_PATH } from '../constants';
import {
  validateGateConfig,
  parseTopology,
  formatValidationErrors,
  type GateConfig,
} from '../schemas';
import type { TopologyRequest } from '../types';
import { CLIError, ConfigError, ErrorCode, ValidationError } from './errors';
import { printDebug } from './output';

/**
 * Get the project root directory (where deploy-gate.yml is)
 */
export function getProjectRoot(): string {
  return process.cwd();
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : join(getProjectRoot(), path);
}

function readYaml(path: string, options: { mapAsMap?: boolean } = {}): unknown {
  const content = readFileSync(path, 'utf-8');
  try {
    return parseYaml(content, { mapAsMap: options.mapAsMap ?? false });
  } catch (error) {
    throw new ConfigError(
      `${path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load deploy-gate.yml.
 * Without an explicit path a missing file means defaults; an explicit
 * path must exist.
 */
export function loadGateConfig(configPath?: string): GateConfig {
  const path = resolvePath(configPath ?? CONFIG_PATH);

  if (!existsSync(path)) {
    if (configPath) {
      throw new CLIError(`Config file not found: ${path}`, ErrorCode.CONFIG_NOT_FOUND);
    }
    printDebug('No config file, using defaults', { path });
    return unwrapConfig(validateGateConfig({}), path);
  }

  return unwrapConfig(validateGateConfig(readYaml(path)), path);
}

function unwrapConfig(result: ReturnType<typeof validateGateConfig>, path: string): GateConfig {
  if (result.success) {
    return result.data;
  }
  throw new ConfigError(
    formatValidationErrors(result.error, path),
    'Fix the fields listed above in the config file'
  );
}

/**
 * Load a topology file: a YAML mapping of role → host or list of hosts.
 * Role order in the file is preserved.
 */
export function loadTopologyFile(topologyPath: string): TopologyRequest {
  const path = resolvePath(topologyPath);

  if (!existsSync(path)) {
    throw new CLIError(`Topology file not found: ${path}`, ErrorCode.TOPOLOGY_NOT_FOUND);
  }

  const result = parseTopology(readYaml(path, { mapAsMap: true }));
  if (!result.success) {
    throw new ValidationError(formatValidationErrors(result.error, path), ErrorCode.TOPOLOGY_INVALID);
  }
  return result.data;
}
