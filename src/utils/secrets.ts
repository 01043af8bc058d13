/**
 * Secrets loading utilities
 * Loads credentials from .env.deploy-gate into process.env.
 * Variables already set in the environment take precedence.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ENV_FILE_PATH } from '../constants';
import { getProjectRoot } from './config';
import { printDebug } from './output';

/**
 * Parse a dotenv file content into key-value pairs
 */
export function parseDotenv(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    if (key) result[key] = value;
  }

  return result;
}

/**
 * Load secrets into process.env from .env.deploy-gate, if present
 */
export function loadSecrets(): void {
  const envFile = join(getProjectRoot(), ENV_FILE_PATH);
  if (!existsSync(envFile)) {
    return;
  }

  const vars = parseDotenv(readFileSync(envFile, 'utf-8'));
  let loaded = 0;
  for (const [key, value] of Object.entries(vars)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }
  printDebug(`Loaded ${loaded} variable(s) from ${ENV_FILE_PATH}`);
}
