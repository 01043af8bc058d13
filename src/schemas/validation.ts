/**
 * Validation utilities for YAML input files
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import chalk from 'chalk';
import { GateConfigSchema, type GateConfig } from './gate.schema';
import { TopologyEntriesSchema } from './topology.schema';
import type { Result, TopologyRequest, HostSpec } from '../types';
import { ok, err, singleHost, manyHosts } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

/**
 * Transform Zod errors to ValidationIssues
 */
function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors for console output
 */
export function formatValidationErrors(errors: ValidationIssue[], fileName: string): string {
  const lines: string[] = [
    '',
    chalk.red.bold(`✗ Validation failed for ${fileName}`),
    '',
  ];

  for (const error of errors) {
    lines.push(chalk.yellow(`  → ${error.path}`));
    lines.push(chalk.white(`    ${error.message}`));
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Validate deploy-gate.yml content.
 * An empty file yields the defaults.
 */
export function validateGateConfig(data: unknown): Result<GateConfig, ValidationIssue[]> {
  const result = GateConfigSchema.safeParse(data ?? {});

  if (result.success) {
    return ok(result.data);
  }

  return err(transformZodErrors(result.error));
}

function topologyEntries(data: unknown): [unknown, unknown][] | null {
  if (data instanceof Map) {
    return [...data.entries()];
  }
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return Object.entries(data);
  }
  return null;
}

/**
 * Convert a parsed topology document into a TopologyRequest.
 * Accepts the Map produced by `yaml` in mapAsMap mode (keeps declaration
 * order for every key) or a plain object. An absent document is an empty
 * request; rejecting it is the validator's job.
 */
export function parseTopology(data: unknown): Result<TopologyRequest, ValidationIssue[]> {
  if (data === null || data === undefined) {
    return ok(new Map());
  }

  const entries = topologyEntries(data);
  if (!entries) {
    return err([{
      path: 'root',
      message: 'Topology must be a mapping of role names to a host or a list of hosts',
      code: 'invalid_type',
    }]);
  }

  const result = TopologyEntriesSchema.safeParse(entries);
  if (!result.success) {
    // Report issues against the role name rather than the entry index
    return err(result.error.issues.map((issue) => {
      const [index, , ...rest] = issue.path;
      const entry = typeof index === 'number' ? entries[index] : undefined;
      const role = entry ? String(entry[0]) : undefined;
      return {
        path: role !== undefined ? formatPath([role, ...rest]) : formatPath(issue.path),
        message: issue.message,
        code: issue.code,
      };
    }));
  }

  const request = new Map<string, HostSpec>();
  for (const [role, hosts] of result.data) {
    request.set(role, Array.isArray(hosts) ? manyHosts(hosts) : singleHost(hosts));
  }
  return ok(request);
}
