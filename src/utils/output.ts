/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
};

let verbose = Boolean(process.env.DEBUG);

/**
 * Enable or disable debug output (--debug)
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

export function printSuccess(message: string): void {
  console.log(colors.success(`✓ ${message}`));
}

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printHeader(title: string): void {
  const line = '='.repeat(56);
  console.log(colors.success(line));
  console.log(colors.success(`   ${title}`));
  console.log(colors.success(line));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(message: string): void {
  console.log(message);
}

/**
 * Debug output, only shown with --debug or DEBUG set.
 * Written to stderr so it never mixes with command output.
 */
export function printDebug(message: string, context?: Record<string, unknown>): void {
  if (!verbose) return;
  const suffix = context ? ` ${JSON.stringify(context)}` : '';
  console.error(colors.dim(`[DEBUG] ${message}${suffix}`));
}
