/**
 * Command Error Handling
 *
 * Provides centralized error handling for CLI commands.
 * This module ensures consistent error messages and exit behavior
 * across all commands.
 */

import { printBlank, printRaw, colors, isVerbose } from './output';
import { GateErrorKind, type GateOutcome } from '../types';

/**
 * CLI Error codes for different failure scenarios
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,
  INTERRUPTED = 2,

  // Configuration errors (10-19)
  CONFIG_NOT_FOUND = 10,
  CONFIG_INVALID = 11,
  TOPOLOGY_NOT_FOUND = 12,

  // Connection errors (30-39)
  CONNECTION_FAILED = 30,
  SSH_AUTH_FAILED = 32,

  // Deployment errors (50-59)
  DEPLOY_FAILED = 50,
  DEPLOY_LOCKED = 51,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
  INVALID_ARGUMENT = 61,
  TOPOLOGY_INVALID = 62,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    // inquirer rejects with ExitPromptError on Ctrl+C
    if (error instanceof Error && error.name === 'ExitPromptError') {
      return new CLIError('Operation cancelled', ErrorCode.INTERRUPTED);
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

/**
 * Specific error types for common scenarios
 */
export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.CONFIG_INVALID, suggestion);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONNECTION_FAILED, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'ConnectionError';
  }
}

export class DeployError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.DEPLOY_FAILED, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'DeployError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.VALIDATION_FAILED, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'ValidationError';
  }
}

/**
 * System error code (ENOENT, ECONNREFUSED...) of a thrown value, if any
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Convert a failed gate outcome into the matching CLIError
 */
export function errorFromOutcome(outcome: GateOutcome): CLIError {
  switch (outcome.kind) {
    case GateErrorKind.INPUT:
      return new ValidationError(outcome.message, ErrorCode.INVALID_ARGUMENT);
    case GateErrorKind.SCHEMA:
      return new ValidationError(
        outcome.message,
        ErrorCode.TOPOLOGY_INVALID,
        'Check the role names in the topology file'
      );
    case GateErrorKind.NETWORK:
      return new ConnectionError(outcome.message, ErrorCode.CONNECTION_FAILED, 'Check that the host is up and reachable on the SSH port');
    case GateErrorKind.AUTH:
      return new ConnectionError(outcome.message, ErrorCode.SSH_AUTH_FAILED, 'Check the root password');
    case GateErrorKind.CONCURRENCY:
      return new DeployError(
        outcome.message,
        ErrorCode.DEPLOY_LOCKED,
        'Wait for it to finish, or run "deploy-gate lock status" to inspect the lock'
      );
    case GateErrorKind.DEPLOY:
      return new DeployError(outcome.message);
    default:
      return new CLIError(outcome.message, ErrorCode.UNKNOWN);
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (isVerbose() && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  printBlank();
  printRaw(formatError(cliError));
  printBlank();

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (file, options) => {
 *   // Command logic - just throw errors, don't call process.exit
 *   if (!valid) throw new ValidationError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

