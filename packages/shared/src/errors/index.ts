// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class ShellgateError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends ShellgateError {
  readonly code = 'CONFIG_ERROR';
  readonly source: string;

  constructor(source: string, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.source = source;
  }

  static unreadable(source: string, reason?: string): ConfigError {
    return new ConfigError(source, `Cannot read policy from ${source}${reason ? `: ${reason}` : ''}`);
  }

  static malformed(source: string, reason: string): ConfigError {
    return new ConfigError(source, `Policy in ${source} is not valid JSON: ${reason}`);
  }

  static invalid(source: string, issues: string[]): ConfigError {
    return new ConfigError(
      source,
      `Policy in ${source} is invalid: ${issues.join('; ')}`,
      { issues },
    );
  }
}

// ============================================================================
// Permission Errors
// ============================================================================

export type DenialReason = 'command_not_allowed' | 'directory_not_allowed' | 'injection_pattern';

function formatAllowed(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

/**
 * Policy denial. The message always says what was rejected and what the
 * policy allows instead, so callers can correct the next request themselves.
 */
export class PermissionError extends ShellgateError {
  readonly code = 'PERMISSION_ERROR';
  readonly reason: DenialReason;
  readonly resource: string;

  constructor(reason: DenialReason, resource: string, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.reason = reason;
    this.resource = resource;
  }

  static commandNotAllowed(baseCommand: string, allowedCommands: readonly string[]): PermissionError {
    const subject = baseCommand ? `Command '${baseCommand}' is not allowed.` : 'Empty command is not allowed.';
    return new PermissionError(
      'command_not_allowed',
      baseCommand,
      `${subject} Allowed commands: ${formatAllowed(allowedCommands)}`,
      { allowedCommands: [...allowedCommands] },
    );
  }

  static directoryNotAllowed(directory: string, allowedDirectories: readonly string[]): PermissionError {
    return new PermissionError(
      'directory_not_allowed',
      directory,
      `Directory '${directory}' is not allowed. Allowed directories (subdirectories are permitted): ${formatAllowed(allowedDirectories)}`,
      { allowedDirectories: [...allowedDirectories] },
    );
  }

  static injectionDetected(pattern: string, forbidden: readonly string[]): PermissionError {
    return new PermissionError(
      'injection_pattern',
      pattern,
      `Potential command injection detected: ${JSON.stringify(pattern)}. Strict validation forbids ${forbidden.map((entry) => JSON.stringify(entry)).join(', ')}; run a single command without shell operators.`,
      { pattern },
    );
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

export type ExecutionErrorKind = 'spawn_failure' | 'timeout_exceeded' | 'internal_fault';

export class ExecutionError extends ShellgateError {
  readonly code = 'EXECUTION_ERROR';
  readonly kind: ExecutionErrorKind;

  constructor(kind: ExecutionErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.kind = kind;
  }

  static spawnFailed(reason: string): ExecutionError {
    return new ExecutionError('spawn_failure', `Failed to start command: ${reason}`);
  }

  static timedOut(timeoutSeconds: number): ExecutionError {
    return new ExecutionError(
      'timeout_exceeded',
      `Command execution timed out after ${timeoutSeconds} seconds`,
      { timeoutSeconds },
    );
  }

  static internalFault(reason: string): ExecutionError {
    return new ExecutionError('internal_fault', `Error executing command: ${reason}`);
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends ShellgateError {
  readonly code = 'VALIDATION_ERROR';
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }

  static invalid(field: string, reason?: string): ValidationError {
    return new ValidationError(`Invalid ${field}${reason ? `: ${reason}` : ''}`, field);
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isShellgateError(error: unknown): error is ShellgateError {
  return error instanceof ShellgateError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isPermissionError(error: unknown): error is PermissionError {
  return error instanceof PermissionError;
}

export function isExecutionError(error: unknown): error is ExecutionError {
  return error instanceof ExecutionError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

// ============================================================================
// Error Wrapping
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function wrapError(error: unknown, fallbackMessage = 'An unexpected error occurred'): ShellgateError {
  if (isShellgateError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ExecutionError.internalFault(error.message || fallbackMessage);
  }

  return ExecutionError.internalFault(String(error) || fallbackMessage);
}
