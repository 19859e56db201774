// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  ExecutionError,
  ValidationError,
  createLogger,
  generateId,
  truncate,
  wrapError,
  type Logger,
  type PermissionError,
} from '@shellgate/shared';
import type { ConfigStore, ReloadResult } from './config-store.js';
import { CommandExecutor } from './executor.js';
import type { PolicySource } from './policy.js';
import {
  ExecutionRequestSchema,
  type ExecutionOutcome,
  type ExecutionRequest,
  type ExecutionResult,
  type ExecutorOptions,
} from './types.js';
import { evaluatePolicy } from './validator.js';

// ============================================================================
// Result Shaping
// ============================================================================

function echoCommand(request: unknown): string {
  if (request && typeof request === 'object' && 'command' in request && typeof request.command === 'string') {
    return request.command;
  }
  return '';
}

export function rejectedResult(command: string, error: PermissionError | ValidationError): ExecutionResult {
  return {
    success: false,
    output: '',
    error: error.message,
    command,
    status: 'rejected',
  };
}

export function toExecutionResult(command: string, outcome: ExecutionOutcome): ExecutionResult {
  const shared = {
    output: outcome.output,
    command,
    durationMs: outcome.durationMs,
    ...(outcome.truncated ? { truncated: true } : {}),
  };

  switch (outcome.state) {
    case 'completed': {
      const failed = outcome.exitCode !== 0;
      return {
        ...shared,
        success: !failed,
        exitCode: outcome.exitCode,
        ...(failed && outcome.stderr ? { error: outcome.stderr } : {}),
        status: 'completed',
      };
    }
    case 'timed_out':
      return {
        ...shared,
        success: false,
        error: ExecutionError.timedOut(outcome.timeoutSeconds).message,
        status: 'timed_out',
      };
    case 'faulted':
      return {
        ...shared,
        success: false,
        error: outcome.error.message,
        status: 'faulted',
      };
  }
}

// ============================================================================
// Gateway
// ============================================================================

export interface GatewayOptions {
  executor?: CommandExecutor | ExecutorOptions;
  logger?: Logger;
}

/**
 * Authorizes each request against the current policy snapshot and runs the
 * approved ones. `execute` never throws; every failure is a result.
 */
export class CommandGateway {
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;

  constructor(
    private readonly store: ConfigStore,
    options: GatewayOptions = {},
  ) {
    this.executor =
      options.executor instanceof CommandExecutor
        ? options.executor
        : new CommandExecutor(options.executor);
    this.logger = options.logger ?? createLogger('gateway');
  }

  async execute(request: ExecutionRequest | Record<string, unknown>): Promise<ExecutionResult> {
    const requestId = generateId('exec');
    const command = echoCommand(request);

    try {
      const parsed = ExecutionRequestSchema.safeParse(request);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join('.') || 'request';
        const error = ValidationError.invalid(field, issue?.message);
        this.logger.warn(`${requestId} rejected: ${error.message}`);
        return rejectedResult(command, error);
      }

      // One snapshot per request: a reload during execution does not affect it.
      const snapshot = this.store.get();
      const evaluation = evaluatePolicy(snapshot, parsed.data);
      if (!evaluation.allowed) {
        this.logger.warn(`${requestId} denied (${evaluation.denial.reason}): ${truncate(command, 200)}`);
        return rejectedResult(command, evaluation.denial);
      }

      const outcome = await this.executor.run({
        command: parsed.data.command,
        cwd: evaluation.cwd,
        maxOutputSize: snapshot.maxOutputSize,
        timeoutSeconds: parsed.data.timeout,
      });
      this.logOutcome(requestId, command, outcome);
      return toExecutionResult(command, outcome);
    } catch (error) {
      const fault = wrapError(error);
      this.logger.error(`${requestId} internal fault: ${fault.message}`);
      return { success: false, output: '', error: fault.message, command, status: 'faulted' };
    }
  }

  /**
   * Hook for the policy watcher. Failures keep the previous policy active.
   */
  reload(source?: PolicySource): Promise<ReloadResult> {
    return this.store.reload(source);
  }

  private logOutcome(requestId: string, command: string, outcome: ExecutionOutcome): void {
    const preview = truncate(command, 200);
    switch (outcome.state) {
      case 'completed':
        this.logger.info(`${requestId} exited ${outcome.exitCode} in ${outcome.durationMs}ms: ${preview}`);
        return;
      case 'timed_out':
        this.logger.warn(`${requestId} timed out after ${outcome.timeoutSeconds}s: ${preview}`);
        return;
      case 'faulted':
        this.logger.error(`${requestId} ${outcome.error.kind}: ${outcome.error.message}`);
        return;
    }
  }
}
