// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { isAbsolute } from 'path';
import { z } from 'zod';
import type { ExecutionError } from '@shellgate/shared';

// ============================================================================
// Policy Document
// ============================================================================

export const DEFAULT_MAX_OUTPUT_SIZE = 1024 * 1024;

export const PolicyDocumentSchema = z.object({
  allowedCommands: z.array(z.string().min(1, 'command names must not be empty')),
  allowedDirectories: z.array(
    z.string().refine((value) => isAbsolute(value), 'directories must be absolute paths'),
  ),
  validateCommandsStrictly: z.boolean().default(true),
  maxOutputSize: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_SIZE),
});
export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;

// ============================================================================
// Execution Request / Result
// ============================================================================

export const ExecutionRequestSchema = z.object({
  command: z.string(),
  cwd: z.string().min(1, 'cwd must not be empty'),
  timeout: z.number().positive().finite().optional(),
});
export type ExecutionRequest = z.infer<typeof ExecutionRequestSchema>;

export const ExecutionStatusSchema = z.enum(['rejected', 'completed', 'timed_out', 'faulted']);
export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;

export interface ExecutionResult {
  success: boolean;
  output: string;
  error?: string;
  exitCode?: number;
  command: string;
  status: ExecutionStatus;
  truncated?: boolean;
  durationMs?: number;
}

// ============================================================================
// Executor Types
// ============================================================================

export interface ExecutorOptions {
  /** Shell used as `<shell> -c <command>`. */
  shell?: string;
  /** Delay between SIGTERM and SIGKILL when a process group is stopped. */
  killGraceMs?: number;
  /** How long to keep draining pipes after the shell exits. */
  drainGraceMs?: number;
}

export interface CapturedOutput {
  output: string;
  stderr: string;
  truncated: boolean;
}

/**
 * Terminal state of one executor run. `rejected` never reaches the executor;
 * the gateway produces it from a policy denial.
 */
export type ExecutionOutcome =
  | (CapturedOutput & { state: 'completed'; exitCode: number; pid?: number; durationMs: number })
  | (CapturedOutput & { state: 'timed_out'; timeoutSeconds: number; pid?: number; durationMs: number })
  | (CapturedOutput & { state: 'faulted'; error: ExecutionError; pid?: number; durationMs?: number });

export interface ExecutionParams {
  command: string;
  /** Normalized, already validated working directory. */
  cwd: string;
  maxOutputSize: number;
  timeoutSeconds?: number;
}
