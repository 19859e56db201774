// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Types
export type {
  PolicyDocument,
  ExecutionRequest,
  ExecutionStatus,
  ExecutionResult,
  ExecutorOptions,
  CapturedOutput,
  ExecutionOutcome,
  ExecutionParams,
} from './types.js';

export {
  DEFAULT_MAX_OUTPUT_SIZE,
  PolicyDocumentSchema,
  ExecutionRequestSchema,
  ExecutionStatusSchema,
} from './types.js';

// Policy
export {
  PolicySnapshot,
  FilePolicySource,
  MemoryPolicySource,
  loadPolicy,
  normalizeDirectory,
  parsePolicy,
} from './policy.js';
export type { PolicySource } from './policy.js';

export { ConfigStore } from './config-store.js';
export type { ConfigStoreOptions, ReloadResult } from './config-store.js';

// Validator
export {
  INJECTION_PATTERNS,
  evaluatePolicy,
  extractBaseCommand,
  isSameOrDescendant,
  scanForInjection,
  validateCommand,
  validateDirectory,
} from './validator.js';
export type { PolicyEvaluation, ValidationDecision } from './validator.js';

// Executor
export {
  BoundedOutput,
  CommandExecutor,
  DEFAULT_DRAIN_GRACE_MS,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_SHELL,
  buildExecutionEnv,
  signalProcessGroup,
} from './executor.js';

// Gateway
export { CommandGateway, rejectedResult, toExecutionResult } from './gateway.js';
export type { GatewayOptions } from './gateway.js';
