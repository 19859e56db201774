// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { sep } from 'path';
import { PermissionError } from '@shellgate/shared';
import { normalizeDirectory, type PolicySnapshot } from './policy.js';
import type { ExecutionRequest } from './types.js';

// ============================================================================
// Decisions
// ============================================================================

export type ValidationDecision = { allowed: true } | { allowed: false; denial: PermissionError };

export type PolicyEvaluation =
  | { allowed: true; cwd: string }
  | { allowed: false; denial: PermissionError };

const ALLOW: ValidationDecision = { allowed: true };

function deny(denial: PermissionError): ValidationDecision {
  return { allowed: false, denial };
}

// ============================================================================
// Command Validator
// ============================================================================

/**
 * First whitespace-delimited token of the trimmed command. No quoting or
 * assignment-prefix handling: only the literal leading token is checked, and
 * the injection scanner covers what follows it.
 */
export function extractBaseCommand(command: string): string {
  return command.trim().split(/\s+/)[0] ?? '';
}

export function validateCommand(snapshot: PolicySnapshot, command: string): ValidationDecision {
  const baseCommand = extractBaseCommand(command);
  if (baseCommand && snapshot.allowsCommand(baseCommand)) {
    return ALLOW;
  }
  return deny(PermissionError.commandNotAllowed(baseCommand, snapshot.allowedCommands));
}

// ============================================================================
// Directory Validator
// ============================================================================

/**
 * Segment-wise containment: `/home/x` is inside `/home`, `/home2/x` is not.
 * Both arguments must already be normalized.
 */
export function isSameOrDescendant(directory: string, root: string): boolean {
  if (directory === root) {
    return true;
  }
  const prefix = root.endsWith(sep) ? root : `${root}${sep}`;
  return directory.startsWith(prefix);
}

export function validateDirectory(snapshot: PolicySnapshot, cwd: string): ValidationDecision {
  const directory = normalizeDirectory(cwd);
  const permitted = snapshot.allowedDirectories.some((root) => isSameOrDescendant(directory, root));
  if (permitted) {
    return ALLOW;
  }
  return deny(PermissionError.directoryNotAllowed(directory, snapshot.allowedDirectories));
}

// ============================================================================
// Injection Scanner
// ============================================================================

/**
 * Checked in order; the first sequence found is reported. `&&` and `||` come
 * before `|` so the longer operator is named.
 */
export const INJECTION_PATTERNS = [';', '&&', '||', '`', '$(', '|', '>', '<', '\n'] as const;

export function scanForInjection(snapshot: PolicySnapshot, command: string): ValidationDecision {
  if (!snapshot.strictValidation) {
    return ALLOW;
  }
  const found = INJECTION_PATTERNS.find((pattern) => command.includes(pattern));
  return found ? deny(PermissionError.injectionDetected(found, INJECTION_PATTERNS)) : ALLOW;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Run all three checks against one snapshot. The normalized working directory
 * is returned so the executor runs exactly where validation looked.
 */
export function evaluatePolicy(snapshot: PolicySnapshot, request: ExecutionRequest): PolicyEvaluation {
  const decisions = [
    () => validateCommand(snapshot, request.command),
    () => validateDirectory(snapshot, request.cwd),
    () => scanForInjection(snapshot, request.command),
  ];

  for (const decide of decisions) {
    const decision = decide();
    if (!decision.allowed) {
      return decision;
    }
  }

  return { allowed: true, cwd: normalizeDirectory(request.cwd) };
}
