// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { z } from 'zod';
import { ConfigError, errorMessage } from '@shellgate/shared';
import { PolicyDocumentSchema, type PolicyDocument } from './types.js';

// ============================================================================
// Policy Snapshot
// ============================================================================

/**
 * Normalize a path to absolute form without a trailing separator. Symlinks are
 * deliberately left unresolved.
 */
export function normalizeDirectory(path: string): string {
  return resolve(path);
}

function sortedUnique(values: Iterable<string>): readonly string[] {
  return Object.freeze([...new Set(values)].sort());
}

/**
 * Immutable point-in-time copy of the policy. A change to the policy always
 * produces a new snapshot.
 */
export class PolicySnapshot {
  readonly allowedCommands: readonly string[];
  readonly allowedDirectories: readonly string[];
  readonly strictValidation: boolean;
  readonly maxOutputSize: number;
  private readonly commandLookup: ReadonlySet<string>;

  constructor(document: PolicyDocument) {
    this.allowedCommands = sortedUnique(document.allowedCommands);
    this.allowedDirectories = sortedUnique(document.allowedDirectories.map(normalizeDirectory));
    this.strictValidation = document.validateCommandsStrictly;
    this.maxOutputSize = document.maxOutputSize;
    this.commandLookup = new Set(this.allowedCommands);
    Object.freeze(this);
  }

  allowsCommand(name: string): boolean {
    return this.commandLookup.has(name);
  }
}

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse a policy document. Throws ConfigError on malformed JSON or on content
 * that does not match the policy schema.
 */
export function parsePolicy(text: string, source: string): PolicySnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw ConfigError.malformed(source, errorMessage(error));
  }

  const parsed = PolicyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigError.invalid(source, formatIssues(parsed.error));
  }
  return new PolicySnapshot(parsed.data);
}

// ============================================================================
// Policy Sources
// ============================================================================

export interface PolicySource {
  /** Human-readable location, used in logs and errors. */
  readonly description: string;
  read(): Promise<string>;
}

export class FilePolicySource implements PolicySource {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  get description(): string {
    return this.path;
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.path, 'utf8');
    } catch (error) {
      throw ConfigError.unreadable(this.path, errorMessage(error));
    }
  }
}

/**
 * Policy held in memory. Useful for embedding the gateway and for tests.
 */
export class MemoryPolicySource implements PolicySource {
  readonly description: string;
  private text: string;

  constructor(policy: string | z.input<typeof PolicyDocumentSchema>, description = 'memory') {
    this.description = description;
    this.text = typeof policy === 'string' ? policy : JSON.stringify(policy);
  }

  set(policy: string | z.input<typeof PolicyDocumentSchema>): void {
    this.text = typeof policy === 'string' ? policy : JSON.stringify(policy);
  }

  async read(): Promise<string> {
    return this.text;
  }
}

/**
 * Read and parse a policy. Fatal callers (startup) let the ConfigError
 * propagate; reload paths catch it.
 */
export async function loadPolicy(source: PolicySource): Promise<PolicySnapshot> {
  const text = await source.read();
  return parsePolicy(text, source.description);
}
