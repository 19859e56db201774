// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { spawn, type ChildProcess } from 'child_process';
import { constants } from 'os';
import { performance } from 'perf_hooks';
import { StringDecoder } from 'string_decoder';
import { ExecutionError, errorMessage } from '@shellgate/shared';
import type { CapturedOutput, ExecutionOutcome, ExecutionParams, ExecutorOptions } from './types.js';

// ============================================================================
// Environment
// ============================================================================

const INHERITED_ENV_KEYS = ['PATH', 'HOME', 'USER', 'LOGNAME', 'LANG', 'LC_ALL', 'TMPDIR', 'TZ'] as const;

// Progress bars, pagers and prompts would otherwise write control sequences
// or block on the caller's transport.
const NON_INTERACTIVE_ENV: Readonly<Record<string, string>> = {
  TERM: 'dumb',
  NO_COLOR: '1',
  CI: '1',
  PAGER: 'cat',
  GIT_PAGER: 'cat',
  GIT_TERMINAL_PROMPT: '0',
  DEBIAN_FRONTEND: 'noninteractive',
};

const FALLBACK_PATH = '/usr/local/bin:/usr/bin:/bin';

export function buildExecutionEnv(cwd: string, inherited: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const key of INHERITED_ENV_KEYS) {
    const value = inherited[key];
    if (typeof value === 'string') {
      env[key] = value;
    }
  }
  env.PATH ??= FALLBACK_PATH;
  return { ...env, ...NON_INTERACTIVE_ENV, PWD: cwd };
}

// ============================================================================
// Bounded Output
// ============================================================================

/**
 * Keeps the first `limit` bytes and counts the rest as discarded. Callers keep
 * pushing after the limit so the child's pipe never fills up.
 */
export class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private discarded = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (chunk.length > room) {
      this.discarded = true;
    }
    if (room <= 0) {
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  get truncated(): boolean {
    return this.discarded;
  }

  get byteLength(): number {
    return this.size;
  }

  /**
   * Decoded text. A multi-byte character cut by the limit is dropped rather
   * than replaced, so the text never exceeds the limit.
   */
  text(): string {
    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.concat(this.chunks);
    return this.discarded ? decoder.write(buffer) : decoder.end(buffer);
  }
}

// ============================================================================
// Process Group Control
// ============================================================================

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/**
 * Signal the whole process group led by the child. The child is spawned
 * detached, so its pid is also its process group id.
 */
export function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    if (isNoSuchProcess(error)) {
      return;
    }
    child.kill(signal);
  }
}

function signalExitStatus(signal: NodeJS.Signals | null): number {
  if (!signal) {
    return 1;
  }
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  const value: unknown = entry?.[1];
  return typeof value === 'number' ? 128 + value : 1;
}

// ============================================================================
// Command Executor
// ============================================================================

export const DEFAULT_SHELL = '/bin/sh';
export const DEFAULT_KILL_GRACE_MS = 1000;
export const DEFAULT_DRAIN_GRACE_MS = 2000;

// Node fires any longer delay after 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class CommandExecutor {
  private readonly shell: string;
  private readonly killGraceMs: number;
  private readonly drainGraceMs: number;

  constructor(options: ExecutorOptions = {}) {
    this.shell = options.shell ?? DEFAULT_SHELL;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.drainGraceMs = options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
  }

  /**
   * Run an approved command to one of its terminal states. Never rejects:
   * spawn and stream failures come back as `faulted` outcomes.
   */
  run(params: ExecutionParams): Promise<ExecutionOutcome> {
    return new Promise((resolvePromise) => {
      const combined = new BoundedOutput(params.maxOutputSize);
      const stderr = new BoundedOutput(params.maxOutputSize);
      const captured = (): CapturedOutput => ({
        output: combined.text(),
        stderr: stderr.text(),
        truncated: combined.truncated,
      });

      let child: ChildProcess;
      try {
        child = spawn(this.shell, ['-c', params.command], {
          cwd: params.cwd,
          env: buildExecutionEnv(params.cwd),
          detached: true,
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (error) {
        resolvePromise({
          state: 'faulted',
          error: ExecutionError.spawnFailed(errorMessage(error)),
          ...captured(),
        });
        return;
      }

      let spawned = false;
      let settled = false;
      let timedOut = false;
      let startedAt = 0;
      let exitStatus: number | undefined;
      let deadline: NodeJS.Timeout | undefined;
      const timers: NodeJS.Timeout[] = [];

      const elapsed = () => Math.round(performance.now() - startedAt);

      // Single exit path for every terminal state.
      const finish = (outcome: ExecutionOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        for (const timer of timers) {
          clearTimeout(timer);
        }
        if (spawned) {
          signalProcessGroup(child, 'SIGKILL');
        }
        child.stdout?.destroy();
        child.stderr?.destroy();
        resolvePromise(outcome);
      };

      const fault = (error: ExecutionError) => {
        finish({
          state: 'faulted',
          error,
          pid: child.pid,
          durationMs: spawned ? elapsed() : undefined,
          ...captured(),
        });
      };

      const armDeadline = (remainingMs: number) => {
        const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
        deadline = setTimeout(() => {
          if (remainingMs > delay) {
            armDeadline(remainingMs - delay);
            return;
          }
          onTimeout();
        }, delay);
      };

      const onTimeout = () => {
        timedOut = true;
        signalProcessGroup(child, 'SIGTERM');
        timers.push(setTimeout(() => signalProcessGroup(child, 'SIGKILL'), this.killGraceMs));
      };

      child.once('spawn', () => {
        spawned = true;
        startedAt = performance.now();
        if (params.timeoutSeconds !== undefined) {
          armDeadline(params.timeoutSeconds * 1000);
        }
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        combined.push(chunk);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        combined.push(chunk);
        stderr.push(chunk);
      });
      child.stdout?.on('error', (error) => fault(ExecutionError.internalFault(error.message)));
      child.stderr?.on('error', (error) => fault(ExecutionError.internalFault(error.message)));

      child.on('error', (error) => {
        fault(spawned ? ExecutionError.internalFault(error.message) : ExecutionError.spawnFailed(error.message));
      });

      child.once('exit', (code, signal) => {
        if (settled) return;
        exitStatus = code ?? signalExitStatus(signal);
        if (!timedOut) {
          clearTimeout(deadline);
        }
        // Background members of the group would otherwise outlive the call
        // and hold the pipes open.
        signalProcessGroup(child, 'SIGKILL');
        timers.push(
          setTimeout(() => {
            child.stdout?.destroy();
            child.stderr?.destroy();
          }, this.drainGraceMs),
        );
      });

      child.once('close', () => {
        if (timedOut) {
          finish({
            state: 'timed_out',
            timeoutSeconds: params.timeoutSeconds ?? 0,
            pid: child.pid,
            durationMs: elapsed(),
            ...captured(),
          });
          return;
        }
        finish({
          state: 'completed',
          exitCode: exitStatus ?? 1,
          pid: child.pid,
          durationMs: elapsed(),
          ...captured(),
        });
      });
    });
  }
}
