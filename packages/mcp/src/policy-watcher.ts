// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { watch, type FSWatcher } from 'fs';
import { basename, dirname, resolve } from 'path';
import { createLogger, errorMessage, type Logger } from '@shellgate/shared';

// ============================================================================
// Policy Watcher
// ============================================================================

export interface PolicyWatcherOptions {
  debounceMs?: number;
  logger?: Logger;
}

export const DEFAULT_WATCH_DEBOUNCE_MS = 100;

/**
 * Calls `onChange` after the policy file changes. The parent directory is
 * watched rather than the file itself because editors often replace the file
 * by rename, which ends a watch on the old inode.
 */
export class PolicyWatcher {
  private readonly path: string;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    path: string,
    private readonly onChange: () => Promise<unknown>,
    options: PolicyWatcherOptions = {},
  ) {
    this.path = resolve(path);
    this.debounceMs = options.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS;
    this.logger = options.logger ?? createLogger('policy-watcher');
  }

  start(): void {
    if (this.watcher) return;

    const fileName = basename(this.path);
    this.watcher = watch(dirname(this.path), (_eventType, filename) => {
      if (filename && String(filename) !== fileName) return;
      this.trigger();
    });
    this.watcher.on('error', (error) => {
      this.logger.error(`Watching ${this.path} failed: ${error.message}`);
    });
    this.logger.info(`Watching ${this.path} for changes`);
  }

  /**
   * Schedule a reload. Calls within the debounce window collapse into one.
   */
  trigger(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.pending.then(() => this.runChange());
    }, this.debounceMs);
  }

  /**
   * Resolves once every reload scheduled so far has finished.
   */
  idle(): Promise<void> {
    return this.pending;
  }

  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.watcher?.close();
    this.watcher = null;
  }

  private async runChange(): Promise<void> {
    try {
      await this.onChange();
    } catch (error) {
      this.logger.error(`Policy reload failed: ${errorMessage(error)}`);
    }
  }
}
