// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { ConfigError, createLogger, errorMessage, type Logger } from '@shellgate/shared';
import { loadPolicy, type PolicySnapshot, type PolicySource } from './policy.js';

// ============================================================================
// Config Store
// ============================================================================

export interface ConfigStoreOptions {
  logger?: Logger;
}

export type ReloadResult =
  | { applied: true; snapshot: PolicySnapshot }
  | { applied: false; error: ConfigError };

/**
 * Owns the current policy snapshot. Reads return whatever snapshot is
 * installed at that moment; reloads replace it wholesale and run one at a time.
 */
export class ConfigStore {
  private current: PolicySnapshot;
  private defaultSource: PolicySource;
  private readonly logger: Logger;
  private writeQueue: Promise<unknown> = Promise.resolve();

  private constructor(snapshot: PolicySnapshot, source: PolicySource, options: ConfigStoreOptions) {
    this.current = snapshot;
    this.defaultSource = source;
    this.logger = options.logger ?? createLogger('config');
  }

  /**
   * Parse a policy without installing it.
   */
  static load(source: PolicySource): Promise<PolicySnapshot> {
    return loadPolicy(source);
  }

  /**
   * Load the initial policy. A ConfigError here is fatal to the caller.
   */
  static async open(source: PolicySource, options: ConfigStoreOptions = {}): Promise<ConfigStore> {
    const snapshot = await loadPolicy(source);
    const store = new ConfigStore(snapshot, source, options);
    store.logger.info(`Loaded policy from ${source.description} (${describe(snapshot)})`);
    return store;
  }

  get(): PolicySnapshot {
    return this.current;
  }

  get source(): PolicySource {
    return this.defaultSource;
  }

  /**
   * Re-read the policy and install it. On failure the previous snapshot stays
   * active and the problem is reported as a warning.
   */
  reload(source: PolicySource = this.defaultSource): Promise<ReloadResult> {
    const run = this.writeQueue.then(() => this.applyReload(source));
    this.writeQueue = run;
    return run;
  }

  private async applyReload(source: PolicySource): Promise<ReloadResult> {
    try {
      const snapshot = await loadPolicy(source);
      this.current = snapshot;
      this.defaultSource = source;
      this.logger.info(`Reloaded policy from ${source.description} (${describe(snapshot)})`);
      return { applied: true, snapshot };
    } catch (error) {
      const configError =
        error instanceof ConfigError
          ? error
          : ConfigError.unreadable(source.description, errorMessage(error));
      this.logger.warn(`Policy reload rejected, keeping previous policy: ${configError.message}`);
      return { applied: false, error: configError };
    }
  }
}

function describe(snapshot: PolicySnapshot): string {
  return [
    `${snapshot.allowedCommands.length} commands`,
    `${snapshot.allowedDirectories.length} directories`,
    `strict=${snapshot.strictValidation}`,
    `maxOutputSize=${snapshot.maxOutputSize}`,
  ].join(', ');
}
