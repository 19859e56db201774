// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { resolve } from 'path';
import { parseBooleanFlag, parsePositiveNumber } from '@shellgate/shared';
import { DEFAULT_KILL_GRACE_MS, DEFAULT_SHELL } from '@shellgate/sandbox';

export const DEFAULT_POLICY_FILE = 'shellgate.policy.json';

export interface ServerConfig {
  policyPath: string;
  watchPolicy: boolean;
  shell: string;
  killGraceMs: number;
}

export function resolveServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ServerConfig {
  return {
    policyPath: resolve(cwd, env.SHELLGATE_POLICY_PATH?.trim() || DEFAULT_POLICY_FILE),
    watchPolicy: parseBooleanFlag(env.SHELLGATE_WATCH_POLICY, true),
    shell: env.SHELLGATE_SHELL?.trim() || DEFAULT_SHELL,
    killGraceMs: parsePositiveNumber(env.SHELLGATE_KILL_GRACE_MS, DEFAULT_KILL_GRACE_MS),
  };
}
