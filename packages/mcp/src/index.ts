// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Server
export { DEFAULT_SERVER_INFO, EXECUTE_COMMAND_TOOL, createGatewayServer } from './server.js';
export type { GatewayServerInfo } from './server.js';

// Policy watching
export { DEFAULT_WATCH_DEBOUNCE_MS, PolicyWatcher } from './policy-watcher.js';
export type { PolicyWatcherOptions } from './policy-watcher.js';

// Configuration
export { DEFAULT_POLICY_FILE, resolveServerConfig } from './server-config.js';
export type { ServerConfig } from './server-config.js';
