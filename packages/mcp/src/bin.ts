#!/usr/bin/env node
// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, errorMessage, isConfigError } from '@shellgate/shared';
import { CommandGateway, ConfigStore, FilePolicySource } from '@shellgate/sandbox';
import { PolicyWatcher } from './policy-watcher.js';
import { createGatewayServer } from './server.js';
import { resolveServerConfig } from './server-config.js';

// stdout carries the MCP protocol; every log line goes to stderr.
const logger = createLogger('shellgate');

async function main(): Promise<void> {
  const config = resolveServerConfig();
  logger.info(`Starting (policy=${config.policyPath}, shell=${config.shell})`);

  let store: ConfigStore;
  try {
    store = await ConfigStore.open(new FilePolicySource(config.policyPath));
  } catch (error) {
    if (isConfigError(error)) {
      logger.error(`Fatal: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const gateway = new CommandGateway(store, {
    executor: { shell: config.shell, killGraceMs: config.killGraceMs },
  });
  const server = createGatewayServer(gateway);
  const watcher = config.watchPolicy ? new PolicyWatcher(config.policyPath, () => gateway.reload()) : null;

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    watcher?.close();
    try {
      await server.close();
    } catch (error) {
      logger.warn(`Server close warning: ${errorMessage(error)}`);
    }
    logger.info('Stopped');
  };

  await server.connect(new StdioServerTransport());
  watcher?.start();
  logger.info('Ready');

  process.on('SIGHUP', () => {
    logger.info('SIGHUP received, reloading policy');
    void gateway.reload();
  });
  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.stdin.on('close', () => {
    void shutdown();
  });

  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
  });
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
  });
}

main().catch((error: unknown) => {
  logger.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
