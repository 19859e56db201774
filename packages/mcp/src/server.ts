// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CommandGateway } from '@shellgate/sandbox';

// ============================================================================
// MCP Server
// ============================================================================

export const EXECUTE_COMMAND_TOOL = 'execute_command';

export interface GatewayServerInfo {
  name: string;
  version: string;
}

export const DEFAULT_SERVER_INFO: GatewayServerInfo = {
  name: 'shellgate',
  version: '0.1.0',
};

const executeCommandShape = {
  command: z.string().describe('The shell command to execute'),
  cwd: z.string().describe('Working directory for the command'),
  timeout: z.number().positive().optional().describe('Optional timeout in seconds'),
};

/**
 * Expose the gateway as a single MCP tool. The tool result is the gateway's
 * ExecutionResult as pretty-printed JSON text.
 */
export function createGatewayServer(
  gateway: CommandGateway,
  info: GatewayServerInfo = DEFAULT_SERVER_INFO,
): McpServer {
  const server = new McpServer({ name: info.name, version: info.version });

  server.registerTool(
    EXECUTE_COMMAND_TOOL,
    {
      description: 'Execute a shell command in a secure environment',
      inputSchema: executeCommandShape,
    },
    async ({ command, cwd, timeout }): Promise<CallToolResult> => {
      const result = await gateway.execute({ command, cwd, timeout });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      };
    },
  );

  return server;
}
