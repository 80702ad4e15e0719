// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * MCP Bearer Server
 *
 * Exposes the Bearer CLI as MCP tools. Transport-agnostic: the same server
 * factory backs the stdio and SSE entry points.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig } from '../services/config.js';
import type { ToolDispatcher, ToolResponse } from './dispatcher.js';

/**
 * Convert a dispatcher response into the MCP tool-call result shape
 */
export function toCallToolResult(response: ToolResponse): CallToolResult {
  if (!response.ok) {
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({ error: response.error }, null, 2),
        },
      ],
      isError: true,
    };
  }

  return {
    content: [
      { type: 'text', text: response.text },
      ...response.warnings.map(warning => ({ type: 'text' as const, text: `Warning: ${warning}` })),
    ],
  };
}

export function createMcpServer(
  dispatcher: ToolDispatcher,
  config: Pick<ServerConfig, 'name' | 'version'>
): Server {
  const server = new Server(
    {
      name: config.name,
      version: config.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  /**
   * List available tools (required by MCP protocol)
   */
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: dispatcher.listTools() };
  });

  /**
   * Handle tool calls. The request signal fires when the client cancels,
   * which stops the Bearer process behind the call.
   */
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    console.error(`[MCP] Tool call: ${name}`);

    const response = await dispatcher.dispatch(name, args ?? {}, extra.signal);
    return toCallToolResult(response);
  });

  return server;
}
