// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Tool Dispatcher
 *
 * Maps a tool name to its handler and turns every outcome into a ToolResponse.
 * Holds nothing mutable besides the configuration given at construction, so
 * one instance serves any number of concurrent calls.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { isToolError, type ToolErrorPayload, UnknownToolError } from '../scanner/errors.js'
import type { CommandRunner } from '../scanner/types.js'
import type { ServerConfig } from '../services/config.js'
import { captureException } from '../services/sentry.js'
import type { ToolContext, ToolResult } from './handlers.js'
import { type RegisteredTool, TOOLS } from './tools.js'

export type ToolResponse =
  | ({ ok: true } & ToolResult)
  | { ok: false; error: ToolErrorPayload }

export type DispatcherConfig = Pick<ServerConfig, 'workingDir' | 'timeoutMs' | 'expectedBearerVersion' | 'verbose'>

export class ToolDispatcher {
  private readonly tools: ReadonlyMap<string, RegisteredTool>

  constructor(
    private readonly config: DispatcherConfig,
    private readonly runner: CommandRunner,
    tools: readonly RegisteredTool[] = TOOLS,
  ) {
    this.tools = new Map(tools.map(tool => [tool.name, tool]))
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values(), tool => tool.definition)
  }

  /**
   * Run one tool call. Never throws: failures come back as `{ ok: false }`.
   */
  async dispatch(name: string, args: unknown, signal?: AbortSignal): Promise<ToolResponse> {
    const started = Date.now()
    try {
      const tool = this.tools.get(name)
      if (!tool) {
        throw new UnknownToolError(name)
      }

      const ctx: ToolContext = {
        workingDir: this.config.workingDir,
        runner: this.runner,
        timeoutMs: this.config.timeoutMs,
        expectedBearerVersion: this.config.expectedBearerVersion,
        verbose: this.config.verbose,
        signal,
      }

      const result = await tool.invoke(args, ctx)
      if (this.config.verbose) {
        console.error(`[Dispatcher] ${name} completed in ${Date.now() - started}ms`)
      }
      return { ok: true, ...result }
    } catch (error) {
      if (isToolError(error)) {
        console.error(`[Dispatcher] ${name} failed (${error.kind}): ${error.message}`)
        return { ok: false, error: error.toPayload() }
      }

      console.error(`[Dispatcher] Unexpected error in ${name}:`, error)
      captureException(error, { tool: name })
      return {
        ok: false,
        error: {
          kind: 'internal',
          message: `Error executing ${name}: ${error instanceof Error ? error.message : String(error)}`,
        },
      }
    }
  }
}
