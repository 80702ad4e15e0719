#!/usr/bin/env node
// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Bearer MCP Server (stdio or SSE over Node.js + Hono)
 *
 * Usage:
 *   MCP_WORKING_DIRECTORY=/workspace bearer-mcp               # stdio
 *   MCP_TRANSPORT=sse MCP_SSE_PORT=8000 bearer-mcp            # SSE
 */

import { type ServerType, serve } from '@hono/node-server'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { createHttpApp } from './app.js'
import { ToolDispatcher } from './mcp/dispatcher.js'
import { createMcpServer } from './mcp/server.js'
import type { SseSessions } from './routes/index.js'
import { BearerExecutor } from './scanner/executor.js'
import { loadConfig, type ServerConfig } from './services/config.js'
import { captureException, flushSentry, initSentry } from './services/sentry.js'
import { findAvailablePort } from './utils/port.js'

async function startSseServer(
  config: Readonly<ServerConfig>,
  dispatcher: ToolDispatcher,
  sessions: SseSessions
): Promise<ServerType> {
  const port = await findAvailablePort(config.ssePort, config.sseHost)
  if (port !== config.ssePort) {
    console.error(`[Server] Port ${config.ssePort} in use, using port ${port}`)
  }

  const app = createHttpApp({
    config: { ...config, ssePort: port },
    createServer: () => createMcpServer(dispatcher, config),
    sessions,
  })

  const server = serve({ fetch: app.fetch, port, hostname: config.sseHost })
  console.error(`[Server] SSE transport listening on http://${config.sseHost}:${port}/sse`)
  return server
}

async function main(): Promise<void> {
  // Initialize error tracking (must be first)
  initSentry()

  const config = loadConfig()
  // The Bearer binary is not checked here: it may be mounted after startup
  const executor = new BearerExecutor({
    command: config.bearerCommand,
    timeoutMs: config.timeoutMs,
    killGraceMs: config.killGraceMs,
    verbose: config.verbose,
  })
  const dispatcher = new ToolDispatcher(config, executor)

  console.error(`[Server] ${config.name} v${config.version}`)
  console.error(`[Server] Working directory: ${config.workingDir}`)
  console.error(`[Server] Bearer command: ${config.bearerCommand} (timeout ${config.timeoutMs}ms)`)

  const sessions: SseSessions = new Map()
  let httpServer: ServerType | null = null
  let stdioServer: ReturnType<typeof createMcpServer> | null = null

  if (config.transport === 'sse') {
    httpServer = await startSseServer(config, dispatcher, sessions)
  } else {
    stdioServer = createMcpServer(dispatcher, config)
    await stdioServer.connect(new StdioServerTransport())
    console.error('[Server] STDIO transport ready')
  }

  // A failed tool call must never take the server down
  process.on('uncaughtException', (err) => {
    console.error('[Server] Uncaught exception:', err)
    captureException(err, { context: 'uncaughtException' })
  })

  process.on('unhandledRejection', (reason) => {
    console.error('[Server] Unhandled rejection:', reason)
    captureException(reason instanceof Error ? reason : new Error(String(reason)), { context: 'unhandledRejection' })
  })

  const shutdown = async (signal: string) => {
    console.error(`[Server] ${signal} received, shutting down...`)
    executor.cleanup()
    await Promise.allSettled([
      ...Array.from(sessions.values(), transport => transport.close()),
      stdioServer?.close(),
    ])
    httpServer?.close()
    await flushSentry()
    process.exit(0)
  }

  process.on('SIGINT', () => { void shutdown('SIGINT') })
  process.on('SIGTERM', () => { void shutdown('SIGTERM') })
}

main().catch(async (error) => {
  console.error('[Server] Fatal error:', error)
  captureException(error, { context: 'startup' })
  await flushSentry()
  process.exit(1)
})
