// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Status Routes
 *
 * Health check and a human-readable landing page for the SSE server.
 */

import { Hono } from 'hono'
import { html } from 'hono/html'
import type { ServerConfig } from '../services/config.js'

export function createStatusRoutes(
  config: Pick<ServerConfig, 'name' | 'version' | 'sseHost' | 'ssePort'>,
  activeSessions: () => number
) {
  const routes = new Hono()

  routes.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: config.version,
      sessions: activeSessions()
    })
  })

  routes.get('/', (c) => {
    return c.html(html`<!DOCTYPE html>
<html>
  <head><title>Bearer MCP Server</title></head>
  <body>
    <h1>Bearer MCP Server</h1>
    <p><strong>Status:</strong> Running</p>
    <p><strong>Version:</strong> ${config.version}</p>
    <p><strong>Transport:</strong> SSE (Server-Sent Events)</p>
    <p><strong>Host:</strong> ${config.sseHost}:${config.ssePort}</p>
    <h3>Endpoints</h3>
    <p>SSE endpoint: <code>/sse</code></p>
    <p>Messages endpoint: <code>/messages?sessionId=...</code></p>
    <p>MCP server wrapping the Bearer CLI security scanner: scan code for
    security vulnerabilities and sensitive data leaks.</p>
  </body>
</html>`)
  })

  return routes
}
