// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * SSE Routes
 *
 * MCP over Server-Sent Events. GET /sse opens a session backed by its own MCP
 * server instance; the client then POSTs JSON-RPC messages to
 * /messages?sessionId=<id>.
 */

import type { HttpBindings } from '@hono/node-server'
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js'
import { Hono } from 'hono'

export type SseSessions = Map<string, SSEServerTransport>

export const MESSAGES_PATH = '/messages'

export function createSseRoutes(createServer: () => Server, sessions: SseSessions = new Map()) {
  const routes = new Hono<{ Bindings: HttpBindings }>()

  routes.get('/sse', async (c) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, c.env.outgoing)
    const server = createServer()
    const sessionId = transport.sessionId

    sessions.set(sessionId, transport)
    server.onclose = () => {
      sessions.delete(sessionId)
      console.error(`[SSE] Session closed: ${sessionId} (${sessions.size} active)`)
    }

    // connect() starts the transport, which writes the SSE headers and endpoint event
    await server.connect(transport)
    console.error(`[SSE] Session opened: ${sessionId} (${sessions.size} active)`)

    return RESPONSE_ALREADY_SENT
  })

  routes.post(MESSAGES_PATH, async (c) => {
    const sessionId = c.req.query('sessionId')
    const transport = sessionId ? sessions.get(sessionId) : undefined
    if (!transport) {
      return c.json({ error: 'Unknown or expired session' }, 404)
    }

    await transport.handlePostMessage(c.env.incoming, c.env.outgoing)
    return RESPONSE_ALREADY_SENT
  })

  return routes
}
