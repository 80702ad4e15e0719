// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * HTTP application for the SSE transport (Hono)
 */

import { randomBytes } from 'node:crypto'
import type { HttpBindings } from '@hono/node-server'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import { createSseRoutes, createStatusRoutes, type SseSessions } from './routes/index.js'
import type { ServerConfig } from './services/config.js'
import { captureException } from './services/sentry.js'

export interface HttpAppOptions {
  config: Pick<ServerConfig, 'name' | 'version' | 'sseHost' | 'ssePort' | 'verbose'>
  /** Builds a fresh MCP server for every SSE session */
  createServer: () => Server
  sessions?: SseSessions
}

const LOCAL_HOSTNAMES = new Set(['localhost', '127.0.0.1'])

function localOrigin(origin: string): string {
  try {
    return LOCAL_HOSTNAMES.has(new URL(origin).hostname) ? origin : 'http://localhost'
  } catch {
    return 'http://localhost'
  }
}

export function createHttpApp({ config, createServer, sessions = new Map() }: HttpAppOptions) {
  const app = new Hono<{ Bindings: HttpBindings }>()

  // stdout is reserved for protocol traffic in stdio mode; keep all logs on stderr
  app.use('*', logger((message, ...rest) => console.error(message, ...rest)))

  // Browser-based MCP clients may only connect from the local machine
  app.use('*', cors({ origin: (origin) => (origin ? localOrigin(origin) : 'http://localhost') }))

  app.route('/', createStatusRoutes(config, () => sessions.size))
  app.route('/', createSseRoutes(createServer, sessions))

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404)
  })

  app.onError((err, c) => {
    const errorId = randomBytes(4).toString('hex')
    console.error(`[HTTP] Server error [${errorId}]:`, err)
    captureException(err, { errorId, path: c.req.path, method: c.req.method })
    return c.json({
      error: 'Internal server error',
      errorId,
      message: 'Something went wrong. If this persists, report this error ID.'
    }, 500)
  })

  return app
}
