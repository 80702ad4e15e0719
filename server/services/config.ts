// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Server Configuration
 *
 * Resolved once from the environment at startup and passed around as a
 * frozen value.
 */

import { resolve } from 'node:path'

export type TransportType = 'stdio' | 'sse'

export interface ServerConfig {
  name: string
  version: string
  /** Root every scan path must stay within */
  workingDir: string
  transport: TransportType
  sseHost: string
  ssePort: number
  bearerCommand: string
  /** Per-call timeout for Bearer processes */
  timeoutMs: number
  /** Delay between SIGTERM and SIGKILL on timeout or cancellation */
  killGraceMs: number
  /** Version the deployment was built against; drift is reported, not enforced */
  expectedBearerVersion?: string
  verbose: boolean
}

export const SERVER_NAME = 'bearer-mcp-server'
export const SERVER_VERSION = '1.1.0'

const DEFAULTS = {
  transport: 'stdio',
  sseHost: 'localhost',
  ssePort: 8000,
  bearerCommand: 'bearer',
  timeoutMs: 300_000,
  killGraceMs: 5_000,
} as const

const MAX_PORT = 65535

type Env = Record<string, string | undefined>

function parsePositiveInt(
  name: string,
  raw: string | undefined,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const value = parseInt(raw, 10)
  if (!Number.isFinite(value) || value <= 0 || value > max || String(value) !== raw.trim()) {
    console.error(`[Config] Ignoring invalid ${name}="${raw}", using ${fallback}`)
    return fallback
  }
  return value
}

function parseTransport(raw: string | undefined): TransportType {
  const value = (raw || DEFAULTS.transport).trim().toLowerCase()
  if (value === 'stdio' || value === 'sse') return value
  console.error(`[Config] Invalid transport type: ${raw}. Using stdio.`)
  return 'stdio'
}

function parseFlag(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true'
}

/**
 * Build the server configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Readonly<ServerConfig> {
  const workingDir = env.MCP_WORKING_DIRECTORY || env.WORKING_DIR || process.cwd()

  return Object.freeze({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    workingDir: resolve(workingDir),
    transport: parseTransport(env.MCP_TRANSPORT),
    sseHost: env.MCP_SSE_HOST || DEFAULTS.sseHost,
    ssePort: parsePositiveInt('MCP_SSE_PORT', env.MCP_SSE_PORT, DEFAULTS.ssePort, MAX_PORT),
    bearerCommand: env.BEARER_BINARY || DEFAULTS.bearerCommand,
    timeoutMs: parsePositiveInt('BEARER_TIMEOUT_MS', env.BEARER_TIMEOUT_MS, DEFAULTS.timeoutMs),
    killGraceMs: parsePositiveInt('BEARER_KILL_GRACE_MS', env.BEARER_KILL_GRACE_MS, DEFAULTS.killGraceMs),
    expectedBearerVersion: env.BEARER_EXPECTED_VERSION?.replace(/^v/, '') || undefined,
    verbose: parseFlag(env.BEARER_MCP_VERBOSE),
  })
}
