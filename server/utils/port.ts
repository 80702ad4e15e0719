// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Port utilities for finding an available SSE port
 */

import { createServer } from 'node:net'

/**
 * Check if a port is available by trying to bind to it on the given host
 */
export function isPortAvailable(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer()

    server.once('error', () => {
      server.close()
      resolve(false) // Port is in use
    })

    server.once('listening', () => {
      server.close()
      resolve(true) // Port is available
    })

    server.listen(port, host)
  })
}

/**
 * Find an available port starting from startPort
 */
export async function findAvailablePort(startPort: number, host: string, maxTries: number = 20): Promise<number> {
  // Check all ports in parallel for speed
  const ports = Array.from({ length: maxTries }, (_, i) => startPort + i).filter(port => port <= 65535)
  const results = await Promise.all(
    ports.map(async (port) => ({ port, available: await isPortAvailable(port, host) }))
  )
  const available = results.find(r => r.available)
  if (available) {
    return available.port
  }
  throw new Error(`No available ports found between ${startPort} and ${startPort + maxTries - 1}`)
}
