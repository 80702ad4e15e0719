// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import * as Sentry from '@sentry/node'
import { SERVER_NAME, SERVER_VERSION } from './config.js'

let initialized = false

/**
 * Error reporting is opt-in: it needs a DSN and can be switched off explicitly
 */
function isTelemetryEnabled(env: Record<string, string | undefined>): boolean {
  const envValue = env.BEARER_MCP_TELEMETRY
  if (envValue === '0' || envValue === 'false') {
    return false
  }
  return Boolean(env.SENTRY_DSN)
}

export function initSentry(env: Record<string, string | undefined> = process.env): boolean {
  if (initialized) return true
  if (!isTelemetryEnabled(env)) return false

  initialized = true

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV || 'development',
    release: `${SERVER_NAME}@${SERVER_VERSION}`,
    tracesSampleRate: 0,
    beforeSend(event) {
      // Strip PII from error events
      if (event.user) {
        delete event.user.ip_address
      }
      return event
    },
  })
  return true
}

export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!initialized) return
  Sentry.captureException(error, context ? { extra: context } : undefined)
}

export async function flushSentry(timeout = 2000): Promise<void> {
  if (!initialized) return
  await Sentry.flush(timeout)
}
