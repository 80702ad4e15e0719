// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Routes Index
 *
 * Re-exports all route creators for easy importing.
 */

export { createSseRoutes, type SseSessions } from './sse.js'
export { createStatusRoutes } from './status.js'
