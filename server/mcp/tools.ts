// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Tool Registry
 *
 * Binds each tool name to its argument schema and handler. The JSON Schema
 * advertised over MCP is generated from the same zod schema that validates
 * incoming calls.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import { InvalidArgumentError } from '../scanner/errors.js'
import {
  handleInitConfig,
  handleListRules,
  handleScan,
  handleScanRepo,
  handleVersion,
  type ToolContext,
  type ToolResult,
} from './handlers.js'
import { initConfigSchema, listRulesSchema, scanRepoSchema, scanSchema, versionSchema } from './schemas.js'

export const TOOL_NAMES = [
  'bearer_scan',
  'bearer_scan_repo',
  'bearer_version',
  'bearer_list_rules',
  'bearer_init_config',
] as const

export type ToolName = (typeof TOOL_NAMES)[number]

export interface RegisteredTool {
  name: ToolName
  definition: Tool
  /** Validate raw arguments against the schema, then run the handler */
  invoke(rawArgs: unknown, ctx: ToolContext): Promise<ToolResult>
}

interface ToolOptions<S extends z.ZodTypeAny> {
  name: ToolName
  description: string
  schema: S
  handler: (args: z.output<S>, ctx: ToolContext) => Promise<ToolResult>
}

function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const json: Record<string, unknown> = { ...zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' }) }
  delete json.$schema
  const { properties, required, ...rest } = json
  return {
    ...rest,
    type: 'object',
    properties: isRecord(properties) ? objectEntriesOnly(properties) : {},
    ...(Array.isArray(required) && required.length > 0
      ? { required: required.filter((field): field is string => typeof field === 'string') }
      : {}),
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Property map holding only the object-valued entries, as MCP tool schemas require */
function objectEntriesOnly(properties: Record<string, unknown>): Record<string, Record<string, unknown>> {
  return Object.fromEntries(
    Object.entries(properties).filter((entry): entry is [string, Record<string, unknown>] => isRecord(entry[1]))
  )
}

function describeIssue(issue: z.ZodIssue): { field?: string; message: string } {
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined
  return { field, message: field ? `Invalid argument "${field}": ${issue.message}` : `Invalid arguments: ${issue.message}` }
}

export function defineTool<S extends z.ZodTypeAny>(options: ToolOptions<S>): RegisteredTool {
  return {
    name: options.name,
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: toInputSchema(options.schema),
    },
    async invoke(rawArgs, ctx) {
      const parsed = options.schema.safeParse(rawArgs ?? {})
      if (!parsed.success) {
        const { field, message } = describeIssue(parsed.error.issues[0])
        throw new InvalidArgumentError(message, field)
      }
      return options.handler(parsed.data, ctx)
    },
  }
}

export const TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'bearer_scan',
    description: 'Run Bearer security scan on a specific directory or file path (path parameter required)',
    schema: scanSchema,
    handler: handleScan,
  }),
  defineTool({
    name: 'bearer_scan_repo',
    description: 'Run Bearer security scan on the entire repository/workspace (no path parameter needed)',
    schema: scanRepoSchema,
    handler: handleScanRepo,
  }),
  defineTool({
    name: 'bearer_version',
    description: 'Get Bearer CLI version information',
    schema: versionSchema,
    handler: handleVersion,
  }),
  defineTool({
    name: 'bearer_list_rules',
    description: 'Get information about Bearer security rules, optionally for one language or OWASP category',
    schema: listRulesSchema,
    handler: handleListRules,
  }),
  defineTool({
    name: 'bearer_init_config',
    description: 'Initialize Bearer configuration file (bearer.yml) in the project',
    schema: initConfigSchema,
    handler: handleInitConfig,
  }),
]
