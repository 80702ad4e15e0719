// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Tool argument schemas. Argument names follow the MCP tool surface
 * (snake_case), not the internal ScanRequest field names.
 */

import { z } from 'zod'
import { SCAN_FORMATS, SEVERITIES } from '../scanner/types.js'

const ruleList = (description: string) =>
  z.union([z.string(), z.array(z.string())]).optional().describe(description)

const scanOptions = {
  format: z.enum(SCAN_FORMATS).default('json').describe('Output format for the scan results'),
  severity: z.enum(SEVERITIES).optional().describe('Minimum severity level to report'),
  rules: ruleList("Rule IDs to run, comma-separated or as a list (e.g., 'javascript_lang_eval,ruby_rails_logger')"),
  skip_rules: ruleList('Rule IDs to skip, comma-separated or as a list'),
  output_file: z.string().optional().describe('Path to save scan results to, inside the working directory'),
  quiet: z.boolean().default(false).describe('Suppress progress output'),
}

export const scanSchema = z.object({
  path: z.string().min(1).describe('Path to scan (directory or file). Relative paths are resolved from the working directory.'),
  ...scanOptions,
}).strict()

export const scanRepoSchema = z.object(scanOptions).strict()

export const versionSchema = z.object({}).strict()

export const listRulesSchema = z.object({
  language: z.string().optional().describe('Language to get information about (e.g., javascript, python, java, ruby, php, go)'),
  category: z.string().optional().describe('OWASP Top 10 category to describe, by ID (A03) or name (injection)'),
}).strict()

export const initConfigSchema = z.object({
  path: z.string().optional().describe('Directory to create configuration in (defaults to the working directory)'),
}).strict()

export type ScanToolArgs = z.infer<typeof scanSchema>
export type ScanRepoToolArgs = z.infer<typeof scanRepoSchema>
export type VersionToolArgs = z.infer<typeof versionSchema>
export type ListRulesToolArgs = z.infer<typeof listRulesSchema>
export type InitConfigToolArgs = z.infer<typeof initConfigSchema>
