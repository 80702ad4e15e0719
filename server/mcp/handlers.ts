// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Tool Handlers
 *
 * One function per tool. Each runs the linear pipeline
 * validate paths → build argv → execute → interpret.
 * Handlers throw ToolErrors; the dispatcher turns them into responses.
 */

import { dirname } from 'node:path'
import { buildInitArgs, buildScanArgs, buildVersionArgs } from '../scanner/command-builder.js'
import { extractVersion, interpretOutput, stripAnsi } from '../scanner/output-utils.js'
import type { CommandRunner, ScanFormat } from '../scanner/types.js'
import { getRelativePath, resolveConfinedPath } from '../services/pathUtils.js'
import { describeRules, loadRulesCatalog } from './rules-catalog.js'
import type {
  InitConfigToolArgs,
  ListRulesToolArgs,
  ScanRepoToolArgs,
  ScanToolArgs,
  VersionToolArgs,
} from './schemas.js'

export interface ToolContext {
  workingDir: string
  runner: CommandRunner
  timeoutMs: number
  expectedBearerVersion?: string
  verbose: boolean
  /** Aborted when the client cancels the request */
  signal?: AbortSignal
}

export interface ToolResult {
  text: string
  /** Parsed payload, when the output was structured */
  data?: unknown
  warnings: string[]
}

// Bearer exits 1 when it reports findings; that is a successful scan
const SCAN_SUCCESS_EXIT_CODES = [0, 1] as const

// `bearer version` should answer quickly, whatever the scan timeout is
const VERSION_TIMEOUT_MS = 30_000

async function runScan(scanPath: string, args: ScanRepoToolArgs, ctx: ToolContext): Promise<ToolResult> {
  const outputFile = args.output_file
    ? resolveConfinedPath(args.output_file, ctx.workingDir)
    : undefined
  if (outputFile) {
    // Bearer does not create missing directories for --output
    resolveConfinedPath(dirname(outputFile), ctx.workingDir, { directory: true })
  }

  const argv = buildScanArgs({
    path: scanPath,
    format: args.format,
    severity: args.severity,
    rules: args.rules,
    skipRules: args.skip_rules,
    outputFile,
    quiet: args.quiet,
  })

  console.error(`[Scan] Scanning ${getRelativePath(scanPath, ctx.workingDir) || '.'} (${args.format})`)

  const result = await ctx.runner.run(argv, {
    cwd: ctx.workingDir,
    timeoutMs: ctx.timeoutMs,
    signal: ctx.signal,
    successExitCodes: SCAN_SUCCESS_EXIT_CODES,
  })

  if (ctx.verbose) {
    console.error(`[Scan] Finished with exit code ${result.exitCode} in ${result.durationMs}ms`)
  }

  if (outputFile) {
    const summary = result.exitCode === 1
      ? 'Bearer scan completed with findings.'
      : 'Bearer scan completed. No security issues detected.'
    const consoleOutput = stripAnsi(result.stdout).trim()
    return {
      text: `${summary}\nResults written to ${getRelativePath(outputFile, ctx.workingDir)}${consoleOutput ? `\n\n${consoleOutput}` : ''}`,
      data: { outputFile, exitCode: result.exitCode },
      warnings: [],
    }
  }

  return toToolResult(result.stdout, args.format)
}

function toToolResult(stdout: string, format: ScanFormat): ToolResult {
  const interpreted = interpretOutput(stdout, format)
  if (interpreted.kind === 'json') {
    return {
      text: JSON.stringify(interpreted.data, null, 2),
      data: interpreted.data,
      warnings: interpreted.warnings,
    }
  }
  return { text: interpreted.text, warnings: interpreted.warnings }
}

export async function handleScan(args: ScanToolArgs, ctx: ToolContext): Promise<ToolResult> {
  const { path, ...options } = args
  const scanPath = resolveConfinedPath(path, ctx.workingDir, { mustExist: true })
  return runScan(scanPath, options, ctx)
}

export async function handleScanRepo(args: ScanRepoToolArgs, ctx: ToolContext): Promise<ToolResult> {
  const scanPath = resolveConfinedPath('.', ctx.workingDir, { directory: true })
  return runScan(scanPath, args, ctx)
}

export async function handleVersion(_args: VersionToolArgs, ctx: ToolContext): Promise<ToolResult> {
  const result = await ctx.runner.run(buildVersionArgs(), {
    cwd: ctx.workingDir,
    timeoutMs: Math.min(ctx.timeoutMs, VERSION_TIMEOUT_MS),
    signal: ctx.signal,
  })

  const output = stripAnsi(result.stdout).trim()
  const version = extractVersion(output)
  const expected = ctx.expectedBearerVersion
  const warnings: string[] = []

  if (expected && version && version !== expected) {
    // Drift is reported but never blocks: whatever Bearer is on PATH gets used
    console.error(`[Version] Installed Bearer ${version} differs from expected ${expected}`)
    warnings.push(`Installed Bearer version ${version} differs from the expected ${expected}; continuing with the installed version`)
  }

  return {
    text: `Bearer CLI version:\n${output}`,
    data: {
      version,
      expectedVersion: expected ?? null,
      matchesExpected: expected && version ? version === expected : null,
    },
    warnings,
  }
}

export async function handleListRules(args: ListRulesToolArgs, _ctx: ToolContext): Promise<ToolResult> {
  return {
    text: describeRules(loadRulesCatalog(), { language: args.language, category: args.category }),
    warnings: [],
  }
}

export async function handleInitConfig(args: InitConfigToolArgs, ctx: ToolContext): Promise<ToolResult> {
  const targetDir = resolveConfinedPath(args.path ?? '.', ctx.workingDir, { directory: true })
  console.error(`[Init] Initializing Bearer config in: ${targetDir}`)

  const result = await ctx.runner.run(buildInitArgs(), {
    cwd: targetDir,
    timeoutMs: ctx.timeoutMs,
    signal: ctx.signal,
  })

  return {
    text: `Bearer configuration initialized in ${targetDir}:\n${stripAnsi(result.stdout).trim()}`,
    data: { directory: targetDir },
    warnings: [],
  }
}
