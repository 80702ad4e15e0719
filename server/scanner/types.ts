// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Scanner Types
 *
 * Shared type definitions for building, running and interpreting Bearer calls.
 */

export const SCAN_FORMATS = ['json', 'yaml', 'sarif', 'html'] as const;
export type ScanFormat = (typeof SCAN_FORMATS)[number];

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Formats whose stdout is a JSON document */
export const STRUCTURED_FORMATS: ReadonlySet<ScanFormat> = new Set<ScanFormat>(['json', 'sarif']);

/** Scan options as they arrive from a caller, before enum and rule validation */
export interface ScanRequest {
  path: string;
  format?: string;
  severity?: string;
  rules?: string | string[];
  skipRules?: string | string[];
  outputFile?: string;
  quiet?: boolean;
}

/** Validated scan options */
export interface ScanArguments {
  /** Absolute path inside the working-directory root */
  path: string;
  format: ScanFormat;
  severity?: Severity;
  rules?: string[];
  skipRules?: string[];
  /** Absolute path inside the working-directory root */
  outputFile?: string;
  quiet: boolean;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  command: string;
  cwd: string;
}

export interface RunOptions {
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Exit codes treated as success (default: [0]) */
  successExitCodes?: readonly number[];
}

/** Anything that can run a Bearer argument vector (the real executor or a test double) */
export interface CommandRunner {
  run(args: string[], options: RunOptions): Promise<ExecutionResult>;
}

export type InterpretedOutput =
  | { kind: 'json'; data: unknown; warnings: string[] }
  | { kind: 'text'; text: string; warnings: string[] };
