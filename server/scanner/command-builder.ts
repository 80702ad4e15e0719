// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Command Builder
 *
 * Maps logical tool arguments onto Bearer CLI flags. Always returns discrete
 * argv tokens; nothing here is ever passed through a shell.
 */

import { InvalidArgumentError } from './errors.js';
import {
  SCAN_FORMATS,
  type ScanArguments,
  type ScanFormat,
  type ScanRequest,
  SEVERITIES,
  type Severity,
} from './types.js';

// Must not start with '-' or '.', so an ID can never be read as a flag
const RULE_ID_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

// Detectors Bearer should run for every scan
const SCANNERS = 'sast,secrets';

function isScanFormat(value: string): value is ScanFormat {
  return SCAN_FORMATS.some(format => format === value);
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some(severity => severity === value);
}

export function assertScanFormat(value: string): ScanFormat {
  if (!isScanFormat(value)) {
    throw new InvalidArgumentError(
      `Unsupported format "${value}". Expected one of: ${SCAN_FORMATS.join(', ')}`,
      'format'
    );
  }
  return value;
}

export function assertSeverity(value: string): Severity {
  if (!isSeverity(value)) {
    throw new InvalidArgumentError(
      `Unsupported severity "${value}". Expected one of: ${SEVERITIES.join(', ')}`,
      'severity'
    );
  }
  return value;
}

/**
 * Normalize a rule list given either as "a,b,c" or ["a", "b", "c"].
 * Blank entries are dropped; anything that is not a plain rule ID is rejected.
 */
export function parseRuleList(value: string | string[] | undefined, field: string): string[] | undefined {
  if (value === undefined) return undefined;

  const parts = (Array.isArray(value) ? value : value.split(','))
    .map(part => part.trim())
    .filter(part => part.length > 0);

  for (const id of parts) {
    if (!RULE_ID_PATTERN.test(id)) {
      throw new InvalidArgumentError(`Invalid rule ID "${id}" in ${field}`, field);
    }
  }

  return parts.length > 0 ? parts : undefined;
}

/**
 * Validate a scan request. Throws InvalidArgumentError for anything Bearer
 * would not accept, so a bad request never reaches the executor.
 */
export function normalizeScanArguments(request: ScanRequest): ScanArguments {
  return {
    path: request.path,
    format: assertScanFormat(request.format ?? 'json'),
    severity: request.severity !== undefined ? assertSeverity(request.severity) : undefined,
    rules: parseRuleList(request.rules, 'rules'),
    skipRules: parseRuleList(request.skipRules, 'skip_rules'),
    outputFile: request.outputFile || undefined,
    quiet: request.quiet ?? false,
  };
}

export function buildScanArgs(request: ScanRequest): string[] {
  const scan = normalizeScanArguments(request);
  const args = ['scan', scan.path, '--scanner', SCANNERS, '--format', scan.format];

  // Machine-readable output, and test files are scanned too
  args.push('--no-color', '--skip-test=false');

  if (scan.severity) {
    args.push('--severity', scan.severity);
  }

  if (scan.rules) {
    args.push('--only-rule', scan.rules.join(','));
  }

  if (scan.skipRules) {
    args.push('--skip-rule', scan.skipRules.join(','));
  }

  if (scan.outputFile) {
    args.push('--output', scan.outputFile);
  }

  if (scan.quiet) {
    args.push('--quiet');
  }

  return args;
}

export function buildVersionArgs(): string[] {
  return ['version'];
}

export function buildInitArgs(): string[] {
  return ['init'];
}

/** Render an argv for logs and error messages */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(token => (/[\s"'\\$`]/.test(token) ? JSON.stringify(token) : token))
    .join(' ');
}
