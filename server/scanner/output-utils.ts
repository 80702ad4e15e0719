// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Output Utilities
 *
 * Utilities for processing and parsing Bearer CLI output.
 */

import { OutputParseError } from './errors.js';
import { type InterpretedOutput, type ScanFormat, STRUCTURED_FORMATS } from './types.js';

export const EMPTY_SCAN_RESULT = {
  findings: [],
  summary: 'No security issues detected'
} as const;

const CLOSERS: Record<string, string> = { '{': '}', '[': ']' };

/**
 * Remove ANSI colour codes and normalize line endings
 */
export function stripAnsi(rawOutput: string): string {
  return rawOutput
    .replace(/\x1b\[[0-9;]*m/g, '')
    .replace(/\r\n/g, '\n');
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

/** Spans running from an opening delimiter to the last matching closer, earliest first */
function delimiterCandidates(text: string): string[] {
  const spans: Array<{ start: number; end: number }> = [];
  for (const [open, close] of Object.entries(CLOSERS)) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start !== -1 && end > start) {
      spans.push({ start, end });
    }
  }
  return spans
    .sort((a, b) => a.start - b.start)
    .map(({ start, end }) => text.slice(start, end + 1));
}

/** Spans starting at a line that opens with a delimiter, for logs that contain braces */
function lineCandidates(text: string): string[] {
  const candidates: string[] = [];
  let offset = 0;
  for (const line of text.split('\n')) {
    const trimmed = line.trimStart();
    const open = trimmed.charAt(0);
    const close = CLOSERS[open];
    if (close) {
      const start = offset + (line.length - trimmed.length);
      const end = text.lastIndexOf(close);
      if (end > start) {
        candidates.push(text.slice(start, end + 1));
      }
    }
    offset += line.length + 1;
  }
  return candidates;
}

/**
 * Parse a JSON document out of scanner stdout.
 * Log lines before or after the payload are tolerated.
 */
export function parseJsonPayload(output: string): unknown {
  const text = output.trim();

  const whole = tryParse(text);
  if (whole.ok) return whole.value;

  const seen = new Set<string>();
  for (const candidate of [...delimiterCandidates(text), ...lineCandidates(text)]) {
    if (seen.has(candidate)) continue;
    seen.add(candidate);
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  throw new OutputParseError('No JSON document found in Bearer output');
}

/**
 * Turn scanner stdout into a result. Structured formats are parsed; when
 * parsing fails the raw text is returned with a warning instead of an error.
 */
export function interpretOutput(stdout: string, format: ScanFormat): InterpretedOutput {
  const text = stripAnsi(stdout).trim();

  if (!STRUCTURED_FORMATS.has(format)) {
    return {
      kind: 'text',
      text: text || 'Bearer scan completed successfully. No security issues detected.',
      warnings: []
    };
  }

  if (!text) {
    return { kind: 'json', data: EMPTY_SCAN_RESULT, warnings: [] };
  }

  try {
    return { kind: 'json', data: parseJsonPayload(text), warnings: [] };
  } catch (error) {
    if (!(error instanceof OutputParseError)) throw error;
    console.error(`[Output] ${error.message}; returning raw output (${text.length} chars)`);
    return {
      kind: 'text',
      text,
      warnings: [`Bearer scan completed but ${format.toUpperCase()} parsing failed; raw output returned`]
    };
  }
}

/**
 * Error patterns for explaining Bearer failures found in stderr
 */
export const ERROR_PATTERNS = [
  { pattern: /unknown flag|unknown shorthand flag|invalid argument/i,
    message: 'Bearer rejected a command-line flag. The installed Bearer version may not support this option.',
    errorCode: 'UNSUPPORTED_FLAG' },
  { pattern: /could not find (the )?(directory|path)|no such file or directory/i,
    message: 'Bearer could not find the target path.',
    errorCode: 'PATH_NOT_FOUND' },
  { pattern: /bearer\.yml|config(uration)? file/i,
    message: 'Bearer could not load its configuration file. Run bearer_init_config or fix bearer.yml.',
    errorCode: 'CONFIG_ERROR' },
  { pattern: /permission denied|EACCES/i,
    message: 'Bearer was denied access to a file or directory.',
    errorCode: 'PERMISSION_DENIED' },
  { pattern: /rule.*not found|unknown rule/i,
    message: 'One of the requested rule IDs is not known to Bearer.',
    errorCode: 'UNKNOWN_RULE' },
  { pattern: /no internet|network error|connection refused|ENOTFOUND|ECONNREFUSED|ETIMEDOUT/i,
    message: 'Bearer could not reach the network (rule or version updates).',
    errorCode: 'NETWORK_ERROR' },
];

/**
 * Check stderr for known error patterns and return the first match
 */
export function detectErrorInStderr(stderrBuffer: string): { message: string; errorCode: string } | null {
  for (const { pattern, message, errorCode } of ERROR_PATTERNS) {
    if (pattern.test(stderrBuffer)) {
      return { message, errorCode };
    }
  }
  return null;
}

/**
 * Pull a semantic version out of `bearer version` output
 */
export function extractVersion(output: string): string | null {
  const match = stripAnsi(output).match(/v?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?)/);
  return match ? match[1] : null;
}
