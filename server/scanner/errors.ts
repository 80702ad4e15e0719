// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Scanner Errors
 *
 * Every failure a tool call can report upstream. The `kind` field is what
 * clients see in the structured error payload.
 */

export type ToolErrorKind =
  | 'invalid_path'
  | 'invalid_argument'
  | 'unknown_tool'
  | 'tool_unavailable'
  | 'timeout'
  | 'execution_failed'
  | 'output_parse'
  | 'cancelled'
  | 'internal';

export interface ToolErrorPayload {
  kind: ToolErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Extra fields worth showing the caller (exit code, stderr, ...) */
  get details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toPayload(): ToolErrorPayload {
    const details = this.details;
    return details
      ? { kind: this.kind, message: this.message, details }
      : { kind: this.kind, message: this.message };
  }
}

export class InvalidPathError extends ToolError {
  readonly kind = 'invalid_path' as const;

  constructor(message: string, readonly targetPath: string) {
    super(message);
  }

  override get details() {
    return { path: this.targetPath };
  }
}

export class InvalidArgumentError extends ToolError {
  readonly kind = 'invalid_argument' as const;

  constructor(message: string, readonly field?: string) {
    super(message);
  }

  override get details() {
    return this.field ? { field: this.field } : undefined;
  }
}

export class UnknownToolError extends ToolError {
  readonly kind = 'unknown_tool' as const;

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

export class ToolUnavailableError extends ToolError {
  readonly kind = 'tool_unavailable' as const;

  constructor(message: string, readonly command: string, readonly code?: string) {
    super(message);
  }

  override get details() {
    return { command: this.command, code: this.code };
  }
}

export class TimeoutError extends ToolError {
  readonly kind = 'timeout' as const;

  constructor(readonly timeoutMs: number, readonly command: string, readonly pid?: number) {
    super(`Bearer did not finish within ${Math.round(timeoutMs / 1000)}s and was terminated`);
  }

  override get details() {
    return { timeoutMs: this.timeoutMs, command: this.command };
  }
}

export class ExecutionError extends ToolError {
  readonly kind = 'execution_failed' as const;

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly command: string,
    readonly hint?: string,
  ) {
    super(message);
  }

  override get details() {
    return {
      exitCode: this.exitCode,
      stderr: this.stderr,
      command: this.command,
      ...(this.hint ? { hint: this.hint } : {}),
    };
  }
}

/** Raised inside the output interpreter; recovered there into a raw-text result */
export class OutputParseError extends ToolError {
  readonly kind = 'output_parse' as const;
}

export class CancelledError extends ToolError {
  readonly kind = 'cancelled' as const;

  constructor(readonly command: string) {
    super('Bearer run was cancelled');
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}
