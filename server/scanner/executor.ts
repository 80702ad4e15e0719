// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Bearer Executor
 *
 * Handles spawning and managing Bearer CLI processes.
 */

import { type ChildProcess, spawn } from 'node:child_process';
import { formatCommandLine } from './command-builder.js';
import {
  CancelledError,
  ExecutionError,
  TimeoutError,
  ToolUnavailableError,
} from './errors.js';
import { detectErrorInStderr } from './output-utils.js';
import type { CommandRunner, ExecutionResult, RunOptions } from './types.js';

export interface ExecutorConfig {
  /** Scanner executable, resolved through PATH when not absolute */
  command: string;
  /** Tokens placed before every argv (e.g. a script path when command is an interpreter) */
  baseArgs: string[];
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL */
  killGraceMs: number;
  verbose: boolean;
  /** Extra environment for the child */
  env?: Record<string, string>;
}

const SPAWN_ERROR_MAP: Record<string, { code: string; message: string }> = {
  ENOENT: {
    code: 'BEARER_NOT_INSTALLED',
    message: 'Bearer CLI is not installed or not in PATH. Install it from https://docs.bearer.com/reference/installation/'
  },
  EACCES: {
    code: 'PERMISSION_DENIED',
    message: 'Permission denied when running the Bearer CLI. Please check file permissions.'
  }
};

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Signal the child's whole process group, so wrapper scripts and Bearer's
 * own workers go down with it
 */
function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  if (process.platform === 'win32') {
    child.kill(signal);
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    // ESRCH: the group is already gone
    if (errorCode(error) !== 'ESRCH') {
      console.error(`[Executor] Failed to send ${signal} to process group ${child.pid}:`, error);
    }
  }
}

/** Terminate a process group: SIGTERM then SIGKILL after the grace period */
function terminateProcess(child: ChildProcess, graceMs: number): ReturnType<typeof setTimeout> {
  signalProcessGroup(child, 'SIGTERM');
  return setTimeout(() => signalProcessGroup(child, 'SIGKILL'), graceMs);
}

export class BearerExecutor implements CommandRunner {
  private config: ExecutorConfig;
  private runningProcesses: Map<number, ChildProcess> = new Map();

  constructor(config: Partial<ExecutorConfig> & Pick<ExecutorConfig, 'command'>) {
    this.config = {
      command: config.command,
      baseArgs: config.baseArgs ?? [],
      timeoutMs: config.timeoutMs ?? 300_000,
      killGraceMs: config.killGraceMs ?? 5_000,
      verbose: config.verbose ?? false,
      env: config.env,
    };
  }

  get command(): string {
    return this.config.command;
  }

  /** Number of Bearer processes currently alive */
  get runningCount(): number {
    return this.runningProcesses.size;
  }

  /**
   * Run Bearer with the given argv.
   * Resolves only for an exit code in `successExitCodes`; every other outcome
   * rejects with a ToolError once the child has fully exited.
   */
  run(args: string[], options: RunOptions): Promise<ExecutionResult> {
    const { cwd, signal } = options;
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const successExitCodes = options.successExitCodes ?? [0];
    const fullArgs = [...this.config.baseArgs, ...args];
    const commandLine = formatCommandLine(this.config.command, fullArgs);

    if (signal?.aborted) {
      return Promise.reject(new CancelledError(commandLine));
    }

    const perfStart = Date.now();
    if (this.config.verbose) {
      console.error(`[Executor] Running: ${commandLine} (cwd: ${cwd})`);
    }

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = spawn(this.config.command, fullArgs, {
        cwd,
        env: { ...process.env, ...this.config.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        // Own process group, so a timeout can take down every descendant
        detached: process.platform !== 'win32',
      });

      if (child.pid) {
        this.runningProcesses.set(child.pid, child);
      }

      let stdout = '';
      let stderr = '';
      let settled = false;
      let stopReason: 'timeout' | 'cancelled' | null = null;
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      const stop = (reason: 'timeout' | 'cancelled') => {
        if (stopReason || settled) return;
        stopReason = reason;
        if (this.config.verbose) {
          console.error(`[Executor] Stopping pid ${child.pid ?? '?'} (${reason})`);
        }
        killTimer = terminateProcess(child, this.config.killGraceMs);
      };

      const timeoutTimer = setTimeout(() => stop('timeout'), timeoutMs);
      const onAbort = () => stop('cancelled');
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (outcome: { result: ExecutionResult } | { error: Error }) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        if (child.pid) {
          this.runningProcesses.delete(child.pid);
        }
        if ('result' in outcome) {
          resolve(outcome.result);
        } else {
          reject(outcome.error);
        }
      };

      // Decode across chunk boundaries so split multi-byte characters survive
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      const settleStopped = () => {
        if (stopReason === 'timeout') {
          console.error(`[Executor] Timed out after ${timeoutMs}ms: ${commandLine}`);
          finish({ error: new TimeoutError(timeoutMs, commandLine, child.pid) });
        } else {
          finish({ error: new CancelledError(commandLine) });
        }
      };

      child.stdout?.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr?.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        const mapped = error.code ? SPAWN_ERROR_MAP[error.code] : undefined;
        if (mapped) {
          console.error(`[Executor] ${mapped.code}: ${this.config.command}`);
          finish({ error: new ToolUnavailableError(mapped.message, this.config.command, error.code) });
          return;
        }
        console.error(`[Executor] Failed to run ${commandLine}:`, error);
        finish({ error });
      });

      // A stopped run settles on exit: descendants that inherited the pipes
      // would otherwise hold `close` back until they finish on their own
      child.on('exit', () => {
        if (!stopReason) return;
        signalProcessGroup(child, 'SIGKILL');
        child.stdout?.destroy();
        child.stderr?.destroy();
        settleStopped();
      });

      child.on('close', (code, closeSignal) => {
        const durationMs = Date.now() - perfStart;
        if (this.config.verbose) {
          console.error(`[Executor] Exited with ${code ?? closeSignal} after ${durationMs}ms`);
        }

        if (stopReason) {
          settleStopped();
          return;
        }

        const exitCode = code ?? -1;
        if (!successExitCodes.includes(exitCode)) {
          const detected = detectErrorInStderr(stderr);
          console.error(`[Executor] Bearer failed with exit code ${code ?? closeSignal}: ${stderr.trim().slice(0, 500)}`);
          finish({
            error: new ExecutionError(
              closeSignal
                ? `Bearer was terminated by ${closeSignal}`
                : `Bearer exited with code ${exitCode}`,
              code,
              stderr,
              commandLine,
              detected?.message,
            )
          });
          return;
        }

        finish({ result: { exitCode, stdout, stderr, durationMs, command: commandLine, cwd } });
      });
    });
  }

  /**
   * Kill every Bearer process still running (shutdown)
   */
  cleanup(): void {
    for (const child of this.runningProcesses.values()) {
      signalProcessGroup(child, 'SIGKILL');
    }
    this.runningProcesses.clear();
  }
}
