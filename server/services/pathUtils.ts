// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Path Utilities
 *
 * Secure path validation utilities to prevent path traversal attacks.
 * Every path handed to Bearer MUST be validated through these functions.
 */

import { existsSync, lstatSync, readlinkSync, realpathSync, statSync } from 'node:fs';
import { dirname, isAbsolute, normalize, relative, resolve, sep } from 'node:path';
import { InvalidPathError } from '../scanner/errors.js';

export interface PathValidationResult {
  valid: boolean;
  resolvedPath: string;
  error?: string;
}

export interface ConfinedPathOptions {
  /** Fail when the path does not exist */
  mustExist?: boolean;
  /** Require the path to be a directory (implies mustExist) */
  directory?: boolean;
}

function isWithin(candidate: string, root: string): boolean {
  // Trailing separator prevents partial matches (e.g., /home/user vs /home/username)
  const rootWithSep = root.endsWith(sep) ? root : `${root}${sep}`;
  return candidate === root || candidate.startsWith(rootWithSep);
}

// Same limit as the kernel's ELOOP check
const MAX_SYMLINK_HOPS = 40;

/**
 * Real path of the deepest existing ancestor, with the missing tail re-appended.
 * Lets symlink checks cover paths that do not exist yet (output files).
 * A dangling symlink is followed to its target, since writing through it
 * creates the target.
 */
function realpathOfExistingPrefix(target: string, hops = 0): string {
  if (hops > MAX_SYMLINK_HOPS) {
    throw new Error(`Too many levels of symbolic links: ${target}`);
  }

  let current = target;
  const missing: string[] = [];
  for (;;) {
    const stats = lstatSync(current, { throwIfNoEntry: false });
    if (stats) {
      if (stats.isSymbolicLink() && !existsSync(current)) {
        const linkTarget = resolve(dirname(current), readlinkSync(current));
        return realpathOfExistingPrefix(resolve(linkTarget, ...missing), hops + 1);
      }
      return resolve(realpathSync(current), ...missing);
    }
    const parent = dirname(current);
    if (parent === current) break;
    missing.unshift(current.slice(parent.length).replace(/^[\\/]+/, ''));
    current = parent;
  }
  return resolve(current, ...missing);
}

/**
 * Validate that a path is within the allowed working directory.
 * Prevents path traversal attacks using .., absolute paths or symlinks.
 *
 * @param targetPath - The path to validate (relative or absolute)
 * @param workingDir - The allowed working directory boundary
 */
export function validatePathWithinWorkingDir(
  targetPath: string,
  workingDir: string
): PathValidationResult {
  try {
    if (containsDangerousPatterns(targetPath)) {
      console.error(`[PathUtils] SECURITY: Rejected path with unsafe characters: ${JSON.stringify(targetPath)}`);
      return {
        valid: false,
        resolvedPath: '',
        error: 'Invalid path: contains unsupported characters or shell expansion'
      };
    }

    const normalizedWorkingDir = resolve(workingDir);

    let resolvedPath = isAbsolute(targetPath)
      ? resolve(targetPath)
      : resolve(normalizedWorkingDir, targetPath);
    resolvedPath = normalize(resolvedPath);

    let isWithinWorkingDir = isWithin(resolvedPath, normalizedWorkingDir);

    // A symlink inside the root may still point outside it
    if (isWithinWorkingDir && existsSync(normalizedWorkingDir)) {
      const realRoot = realpathSync(normalizedWorkingDir);
      isWithinWorkingDir = isWithin(realpathOfExistingPrefix(resolvedPath), realRoot);
    }

    if (!isWithinWorkingDir) {
      console.error(
        `[PathUtils] SECURITY: Path traversal attempt blocked. ` +
        `Target: "${targetPath}", Resolved: "${resolvedPath}", WorkingDir: "${normalizedWorkingDir}"`
      );

      return {
        valid: false,
        resolvedPath: '',
        error: 'Access denied: path is outside working directory'
      };
    }

    return {
      valid: true,
      resolvedPath
    };
  } catch (error) {
    console.error('[PathUtils] Error validating path:', error);
    return {
      valid: false,
      resolvedPath: '',
      error: `Invalid path: ${error instanceof Error ? error.message : String(error)}`
    };
  }
}

/**
 * Resolve a caller-supplied path to an absolute path inside the working directory.
 *
 * @throws InvalidPathError when the path escapes the root or fails the existence checks
 */
export function resolveConfinedPath(
  targetPath: string,
  workingDir: string,
  options: ConfinedPathOptions = {}
): string {
  const validation = validatePathWithinWorkingDir(targetPath, workingDir);
  if (!validation.valid) {
    throw new InvalidPathError(validation.error ?? 'Invalid path', targetPath);
  }

  const mustExist = options.mustExist || options.directory;
  if (mustExist && !existsSync(validation.resolvedPath)) {
    throw new InvalidPathError(
      `Path does not exist: ${getRelativePath(validation.resolvedPath, workingDir) || '.'}`,
      targetPath
    );
  }

  if (options.directory && !statSync(validation.resolvedPath).isDirectory()) {
    throw new InvalidPathError(
      `Not a directory: ${getRelativePath(validation.resolvedPath, workingDir)}`,
      targetPath
    );
  }

  return validation.resolvedPath;
}

/**
 * Get the relative path from working directory.
 * Useful for returning user-friendly paths in responses.
 */
export function getRelativePath(absolutePath: string, workingDir: string): string {
  return relative(resolve(workingDir), absolutePath);
}

/**
 * Check if a path contains dangerous patterns that should be blocked.
 */
export function containsDangerousPatterns(path: string): boolean {
  const dangerousPatterns = [
    /\0/, // Null bytes
    /^~/, // Home directory expansion (should use absolute paths)
    /\$\{/, // Variable expansion
    /\$\(/, // Command substitution
  ];

  return dangerousPatterns.some(pattern => pattern.test(path));
}
