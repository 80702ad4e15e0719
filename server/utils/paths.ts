// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Path Utilities for the Package
 *
 * Provides consistent path resolution for the installed npm package.
 * Works whether running from source (tsx) or from the compiled dist/ tree.
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// ES module equivalent of __dirname for this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function findPackageRoot(start: string): string {
  let current = start;
  while (!existsSync(join(current, 'package.json'))) {
    const parent = dirname(current);
    if (parent === current) {
      return resolve(start, '../..');
    }
    current = parent;
  }
  return current;
}

/**
 * Root directory of the package installation (the directory containing package.json).
 */
export const PACKAGE_ROOT = findPackageRoot(__dirname);

/**
 * Static Bearer rule catalogue served by bearer_list_rules
 */
export const RULES_CATALOG_PATH = resolve(PACKAGE_ROOT, 'data', 'rules-catalog.json');
