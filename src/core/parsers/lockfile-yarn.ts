/**
 * Parser for yarn.lock files (v1 Classic and v2+ Berry formats)
 */

import { readFileSync, existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { MAX_LOCKFILE_SIZE } from '../constants.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import type { Dependency } from '../types.js';

/**
 * Extract the package name from a header spec.
 * Examples:
 *   "react@^18.2.0"            -> "react"
 *   "@babel/core@^7.0.0"       -> "@babel/core"
 *   "react@npm:^18.2.0"        -> "react"
 */
export function packageNameFromSpec(spec: string): string | null {
  const cleaned = spec.trim().replace(/^["']|["']$/g, '');
  const atIndex = cleaned.startsWith('@') ? cleaned.indexOf('@', 1) : cleaned.indexOf('@');

  if (atIndex <= 0) {
    return null;
  }

  return cleaned.slice(0, atIndex);
}

function isHeaderLine(line: string): boolean {
  return !line.startsWith(' ') && !line.startsWith('\t') && line.trimEnd().endsWith(':');
}

/**
 * Parse yarn.lock content.
 *
 * Classic blocks:            Berry blocks:
 *   react@^18.2.0:             "react@npm:^18.2.0":
 *     version "18.2.0"           version: 18.2.0
 *
 * A block contributes one entry per distinct name in its header once a
 * version line is seen; blocks without one are dropped.
 */
export function parseYarnLockfileContent(content: string): Dependency[] {
  const dependencies: Dependency[] = [];
  const lines = content.split(/\r?\n/);

  let currentNames: string[] = [];
  let currentVersion: string | undefined;

  const saveCurrentBlock = (): void => {
    if (currentVersion) {
      for (const name of currentNames) {
        dependencies.push({ name, version: currentVersion, source: 'lockfile' });
      }
    }
    currentNames = [];
    currentVersion = undefined;
  };

  for (const line of lines) {
    if (line.startsWith('#') || line.trim() === '') {
      continue;
    }

    if (isHeaderLine(line)) {
      saveCurrentBlock();

      // "pkg@^1.0.0", "pkg@^1.1.0":
      const header = line.trimEnd().replace(/:$/, '');
      const names = header
        .split(',')
        .map(packageNameFromSpec)
        .filter((name): name is string => name !== null);
      currentNames = [...new Set(names)];
      continue;
    }

    // A non-indented line that is not a header (e.g. __metadata) closes the block
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      saveCurrentBlock();
      continue;
    }

    if (currentNames.length > 0 && currentVersion === undefined) {
      const match = line.match(/^\s+version:?\s+["']?([^"'\s]+)["']?\s*$/);
      if (match) {
        currentVersion = match[1];
      }
    }
  }

  saveCurrentBlock();

  return dependencies;
}

/**
 * Parse yarn.lock from a directory.
 * Returns null when the file does not exist and [] when it cannot be read.
 */
export function parseYarnLockfile(dir: string, logger: Logger = silentLogger): Dependency[] | null {
  const lockfilePath = join(dir, 'yarn.lock');

  if (!existsSync(lockfilePath)) {
    return null;
  }

  try {
    const stats = statSync(lockfilePath);
    if (stats.size > MAX_LOCKFILE_SIZE) {
      logger.warn(`Lockfile too large (${(stats.size / 1024 / 1024).toFixed(1)}MB > 100MB limit): ${lockfilePath}`);
      return [];
    }

    return parseYarnLockfileContent(readFileSync(lockfilePath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse Yarn lockfile ${lockfilePath}: ${errorMessage(error)}`);
    return [];
  }
}
