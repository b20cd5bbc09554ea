/**
 * Parser for npm package-lock.json files (v1 legacy tree and v2/v3 "packages" map)
 */

import { readFileSync, existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { MAX_LOCKFILE_SIZE } from '../constants.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import type { Dependency, NpmLegacyDependency, NpmLockfile } from '../types.js';

const NODE_MODULES_MARKER = 'node_modules/';
const DEFAULT_VERSION = '0.0.0';

/**
 * Extract package name from an install path key
 * e.g. "node_modules/a/node_modules/@scope/b" -> "@scope/b"
 */
export function packageNameFromPath(key: string): string {
  const index = key.lastIndexOf(NODE_MODULES_MARKER);
  return index === -1 ? key : key.slice(index + NODE_MODULES_MARKER.length);
}

/**
 * Flatten the v1 "dependencies" tree. Walks with an explicit stack so deeply
 * nested trees cannot exhaust the call stack; entries come out in pre-order.
 */
export function flattenLegacyDependencies(root: Record<string, NpmLegacyDependency>): Dependency[] {
  const dependencies: Dependency[] = [];
  const stack: Array<[string, NpmLegacyDependency]> = Object.entries(root).reverse();

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [name, info] = next;

    dependencies.push({
      name,
      version: typeof info.version === 'string' ? info.version : DEFAULT_VERSION,
      source: 'lockfile',
    });

    if (info.dependencies && typeof info.dependencies === 'object') {
      const children = Object.entries(info.dependencies);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }

  return dependencies;
}

/**
 * Parse package-lock.json content into lockfile dependencies
 */
export function parseNpmLockfileContent(content: string): Dependency[] {
  const lockfile = JSON.parse(content) as NpmLockfile;

  if (!lockfile || typeof lockfile !== 'object') {
    throw new Error('package-lock.json is not a JSON object');
  }

  if (lockfile.packages) {
    const dependencies: Dependency[] = [];

    for (const [key, pkg] of Object.entries(lockfile.packages)) {
      // Skip the root package entry (empty key)
      if (key === '') continue;

      const name = packageNameFromPath(key);
      if (!name) continue;

      dependencies.push({
        name,
        version: typeof pkg?.version === 'string' ? pkg.version : DEFAULT_VERSION,
        source: 'lockfile',
      });
    }

    return dependencies;
  }

  if (lockfile.dependencies) {
    return flattenLegacyDependencies(lockfile.dependencies);
  }

  return [];
}

/**
 * Parse npm package-lock.json from a directory.
 * Returns null when the file does not exist and [] when it cannot be read.
 */
export function parseNpmLockfile(dir: string, logger: Logger = silentLogger): Dependency[] | null {
  const lockfilePath = join(dir, 'package-lock.json');

  if (!existsSync(lockfilePath)) {
    return null;
  }

  try {
    const stats = statSync(lockfilePath);
    if (stats.size > MAX_LOCKFILE_SIZE) {
      logger.warn(`Lockfile too large (${(stats.size / 1024 / 1024).toFixed(1)}MB > 100MB limit): ${lockfilePath}`);
      return [];
    }

    return parseNpmLockfileContent(readFileSync(lockfilePath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse npm lockfile ${lockfilePath}: ${errorMessage(error)}`);
    return [];
  }
}
