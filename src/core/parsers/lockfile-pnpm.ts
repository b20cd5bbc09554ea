/**
 * Parser for pnpm-lock.yaml files
 */

import { readFileSync, existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { MAX_LOCKFILE_SIZE } from '../constants.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import type { Dependency } from '../types.js';

interface PnpmLockfile {
  lockfileVersion?: string | number;
  packages?: Record<string, unknown>;
}

function isValidName(name: string): boolean {
  if (name === '') return false;
  if (name.startsWith('@')) {
    const parts = name.split('/');
    return parts.length === 2 && parts[0].length > 1 && parts[1] !== '' && !name.includes('@', 1);
  }
  return !name.includes('@');
}

/**
 * Extract package name and version from a pnpm package key
 * Examples:
 *   "/react/18.2.0"                -> { name: "react", version: "18.2.0" }        (v5)
 *   "/@scope/pkg/1.0.0_react@18.2.0" -> { name: "@scope/pkg", version: "1.0.0" } (v5)
 *   "/@scope/pkg@1.0.0"            -> { name: "@scope/pkg", version: "1.0.0" }    (v6)
 *   "react@18.2.0(typescript@5.4.0)" -> { name: "react", version: "18.2.0" }     (v9)
 */
export function parsePackageKey(key: string): { name: string; version: string } | null {
  const normalized = (key.startsWith('/') ? key.slice(1) : key).replace(/\(.*$/, '');

  // v5: /name/version[_hash]
  const segments = normalized.split('/');
  if (key.startsWith('/') && segments.length >= 2) {
    const name = segments.slice(0, -1).join('/');
    const version = segments[segments.length - 1].split('_')[0];
    if (isValidName(name) && version !== '' && !version.includes('@')) {
      return { name, version };
    }
  }

  // v6+: name@version
  const atIndex = normalized.startsWith('@') ? normalized.indexOf('@', 1) : normalized.indexOf('@');
  if (atIndex > 0) {
    const name = normalized.slice(0, atIndex);
    const version = normalized.slice(atIndex + 1);
    if (isValidName(name) && version !== '') {
      return { name, version };
    }
  }

  return null;
}

/**
 * Parse pnpm-lock.yaml content into lockfile dependencies
 */
export function parsePnpmLockfileContent(content: string): Dependency[] {
  const lockfile = yaml.load(content) as PnpmLockfile | null | undefined;

  if (!lockfile || typeof lockfile !== 'object') {
    return [];
  }

  const dependencies: Dependency[] = [];

  for (const key of Object.keys(lockfile.packages ?? {})) {
    const parsed = parsePackageKey(key);
    if (parsed) {
      dependencies.push({ ...parsed, source: 'lockfile' });
    }
  }

  return dependencies;
}

/**
 * Parse pnpm-lock.yaml from a directory.
 * Returns null when the file does not exist and [] when it cannot be read.
 */
export function parsePnpmLockfile(dir: string, logger: Logger = silentLogger): Dependency[] | null {
  const lockfilePath = join(dir, 'pnpm-lock.yaml');

  if (!existsSync(lockfilePath)) {
    return null;
  }

  try {
    const stats = statSync(lockfilePath);
    if (stats.size > MAX_LOCKFILE_SIZE) {
      logger.warn(`Lockfile too large (${(stats.size / 1024 / 1024).toFixed(1)}MB > 100MB limit): ${lockfilePath}`);
      return [];
    }

    return parsePnpmLockfileContent(readFileSync(lockfilePath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse PNPM lockfile ${lockfilePath}: ${errorMessage(error)}`);
    return [];
  }
}
