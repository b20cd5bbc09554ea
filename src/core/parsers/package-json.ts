/**
 * Parser for package.json files
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import type { Dependency, PackageJson } from '../types.js';

/**
 * Parse a package.json file from a directory
 */
export function parsePackageJson(dir: string, logger: Logger = silentLogger): PackageJson | null {
  const packageJsonPath = join(dir, 'package.json');

  if (!existsSync(packageJsonPath)) {
    return null;
  }

  try {
    const content = readFileSync(packageJsonPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.warn(`Ignoring ${packageJsonPath}: not a JSON object`);
      return null;
    }
    return parsed as PackageJson;
  } catch (error) {
    logger.warn(`Failed to parse ${packageJsonPath}: ${errorMessage(error)}`);
    return null;
  }
}

function stringEntries(deps: Record<string, string> | undefined): Array<[string, string]> {
  if (!deps || typeof deps !== 'object') return [];
  return Object.entries(deps).filter((entry): entry is [string, string] => typeof entry[1] === 'string');
}

/**
 * Get all dependencies from a package.json (both deps and devDeps).
 * A name declared in both keeps its devDependencies specifier.
 */
export function getAllDependencies(packageJson: PackageJson): Record<string, string> {
  return {
    ...Object.fromEntries(stringEntries(packageJson.dependencies)),
    ...Object.fromEntries(stringEntries(packageJson.devDependencies)),
  };
}

/**
 * Declared dependencies as `manifest` entries; `version` holds the raw specifier
 */
export function getManifestDependencies(packageJson: PackageJson): Dependency[] {
  return Object.entries(getAllDependencies(packageJson)).map(([name, version]): Dependency => ({
    name,
    version,
    source: 'manifest',
  }));
}
