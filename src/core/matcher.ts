/**
 * Threat matcher - checks declared and resolved dependencies against the threat list
 */

import { parsePackageJson, getManifestDependencies } from './parsers/package-json.js';
import { resolveLockfileDependencies } from './lockfile.js';
import { isBadVersion } from './threat-list.js';
import { normalizeVersion } from './version.js';
import { silentLogger, type Logger } from './logger.js';
import type { BadDependency, Dependency, ThreatList } from './types.js';

export interface MatchInput {
  /** Declared entries; `version` is the specifier as written in package.json */
  manifestDependencies: Dependency[];
  lockfileDependencies: Dependency[];
  threatList: ThreatList;
}

export interface DependencyScanResult {
  badDeps: BadDependency[];
  totalScanned: number;
}

/**
 * Match manifest and lockfile dependencies against the threat list.
 *
 * Lockfile entries are checked whether or not the manifest declares them, so
 * transitive dependencies are covered too.
 */
export function matchDependencies(input: MatchInput): DependencyScanResult {
  const { manifestDependencies, lockfileDependencies, threatList } = input;
  const badDeps: BadDependency[] = [];
  const seen = new Set<string>();

  const report = (name: string, version: string): void => {
    const key = `${name}@${version}`;
    if (seen.has(key)) return;
    seen.add(key);
    badDeps.push({ category: 'bad-dependency', name, version });
  };

  for (const dependency of manifestDependencies) {
    const version = normalizeVersion(dependency.version);
    if (isBadVersion(threatList, dependency.name, version)) {
      report(dependency.name, version);
    }
  }

  const lockfileNames = new Set<string>();

  for (const dependency of lockfileDependencies) {
    lockfileNames.add(dependency.name);
    if (isBadVersion(threatList, dependency.name, dependency.version)) {
      report(dependency.name, dependency.version);
    }
  }

  return {
    badDeps,
    totalScanned: Math.max(manifestDependencies.length, lockfileNames.size),
  };
}

/**
 * Scan a project's package.json and lockfiles for compromised versions
 */
export function scanDependencies(
  projectDir: string,
  threatList: ThreatList,
  logger: Logger = silentLogger
): DependencyScanResult {
  const packageJson = parsePackageJson(projectDir, logger);

  if (!packageJson) {
    logger.warn('No package.json found.');
  }

  return matchDependencies({
    manifestDependencies: packageJson ? getManifestDependencies(packageJson) : [],
    lockfileDependencies: resolveLockfileDependencies(projectDir, logger),
    threatList,
  });
}
