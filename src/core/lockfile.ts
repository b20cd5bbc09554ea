/**
 * Lockfile resolver - collects resolved dependencies from every lockfile in a project
 */

import { parseNpmLockfile } from './parsers/lockfile-npm.js';
import { parseYarnLockfile } from './parsers/lockfile-yarn.js';
import { parsePnpmLockfile } from './parsers/lockfile-pnpm.js';
import { silentLogger, type Logger } from './logger.js';
import type { Dependency } from './types.js';

export const LOCKFILE_NAMES = ['package-lock.json', 'yarn.lock', 'pnpm-lock.yaml'] as const;

/**
 * Parse every recognized lockfile in the project directory.
 * Results are concatenated in npm -> yarn -> pnpm order and not deduplicated.
 */
export function resolveLockfileDependencies(projectDir: string, logger: Logger = silentLogger): Dependency[] {
  const parsers = [parseNpmLockfile, parseYarnLockfile, parsePnpmLockfile];
  const dependencies: Dependency[] = [];

  for (const parse of parsers) {
    const entries = parse(projectDir, logger);
    if (entries) {
      logger.debug(`Read ${entries.length} lockfile entries via ${parse.name}`);
      dependencies.push(...entries);
    }
  }

  return dependencies;
}
