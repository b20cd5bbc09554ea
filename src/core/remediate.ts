/**
 * Auto-remediation - uninstalls compromised packages with the project's package manager
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { execFileSync } from 'node:child_process';
import { errorMessage } from './logger.js';
import type { BadDependency } from './types.js';

export type PackageManager = 'npm' | 'pnpm' | 'yarn';

export type CommandRunner = (command: string, args: string[], cwd: string) => void;

export interface RemediationOptions {
  projectPath: string;
  badDeps: BadDependency[];
  dryRun?: boolean;
  run?: CommandRunner;
}

export interface RemediationResult {
  success: boolean;
  packageManager: PackageManager;
  command: string;
  removedPackages: string[];
  errors: string[];
}

const UNINSTALL_ARGS: Record<PackageManager, string[]> = {
  npm: ['uninstall'],
  pnpm: ['remove'],
  yarn: ['remove'],
};

const runCommand: CommandRunner = (command, args, cwd) => {
  execFileSync(command, args, { cwd, stdio: 'inherit' });
};

/**
 * Detect which package manager is being used
 */
export function detectPackageManager(projectPath: string): PackageManager {
  if (existsSync(join(projectPath, 'pnpm-lock.yaml'))) {
    return 'pnpm';
  }
  if (existsSync(join(projectPath, 'yarn.lock'))) {
    return 'yarn';
  }
  return 'npm';
}

/**
 * Remove every compromised package from the project
 */
export function remediate(options: RemediationOptions): RemediationResult {
  const { projectPath, badDeps, dryRun = false, run = runCommand } = options;
  const packageManager = detectPackageManager(projectPath);
  const packages = [...new Set(badDeps.map(dep => dep.name))];
  const args = [...UNINSTALL_ARGS[packageManager], ...packages];

  const result: RemediationResult = {
    success: false,
    packageManager,
    command: [packageManager, ...args].join(' '),
    removedPackages: [],
    errors: [],
  };

  if (packages.length === 0 || dryRun) {
    result.success = true;
    return result;
  }

  try {
    run(packageManager, args, projectPath);
    result.removedPackages = packages;
    result.success = true;
  } catch (error) {
    result.errors.push(`Remediation failed: ${errorMessage(error)}`);
  }

  return result;
}
