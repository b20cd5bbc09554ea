/**
 * Core scanner - runs every detector over a project and aggregates the findings
 */

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { scanDependencies, type DependencyScanResult } from './matcher.js';
import { scanFiles, type FileScanOptions, type FileScanResult } from './file-scanner.js';
import { scanGitRepository, type GitScanResult } from './git-scanner.js';
import { LOCKFILE_NAMES } from './lockfile.js';
import { createReport } from './report.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { GitClient } from './git-client.js';
import type { ScanReport, ThreatList } from './types.js';

export interface ScanOptions {
  path: string;
  threatList: ThreatList;
  skipGit?: boolean;
  gitClient?: GitClient;
  bundleHashes?: FileScanOptions['bundleHashes'];
  logger?: Logger;
}

export interface RecursiveScanOptions extends ScanOptions {
  maxDepth?: number;
  ignorePaths?: string[];
}

export interface ProjectScan {
  path: string;
  report: ScanReport;
}

// Code-unit order, independent of the host locale
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Find every directory holding a lockfile, skipping node_modules and dot
 * directories
 */
export function findProjectDirs(rootDir: string, maxDepth: number = 2, ignorePaths: string[] = []): string[] {
  const results: string[] = [];
  const ignoreSet = new Set(['node_modules', ...ignorePaths]);

  function walk(dir: string, depth: number): void {
    if (depth > maxDepth) return;

    if (LOCKFILE_NAMES.some(name => existsSync(join(dir, name)))) {
      results.push(dir);
    }

    try {
      const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => compareNames(a.name, b.name));

      for (const entry of entries) {
        if (!entry.isDirectory()) continue;
        if (ignoreSet.has(entry.name)) continue;
        if (entry.name.startsWith('.')) continue;

        walk(join(dir, entry.name), depth + 1);
      }
    } catch {
      // Unreadable directories have no projects to report
    }
  }

  walk(rootDir, 0);
  return results;
}

/**
 * Scan a single project directory
 */
export function scan(options: ScanOptions): ScanReport {
  const { path: rootPath, threatList, skipGit = false, gitClient, bundleHashes, logger = silentLogger } = options;
  const startedAt = new Date();
  const errors: string[] = [];

  let dependencies: DependencyScanResult = { badDeps: [], totalScanned: 0 };
  let files: FileScanResult = { suspiciousFiles: [], suspiciousScripts: [] };
  let git: GitScanResult = { gitIssues: [] };

  if (!existsSync(rootPath)) {
    errors.push(`Path does not exist: ${rootPath}`);
  } else {
    try {
      dependencies = scanDependencies(rootPath, threatList, logger);
    } catch (error) {
      errors.push(`Dependency scan failed: ${errorMessage(error)}`);
    }

    try {
      files = scanFiles(rootPath, { bundleHashes, logger });
    } catch (error) {
      errors.push(`File scan failed: ${errorMessage(error)}`);
    }

    if (!skipGit) {
      git = scanGitRepository(rootPath, { client: gitClient, logger });
    }
  }

  return createReport({
    scannedDir: rootPath,
    startedAt,
    finishedAt: new Date(),
    dependencies,
    files,
    git,
    errors,
  });
}

/**
 * Scan every project found below a root directory
 */
export function scanRecursive(options: RecursiveScanOptions): ProjectScan[] {
  const { path: rootPath, maxDepth = 2, ignorePaths = [], logger = silentLogger } = options;
  const projectDirs = findProjectDirs(rootPath, maxDepth, ignorePaths);

  logger.debug(`Found ${projectDirs.length} project(s) to scan`);

  return projectDirs.map((projectDir, index) => {
    logger.info(`[${index + 1}/${projectDirs.length}] Processing ${projectDir}...`);
    return { path: projectDir, report: scan({ ...options, path: projectDir }) };
  });
}
