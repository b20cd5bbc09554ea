/**
 * Result aggregation - merges component findings into a ScanReport
 */

import type { DependencyScanResult } from './matcher.js';
import type { FileScanResult } from './file-scanner.js';
import type { GitScanResult } from './git-scanner.js';
import type { GitHubIssue, ScanReport } from './types.js';

export interface GitHubScanResult {
  githubIssues: GitHubIssue[];
  githubError?: string;
}

export interface ReportParts {
  scannedDir: string;
  startedAt: Date;
  finishedAt: Date;
  dependencies: DependencyScanResult;
  files: FileScanResult;
  git: GitScanResult;
  errors?: string[];
}

export function countIssues(
  report: Pick<ScanReport, 'badDeps' | 'suspiciousFiles' | 'suspiciousScripts' | 'gitIssues' | 'githubIssues'>
): number {
  return (
    report.badDeps.length +
    report.suspiciousFiles.length +
    report.suspiciousScripts.length +
    report.gitIssues.length +
    report.githubIssues.length
  );
}

export function createReport(parts: ReportParts): ScanReport {
  const { scannedDir, startedAt, finishedAt, dependencies, files, git, errors = [] } = parts;

  const report: ScanReport = {
    scannedDir,
    timestamp: startedAt.toISOString(),
    badDeps: dependencies.badDeps,
    suspiciousFiles: files.suspiciousFiles,
    suspiciousScripts: files.suspiciousScripts,
    gitIssues: git.gitIssues,
    githubIssues: [],
    totalScanned: dependencies.totalScanned,
    totalIssues: 0,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    errors,
  };

  if (git.gitError !== undefined) {
    report.gitError = git.gitError;
  }

  report.totalIssues = countIssues(report);
  return report;
}

/**
 * Attach organisation scan results to an existing report
 */
export function withGitHubResults(report: ScanReport, result: GitHubScanResult): ScanReport {
  const merged: ScanReport = {
    ...report,
    githubIssues: [...report.githubIssues, ...result.githubIssues],
  };

  if (result.githubError !== undefined) {
    merged.githubError = result.githubError;
  }

  merged.totalIssues = countIssues(merged);
  return merged;
}
