/**
 * hulud-scan
 * Scanner for Shai-Hulud npm worm infections
 */

// Core scanner functions
export { scan, scanRecursive, findProjectDirs } from './core/scanner.js';
export type { ScanOptions, RecursiveScanOptions, ProjectScan } from './core/scanner.js';

// Types
export type {
  Dependency,
  DependencySource,
  ThreatList,
  Finding,
  BadDependency,
  SuspiciousFile,
  SuspiciousFileKind,
  SuspiciousScript,
  GitIssue,
  GitIssueKind,
  GitHubIssue,
  ScanReport,
  PackageJson,
} from './core/types.js';

// Detectors
export { resolveLockfileDependencies } from './core/lockfile.js';
export { normalizeVersion } from './core/version.js';
export { matchDependencies, scanDependencies } from './core/matcher.js';
export type { MatchInput, DependencyScanResult } from './core/matcher.js';
export { scanFiles, inspectManifest } from './core/file-scanner.js';
export type { FileScanOptions, FileScanResult } from './core/file-scanner.js';
export { scanGitRepository, applyUnsignedCommitPolicy } from './core/git-scanner.js';
export type { GitScanOptions, GitScanResult } from './core/git-scanner.js';
export { createGitCliClient } from './core/git-client.js';
export type { GitClient, SignatureStatus } from './core/git-client.js';

// Aggregation
export { createReport, withGitHubResults, countIssues } from './core/report.js';
export type { GitHubScanResult } from './core/report.js';

// Threat list
export {
  loadThreatList,
  readThreatListFile,
  createThreatList,
  fetchThreatList,
  ThreatListError,
} from './core/threat-list.js';
export type { ThreatListOptions } from './core/threat-list.js';

// GitHub organisation scan
export { scanGitHubOrg } from './core/github-scanner.js';
export type { GitHubScanOptions } from './core/github-scanner.js';

// Remediation
export { remediate, detectPackageManager } from './core/remediate.js';
export type { RemediationOptions, RemediationResult, PackageManager } from './core/remediate.js';

// Formatters
export { formatSarif, generateSarif } from './core/formatters/sarif.js';
export { formatText } from './core/formatters/text.js';

// Logging
export { createConsoleLogger, silentLogger } from './core/logger.js';
export type { Logger, ConsoleLoggerOptions } from './core/logger.js';
