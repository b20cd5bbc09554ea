/**
 * Core type definitions for hulud-scan
 */

export type DependencySource = 'manifest' | 'lockfile';

export interface Dependency {
  name: string;
  version: string;
  source: DependencySource;
}

/**
 * Known-bad versions keyed by package name.
 * Raw keys starting with `_` end up in `metadata`, never in `packages`.
 */
export interface ThreatList {
  packages: ReadonlyMap<string, ReadonlySet<string>>;
  metadata: Readonly<Record<string, unknown>>;
}

export interface BadDependency {
  category: 'bad-dependency';
  name: string;
  version: string;
}

export type SuspiciousFileKind = 'bundle-hash' | 'ioc' | 'leaked-token';

export interface SuspiciousFile {
  category: 'suspicious-file';
  kind: SuspiciousFileKind;
  path: string;
  detail: string;
  packageName?: string;
}

export interface SuspiciousScript {
  category: 'suspicious-script';
  path: string;
  script: string;
}

export type GitIssueKind =
  | 'suspicious-branch'
  | 'suspicious-commits'
  | 'suspicious-files-added'
  | 'suspicious-remote'
  | 'unsigned-commits';

export interface GitIssue {
  category: 'git-issue';
  kind: GitIssueKind;
  items: string[];
  reason: string;
}

export interface GitHubIssue {
  category: 'github-issue';
  type: 'repo' | 'branch' | 'workflow';
  name: string;
}

export type Finding = BadDependency | SuspiciousFile | SuspiciousScript | GitIssue | GitHubIssue;

export interface ScanReport {
  scannedDir: string;
  timestamp: string;
  badDeps: BadDependency[];
  suspiciousFiles: SuspiciousFile[];
  suspiciousScripts: SuspiciousScript[];
  gitIssues: GitIssue[];
  githubIssues: GitHubIssue[];
  totalScanned: number;
  totalIssues: number;
  durationMs: number;
  gitError?: string;
  githubError?: string;
  errors: string[];
}

export interface PackageJson {
  name?: string;
  version?: string;
  description?: string;
  scripts?: Record<string, string>;
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

export interface NpmLockfileEntry {
  version?: string;
  resolved?: string;
  integrity?: string;
}

export interface NpmLegacyDependency {
  version?: string;
  resolved?: string;
  integrity?: string;
  dependencies?: Record<string, NpmLegacyDependency>;
}

export interface NpmLockfile {
  lockfileVersion?: number;
  packages?: Record<string, NpmLockfileEntry>;
  dependencies?: Record<string, NpmLegacyDependency>;
}
