/**
 * Repository history scanner - looks for worm propagation traces in local git metadata
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createGitCliClient, type GitClient, type SignatureStatus } from './git-client.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { GitIssue } from './types.js';

export interface GitScanOptions {
  client?: GitClient;
  logger?: Logger;
}

export interface GitScanResult {
  gitIssues: GitIssue[];
  gitError?: string;
}

const COMMIT_LIMIT = 20;
const SIGNATURE_LIMIT = 10;
const RECENT_FILES_SINCE = '30 days ago';

const SUSPICIOUS_BRANCH_TERMS = ['shai-hulud', 'exfiltrate', 'malware', 'backdoor'];
// Only count together with "migration"
const MIGRATION_QUALIFIERS = ['shai', 'hulud', 'worm', 'malicious'];

const SUSPICIOUS_COMMIT_PATTERNS = [
  /shai-hulud/i,
  /add.*bundle\.js/i,
  /postinstall.*malicious/i,
  /trufflehog/i,
  /webhook\.site/i,
  /exfiltrat/i,
  /malicious.*package/i,
  /backdoor/i,
];

const SUSPICIOUS_FILE_TERMS = ['bundle.js', 'shai-hulud', 'malware', 'backdoor'];

// N: no signature, U: good signature of unknown validity, E: signature cannot be checked
const UNVERIFIED_SIGNATURE_CODES = new Set(['N', 'U', 'E']);

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function isSuspiciousBranch(branch: string): boolean {
  const lower = branch.toLowerCase();

  if (SUSPICIOUS_BRANCH_TERMS.some(term => lower.includes(term))) {
    return true;
  }

  return lower.includes('migration') && MIGRATION_QUALIFIERS.some(term => lower.includes(term));
}

export function isSuspiciousCommit(line: string): boolean {
  return SUSPICIOUS_COMMIT_PATTERNS.some(pattern => pattern.test(line));
}

export function isSuspiciousFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();

  if (SUSPICIOUS_FILE_TERMS.some(term => lower.includes(term))) {
    return true;
  }

  return lower.includes('postinstall') && lower.includes('.js');
}

export function isSuspiciousRemote(line: string): boolean {
  return line.includes('Shai-Hulud') || line.includes('shai-hulud');
}

export function hasUnverifiedCommits(statuses: SignatureStatus[]): boolean {
  return statuses.some(({ status }) => UNVERIFIED_SIGNATURE_CODES.has(status));
}

export function checkBranches(branches: string[]): GitIssue | null {
  const suspicious = branches.filter(isSuspiciousBranch);
  return suspicious.length > 0
    ? {
        category: 'git-issue',
        kind: 'suspicious-branch',
        items: suspicious,
        reason: 'Branch names match Shai-Hulud patterns',
      }
    : null;
}

export function checkCommits(commits: string[]): GitIssue | null {
  const suspicious = unique(commits.map(commit => commit.trim()).filter(isSuspiciousCommit));
  return suspicious.length > 0
    ? {
        category: 'git-issue',
        kind: 'suspicious-commits',
        items: suspicious,
        reason: 'Commit messages contain suspicious patterns',
      }
    : null;
}

export function checkRecentFiles(files: string[]): GitIssue | null {
  const suspicious = unique(
    files.map(file => file.trim()).filter(file => file !== '' && isSuspiciousFile(file))
  );
  return suspicious.length > 0
    ? {
        category: 'git-issue',
        kind: 'suspicious-files-added',
        items: suspicious,
        reason: 'Suspicious files added in recent commits',
      }
    : null;
}

export function checkRemotes(remotes: string[]): GitIssue | null {
  const suspicious = remotes.filter(line => line !== '' && isSuspiciousRemote(line));
  return suspicious.length > 0
    ? {
        category: 'git-issue',
        kind: 'suspicious-remote',
        items: suspicious,
        reason: 'Git remotes point to suspicious repositories',
      }
    : null;
}

/**
 * Unsigned commits only count next to another git finding, so this runs
 * last over the issues collected so far.
 */
export function applyUnsignedCommitPolicy(issues: GitIssue[], statuses: SignatureStatus[]): GitIssue[] {
  if (issues.length === 0 || !hasUnverifiedCommits(statuses)) {
    return issues;
  }

  return [
    ...issues,
    {
      category: 'git-issue',
      kind: 'unsigned-commits',
      items: statuses.filter(({ status }) => UNVERIFIED_SIGNATURE_CODES.has(status)).map(({ hash }) => hash),
      reason: 'Unsigned commits detected alongside other suspicious indicators',
    },
  ];
}

/**
 * Scan the project's git repository. Each query fails independently; failures
 * are reported through `gitError` and never thrown.
 */
export function scanGitRepository(projectDir: string, options: GitScanOptions = {}): GitScanResult {
  const { logger = silentLogger } = options;

  if (!existsSync(join(projectDir, '.git'))) {
    logger.debug(`No .git directory in ${projectDir}`);
    return { gitIssues: [] };
  }

  const failures: string[] = [];

  const query = <T>(label: string, run: () => T[]): T[] => {
    try {
      return run();
    } catch (error) {
      const message = `${label}: ${errorMessage(error)}`;
      logger.debug(`Git query failed - ${message}`);
      failures.push(message);
      return [];
    }
  };

  try {
    const client = options.client ?? createGitCliClient(projectDir);

    const checks = [
      checkBranches(query('git branch', () => client.listBranches())),
      checkCommits(query('git log', () => client.recentCommits(COMMIT_LIMIT))),
      checkRecentFiles(query('git log --name-only', () => client.filesChangedSince(RECENT_FILES_SINCE))),
      checkRemotes(query('git remote', () => client.remotes())),
    ];

    const issues = checks.filter((issue): issue is GitIssue => issue !== null);

    for (const issue of issues) {
      logger.debug(`${issue.reason}: ${issue.items.join(', ')}`);
    }

    const gitIssues = applyUnsignedCommitPolicy(
      issues,
      query('git log %G?', () => client.signatureStatuses(SIGNATURE_LIMIT))
    );

    return failures.length > 0 ? { gitIssues, gitError: failures.join('; ') } : { gitIssues };
  } catch (error) {
    logger.warn(`Git scan failed: ${errorMessage(error)}`);
    return { gitIssues: [], gitError: errorMessage(error) };
  }
}
