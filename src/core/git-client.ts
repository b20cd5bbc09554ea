/**
 * Read-only git queries used by the repository history scanner
 */

import { execFileSync } from 'node:child_process';

export interface SignatureStatus {
  hash: string;
  /** `git log --pretty=%G?` code: G, B, U, X, Y, R, E or N */
  status: string;
}

export interface GitClient {
  listBranches(): string[];
  recentCommits(limit: number): string[];
  filesChangedSince(since: string): string[];
  remotes(): string[];
  signatureStatuses(limit: number): SignatureStatus[];
}

function nonEmptyLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '');
}

/**
 * Parse `git branch -a` output, dropping the current-branch marker
 */
export function parseBranchList(output: string): string[] {
  return nonEmptyLines(output).map(line => line.replace(/\*/g, '').trim());
}

/**
 * Parse `git log --pretty=format:'%H %G?'` output
 */
export function parseSignatureLog(output: string): SignatureStatus[] {
  return nonEmptyLines(output).map(line => {
    const [hash, status = 'N'] = line.split(/\s+/);
    return { hash, status };
  });
}

// `git log --name-only` on a busy repository runs well past the 1 MiB default
export const GIT_MAX_BUFFER = 256 * 1024 * 1024;

/**
 * GitClient backed by the git binary
 */
export function createGitCliClient(cwd: string): GitClient {
  const git = (args: string[]): string =>
    execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: GIT_MAX_BUFFER,
    });

  return {
    listBranches: () => parseBranchList(git(['branch', '-a'])),
    recentCommits: limit => nonEmptyLines(git(['log', '--oneline', `-${limit}`])),
    filesChangedSince: since => nonEmptyLines(git(['log', '--name-only', '--pretty=format:', `--since=${since}`])),
    remotes: () => nonEmptyLines(git(['remote', '-v'])),
    signatureStatuses: limit => parseSignatureLog(git(['log', '--pretty=format:%H %G?', `-${limit}`])),
  };
}
