/**
 * GitHub organisation scanner - looks for worm-created repos, branches and workflows
 */

import { GITHUB_API_URL, HTTP_TIMEOUT } from './constants.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { GitHubScanResult } from './report.js';
import type { GitHubIssue } from './types.js';

export interface GitHubScanOptions {
  token: string;
  org: string;
  baseUrl?: string;
  timeout?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

interface GitHubRepo {
  name: string;
  full_name: string;
}

interface GitHubBranch {
  name: string;
}

interface GitHubWorkflows {
  workflows?: Array<{ path?: string }>;
}

const MALICIOUS_WORKFLOW = 'shai-hulud-workflow.yml';

export function isSuspiciousRepoName(name: string): boolean {
  return name.includes('-migration') || name === 'Shai-Hulud';
}

function createClient(options: GitHubScanOptions) {
  const { token, baseUrl = GITHUB_API_URL, timeout = HTTP_TIMEOUT, fetch: fetchImpl = fetch } = options;

  return async function request<T>(endpoint: string): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetchImpl(`${baseUrl}/${endpoint}`, {
        headers: {
          Authorization: `token ${token}`,
          Accept: 'application/vnd.github.v3+json',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`GitHub API ${endpoint} returned HTTP ${response.status}`);
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

/**
 * Scan a GitHub organisation. Inaccessible repositories are skipped; a
 * failure to list the organisation becomes `githubError`.
 */
export async function scanGitHubOrg(options: GitHubScanOptions): Promise<GitHubScanResult> {
  const { org, logger = silentLogger } = options;
  const request = createClient(options);
  const githubIssues: GitHubIssue[] = [];

  let repos: GitHubRepo[];
  try {
    repos = await request<GitHubRepo[]>(`orgs/${encodeURIComponent(org)}/repos`);
  } catch (error) {
    logger.error(`GitHub scan failed: ${errorMessage(error)}`);
    return { githubIssues, githubError: errorMessage(error) };
  }

  if (!Array.isArray(repos)) {
    return { githubIssues, githubError: `Unexpected response listing repositories of ${org}` };
  }

  logger.info(`GitHub scan for org '${org}' (${repos.length} repos checked)`);

  for (const repo of repos) {
    const repoPath = `repos/${encodeURIComponent(org)}/${encodeURIComponent(repo.name)}`;

    if (isSuspiciousRepoName(repo.name)) {
      githubIssues.push({ category: 'github-issue', type: 'repo', name: repo.full_name });
    }

    try {
      const branches = await request<GitHubBranch[]>(`${repoPath}/branches`);
      if (branches.some(branch => branch.name === 'shai-hulud')) {
        githubIssues.push({
          category: 'github-issue',
          type: 'branch',
          name: `${repo.full_name} (branch: shai-hulud)`,
        });
      }
    } catch (error) {
      logger.debug(`Skipping branches of ${repo.full_name}: ${errorMessage(error)}`);
      continue;
    }

    try {
      const { workflows = [] } = await request<GitHubWorkflows>(`${repoPath}/actions/workflows`);
      if (workflows.some(workflow => (workflow.path ?? '').includes(MALICIOUS_WORKFLOW))) {
        githubIssues.push({ category: 'github-issue', type: 'workflow', name: repo.full_name });
      }
    } catch (error) {
      logger.debug(`Skipping workflows of ${repo.full_name}: ${errorMessage(error)}`);
    }
  }

  return { githubIssues };
}
