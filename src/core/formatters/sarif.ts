/**
 * SARIF (Static Analysis Results Interchange Format) output formatter
 * Follows SARIF 2.1.0 specification
 */

import { VERSION } from '../constants.js';
import type { ScanReport } from '../types.js';

interface SarifLocation {
  physicalLocation: {
    artifactLocation: {
      uri: string;
      uriBaseId?: string;
    };
    region?: {
      startLine: number;
      startColumn?: number;
    };
  };
}

interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: 'error' | 'warning' | 'note' | 'none';
  message: {
    text: string;
  };
  locations: SarifLocation[];
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: {
    text: string;
  };
  fullDescription: {
    text: string;
  };
  properties?: {
    precision?: string;
    'security-severity'?: string;
    tags?: string[];
  };
}

interface SarifRun {
  tool: {
    driver: {
      name: string;
      version: string;
      rules: SarifRule[];
    };
  };
  results: SarifResult[];
}

export interface SarifReport {
  $schema: string;
  version: string;
  runs: SarifRun[];
}

type RuleId =
  | 'compromised-package'
  | 'malicious-bundle'
  | 'suspicious-postinstall'
  | 'ioc-match'
  | 'leaked-github-token'
  | 'suspicious-git-activity'
  | 'suspicious-github-resource';

const RULES: Array<SarifRule & { id: RuleId; level: SarifResult['level'] }> = [
  {
    id: 'compromised-package',
    name: 'Compromised package version',
    shortDescription: { text: 'Dependency resolves to a version published by the Shai-Hulud worm' },
    fullDescription: {
      text: 'The package version appears in the list of versions compromised by the Shai-Hulud npm worm. Remove it and reinstall a clean version.',
    },
    properties: { precision: 'very-high', 'security-severity': '9.8', tags: ['security', 'supply-chain', 'malware'] },
    level: 'error',
  },
  {
    id: 'malicious-bundle',
    name: 'Malicious bundle.js',
    shortDescription: { text: 'bundle.js matches the known Shai-Hulud payload digest' },
    fullDescription: { text: 'A bundle.js in node_modules has the SHA-256 digest of the Shai-Hulud payload.' },
    properties: { precision: 'very-high', 'security-severity': '10.0', tags: ['security', 'malware'] },
    level: 'error',
  },
  {
    id: 'suspicious-postinstall',
    name: 'Suspicious postinstall script',
    shortDescription: { text: 'postinstall script references worm tooling or exfiltration endpoints' },
    fullDescription: {
      text: 'An installed package runs a postinstall script that references bundle.js, TruffleHog, webhook.site or exfiltration.',
    },
    properties: { precision: 'high', 'security-severity': '8.8', tags: ['security', 'malware'] },
    level: 'error',
  },
  {
    id: 'ioc-match',
    name: 'Indicator of compromise',
    shortDescription: { text: 'Package manifest contains a Shai-Hulud indicator of compromise' },
    fullDescription: { text: 'An installed package manifest mentions a known Shai-Hulud endpoint, campaign identifier or tool.' },
    properties: { precision: 'medium', 'security-severity': '7.5', tags: ['security', 'ioc'] },
    level: 'warning',
  },
  {
    id: 'leaked-github-token',
    name: 'GitHub token in package manifest',
    shortDescription: { text: 'Package manifest contains a GitHub token' },
    fullDescription: { text: 'An installed package manifest contains a string shaped like a GitHub personal access or OAuth token.' },
    properties: { precision: 'medium', 'security-severity': '7.5', tags: ['security', 'secrets'] },
    level: 'warning',
  },
  {
    id: 'suspicious-git-activity',
    name: 'Suspicious git activity',
    shortDescription: { text: 'Local git history matches Shai-Hulud propagation patterns' },
    fullDescription: { text: 'Branches, commits, recently added files or remotes of the repository match Shai-Hulud patterns.' },
    properties: { precision: 'medium', 'security-severity': '6.5', tags: ['security', 'git'] },
    level: 'warning',
  },
  {
    id: 'suspicious-github-resource',
    name: 'Suspicious GitHub resource',
    shortDescription: { text: 'Organisation repository, branch or workflow matches Shai-Hulud patterns' },
    fullDescription: { text: 'The GitHub organisation contains a repository, branch or workflow created by the Shai-Hulud worm.' },
    properties: { precision: 'medium', 'security-severity': '6.5', tags: ['security', 'github'] },
    level: 'warning',
  },
];

function resultFor(ruleId: RuleId, text: string, uri: string): SarifResult {
  const ruleIndex = RULES.findIndex(rule => rule.id === ruleId);
  return {
    ruleId,
    ruleIndex,
    level: RULES[ruleIndex].level,
    message: { text },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: uri.replace(/^\//, '') },
          region: { startLine: 1 },
        },
      },
    ],
  };
}

/**
 * Generate SARIF report from a scan report
 */
export function generateSarif(report: ScanReport): SarifReport {
  const results: SarifResult[] = [];
  const manifestPath = `${report.scannedDir}/package.json`;
  const gitPath = `${report.scannedDir}/.git`;

  for (const dep of report.badDeps) {
    results.push(
      resultFor('compromised-package', `Compromised package "${dep.name}" version ${dep.version} detected.`, manifestPath)
    );
  }

  for (const file of report.suspiciousFiles) {
    if (file.kind === 'bundle-hash') {
      results.push(resultFor('malicious-bundle', `Malicious bundle.js (sha256 ${file.detail}).`, file.path));
    } else if (file.kind === 'ioc') {
      results.push(
        resultFor('ioc-match', `Indicator "${file.detail}" found in package ${file.packageName ?? 'unknown'}.`, file.path)
      );
    } else {
      results.push(
        resultFor('leaked-github-token', `${file.detail} in package ${file.packageName ?? 'unknown'}.`, file.path)
      );
    }
  }

  for (const script of report.suspiciousScripts) {
    results.push(resultFor('suspicious-postinstall', `Suspicious postinstall script: ${script.script}`, script.path));
  }

  for (const issue of report.gitIssues) {
    const details = issue.items.length > 0 ? ` (${issue.items.join(', ')})` : '';
    results.push(resultFor('suspicious-git-activity', `${issue.reason}${details}`, gitPath));
  }

  for (const issue of report.githubIssues) {
    results.push(
      resultFor('suspicious-github-resource', `Suspicious GitHub ${issue.type}: ${issue.name}`, `https://github.com/${issue.name.split(' ')[0]}`)
    );
  }

  return {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: 'hulud-scan',
            version: VERSION,
            rules: RULES.map(({ level: _level, ...rule }) => rule),
          },
        },
        results,
      },
    ],
  };
}

/**
 * Format SARIF report as JSON string
 */
export function formatSarif(report: ScanReport): string {
  return JSON.stringify(generateSarif(report), null, 2);
}
