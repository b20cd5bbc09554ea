/**
 * Human-readable report formatter
 */

import { colors as ansi } from '../logger.js';
import type { GitIssueKind, ScanReport, SuspiciousFileKind } from '../types.js';

export interface TextFormatOptions {
  colors?: boolean;
}

const FILE_KIND_LABELS: Record<SuspiciousFileKind, string> = {
  'bundle-hash': 'Malicious bundle.js',
  ioc: 'IOC',
  'leaked-token': 'GitHub token',
};

const GIT_KIND_LABELS: Record<GitIssueKind, string> = {
  'suspicious-branch': 'Suspicious branches',
  'suspicious-commits': 'Suspicious commits',
  'suspicious-files-added': 'Suspicious files added',
  'suspicious-remote': 'Suspicious remotes',
  'unsigned-commits': 'Unsigned commits',
};

export function formatText(report: ScanReport, options: TextFormatOptions = {}): string {
  const useColors = options.colors ?? true;
  const c = (color: keyof typeof ansi, text: string): string =>
    useColors ? `${ansi[color]}${text}${ansi.reset}` : text;

  const lines: string[] = [];

  lines.push('');
  lines.push(`${c('bold', 'hulud-scan')} - Shai-Hulud npm worm scanner`);
  lines.push('─'.repeat(50));
  lines.push(`Directory: ${report.scannedDir}`);
  lines.push(`Dependencies scanned: ${report.totalScanned}`);
  lines.push(`Duration: ${report.durationMs}ms`);
  lines.push('');

  if (report.badDeps.length > 0) {
    lines.push(c('red', 'Compromised packages:'));
    for (const dep of report.badDeps) {
      lines.push(`  - ${c('bold', dep.name)} @ ${dep.version}`);
    }
    lines.push('');
  }

  if (report.suspiciousFiles.length > 0) {
    lines.push(c('red', 'Suspicious files:'));
    for (const file of report.suspiciousFiles) {
      const pkg = file.packageName ? ` [${file.packageName}]` : '';
      lines.push(`  - ${FILE_KIND_LABELS[file.kind]}${pkg}: ${file.path}`);
      lines.push(`    ${c('gray', file.detail)}`);
    }
    lines.push('');
  }

  if (report.suspiciousScripts.length > 0) {
    lines.push(c('red', 'Suspicious postinstall scripts:'));
    for (const script of report.suspiciousScripts) {
      lines.push(`  - ${script.path}`);
      lines.push(`    ${c('gray', script.script)}`);
    }
    lines.push('');
  }

  if (report.gitIssues.length > 0) {
    lines.push(c('yellow', 'Git repository:'));
    for (const issue of report.gitIssues) {
      lines.push(`  - ${GIT_KIND_LABELS[issue.kind]}: ${issue.reason}`);
      for (const item of issue.items) {
        lines.push(`    ${c('gray', item)}`);
      }
    }
    lines.push('');
  }

  if (report.githubIssues.length > 0) {
    lines.push(c('yellow', 'GitHub organisation:'));
    for (const issue of report.githubIssues) {
      lines.push(`  - ${issue.type}: ${issue.name}`);
    }
    lines.push('');
  }

  const warnings = [
    ...report.errors,
    ...(report.gitError ? [`Git scan: ${report.gitError}`] : []),
    ...(report.githubError ? [`GitHub scan: ${report.githubError}`] : []),
  ];

  lines.push('─'.repeat(50));
  if (report.totalIssues > 0) {
    lines.push(`${c('red', c('bold', 'INFECTED'))} - ${report.totalIssues} issue(s) found. Action required!`);
    lines.push('Remove compromised packages, rotate npm and GitHub credentials, and review recent publishes.');
  } else {
    lines.push(`${c('green', c('bold', 'CLEAN'))} - No Shai-Hulud indicators found.`);
  }
  lines.push('');

  if (warnings.length > 0) {
    lines.push(c('yellow', 'Warnings:'));
    for (const warning of warnings) {
      lines.push(`  - ${warning}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
