#!/usr/bin/env node

/**
 * hulud-scan CLI
 * Scanner for Shai-Hulud npm worm infections
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { scan, scanRecursive } from '../core/scanner.js';
import { loadThreatList, readThreatListFile, ThreatListError } from '../core/threat-list.js';
import { scanGitHubOrg } from '../core/github-scanner.js';
import { withGitHubResults } from '../core/report.js';
import { remediate } from '../core/remediate.js';
import { formatSarif } from '../core/formatters/sarif.js';
import { formatText } from '../core/formatters/text.js';
import { colors, createConsoleLogger, errorMessage, type Logger } from '../core/logger.js';
import { VERSION } from '../core/constants.js';
import type { ScanReport, ThreatList } from '../core/types.js';

interface ScanCommandOptions {
  json?: boolean;
  sarif?: boolean;
  skipGit?: boolean;
  remediate?: boolean;
  dryRun?: boolean;
  badlist?: string;
  badlistUrl?: string;
  githubToken?: string;
  org?: string;
  recursive?: boolean;
  verbose?: boolean;
}

const OVERVIEW = `On September 14, 2025, Shai-Hulud, a self-replicating npm worm, compromised more than 180 packages
in the registry. Attackers phished maintainer accounts and published tainted versions carrying an
obfuscated bundle.js that runs during the postinstall phase of npm install. The payload runs TruffleHog
to harvest secrets, double-base64-encodes them, exfiltrates them to attacker-controlled endpoints,
republishes further packages owned by the victim and flips private GitHub repositories to public
through "-migration" copies.`;

const program = new Command();

async function resolveThreatList(options: ScanCommandOptions, logger: Logger): Promise<ThreatList> {
  if (options.badlist) {
    return readThreatListFile(resolve(options.badlist), logger);
  }
  return loadThreatList({ url: options.badlistUrl, logger });
}

function printReport(report: ScanReport, options: ScanCommandOptions): void {
  if (options.sarif) {
    console.log(formatSarif(report));
  } else if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatText(report));
  }
}

function runRemediation(report: ScanReport, options: ScanCommandOptions, logger: Logger): void {
  if (!options.remediate || report.badDeps.length === 0) {
    return;
  }

  logger.info('Auto-remediation initiated...');
  const result = remediate({
    projectPath: report.scannedDir,
    badDeps: report.badDeps,
    dryRun: options.dryRun,
  });

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would run: ${result.command}`);
    return;
  }

  if (result.success) {
    logger.info(`Remediation complete - removed ${result.removedPackages.length} compromised package(s)`);
    logger.info(`Next: run '${result.packageManager} install' to reinstall clean dependencies`);
  } else {
    for (const error of result.errors) {
      logger.error(error);
    }
  }
}

program
  .name('hulud-scan')
  .description('Scanner for Shai-Hulud npm worm infections')
  .version(VERSION);

program
  .command('overview')
  .description('Display an overview of the Shai-Hulud worm')
  .action(() => {
    console.log(`${colors.cyan}Shai-Hulud Worm Overview:${colors.reset}`);
    console.log(OVERVIEW);
  });

program
  .command('scan', { isDefault: true })
  .description('Scan a project directory for Shai-Hulud indicators')
  .argument('[path]', 'Path to scan', '.')
  .option('--json', 'Output results as JSON')
  .option('--sarif', 'Output results as SARIF 2.1.0 (for GitHub Security tab)')
  .option('--skip-git', 'Skip local git repository scan')
  .option('--remediate', 'Uninstall compromised packages after the scan')
  .option('--dry-run', 'With --remediate, show the uninstall command without running it')
  .option('--badlist <file>', 'Use a local affected-packages JSON file')
  .option('--badlist-url <url>', 'Fetch the affected-packages list from this URL')
  .option('-g, --github-token <token>', 'GitHub token for organisation scan')
  .option('-o, --org <org>', 'GitHub organisation to scan (requires token)')
  .option('-r, --recursive', 'Scan every project with a lockfile up to two levels below path')
  .option('--verbose', 'Enable debug output')
  .action(async (path: string, options: ScanCommandOptions) => {
    const absolutePath = resolve(path);
    const machineOutput = Boolean(options.json || options.sarif);
    const logger = createConsoleLogger({ verbose: options.verbose, stderrOnly: machineOutput });

    let threatList: ThreatList;
    try {
      threatList = await resolveThreatList(options, logger);
    } catch (error) {
      logger.error(`Scan failed: ${errorMessage(error)}`);
      process.exit(error instanceof ThreatListError ? 2 : 1);
    }

    const scanOptions = { path: absolutePath, threatList, skipGit: options.skipGit, logger };

    if (options.recursive) {
      const projects = scanRecursive(scanOptions);

      if (projects.length === 0) {
        logger.warn('No directories with a lockfile found.');
        return;
      }

      if (options.json && !options.sarif) {
        console.log(JSON.stringify(projects.map(project => project.report), null, 2));
      }

      for (const project of projects) {
        if (!options.json || options.sarif) {
          printReport(project.report, options);
        }
        runRemediation(project.report, options, logger);
      }

      if (projects.some(project => project.report.totalIssues > 0)) {
        process.exit(1);
      }
      return;
    }

    let report = scan(scanOptions);

    if (options.githubToken && options.org) {
      report = withGitHubResults(
        report,
        await scanGitHubOrg({ token: options.githubToken, org: options.org, logger })
      );
    } else if (options.githubToken || options.org) {
      logger.warn('Provide both --github-token and --org for GitHub scan.');
    }

    printReport(report, options);
    runRemediation(report, options, logger);

    if (report.errors.length > 0 && report.totalScanned === 0) {
      process.exit(2);
    }

    if (report.totalIssues > 0) {
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`${colors.red}[ERR]${colors.reset} ${errorMessage(error)}`);
  process.exit(1);
});
