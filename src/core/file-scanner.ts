/**
 * File signature scanner - inspects the installed package tree for worm artifacts
 */

import { createHash } from 'node:crypto';
import { existsSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import glob from 'fast-glob';
import {
  BUNDLE_FILENAME,
  BUNDLE_HASH,
  GITHUB_TOKEN_PATTERN,
  MAX_FILE_SIZE,
  SUSPICIOUS_IOCS,
  SUSPICIOUS_POSTINSTALL,
} from './constants.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { SuspiciousFile, SuspiciousScript } from './types.js';

export interface FileScanOptions {
  /** Known-bad SHA-256 digests of the bundle artifact */
  bundleHashes?: string[];
  maxFileSize?: number;
  logger?: Logger;
}

export interface FileScanResult {
  suspiciousFiles: SuspiciousFile[];
  suspiciousScripts: SuspiciousScript[];
}

function findFiles(root: string, filename: string): string[] {
  return glob
    .sync(`**/${filename}`, {
      cwd: root,
      absolute: true,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    })
    .sort();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sha256File(path: string): string {
  return createHash('sha256').update(readFileSync(path)).digest('hex');
}

/**
 * Example tokens in README-like fields are not reported
 */
export function looksLikeDocumentation(content: string): boolean {
  return (
    (content.includes('description') && content.includes('example')) ||
    content.includes('readme') ||
    content.includes('documentation')
  );
}

/**
 * Inspect one parsed package manifest. `path` is only used for reporting.
 */
export function inspectManifest(path: string, manifest: Record<string, unknown>): FileScanResult {
  const suspiciousFiles: SuspiciousFile[] = [];
  const suspiciousScripts: SuspiciousScript[] = [];
  const packageName = typeof manifest.name === 'string' ? manifest.name : 'unknown';

  const scripts = manifest.scripts;
  const postinstall = isRecord(scripts) ? scripts.postinstall : undefined;
  if (typeof postinstall === 'string' && SUSPICIOUS_POSTINSTALL.test(postinstall)) {
    suspiciousScripts.push({ category: 'suspicious-script', path, script: postinstall });
  }

  const content = JSON.stringify(manifest);

  const iocMatch = content.match(SUSPICIOUS_IOCS);
  if (iocMatch) {
    suspiciousFiles.push({
      category: 'suspicious-file',
      kind: 'ioc',
      path,
      detail: iocMatch[0],
      packageName,
    });
  }

  if (GITHUB_TOKEN_PATTERN.test(content) && !looksLikeDocumentation(content)) {
    suspiciousFiles.push({
      category: 'suspicious-file',
      kind: 'leaked-token',
      path,
      detail: 'Potential GitHub token detected',
      packageName,
    });
  }

  return { suspiciousFiles, suspiciousScripts };
}

/**
 * Scan node_modules for the malicious bundle, suspicious postinstall scripts,
 * IOC strings and leaked tokens
 */
export function scanFiles(projectDir: string, options: FileScanOptions = {}): FileScanResult {
  const { bundleHashes = [BUNDLE_HASH], maxFileSize = MAX_FILE_SIZE, logger = silentLogger } = options;
  const result: FileScanResult = { suspiciousFiles: [], suspiciousScripts: [] };
  const nodeModules = join(projectDir, 'node_modules');

  if (!existsSync(nodeModules)) {
    logger.debug(`No node_modules directory in ${projectDir}`);
    return result;
  }

  const knownHashes = new Set(bundleHashes.map(hash => hash.toLowerCase()));

  for (const filePath of findFiles(nodeModules, BUNDLE_FILENAME)) {
    try {
      const { size } = statSync(filePath);
      if (size > maxFileSize) {
        logger.debug(`Skipping oversized file (${size} bytes): ${filePath}`);
        continue;
      }

      const hash = sha256File(filePath);
      if (knownHashes.has(hash)) {
        result.suspiciousFiles.push({
          category: 'suspicious-file',
          kind: 'bundle-hash',
          path: filePath,
          detail: hash,
        });
      }
    } catch (error) {
      logger.debug(`Skipping unreadable file ${filePath}: ${errorMessage(error)}`);
    }
  }

  for (const filePath of findFiles(nodeModules, 'package.json')) {
    let manifest: unknown;
    try {
      manifest = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      logger.debug(`Skipping invalid manifest ${filePath}: ${errorMessage(error)}`);
      continue;
    }

    if (!isRecord(manifest)) {
      continue;
    }

    const findings = inspectManifest(filePath, manifest);
    result.suspiciousScripts.push(...findings.suspiciousScripts);
    result.suspiciousFiles.push(...findings.suspiciousFiles);
  }

  return result;
}
