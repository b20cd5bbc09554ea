/**
 * Threat list loader - known compromised package versions
 *
 * Lookup order: local cache -> remote list (refreshes the cache) -> bundled copy.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { BADLIST_CACHE_FILENAME, DEFAULT_BADLIST_URL, HTTP_TIMEOUT } from './constants.js';
import { errorMessage, silentLogger, type Logger } from './logger.js';
import type { ThreatList } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to the bundled list (relative to both src/core and dist/core)
export const BUNDLED_THREAT_LIST = join(__dirname, '../../threats/affected-packages.json');

export class ThreatListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ThreatListError';
  }
}

export interface ThreatListOptions {
  url?: string;
  cachePath?: string;
  fallbackPath?: string;
  timeout?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

function isMetadataKey(key: string): boolean {
  return key.startsWith('_');
}

/**
 * Build a ThreatList from parsed JSON of the form { "pkg": ["1.0.0", ...] }
 */
export function createThreatList(raw: unknown, logger: Logger = silentLogger): ThreatList {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ThreatListError('Invalid affected list format: expected a JSON object');
  }

  const packages = new Map<string, ReadonlySet<string>>();
  const metadata: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (isMetadataKey(key)) {
      metadata[key] = value;
      continue;
    }

    if (!Array.isArray(value)) {
      logger.debug(`Skipping affected list entry "${key}": versions are not an array`);
      continue;
    }

    const versions = value.filter((version): version is string => typeof version === 'string');
    packages.set(key, new Set(versions));
  }

  return { packages, metadata };
}

export function countThreatPackages(threatList: ThreatList): number {
  return threatList.packages.size;
}

export function isBadVersion(threatList: ThreatList, name: string, version: string): boolean {
  return threatList.packages.get(name)?.has(version) ?? false;
}

/**
 * Load a threat list from a JSON file
 */
export function readThreatListFile(path: string, logger: Logger = silentLogger): ThreatList {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ThreatListError(`Failed to read affected list ${path}: ${errorMessage(error)}`);
  }
  return createThreatList(raw, logger);
}

function loadCachedThreatList(cachePath: string, logger: Logger): ThreatList | null {
  if (!existsSync(cachePath)) {
    return null;
  }

  try {
    const threatList = readThreatListFile(cachePath, logger);
    logger.info(`Using cached affected-packages.json (${countThreatPackages(threatList)} packages).`);
    return threatList;
  } catch (error) {
    logger.debug(`Ignoring unusable cache ${cachePath}: ${errorMessage(error)}`);
    return null;
  }
}

function saveCachedThreatList(cachePath: string, raw: unknown, logger: Logger): void {
  try {
    writeFileSync(cachePath, JSON.stringify(raw, null, 2), 'utf-8');
    logger.debug(`Cached affected list to ${cachePath}`);
  } catch (error) {
    logger.warn(`Failed to cache affected list: ${errorMessage(error)}`);
  }
}

/**
 * Fetch the affected list from a remote URL
 */
export async function fetchThreatList(
  url: string,
  options: { timeout?: number; fetch?: typeof fetch; logger?: Logger } = {}
): Promise<{ threatList: ThreatList; raw: unknown }> {
  const { timeout = HTTP_TIMEOUT, fetch: fetchImpl = fetch, logger = silentLogger } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) {
      throw new ThreatListError(`Network error: HTTP ${response.status}`);
    }

    const raw: unknown = await response.json();
    const threatList = createThreatList(raw, logger);
    logger.info(`Fetched latest affected-packages.json from remote (${countThreatPackages(threatList)} packages).`);
    return { threatList, raw };
  } catch (error) {
    if (error instanceof ThreatListError) throw error;
    throw new ThreatListError(`Failed to fetch remote affected list: ${errorMessage(error)}`);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Resolve the threat list for a scan run
 */
export async function loadThreatList(options: ThreatListOptions = {}): Promise<ThreatList> {
  const {
    url = DEFAULT_BADLIST_URL,
    cachePath = join(process.cwd(), BADLIST_CACHE_FILENAME),
    fallbackPath = BUNDLED_THREAT_LIST,
    timeout,
    fetch: fetchImpl,
    logger = silentLogger,
  } = options;

  const cached = loadCachedThreatList(cachePath, logger);
  if (cached) {
    return cached;
  }

  try {
    const { threatList, raw } = await fetchThreatList(url, { timeout, fetch: fetchImpl, logger });
    saveCachedThreatList(cachePath, raw, logger);
    return threatList;
  } catch (error) {
    logger.warn(`Remote fetch failed: ${errorMessage(error)}`);
    logger.info('Falling back to local affected-packages.json...');
  }

  try {
    const threatList = readThreatListFile(fallbackPath, logger);
    logger.info(`Using local affected-packages.json (${countThreatPackages(threatList)} packages).`);
    return threatList;
  } catch (error) {
    logger.error('Failed to load local affected-packages.json. Cannot proceed without threat intelligence.');
    throw new ThreatListError(`No affected list available: ${errorMessage(error)}`);
  }
}
