import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'node:fs';
import {
  BUNDLED_THREAT_LIST,
  ThreatListError,
  createThreatList,
  countThreatPackages,
  fetchThreatList,
  isBadVersion,
  loadThreatList,
  readThreatListFile,
} from '../../src/core/threat-list.js';

const testDir = join(process.cwd(), 'test', 'fixtures', 'threat-list-test');
const cachePath = join(testDir, 'cache.json');
const fallbackPath = join(testDir, 'fallback.json');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('createThreatList', () => {
  it('should index versions by package name', () => {
    const list = createThreatList({ 'left-pad': ['1.0.0', '1.0.1'] });

    expect(isBadVersion(list, 'left-pad', '1.0.1')).toBe(true);
    expect(isBadVersion(list, 'left-pad', '1.0.2')).toBe(false);
    expect(isBadVersion(list, 'right-pad', '1.0.0')).toBe(false);
  });

  it('should keep underscore keys as metadata', () => {
    const list = createThreatList({ _lastUpdated: '2025-09-17', 'left-pad': ['1.0.0'] });

    expect(list.metadata).toEqual({ _lastUpdated: '2025-09-17' });
    expect(countThreatPackages(list)).toBe(1);
  });

  it('should skip entries whose versions are not an array', () => {
    const list = createThreatList({ 'left-pad': '1.0.0', 'right-pad': ['2.0.0', 3] });

    expect([...list.packages.keys()]).toEqual(['right-pad']);
    expect([...(list.packages.get('right-pad') ?? [])]).toEqual(['2.0.0']);
  });

  it('should reject lists that are not objects', () => {
    expect(() => createThreatList(['left-pad'])).toThrow(ThreatListError);
    expect(() => createThreatList(null)).toThrow('Invalid affected list format');
  });

  it('should load the bundled list', () => {
    const list = readThreatListFile(BUNDLED_THREAT_LIST);

    expect(isBadVersion(list, '@ctrl/tinycolor', '4.1.1')).toBe(true);
    expect(list.metadata._lastUpdated).toBe('2025-09-17');
  });
});

describe('fetchThreatList', () => {
  it('should parse a successful response', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ 'left-pad': ['1.0.0'] }));

    const { threatList, raw } = await fetchThreatList('https://lists.example/affected.json', { fetch: fetchMock });

    expect(isBadVersion(threatList, 'left-pad', '1.0.0')).toBe(true);
    expect(raw).toEqual({ 'left-pad': ['1.0.0'] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should report HTTP failures', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 404));

    await expect(fetchThreatList('https://lists.example/affected.json', { fetch: fetchMock })).rejects.toThrow(
      'Network error: HTTP 404'
    );
  });

  it('should wrap transport failures', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => {
      throw new Error('connection refused');
    });

    await expect(fetchThreatList('https://lists.example/affected.json', { fetch: fetchMock })).rejects.toThrow(
      'Failed to fetch remote affected list: connection refused'
    );
  });
});

describe('loadThreatList', () => {
  beforeEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
    mkdirSync(testDir, { recursive: true });
    writeFileSync(fallbackPath, JSON.stringify({ 'fallback-pkg': ['1.0.0'] }));
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  it('should prefer the cache without touching the network', async () => {
    writeFileSync(cachePath, JSON.stringify({ 'cached-pkg': ['1.0.0'] }));
    const fetchMock = vi.fn(async () => jsonResponse({ 'remote-pkg': ['1.0.0'] }));

    const list = await loadThreatList({ cachePath, fallbackPath, fetch: fetchMock });

    expect([...list.packages.keys()]).toEqual(['cached-pkg']);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should fetch the remote list and write the cache', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ 'remote-pkg': ['1.0.0'] }));

    const list = await loadThreatList({ url: 'https://lists.example/affected.json', cachePath, fallbackPath, fetch: fetchMock });

    expect([...list.packages.keys()]).toEqual(['remote-pkg']);
    expect(fetchMock).toHaveBeenCalledWith('https://lists.example/affected.json', expect.anything());
    expect(JSON.parse(readFileSync(cachePath, 'utf-8'))).toEqual({ 'remote-pkg': ['1.0.0'] });
  });

  it('should fall back to the bundled file when the remote fails', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 500));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const list = await loadThreatList({ cachePath, fallbackPath, fetch: fetchMock, logger });

    expect([...list.packages.keys()]).toEqual(['fallback-pkg']);
    expect(logger.warn).toHaveBeenCalledWith('Remote fetch failed: Network error: HTTP 500');
    expect(existsSync(cachePath)).toBe(false);
  });

  it('should ignore a corrupt cache', async () => {
    writeFileSync(cachePath, '{ broken');
    const fetchMock = vi.fn(async () => jsonResponse({ 'remote-pkg': ['1.0.0'] }));

    const list = await loadThreatList({ cachePath, fallbackPath, fetch: fetchMock });

    expect([...list.packages.keys()]).toEqual(['remote-pkg']);
  });

  it('should fail when no source is available', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 503));

    await expect(
      loadThreatList({ cachePath, fallbackPath: join(testDir, 'missing.json'), fetch: fetchMock })
    ).rejects.toThrow(/^No affected list available: Failed to read affected list/);
  });
});
