import { describe, it, expect, afterEach, vi } from 'vitest';
import { createConsoleLogger, errorMessage } from '../../src/core/logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should hide debug output unless verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createConsoleLogger({ colors: false }).debug('hidden');
    createConsoleLogger({ colors: false, verbose: true }).debug('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[DBG] shown');
  });

  it('should write info and warnings to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createConsoleLogger({ colors: false });

    logger.info('Using cached affected-packages.json (3 packages).');
    logger.warn('No package.json found.');

    expect(log.mock.calls).toEqual([
      ['[INF] Using cached affected-packages.json (3 packages).'],
      ['[WRN] No package.json found.'],
    ]);
  });

  it('should keep stdout free in machine-readable mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger({ colors: false, stderrOnly: true });
    logger.info('progress');
    logger.error('failed');

    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([['[INF] progress'], ['[ERR] failed']]);
  });

  it('should color tags by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createConsoleLogger().warn('careful');

    expect(log).toHaveBeenCalledWith('\x1b[33m[WRN]\x1b[0m careful');
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
