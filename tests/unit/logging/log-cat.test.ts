import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { LogCat, formatLogCatLine } from '@/logging/log-cat.js';
import { initialize, shutdown } from '@/logging/facade.js';
import { resetEnvCache } from '@/config/env.js';
import { resolveCapabilities } from '@/features/capabilities.js';
import { resetProcessFeatures } from '@/features/process.js';
import { BuildError } from '@/errors.js';
import { captureStream, type CapturedStream } from '@tests/utils/capture.js';

describe('formatLogCatLine', () => {
  it('should right-align the level label and colour the line', () => {
    expect(formatLogCatLine('trace', 'APP', 'tracing')).toBe(
      '\x1b[95m[ TRACE] - APP - tracing\x1b[0m'
    );
    expect(formatLogCatLine('info', 'APP', 'started')).toBe('\x1b[32m[  INFO] - APP - started\x1b[0m');
    expect(formatLogCatLine('error', 'DB', 'gone')).toBe('\x1b[31m[ ERROR] - DB - gone\x1b[0m');
  });

  it('should append context as JSON', () => {
    expect(formatLogCatLine('warn', 'APP', 'low space', { disk: 'low' })).toBe(
      '\x1b[33m[  WARN] - APP - low space {"disk":"low"}\x1b[0m'
    );
  });
});

describe('LogCat', () => {
  let consoleSpy: MockInstance;
  let stderr: CapturedStream;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    stderr = captureStream(process.stderr);
  });

  afterEach(async () => {
    await shutdown();
    stderr.restore();
    vi.restoreAllMocks();
    delete process.env.FACETKIT_PROFILE;
    delete process.env.FACETKIT_FEATURES;
    resetEnvCache();
    resetProcessFeatures();
  });

  describe('debug profile', () => {
    it('should print every level to the console without a logger', () => {
      const cat = new LogCat('APP', { profile: 'debug' });

      cat.trace('t');
      cat.debug('d');
      cat.info('Application started successfully.');

      expect(consoleSpy).toHaveBeenCalledTimes(3);
      expect(consoleSpy).toHaveBeenLastCalledWith(
        '\x1b[32m[  INFO] - APP - Application started successfully.\x1b[0m'
      );
      expect(stderr.spy).not.toHaveBeenCalled();
    });
  });

  describe('release profile', () => {
    it('should do nothing before a logger is installed', () => {
      new LogCat('APP', { profile: 'release' }).error('lost');

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(stderr.spy).not.toHaveBeenCalled();
    });

    it('should forward tagged messages to the facade', async () => {
      await initialize({ level: 'info', target: 'console' }, { exitHandlers: false });
      const cat = new LogCat('APP', { profile: 'release' });

      cat.debug('below minimum');
      cat.warn('This might cause an issue', { disk: 'low' });

      const records = stderr.records();
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        level: 'warn',
        msg: 'APP - This might cause an issue',
        disk: 'low',
      });
      expect(consoleSpy).not.toHaveBeenCalled();
    });
  });

  describe('without a logging capability', () => {
    it('should refuse a release LogCat from the process features', () => {
      process.env.FACETKIT_FEATURES = 'macros';
      process.env.FACETKIT_PROFILE = 'release';
      resetEnvCache();

      expect(() => new LogCat('APP')).toThrow(BuildError);
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should refuse a release LogCat from explicit features', () => {
      const features = { capabilities: resolveCapabilities(['types']), profile: 'release' as const };

      expect(() => new LogCat('APP', { features })).toThrow(
        'Logging is required but no logging capability is enabled (release: types). ' +
          'Enable "log" or "log-backend".'
      );
    });

    it('should still print in a debug build', () => {
      const features = { capabilities: resolveCapabilities(['types']), profile: 'debug' as const };

      new LogCat('APP', { features }).info('hello');

      expect(consoleSpy).toHaveBeenCalledWith('\x1b[32m[  INFO] - APP - hello\x1b[0m');
    });
  });

  it('should take its profile from the environment by default', () => {
    process.env.FACETKIT_PROFILE = 'release';
    resetEnvCache();

    expect(new LogCat('APP').profile).toBe('release');
  });
});
