import { describe, it, expect, expectTypeOf, vi, beforeEach, afterEach } from 'vitest';
import {
  defineFeatures,
  isMissingCapability,
  type LogNoopApi,
  type MissingCapability,
} from '@/features/kit.js';
import { parseCapabilityList, type Capability } from '@/features/capabilities.js';
import { isInitialized, shutdown } from '@/logging/facade.js';
import { BuildError } from '@/errors.js';
import { InvalidEnumValueError } from '@/macros/enum-extend.js';
import { captureStream, type CapturedStream } from '@tests/utils/capture.js';

describe('defineFeatures', () => {
  let stderr: CapturedStream;

  beforeEach(() => {
    stderr = captureStream(process.stderr);
  });

  afterEach(async () => {
    await shutdown();
    stderr.restore();
    vi.restoreAllMocks();
  });

  describe('typed gating', () => {
    it('should type missing capabilities as non-callable placeholders', () => {
      const kit = defineFeatures({ capabilities: ['log-backend'], profile: 'release' });

      expectTypeOf(kit.enumExtend).toEqualTypeOf<MissingCapability<'macros'>>();
      expectTypeOf(kit.withContext).toEqualTypeOf<MissingCapability<'interop'>>();
      expectTypeOf(kit.parseByteOrder).toEqualTypeOf<MissingCapability<'types'>>();
      expectTypeOf(kit.log).toBeFunction();
      expectTypeOf(kit.initialize).toBeFunction();
    });

    it('should type a kit without a profile as a release kit', () => {
      const kit = defineFeatures({ capabilities: ['types'] });

      expectTypeOf(kit.log).toEqualTypeOf<MissingCapability<'log'>>();
      expectTypeOf(kit.initialize).toEqualTypeOf<MissingCapability<'log-backend'>>();
      expectTypeOf(kit.encode).toBeFunction();
    });

    it('should gate logging in a release kit without it', () => {
      const kit = defineFeatures({ capabilities: ['types'], profile: 'release' });

      expectTypeOf(kit.log).toEqualTypeOf<MissingCapability<'log'>>();
      expectTypeOf(kit.initialize).toEqualTypeOf<MissingCapability<'log-backend'>>();
      expectTypeOf(kit.parseByteOrder).toBeFunction();
    });

    it('should type logging as no-ops in a debug kit without it', () => {
      const kit = defineFeatures({ capabilities: ['types'], profile: 'debug' });

      expectTypeOf(kit.log).toEqualTypeOf<LogNoopApi['log']>();
      expectTypeOf(kit.log).returns.toEqualTypeOf<false>();
    });

    it('should expose everything with full', () => {
      const kit = defineFeatures({ capabilities: ['full'], profile: 'release' });

      expectTypeOf(kit.enumExtend).toBeFunction();
      expectTypeOf(kit.asyncWithContext).toBeFunction();
      expectTypeOf(kit.configBuilder).toBeFunction();
    });
  });

  describe('enabled capabilities', () => {
    it('should install and log through the facade', async () => {
      const kit = defineFeatures({ capabilities: ['log-backend'], profile: 'release' });

      const result = await kit.initialize({ level: 'info', target: 'console' }, { exitHandlers: false });
      kit.log('info', 'from the kit');
      kit.logCat('KIT').warn('tagged');

      expect(result.status).toBe('installed');
      expect(stderr.records().map((r) => r.msg)).toEqual(['from the kit', 'KIT - tagged']);
      await expect(kit.shutdown()).resolves.toEqual({ flushed: true, timedOut: false });
      expect(isInitialized()).toBe(false);
    });

    it('should hand out the helpers of every capability with full', async () => {
      const kit = defineFeatures({ capabilities: ['full'], profile: 'release' });

      const Color = kit.enumExtend('Color', { Red: 1, Green: 2 });
      expect(Color.tryFrom(2)).toBe(2);
      expect(() => Color.tryFrom(7)).toThrow(InvalidEnumValueError);

      expect(kit.parseByteOrder('big')).toBe('big');
      expect(kit.decode(kit.encode('hi', 'utf_8'), 'utf_8')).toBe('hi');

      const order: string[] = [];
      const resource = {
        __enter__: () => order.push('enter'),
        __exit__: () => order.push('exit'),
      };
      expect(kit.withContext(resource, () => order.push('body'))).toBe(2);
      expect(order).toEqual(['enter', 'body', 'exit']);

      await expect(
        kit.asyncWithContext(
          { __aenter__: () => Promise.resolve(), __aexit__: () => Promise.resolve() },
          () => Promise.resolve('done')
        )
      ).resolves.toBe('done');

      expect(kit.features.capabilities.size).toBe(5);
    });
  });

  describe('run-time gating', () => {
    it('should throw BuildError from a missing non-logging member', () => {
      const capabilities: Capability[] = parseCapabilityList('log-backend');
      const kit = defineFeatures({ capabilities, profile: 'debug' });

      expect(isMissingCapability(kit.enumExtend)).toBe(true);
      expect(() => kit.enumExtend('Color', { Red: 1 })).toThrow(
        'enumExtend() requires the "macros" capability, which is not enabled (profile: debug).'
      );
      expect(() => kit.isEncoding('utf_8')).toThrow(BuildError);
    });

    it('should turn missing logging into no-ops in a debug kit', async () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const capabilities: Capability[] = parseCapabilityList('types');
      const kit = defineFeatures({ capabilities, profile: 'debug' });

      expect(isMissingCapability(kit.log)).toBe(false);
      expect(kit.log('error', 'dropped')).toBe(false);
      kit.logCat('APP').error('dropped too');

      await expect(kit.initialize({ level: 'info', target: 'console' })).resolves.toEqual({
        status: 'disabled',
      });
      await expect(kit.configBuilder().setRootLevel('info').initialize()).resolves.toEqual({
        status: 'disabled',
      });
      await expect(kit.shutdown()).resolves.toEqual({ flushed: true, timedOut: false });

      expect(isInitialized()).toBe(false);
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(stderr.spy).not.toHaveBeenCalled();
    });

    it('should refuse missing logging in a release kit', () => {
      const capabilities: Capability[] = parseCapabilityList('types');
      const kit = defineFeatures({ capabilities, profile: 'release' });

      expect(isMissingCapability(kit.log)).toBe(true);
      expect(() => kit.log('info', 'lost')).toThrow(
        'log() requires the "log" capability, which is not enabled (profile: release).'
      );
      expect(() => kit.initialize({ level: 'info', target: 'console' })).toThrow(BuildError);
    });

    it('should gate the backend separately from log', () => {
      const capabilities: Capability[] = parseCapabilityList('log');
      const kit = defineFeatures({ capabilities, profile: 'release' });

      expect(kit.log('info', 'nothing installed')).toBe(false);
      expect(() => kit.configBuilder()).toThrow(
        'configBuilder() requires the "log-backend" capability'
      );
    });
  });

  describe('requireLogging', () => {
    it('should fail fast for a release kit without logging', () => {
      expect(() =>
        defineFeatures({ capabilities: ['types'], profile: 'release', requireLogging: true })
      ).toThrow(
        'Logging is required but no logging capability is enabled (release: types). ' +
          'Enable "log" or "log-backend".'
      );
    });

    it('should allow a debug kit without logging', () => {
      const kit = defineFeatures({ capabilities: ['types'], profile: 'debug', requireLogging: true });
      expect(kit.features.profile).toBe('debug');
    });

    it('should allow a release kit with logging', () => {
      expect(() =>
        defineFeatures({ capabilities: ['log'], profile: 'release', requireLogging: true })
      ).not.toThrow();
    });
  });
});
