import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ByteOrderSchema,
  DEFAULT_BYTE_ORDER,
  isBig,
  isLittle,
  isNative,
  nativeByteOrder,
  parseByteOrder,
} from '@/types/byte-order.js';
import { ValidationError } from '@/errors.js';

vi.mock('node:os', async (importOriginal) => {
  const os = await importOriginal<typeof import('node:os')>();
  return { ...os, endianness: vi.fn(() => 'LE') };
});

import { endianness } from 'node:os';

describe('ByteOrder', () => {
  afterEach(() => {
    vi.mocked(endianness).mockReturnValue('LE');
  });

  it('should default to little endian', () => {
    expect(DEFAULT_BYTE_ORDER).toBe('little');
    expect(parseByteOrder(undefined)).toBe('little');
  });

  it('should parse the lowercase forms only', () => {
    expect(parseByteOrder('big')).toBe('big');
    expect(parseByteOrder('native')).toBe('native');
    expect(ByteOrderSchema.safeParse('Big').success).toBe(false);
  });

  it('should reject anything else with a ValidationError', () => {
    expect(() => parseByteOrder('middle')).toThrow(
      'Invalid byte order "middle". Expected one of: big, little, native'
    );
    expect(() => parseByteOrder(1)).toThrow(ValidationError);
  });

  it('should resolve native against a little-endian platform', () => {
    expect(nativeByteOrder()).toBe('little');
    expect(isLittle('native')).toBe(true);
    expect(isBig('native')).toBe(false);
    expect(isNative('little')).toBe(true);
    expect(isNative('big')).toBe(false);
  });

  it('should resolve native against a big-endian platform', () => {
    vi.mocked(endianness).mockReturnValue('BE');

    expect(nativeByteOrder()).toBe('big');
    expect(isBig('native')).toBe(true);
    expect(isNative('big')).toBe(true);
    expect(isNative('little')).toBe(false);
  });

  it('should treat explicit orders independently of the platform', () => {
    expect(isLittle('little')).toBe(true);
    expect(isBig('big')).toBe(true);
    expect(isNative('native')).toBe(true);
  });
});
