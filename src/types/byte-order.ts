import { endianness } from 'node:os';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const BYTE_ORDERS = ['big', 'little', 'native'] as const;

/**
 * Byte order used to interpret multi-byte values. Serialized in lowercase.
 * `native` is the byte order of the running platform.
 */
export const ByteOrderSchema = z.enum(BYTE_ORDERS);
export type ByteOrder = z.infer<typeof ByteOrderSchema>;

export const DEFAULT_BYTE_ORDER: ByteOrder = 'little';

/**
 * The platform's byte order.
 */
export function nativeByteOrder(): 'big' | 'little' {
  return endianness() === 'LE' ? 'little' : 'big';
}

export function isLittle(order: ByteOrder): boolean {
  switch (order) {
    case 'big':
      return false;
    case 'little':
      return true;
    case 'native':
      return nativeByteOrder() === 'little';
  }
}

export function isBig(order: ByteOrder): boolean {
  return !isLittle(order);
}

/**
 * Whether `order` matches the platform's byte order.
 */
export function isNative(order: ByteOrder): boolean {
  return order === 'native' || order === nativeByteOrder();
}

/**
 * Parse a serialized byte order; `undefined` yields the default.
 *
 * @throws ValidationError for anything else
 */
export function parseByteOrder(value: unknown): ByteOrder {
  if (value === undefined) {
    return DEFAULT_BYTE_ORDER;
  }
  const result = ByteOrderSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid byte order ${JSON.stringify(value) ?? String(value)}. Expected one of: ${BYTE_ORDERS.join(', ')}`,
      'byteOrder',
      value
    );
  }
  return result.data;
}
