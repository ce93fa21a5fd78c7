/**
 * Codec names as used by Python's `codecs` module, with conversion to the
 * subset Node.js Buffers can encode and decode natively.
 */

import { z } from 'zod';
import encodingNames from './encodings.json' with { type: 'json' };
import { ValidationError } from '../errors.js';

export const ENCODINGS: readonly string[] = Object.freeze([...encodingNames]);

const KNOWN = new Set(ENCODINGS);

export const DEFAULT_ENCODING = 'utf_8';

export function isEncoding(value: unknown): value is string {
  return typeof value === 'string' && KNOWN.has(value);
}

export const EncodingSchema = z.string().refine(isEncoding, {
  message: 'Unknown encoding',
});
export type Encoding = z.infer<typeof EncodingSchema>;

const BUFFER_ENCODINGS: Record<string, BufferEncoding> = {
  ascii: 'ascii',
  base64: 'base64',
  hex: 'hex',
  latin_1: 'latin1',
  iso8859_1: 'latin1',
  utf_8: 'utf8',
  utf_16_le: 'utf16le',
};

/**
 * Node.js Buffer encoding for a codec name, or null when Buffer has none.
 */
export function toBufferEncoding(encoding: string): BufferEncoding | null {
  return BUFFER_ENCODINGS[encoding] ?? null;
}

function requireBufferEncoding(encoding: string): BufferEncoding {
  const bufferEncoding = isEncoding(encoding) ? toBufferEncoding(encoding) : null;
  if (!bufferEncoding) {
    throw new ValidationError(
      `Encoding "${encoding}" is not supported natively. Supported: ${Object.keys(BUFFER_ENCODINGS).join(', ')}`,
      'encoding',
      encoding
    );
  }
  return bufferEncoding;
}

export function encode(text: string, encoding: string = DEFAULT_ENCODING): Buffer {
  return Buffer.from(text, requireBufferEncoding(encoding));
}

export function decode(bytes: Buffer, encoding: string = DEFAULT_ENCODING): string {
  return bytes.toString(requireBufferEncoding(encoding));
}
