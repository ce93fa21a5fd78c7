export {
  BYTE_ORDERS,
  ByteOrderSchema,
  DEFAULT_BYTE_ORDER,
  isBig,
  isLittle,
  isNative,
  nativeByteOrder,
  parseByteOrder,
  type ByteOrder,
} from './byte-order.js';

export {
  DEFAULT_ENCODING,
  ENCODINGS,
  EncodingSchema,
  decode,
  encode,
  isEncoding,
  toBufferEncoding,
  type Encoding,
} from './encoding.js';
