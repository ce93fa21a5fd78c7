import { FacetkitError } from '../errors.js';

/**
 * A raw value that matches no variant of an extended enum.
 */
export class InvalidEnumValueError extends FacetkitError {
  readonly code = 'INVALID_ENUM_VALUE';

  constructor(
    readonly enumName: string,
    readonly value: unknown
  ) {
    super(`Invalid ${enumName} value: ${String(value)}`);
  }
}

type EnumValue = string | number;

export interface EnumHelpers<V extends Record<string, EnumValue>> {
  readonly enumName: string;
  /** Variant values in declaration order */
  values(): V[keyof V][];
  /** Variant names in declaration order */
  variants(): Extract<keyof V, string>[];
  isValue(raw: unknown): raw is V[keyof V];
  /** Name of the variant holding `value` */
  keyOf(value: V[keyof V]): Extract<keyof V, string>;
  /** Value of the named variant */
  into<K extends keyof V>(variant: K): V[K];
  /** Convert a raw value into a variant value, or throw */
  tryFrom(raw: unknown): V[keyof V];
  safeTryFrom(raw: unknown): { ok: true; value: V[keyof V] } | { ok: false; error: Error };
}

export type ExtendedEnum<V extends Record<string, EnumValue>> = Readonly<V> & EnumHelpers<V>;

export interface EnumExtendOptions {
  /** Build the error thrown for an unknown raw value */
  error?: (enumName: string, raw: unknown) => Error;
}

const RESERVED = new Set([
  'enumName',
  'values',
  'variants',
  'isValue',
  'keyOf',
  'into',
  'tryFrom',
  'safeTryFrom',
]);

/**
 * Declare a value-backed enum with checked conversion from raw values.
 *
 * @example
 * ```typescript
 * const Command = enumExtend('Command', { Ping: 0x01, Pong: 0x02 });
 * Command.Ping;            // 1
 * Command.tryFrom(2);      // 2 (Command.Pong)
 * Command.keyOf(2);        // 'Pong'
 * Command.into('Pong');    // 2
 * Command.tryFrom(3);      // throws InvalidEnumValueError
 * ```
 */
export function enumExtend<const V extends Record<string, EnumValue>>(
  enumName: string,
  variants: V,
  options: EnumExtendOptions = {}
): ExtendedEnum<V> {
  const names: Extract<keyof V, string>[] = [];
  const values: V[keyof V][] = [];

  for (const name in variants) {
    if (RESERVED.has(name)) {
      throw new TypeError(`${enumName}: "${name}" is reserved and cannot be a variant name`);
    }
    const value = variants[name];
    if (values.some((existing) => existing === value)) {
      throw new TypeError(`${enumName}: duplicate value ${String(value)} for variant "${name}"`);
    }
    names.push(name);
    values.push(value);
  }

  const makeError =
    options.error ?? ((name: string, raw: unknown) => new InvalidEnumValueError(name, raw));

  const isValue = (raw: unknown): raw is V[keyof V] => values.some((value) => value === raw);

  const helpers: EnumHelpers<V> = {
    enumName,
    values: () => [...values],
    variants: () => [...names],
    isValue,
    keyOf: (value) => names[values.indexOf(value)],
    into: (variant) => variants[variant],
    tryFrom: (raw) => {
      if (isValue(raw)) {
        return raw;
      }
      throw makeError(enumName, raw);
    },
    safeTryFrom: (raw) =>
      isValue(raw) ? { ok: true, value: raw } : { ok: false, error: makeError(enumName, raw) },
  };

  return Object.freeze({ ...variants, ...helpers });
}
