/**
 * Capability-gated feature kits.
 *
 * `defineFeatures` hands out one API group per capability. When the capability list
 * and profile are literals, the kit's type already knows which groups exist: members
 * of a missing capability are typed `MissingCapability<'name'>`, which has no call
 * signature, so using them fails to type-check with the capability in the message.
 *
 * @example
 * ```typescript
 * const kit = defineFeatures({ capabilities: ['log-backend'], profile: 'release' });
 * await kit.initialize({ level: 'info', target: 'console' });
 * kit.log('info', 'ready');
 * kit.enumExtend('Color', { Red: 1 });
 * //  ^ error: Type 'MissingCapability<"macros">' has no call signatures.
 * ```
 */

import { LogConfigBuilder } from '../logging/builder.js';
import {
  initialize,
  log,
  shutdown,
  type InitializeOptions,
  type InitializeResult,
  type LogContext,
  type LoggerConfig,
  type ShutdownResult,
} from '../logging/facade.js';
import type { LogLevel } from '../logging/levels.js';
import { LogCat, type LogSink } from '../logging/log-cat.js';
import { enumExtend } from '../macros/enum-extend.js';
import { asyncWithContext, withContext } from '../macros/with.js';
import { isBig, isLittle, isNative, parseByteOrder } from '../types/byte-order.js';
import { decode, encode, isEncoding } from '../types/encoding.js';
import {
  assertLoggingEnabled,
  hasCapability,
  missingCapabilityError,
  type BuildProfile,
  type Capability,
  type ConcreteCapability,
  type HasCapability,
  type ResolvedFeatures,
} from './capabilities.js';
import { resolveFeatures } from './process.js';

export const MISSING_CAPABILITY: unique symbol = Symbol('facetkit.missingCapability');

/**
 * Placeholder for a member whose capability is not enabled. Not callable.
 */
export interface MissingCapability<N extends ConcreteCapability> {
  readonly [MISSING_CAPABILITY]: N;
}

export interface LogApi {
  log(level: LogLevel, message: string, context?: LogContext): boolean;
  logCat(tag: string): LogSink;
}

export interface LogNoopApi {
  log(level: LogLevel, message: string, context?: LogContext): false;
  logCat(tag: string): LogSink;
}

export interface BackendApi {
  initialize(config: LoggerConfig, options?: InitializeOptions): Promise<InitializeResult>;
  shutdown(): Promise<ShutdownResult>;
  configBuilder(): LogConfigBuilder;
}

export interface BackendNoopApi {
  initialize(config: LoggerConfig, options?: InitializeOptions): Promise<{ status: 'disabled' }>;
  shutdown(): Promise<ShutdownResult>;
  configBuilder(): LogConfigBuilder;
}

export interface MacrosApi {
  enumExtend: typeof enumExtend;
}

export interface InteropApi {
  withContext: typeof withContext;
  asyncWithContext: typeof asyncWithContext;
}

export interface TypesApi {
  parseByteOrder: typeof parseByteOrder;
  isLittle: typeof isLittle;
  isBig: typeof isBig;
  isNative: typeof isNative;
  isEncoding: typeof isEncoding;
  encode: typeof encode;
  decode: typeof decode;
}

type Missing<Api, N extends ConcreteCapability> = {
  readonly [K in keyof Api]: MissingCapability<N>;
};

type Gated<C extends Capability, N extends ConcreteCapability, Api> =
  HasCapability<C, N> extends true ? Api : Missing<Api, N>;

// Debug builds compile missing logging out to no-ops; release builds refuse it.
type GatedLogging<
  C extends Capability,
  P extends BuildProfile,
  N extends ConcreteCapability,
  Api,
  Noop,
> = HasCapability<C, N> extends true ? Api : P extends 'debug' ? Noop : Missing<Api, N>;

export type FeatureKit<C extends Capability, P extends BuildProfile> = {
  readonly features: ResolvedFeatures;
} & GatedLogging<C, P, 'log', LogApi, LogNoopApi> &
  GatedLogging<C, P, 'log-backend', BackendApi, BackendNoopApi> &
  Gated<C, 'macros', MacrosApi> &
  Gated<C, 'interop', InteropApi> &
  Gated<C, 'types', TypesApi>;

export interface DefineFeaturesOptions<C extends Capability, P extends BuildProfile> {
  capabilities: readonly C[];
  /**
   * Defaults to the environment's build profile at run time. Without it the kit is
   * typed as a release kit, so logging members of a missing capability are not
   * callable even when the process turns out to be a debug build.
   */
  profile?: P;
  /** Refuse a release kit that has no logging capability at all */
  requireLogging?: boolean;
}

const noop = (): void => {};

const NOOP_SINK: LogSink = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const disabledInstall = (): Promise<{ status: 'disabled' }> =>
  Promise.resolve({ status: 'disabled' });

const LOG_NOOP: LogNoopApi = {
  log: () => false,
  logCat: () => NOOP_SINK,
};

const BACKEND_NOOP: BackendNoopApi = {
  initialize: disabledInstall,
  shutdown: () => Promise.resolve({ flushed: true, timedOut: false }),
  configBuilder: () => new LogConfigBuilder(disabledInstall),
};

const BACKEND_API: BackendApi = {
  initialize,
  shutdown,
  configBuilder: () => new LogConfigBuilder(),
};

const MACROS_API: MacrosApi = { enumExtend };

const INTEROP_API: InteropApi = { withContext, asyncWithContext };

const TYPES_API: TypesApi = {
  parseByteOrder,
  isLittle,
  isBig,
  isNative,
  isEncoding,
  encode,
  decode,
};

function missingStub(
  features: ResolvedFeatures,
  name: ConcreteCapability,
  member: string
): (() => never) & MissingCapability<ConcreteCapability> {
  const stub = (): never => {
    throw missingCapabilityError(features, name, `${member}()`);
  };
  return Object.assign(stub, { [MISSING_CAPABILITY]: name });
}

function gateGroup(
  features: ResolvedFeatures,
  name: ConcreteCapability,
  api: object,
  debugNoop?: object
): object {
  if (hasCapability(features, name)) {
    return api;
  }
  if (debugNoop && features.profile === 'debug') {
    return debugNoop;
  }
  return Object.fromEntries(
    Object.keys(api).map((member) => [member, missingStub(features, name, member)])
  );
}

/**
 * Build a feature kit for a capability set.
 *
 * Capability lists the type system cannot see (e.g. parsed from the environment)
 * still get run-time gating: a missing member throws `BuildError` when called,
 * except logging members of a debug kit, which do nothing.
 *
 * @throws BuildError when `requireLogging` is set on a release kit without logging
 */
export function defineFeatures<
  const C extends Capability,
  const P extends BuildProfile = 'release',
>(options: DefineFeaturesOptions<C, P>): FeatureKit<C, P>;
export function defineFeatures(options: DefineFeaturesOptions<Capability, BuildProfile>): object {
  const features = resolveFeatures({
    capabilities: options.capabilities,
    profile: options.profile,
  });

  if (options.requireLogging) {
    assertLoggingEnabled(features);
  }

  const logApi: LogApi = {
    log,
    logCat: (tag) => new LogCat(tag, { features }),
  };

  return {
    features,
    ...gateGroup(features, 'log', logApi, LOG_NOOP),
    ...gateGroup(features, 'log-backend', BACKEND_API, BACKEND_NOOP),
    ...gateGroup(features, 'macros', MACROS_API),
    ...gateGroup(features, 'interop', INTEROP_API),
    ...gateGroup(features, 'types', TYPES_API),
  };
}

/**
 * Whether a kit member is a placeholder for a disabled capability.
 */
export function isMissingCapability(value: unknown): value is MissingCapability<ConcreteCapability> {
  return (
    (typeof value === 'function' || (typeof value === 'object' && value !== null)) &&
    MISSING_CAPABILITY in value
  );
}
