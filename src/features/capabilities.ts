import { z } from 'zod';
import { BuildError } from '../errors.js';

export const CAPABILITIES = ['log', 'log-backend', 'macros', 'interop', 'types', 'full'] as const;

export type Capability = (typeof CAPABILITIES)[number];

/** Capabilities a resolved set can hold; `full` only ever appears as input. */
export type ConcreteCapability = Exclude<Capability, 'full'>;

export const CONCRETE_CAPABILITIES: readonly ConcreteCapability[] = [
  'log',
  'log-backend',
  'macros',
  'interop',
  'types',
];

/** Capabilities that put logging call sites into the program. */
export const LOGGING_CAPABILITIES: readonly ConcreteCapability[] = ['log', 'log-backend'];

export const CapabilitySchema = z.enum(CAPABILITIES);
export const BuildProfileSchema = z.enum(['debug', 'release']);
export type BuildProfile = z.infer<typeof BuildProfileSchema>;

/**
 * Capabilities implied by a single requested capability, itself included.
 */
export type ExpandCapability<C extends Capability> = C extends 'full'
  ? ConcreteCapability
  : C extends 'log-backend'
    ? 'log-backend' | 'log'
    : C;

/**
 * `true` when the capability union `C` enables `N` after closure.
 */
export type HasCapability<C extends Capability, N extends ConcreteCapability> = [N] extends [
  ExpandCapability<C>,
]
  ? true
  : false;

export interface ResolvedFeatures {
  readonly capabilities: ReadonlySet<ConcreteCapability>;
  readonly profile: BuildProfile;
}

const IMPLIED: Record<Capability, readonly ConcreteCapability[]> = {
  log: ['log'],
  'log-backend': ['log-backend', 'log'],
  macros: ['macros'],
  interop: ['interop'],
  types: ['types'],
  full: CONCRETE_CAPABILITIES,
};

/**
 * Close a requested capability list: `full` expands to every capability and
 * `log-backend` brings in `log`.
 */
export function resolveCapabilities(
  capabilities: Iterable<Capability>
): ReadonlySet<ConcreteCapability> {
  const resolved = new Set<ConcreteCapability>();
  for (const capability of capabilities) {
    for (const implied of IMPLIED[capability]) {
      resolved.add(implied);
    }
  }
  return resolved;
}

/**
 * Parse a comma separated capability list such as `log-backend, types`.
 *
 * @throws BuildError naming the first unknown capability
 */
export function parseCapabilityList(text: string): Capability[] {
  const capabilities: Capability[] = [];
  for (const raw of text.split(',')) {
    const name = raw.trim();
    if (!name) continue;

    const result = CapabilitySchema.safeParse(name);
    if (!result.success) {
      throw new BuildError(
        `Unknown capability "${name}". Expected one of: ${CAPABILITIES.join(', ')}`,
        name
      );
    }
    capabilities.push(result.data);
  }
  return capabilities;
}

export function hasCapability(features: ResolvedFeatures, name: ConcreteCapability): boolean {
  return features.capabilities.has(name);
}

export function hasLogging(features: ResolvedFeatures): boolean {
  return LOGGING_CAPABILITIES.some((name) => features.capabilities.has(name));
}

/**
 * The error raised when a call site runs without the capability it needs.
 *
 * @param site - Call site named in the diagnostic
 */
export function missingCapabilityError(
  features: ResolvedFeatures,
  name: ConcreteCapability,
  site?: string
): BuildError {
  const where = site ? `${site} requires` : 'This call site requires';
  return new BuildError(
    `${where} the "${name}" capability, which is not enabled (profile: ${features.profile}). ` +
      `Enable it with FACETKIT_FEATURES or defineFeatures({ capabilities: [...] }).`,
    name
  );
}

/**
 * Fail fast when a call site needs a capability the program was not built with.
 */
export function assertCapability(
  features: ResolvedFeatures,
  name: ConcreteCapability,
  site?: string
): void {
  if (!features.capabilities.has(name)) {
    throw missingCapabilityError(features, name, site);
  }
}

/**
 * Startup assertion: a release build must not run with its logging call sites
 * compiled out.
 *
 * @throws BuildError when the profile is `release` and neither `log` nor
 *   `log-backend` is enabled
 */
export function assertLoggingEnabled(features: ResolvedFeatures): void {
  if (features.profile === 'release' && !hasLogging(features)) {
    throw new BuildError(
      `Logging is required but no logging capability is enabled (${describeFeatures(features)}). ` +
        `Enable "log" or "log-backend".`,
      'log'
    );
  }
}

/**
 * Printable form of a resolved set, in declaration order.
 */
export function describeFeatures(features: ResolvedFeatures): string {
  const names = CONCRETE_CAPABILITIES.filter((name) => features.capabilities.has(name));
  return `${features.profile}: ${names.length > 0 ? names.join(', ') : '(none)'}`;
}
