import { getBuildProfile, getEnv } from '../config/env.js';
import {
  initialize as installLogger,
  type InitializeOptions,
  type InitializeResult,
  type LoggerConfig,
} from '../logging/facade.js';
import {
  assertCapability,
  assertLoggingEnabled,
  hasCapability,
  parseCapabilityList,
  resolveCapabilities,
  type BuildProfile,
  type Capability,
  type ResolvedFeatures,
} from './capabilities.js';

export interface FeatureOptions {
  /** Requested capabilities; FACETKIT_FEATURES when omitted */
  capabilities?: Iterable<Capability>;
  /** Build profile; FACETKIT_PROFILE / NODE_ENV when omitted */
  profile?: BuildProfile;
}

export function resolveFeatures(options: FeatureOptions = {}): ResolvedFeatures {
  const requested = options.capabilities ?? parseCapabilityList(getEnv().FACETKIT_FEATURES);
  return {
    capabilities: resolveCapabilities(requested),
    profile: options.profile ?? getBuildProfile(),
  };
}

let processFeatures: ResolvedFeatures | null = null;

/**
 * Features the running process was configured with, read from the environment once.
 * Call it at startup: a release process without any logging capability fails here.
 *
 * @throws BuildError from `assertLoggingEnabled`
 */
export function getProcessFeatures(): ResolvedFeatures {
  if (!processFeatures) {
    const features = resolveFeatures();
    assertLoggingEnabled(features);
    processFeatures = features;
  }
  return processFeatures;
}

// For testing purposes
export function resetProcessFeatures(): void {
  processFeatures = null;
}

/**
 * Install the process-wide logger, gated on the process's `log-backend` capability.
 *
 * Without the capability a debug build resolves `{ status: 'disabled' }` and a
 * release build rejects with `BuildError`.
 */
export async function initialize(
  config: LoggerConfig,
  options?: InitializeOptions
): Promise<InitializeResult> {
  const features = getProcessFeatures();
  if (!hasCapability(features, 'log-backend')) {
    if (features.profile === 'debug') {
      return { status: 'disabled' };
    }
    assertCapability(features, 'log-backend', 'initialize()');
  }
  return installLogger(config, options);
}
