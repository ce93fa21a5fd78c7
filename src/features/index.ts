export {
  CAPABILITIES,
  CONCRETE_CAPABILITIES,
  LOGGING_CAPABILITIES,
  BuildProfileSchema,
  CapabilitySchema,
  assertCapability,
  assertLoggingEnabled,
  describeFeatures,
  hasCapability,
  hasLogging,
  missingCapabilityError,
  parseCapabilityList,
  resolveCapabilities,
  type BuildProfile,
  type Capability,
  type ConcreteCapability,
  type ExpandCapability,
  type HasCapability,
  type ResolvedFeatures,
} from './capabilities.js';

export {
  getProcessFeatures,
  initialize,
  resetProcessFeatures,
  resolveFeatures,
  type FeatureOptions,
} from './process.js';

export {
  MISSING_CAPABILITY,
  defineFeatures,
  isMissingCapability,
  type BackendApi,
  type BackendNoopApi,
  type DefineFeaturesOptions,
  type FeatureKit,
  type InteropApi,
  type LogApi,
  type LogNoopApi,
  type MacrosApi,
  type MissingCapability,
  type TypesApi,
} from './kit.js';
