import {
  BuildProfileSchema,
  CONCRETE_CAPABILITIES,
  hasLogging,
  parseCapabilityList,
} from '../../features/capabilities.js';
import { resolveFeatures } from '../../features/process.js';
import { getErrorMessage } from '../../errors.js';
import { output } from '../output.js';

interface FeaturesOptions {
  profile?: string;
}

export function featuresCommand(list: string | undefined, options: FeaturesOptions = {}): void {
  try {
    const profile =
      options.profile === undefined ? undefined : BuildProfileSchema.parse(options.profile);
    const features = resolveFeatures({
      capabilities: list === undefined ? undefined : parseCapabilityList(list),
      profile,
    });

    output.header('Features');
    output.stat('Profile', features.profile);
    output.divider();
    for (const capability of CONCRETE_CAPABILITIES) {
      output.flag(capability, features.capabilities.has(capability));
    }

    if (!hasLogging(features)) {
      output.divider();
      output.warn(
        features.profile === 'release'
          ? 'No logging capability: logging call sites fail in this release build'
          : 'No logging capability: logging call sites are no-ops'
      );
    }
  } catch (error) {
    output.error('Cannot resolve features', getErrorMessage(error));
    process.exitCode = 1;
  }
}
