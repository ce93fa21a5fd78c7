import { config } from 'dotenv';
import { z } from 'zod';
import { BuildProfileSchema, type BuildProfile } from '../features/capabilities.js';
import { LogLevelSchema } from './schema.js';
import { ConfigurationError } from '../errors.js';

// Load environment variables from .env file
config();

const EnvSchema = z.object({
  FACETKIT_FEATURES: z.string().default('log,log-backend'),
  FACETKIT_PROFILE: BuildProfileSchema.optional(),
  FACETKIT_LOG_LEVEL: LogLevelSchema.default('info'),
  FACETKIT_LOG_CONFIG: z.string().min(1).optional(),
  FACETKIT_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  NODE_ENV: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${errors}`);
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Build profile from the environment. An explicit FACETKIT_PROFILE wins;
 * otherwise NODE_ENV=production means a release build.
 */
export function getBuildProfile(): BuildProfile {
  const env = getEnv();
  if (env.FACETKIT_PROFILE) {
    return env.FACETKIT_PROFILE;
  }
  return env.NODE_ENV === 'production' ? 'release' : 'debug';
}

// For testing purposes - allows resetting the cached env
export function resetEnvCache(): void {
  cachedEnv = null;
}
