/**
 * Environment Configuration
 *
 * Loads and validates the environment variables read by this package.
 *
 * @module config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  // Service filtering for diagnostics (LOG_SERVICES=Preference,PreferenceBuilder)
  LOG_SERVICES: z
    .string()
    .optional()
    .transform((value) =>
      value?.split(',').map((s) => s.trim()).filter(Boolean) ?? []
    ),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment object
 *
 * @throws Error listing every invalid variable
 */
export function parseEnvironment(raw: Record<string, string | undefined>): Environment {
  const parsed = envSchema.safeParse(raw);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const details = Object.entries(fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${details}`);
  }

  return parsed.data;
}

/**
 * Same variables, but an unrecognised value falls back to its default
 * instead of failing the import of the whole package.
 */
const hostEnvSchema = z.object({
  NODE_ENV: envSchema.shape.NODE_ENV.catch('development'),
  LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch(undefined),
  LOG_SERVICES: envSchema.shape.LOG_SERVICES.catch([]),
});

export const env: Environment = hostEnvSchema.parse(process.env);

export const isProd = env.NODE_ENV === 'production';
export const isDev = env.NODE_ENV === 'development';
export const isTest = env.NODE_ENV === 'test';
