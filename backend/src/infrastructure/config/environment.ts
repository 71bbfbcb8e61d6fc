/**
 * Environment Configuration
 *
 * Loads and validates environment variables.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@/types/error.types';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_SERVICES: z.string().optional(),

  // Storage collaborator (SQL Server connection string)
  DATABASE_CONNECTION_STRING: z.string().optional(),

  // Anthropic
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  MODEL_TEMPERATURE: z.string().default('0').transform(Number).pipe(z.number().min(0).max(1)),

  // Agents
  INSTRUCTIONS_DIR: z.string().optional(),
  MAX_TURNS: z.string().default('20').transform(Number).pipe(z.number().int().min(1).max(50)),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment record.
 * @throws ConfigurationError listing the invalid variables
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new ConfigurationError(`Invalid environment variables: ${fields}`, { cause: parsed.error });
  }

  return parsed.data;
}

/**
 * Typed environment configuration
 */
export const env = parseEnvironment(process.env);

export const isProd = env.NODE_ENV === 'production';

export const isDev = env.NODE_ENV === 'development';

export const isTest = env.NODE_ENV === 'test';

/**
 * The one required identifier locating the storage collaborator.
 * @throws ConfigurationError if DATABASE_CONNECTION_STRING is unset
 */
export function requireDatabaseConnectionString(config: Environment = env): string {
  const value = config.DATABASE_CONNECTION_STRING?.trim();
  if (!value) {
    throw new ConfigurationError('DATABASE_CONNECTION_STRING environment variable is required.');
  }
  return value;
}
