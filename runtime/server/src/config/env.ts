import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { logger } from './logger.js';

// Load .env file
config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

  // Session registry
  RECENT_COMMAND_LIMIT: z.coerce.number().int().positive().default(50),

  // Focus event channel
  FOCUS_CHANNEL_MAX_LISTENERS: z.coerce.number().int().nonnegative().default(20),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment source against the runtime schema
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.'));
    logger.error({ issues: result.error.issues }, 'Invalid environment variables');
    throw new ConfigError(`Invalid environment variables: ${keys.join(', ')}`, { cause: result.error });
  }
  return result.data;
}

export const env = loadEnv();
