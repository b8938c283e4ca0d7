/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Target site
  HEMISPHERES_BASE_URL: z.string().url().default('https://www.united.com/en/us/hemispheres/'),

  // Browser
  HEADLESS: booleanFlag,
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MAX_REVEAL_ATTEMPTS: z.coerce.number().int().positive().default(50),

  // Output
  OUTPUT_DIR: z.string().default('output'),

  // Logging
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
