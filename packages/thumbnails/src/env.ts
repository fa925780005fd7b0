/**
 * CLI environment configuration
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ErrorCode, ErrorFactory, LogLevelSchema } from '@spindle/sdk';

export const EnvSchema = z.object({
  SPINDLE_LOG_LEVEL: LogLevelSchema.default('warn'),
  SPINDLE_MANIFEST: z.string().min(1).optional(),
  SPINDLE_THUMBNAIL_SIZE: z.coerce.number().int().min(16).max(1024).optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw ErrorFactory.create(
      ErrorCode.InvalidConfig,
      `Invalid environment: ${fields}`,
      'env',
      { issues: parsed.error.issues },
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * `.env` from the working directory, then process.env
 */
export function loadEnv(): Env {
  loadDotenv();
  return readEnv();
}
