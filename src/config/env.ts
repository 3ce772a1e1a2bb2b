import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';

/**
 * Load the first .env found in the working directory or its parent, so the
 * server and the worker pick up the same settings wherever they are started.
 */
export function loadEnv(cwd: string = process.cwd()): string | null {
  const candidates = [path.join(cwd, '.env'), path.join(cwd, '..', '.env')];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw new Error(`Failed to load ${envPath}: ${result.error.message}`);
      }
      return envPath;
    }
  }
  return null;
}

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  JSON_BODY_LIMIT: z.string().default('5mb'),
  ENABLE_ALIGNMENT_WORKER: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
  ALIGNMENT_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export type ServerConfig = z.infer<typeof serverEnvSchema>;

/**
 * Format zod issues as `KEY: message` lines for startup errors.
 */
export function formatEnvIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid server configuration: ${formatEnvIssues(parsed.error)}`);
  }
  return parsed.data;
}
