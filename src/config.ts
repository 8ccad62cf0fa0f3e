import { z } from 'zod';
import type { LogLevel } from './logger';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DB_SCHEMA: z.string().min(1).default('public'),
  LOG_LEVEL: z
    .string()
    .transform(value => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent']))
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface Config {
  readonly databaseUrl: string | undefined;
  readonly schema: string;
  readonly logLevel: LogLevel;
  readonly nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Read configuration from environment variables. Invalid values fail with a
 * message naming the variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    schema: parsed.DB_SCHEMA,
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
  };
}
