import { z } from 'zod';
import { ConfigError } from './errors.js';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  DATABASE_MAX_CONNECTIONS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(10)
  ),
});

export type StoreConfig = {
  /** Postgres connection string; absent means in-memory storage */
  databaseUrl?: string;
  maxConnections: number;
};

/**
 * Read store configuration from environment variables.
 *
 * @throws ConfigError naming every variable that failed to parse
 */
export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(keys);
  }

  return {
    databaseUrl: result.data.DATABASE_URL,
    maxConnections: result.data.DATABASE_MAX_CONNECTIONS,
  };
}
