import { Pool, type PoolClient, type PoolConfig } from 'pg';
import { z } from 'zod/v4';

const envConfigSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGDATABASE: z.string().optional(),
  PGSSLMODE: z.enum(['disable', 'require']).optional(),
  PGPOOL_MAX: z.coerce.number().int().positive().optional()
});

export type DatabasePool = Pool;
export type DatabaseClient = PoolClient;
export type ResolvedDatabaseConfig = PoolConfig & { connectionString?: string };

export function resolveDatabaseConfig(overrides: Partial<PoolConfig> = {}): ResolvedDatabaseConfig {
  const parsed = envConfigSchema.parse(process.env);
  const ssl = parsed.PGSSLMODE === 'require' ? { rejectUnauthorized: false } : undefined;
  if (parsed.DATABASE_URL) {
    return {
      connectionString: parsed.DATABASE_URL,
      ssl,
      max: parsed.PGPOOL_MAX,
      ...overrides
    };
  }
  return {
    host: parsed.PGHOST,
    port: parsed.PGPORT,
    user: parsed.PGUSER,
    password: parsed.PGPASSWORD,
    database: parsed.PGDATABASE,
    ssl,
    max: parsed.PGPOOL_MAX,
    ...overrides
  };
}

export function createPool(overrides: Partial<PoolConfig> = {}): DatabasePool {
  return new Pool(resolveDatabaseConfig(overrides));
}

export async function withTransaction<T>(pool: DatabasePool, callback: (client: DatabaseClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
