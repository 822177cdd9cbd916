import { Pool, type PoolConfig } from 'pg';
import { existsSync } from 'node:fs';

function defaultHost(): string {
  // Inside the docker-compose network Postgres is reachable via the service name.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

/**
 * Connection settings for the listing database.
 *
 * DATABASE_URL takes precedence over the PG* variables; PGPOOL_MAX caps the pool.
 */
export function poolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const max = parseInt(env.PGPOOL_MAX || '10', 10);
  if (env.DATABASE_URL) {
    return { connectionString: env.DATABASE_URL, max };
  }
  return {
    host: env.PGHOST || defaultHost(),
    port: parseInt(env.PGPORT || '5432', 10),
    user: env.PGUSER || 'list_columns',
    password: env.PGPASSWORD || 'list_columns',
    database: env.PGDATABASE || 'list_columns',
    max,
  };
}

export function createPool(config?: PoolConfig): Pool {
  return new Pool({ ...poolConfigFromEnv(), ...config });
}
