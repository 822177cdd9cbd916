import { describe, it, expect } from 'vitest';
import { poolConfigFromEnv } from './db.ts';

describe('poolConfigFromEnv', () => {
  it('prefers DATABASE_URL', () => {
    expect(poolConfigFromEnv({ DATABASE_URL: 'postgres://test:test-secret@db:5432/lists', PGHOST: 'ignored' })).toEqual({
      connectionString: 'postgres://test:test-secret@db:5432/lists',
      max: 10,
    });
  });

  it('reads the PG* variables', () => {
    const config = poolConfigFromEnv({ PGHOST: 'db', PGPORT: '6543', PGUSER: 'lists', PGPASSWORD: 'test-secret', PGDATABASE: 'content', PGPOOL_MAX: '4' });

    expect(config).toEqual({ host: 'db', port: 6543, user: 'lists', password: 'test-secret', database: 'content', max: 4 });
  });

  it('falls back to the default database settings', () => {
    const config = poolConfigFromEnv({ PGHOST: 'db' });

    expect(config.port).toBe(5432);
    expect(config.user).toBe('list_columns');
    expect(config.database).toBe('list_columns');
  });
});
