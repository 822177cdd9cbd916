import Fastify, { type FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { createPool } from '../db.ts';
import { createLogger } from './logger.ts';
import { ConfigurationError, listColumnsRoutesPlugin, loadRegistriesFromEnv, type ColumnRegistry, type ListColumnsRoutesOptions } from './list-columns/index.ts';

const log = createLogger('server');

export type ListColumnsApiOptions = {
  logger?: boolean;
  /** Defaults to a pool built from the PG* environment variables */
  pool?: Pool;
  /** Defaults to the registries in LIST_COLUMNS_CONFIG_FILE */
  registries?: ReadonlyMap<string, ColumnRegistry>;
} & Pick<ListColumnsRoutesOptions, 'fields' | 'images' | 'baseColumns' | 'baseCell'>;

/**
 * Loads the column registries for process startup.
 * Configuration errors are logged with their issues and yield null.
 */
export function loadStartupRegistries(): ReadonlyMap<string, ColumnRegistry> | null {
  try {
    return loadRegistriesFromEnv();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error('Invalid list column configuration', { message: error.message, issues: error.issues });
      return null;
    }
    throw error;
  }
}

export function buildServer(options: ListColumnsApiOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false });

  const ownsPool = !options.pool;
  const pool = options.pool ?? createPool();
  const registries = options.registries ?? loadRegistriesFromEnv();

  log.info('Registering list routes', { content_types: [...registries.keys()] });

  app.register(listColumnsRoutesPlugin, {
    pool,
    registries,
    fields: options.fields,
    images: options.images,
    baseColumns: options.baseColumns,
    baseCell: options.baseCell,
  });

  app.get('/health', async () => ({ status: 'ok' }));

  if (ownsPool) {
    app.addHook('onClose', async () => {
      await pool.end();
    });
  }

  return app;
}
