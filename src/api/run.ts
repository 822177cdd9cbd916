import { createLogger } from './logger.ts';
import { buildServer, loadStartupRegistries } from './server.ts';

const log = createLogger('run');

const port = parseInt(process.env.PORT || '3000');
const host = process.env.HOST || '::';

const registries = loadStartupRegistries();
if (!registries) {
  process.exit(1);
}

const app = buildServer({ logger: true, registries });

try {
  await app.listen({ port, host });
  log.info('List columns API listening', { port, host, content_types: [...registries.keys()] });
} catch (error) {
  log.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  await app.close();
  process.exit(1);
}
