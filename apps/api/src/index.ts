import { join } from 'node:path';
import { loadConfig, ApiConfigSchema, createLogger } from '@activities/shared';
import { seedActivitiesIfEmpty } from '@activities/domain';
import { openStore, SqliteActivityRepository } from '@activities/db';
import { buildServer } from './server';

const logger = createLogger({ name: 'api' });

const DEFAULT_STATIC_DIR = join(__dirname, '..', 'static');

async function main() {
  const config = loadConfig(ApiConfigSchema);

  const store = openStore({ path: config.DATABASE_PATH });
  store.migrate();

  const seeded = await seedActivitiesIfEmpty({
    activityRepo: new SqliteActivityRepository(),
    withTransaction: (fn) => store.withTransaction(fn),
  });
  if (seeded > 0) {
    logger.info({ count: seeded }, 'Seeded activities');
  }

  const app = await buildServer({
    store,
    staticDir: config.STATIC_DIR ?? DEFAULT_STATIC_DIR,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down API server');
    app.close()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
