import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import { createLogger, type SafeLogger } from '@activities/shared';
import { ActivityService } from '@activities/domain';
import { type Store, SqliteActivityRepository, SqliteParticipantRepository } from '@activities/db';
import { registerErrorHandler } from './plugins/error-handler';
import { registerActivityRoutes } from './routes/activities';

const defaultLogger = createLogger({ name: 'api' });

export interface ServerConfig {
  store: Store;
  staticDir: string;
  logger?: SafeLogger;
}

/** Query strings carry student emails, so only the path is logged. */
function pathOf(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

export async function buildServer(config: ServerConfig) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
  });

  const logger = config.logger ?? defaultLogger;

  registerErrorHandler(app, logger.child({ scope: 'error' }));

  await app.register(fastifyStatic, {
    root: config.staticDir,
    prefix: '/static/',
  });

  const { store } = config;
  const activityService = new ActivityService({
    activityRepo: new SqliteActivityRepository(),
    participantRepo: new SqliteParticipantRepository(),
    withTransaction: (fn) => store.withTransaction(fn),
  });

  app.get('/', async (_request, reply) => {
    return reply.redirect('/static/index.html');
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerActivityRoutes(app, { activityService, logger: logger.child({ scope: 'activities' }) });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: pathOf(request.url), requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: pathOf(request.url), statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
