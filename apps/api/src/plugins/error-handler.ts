import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, type SafeLogger } from '@activities/shared';

export function registerErrorHandler(app: FastifyInstance, logger: SafeLogger): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
