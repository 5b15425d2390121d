import { type FastifyInstance } from 'fastify';
import { type ZodError } from 'zod';
import { AppError, ErrorCode, type SafeLogger } from '@activities/shared';
import {
  type ActivityFailure,
  type ActivityFailureKind,
  type ActivityService,
  type Result,
} from '@activities/domain';
import {
  ActivityParamsSchema,
  StudentEmailQuerySchema,
  type ActivityListResponse,
  type MessageResponse,
} from '@activities/proto';

interface ActivityRouteDeps {
  activityService: ActivityService;
  logger: SafeLogger;
}

const FAILURE_CODES: Record<ActivityFailureKind, ErrorCode> = {
  NOT_FOUND: ErrorCode.NOT_FOUND,
  ALREADY_SIGNED_UP: ErrorCode.BAD_REQUEST,
  ACTIVITY_FULL: ErrorCode.BAD_REQUEST,
  NOT_REGISTERED: ErrorCode.BAD_REQUEST,
};

function unwrapMessage(result: Result<string, ActivityFailure>): MessageResponse {
  if (!result.ok) {
    throw new AppError(FAILURE_CODES[result.error.kind], result.error.message);
  }
  return { message: result.value };
}

function validationError(message: string, error: ZodError): AppError {
  return new AppError(ErrorCode.VALIDATION, message, {
    issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

function parseStudentRequest(params: unknown, query: unknown): { activityName: string; email: string } {
  const parsedParams = ActivityParamsSchema.safeParse(params);
  if (!parsedParams.success) {
    throw validationError('Invalid activity name', parsedParams.error);
  }
  const parsedQuery = StudentEmailQuerySchema.safeParse(query);
  if (!parsedQuery.success) {
    throw validationError('Invalid query parameters', parsedQuery.error);
  }
  return { activityName: parsedParams.data.activityName, email: parsedQuery.data.email };
}

export function registerActivityRoutes(app: FastifyInstance, deps: ActivityRouteDeps): void {
  const { activityService, logger } = deps;

  app.get('/activities', async (_request, reply) => {
    const roster = await activityService.listActivities();
    const body: ActivityListResponse = roster.map((activity) => ({
      name: activity.name,
      description: activity.description,
      schedule: activity.schedule,
      max_participants: activity.maxParticipants,
      participants: activity.participants,
    }));
    return reply.status(200).send(body);
  });

  app.post('/activities/:activityName/signup', async (request, reply) => {
    const { activityName, email } = parseStudentRequest(request.params, request.query);

    const body = unwrapMessage(await activityService.signup(activityName, email));
    logger.info({ activity: activityName, email, requestId: request.id }, 'Student signed up');
    return reply.status(200).send(body);
  });

  app.delete('/activities/:activityName/unregister', async (request, reply) => {
    const { activityName, email } = parseStudentRequest(request.params, request.query);

    const body = unwrapMessage(await activityService.unregister(activityName, email));
    logger.info({ activity: activityName, email, requestId: request.id }, 'Student unregistered');
    return reply.status(200).send(body);
  });
}
