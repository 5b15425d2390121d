export {
  ActivityParamsSchema,
  StudentEmailQuerySchema,
  ActivityResponseSchema,
  ActivityListResponseSchema,
  MessageResponseSchema,
  type ActivityParams,
  type StudentEmailQuery,
  type ActivityResponse,
  type ActivityListResponse,
  type MessageResponse,
} from './api/activity';
