import { z } from 'zod';

export const ActivityParamsSchema = z.object({
  activityName: z.string().min(1, 'Activity name is required'),
});

/** Only presence is checked; the address itself is taken as given. */
export const StudentEmailQuerySchema = z.object({
  email: z.string({ required_error: 'email query parameter is required' }),
});

export const ActivityResponseSchema = z.object({
  name: z.string(),
  description: z.string().nullable(),
  schedule: z.string().nullable(),
  max_participants: z.number().int(),
  participants: z.array(z.string()),
});

export const ActivityListResponseSchema = z.array(ActivityResponseSchema);

export const MessageResponseSchema = z.object({
  message: z.string(),
});

export type ActivityParams = z.infer<typeof ActivityParamsSchema>;
export type StudentEmailQuery = z.infer<typeof StudentEmailQuerySchema>;
export type ActivityResponse = z.infer<typeof ActivityResponseSchema>;
export type ActivityListResponse = z.infer<typeof ActivityListResponseSchema>;
export type MessageResponse = z.infer<typeof MessageResponseSchema>;
