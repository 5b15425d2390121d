import { type ActivityRoster } from './activity';
import {
  type ActivityRepository,
  type ParticipantRepository,
  type WithTransaction,
} from './activity-ports';
import { ok, err, type Result } from './result';

export interface ActivityServiceDeps {
  activityRepo: ActivityRepository;
  participantRepo: ParticipantRepository;
  withTransaction: WithTransaction;
}

export type ActivityFailureKind =
  | 'NOT_FOUND'
  | 'ALREADY_SIGNED_UP'
  | 'ACTIVITY_FULL'
  | 'NOT_REGISTERED';

export interface ActivityFailure {
  kind: ActivityFailureKind;
  message: string;
}

function failure(kind: ActivityFailureKind, message: string): Result<never, ActivityFailure> {
  return err({ kind, message });
}

export class ActivityService {
  constructor(private readonly deps: ActivityServiceDeps) {}

  async listActivities(): Promise<ActivityRoster[]> {
    const { activityRepo, participantRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const activities = await activityRepo.list(tx);
      const participants = await participantRepo.listAll(tx);

      const emailsByActivity = new Map<number, string[]>();
      for (const participant of participants) {
        const emails = emailsByActivity.get(participant.activityId) ?? [];
        emails.push(participant.email);
        emailsByActivity.set(participant.activityId, emails);
      }

      return activities.map((activity) => ({
        name: activity.name,
        description: activity.description,
        schedule: activity.schedule,
        maxParticipants: activity.maxParticipants,
        participants: emailsByActivity.get(activity.id) ?? [],
      }));
    });
  }

  async signup(activityName: string, email: string): Promise<Result<string, ActivityFailure>> {
    const { activityRepo, participantRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const activity = await activityRepo.findByName(tx, activityName);
      if (!activity) {
        return failure('NOT_FOUND', 'Activity not found');
      }

      const existing = await participantRepo.findByActivityAndEmail(tx, activity.id, email);
      if (existing) {
        return failure('ALREADY_SIGNED_UP', 'Student is already signed up');
      }

      const currentCount = await participantRepo.countByActivityId(tx, activity.id);
      if (currentCount >= activity.maxParticipants) {
        return failure('ACTIVITY_FULL', 'Activity is full');
      }

      await participantRepo.add(tx, { activityId: activity.id, email });
      return ok(`Signed up ${email} for ${activityName}`);
    });
  }

  async unregister(activityName: string, email: string): Promise<Result<string, ActivityFailure>> {
    const { activityRepo, participantRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const activity = await activityRepo.findByName(tx, activityName);
      if (!activity) {
        return failure('NOT_FOUND', 'Activity not found');
      }

      const participant = await participantRepo.findByActivityAndEmail(tx, activity.id, email);
      if (!participant) {
        return failure('NOT_REGISTERED', 'Student is not signed up for this activity');
      }

      await participantRepo.remove(tx, participant.id);
      return ok(`Unregistered ${email} from ${activityName}`);
    });
  }
}
