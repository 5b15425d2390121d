export type { Activity, NewActivity, Participant, ActivityRoster } from './activity';
export type { ActivityRepository, ParticipantRepository, WithTransaction } from './activity-ports';
export { ok, err, type Result } from './result';
export {
  ActivityService,
  type ActivityServiceDeps,
  type ActivityFailure,
  type ActivityFailureKind,
} from './activity-service';
export { DEFAULT_ACTIVITIES } from './catalog';
export { seedActivitiesIfEmpty, type SeedDeps } from './seed';
