import { type Activity, type NewActivity, type Participant } from './activity';

export interface ActivityRepository {
  create(tx: unknown, activity: NewActivity): Promise<Activity>;
  findByName(tx: unknown, name: string): Promise<Activity | null>;
  list(tx: unknown): Promise<Activity[]>;
  count(tx: unknown): Promise<number>;
}

export interface ParticipantRepository {
  add(tx: unknown, participant: { activityId: number; email: string }): Promise<Participant>;
  remove(tx: unknown, id: number): Promise<void>;
  findByActivityAndEmail(tx: unknown, activityId: number, email: string): Promise<Participant | null>;
  countByActivityId(tx: unknown, activityId: number): Promise<number>;
  listAll(tx: unknown): Promise<Participant[]>;
}

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
