export interface Activity {
  id: number;
  name: string;
  description: string | null;
  schedule: string | null;
  maxParticipants: number;
}

export type NewActivity = Omit<Activity, 'id'>;

export interface Participant {
  id: number;
  email: string;
  activityId: number;
}

export interface ActivityRoster {
  name: string;
  description: string | null;
  schedule: string | null;
  maxParticipants: number;
  participants: string[];
}
