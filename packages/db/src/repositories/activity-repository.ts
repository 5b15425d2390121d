import { type Activity, type NewActivity, type ActivityRepository } from '@activities/domain';
import { sessionDb } from '../client';

interface ActivityRow {
  id: number;
  name: string;
  description: string | null;
  schedule: string | null;
  max_participants: number;
}

const ACTIVITY_COLUMNS = 'id, name, description, schedule, max_participants';

export class SqliteActivityRepository implements ActivityRepository {
  async create(tx: unknown, activity: NewActivity): Promise<Activity> {
    const row = sessionDb(tx)
      .prepare<[string, string | null, string | null, number], ActivityRow>(
        `INSERT INTO activities (name, description, schedule, max_participants)
         VALUES (?, ?, ?, ?)
         RETURNING ${ACTIVITY_COLUMNS}`,
      )
      .get(activity.name, activity.description, activity.schedule, activity.maxParticipants);
    if (!row) throw new Error(`Insert of activity "${activity.name}" returned no row`);
    return mapActivityRow(row);
  }

  async findByName(tx: unknown, name: string): Promise<Activity | null> {
    const row = sessionDb(tx)
      .prepare<[string], ActivityRow>(`SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE name = ?`)
      .get(name);
    return row ? mapActivityRow(row) : null;
  }

  async list(tx: unknown): Promise<Activity[]> {
    return sessionDb(tx)
      .prepare<[], ActivityRow>(`SELECT ${ACTIVITY_COLUMNS} FROM activities ORDER BY id ASC`)
      .all()
      .map(mapActivityRow);
  }

  async count(tx: unknown): Promise<number> {
    const row = sessionDb(tx)
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM activities')
      .get();
    return row?.total ?? 0;
  }
}

function mapActivityRow(row: ActivityRow): Activity {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    schedule: row.schedule,
    maxParticipants: row.max_participants,
  };
}
