import { type Participant, type ParticipantRepository } from '@activities/domain';
import { sessionDb } from '../client';

interface ParticipantRow {
  id: number;
  email: string;
  activity_id: number;
}

export class SqliteParticipantRepository implements ParticipantRepository {
  async add(tx: unknown, participant: { activityId: number; email: string }): Promise<Participant> {
    const row = sessionDb(tx)
      .prepare<[string, number], ParticipantRow>(
        `INSERT INTO participants (email, activity_id)
         VALUES (?, ?)
         RETURNING id, email, activity_id`,
      )
      .get(participant.email, participant.activityId);
    if (!row) throw new Error('Insert of participant returned no row');
    return mapParticipantRow(row);
  }

  async remove(tx: unknown, id: number): Promise<void> {
    sessionDb(tx).prepare<[number]>('DELETE FROM participants WHERE id = ?').run(id);
  }

  async findByActivityAndEmail(
    tx: unknown,
    activityId: number,
    email: string,
  ): Promise<Participant | null> {
    const row = sessionDb(tx)
      .prepare<[number, string], ParticipantRow>(
        `SELECT id, email, activity_id
         FROM participants WHERE activity_id = ? AND email = ?`,
      )
      .get(activityId, email);
    return row ? mapParticipantRow(row) : null;
  }

  async countByActivityId(tx: unknown, activityId: number): Promise<number> {
    const row = sessionDb(tx)
      .prepare<[number], { total: number }>(
        'SELECT COUNT(*) AS total FROM participants WHERE activity_id = ?',
      )
      .get(activityId);
    return row?.total ?? 0;
  }

  async listAll(tx: unknown): Promise<Participant[]> {
    return sessionDb(tx)
      .prepare<[], ParticipantRow>('SELECT id, email, activity_id FROM participants ORDER BY id ASC')
      .all()
      .map(mapParticipantRow);
  }
}

function mapParticipantRow(row: ParticipantRow): Participant {
  return {
    id: row.id,
    email: row.email,
    activityId: row.activity_id,
  };
}
