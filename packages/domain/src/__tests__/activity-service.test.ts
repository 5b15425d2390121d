import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ActivityService, type ActivityServiceDeps } from '../activity-service';
import { type Activity, type NewActivity, type Participant } from '../activity';

function makeActivity(overrides: Partial<Activity> = {}): Activity {
  return {
    id: 1, name: 'Chess Club', description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM', maxParticipants: 12,
    ...overrides,
  };
}

function makeParticipant(overrides: Partial<Participant> = {}): Participant {
  return { id: 10, email: 'a@x.com', activityId: 1, ...overrides };
}

function createMockDeps(overrides: Partial<ActivityServiceDeps> = {}): ActivityServiceDeps {
  let idCounter = 100;
  return {
    activityRepo: {
      create: vi.fn(async (_tx: unknown, a: NewActivity) => makeActivity({ ...a, id: idCounter++ })),
      findByName: vi.fn(async () => makeActivity()),
      list: vi.fn(async () => [makeActivity()]),
      count: vi.fn(async () => 1),
    },
    participantRepo: {
      add: vi.fn(async (_tx: unknown, p: { activityId: number; email: string }) => makeParticipant({ ...p, id: idCounter++ })),
      remove: vi.fn(async () => {}),
      findByActivityAndEmail: vi.fn(async () => null),
      countByActivityId: vi.fn(async () => 0),
      listAll: vi.fn(async () => []),
    },
    withTransaction: vi.fn(async <T>(fn: (tx: unknown) => Promise<T>) => fn({})),
    ...overrides,
  };
}

describe('ActivityService', () => {
  let deps: ActivityServiceDeps;
  let service: ActivityService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new ActivityService(deps);
  });

  describe('listActivities', () => {
    it('returns an empty list for an empty store', async () => {
      vi.mocked(deps.activityRepo.list).mockResolvedValueOnce([]);
      await expect(service.listActivities()).resolves.toEqual([]);
    });

    it('groups participant emails under their activity in registration order', async () => {
      vi.mocked(deps.activityRepo.list).mockResolvedValueOnce([
        makeActivity({ id: 1, name: 'Chess Club' }),
        makeActivity({ id: 2, name: 'Math Club', description: null, schedule: null, maxParticipants: 10 }),
      ]);
      vi.mocked(deps.participantRepo.listAll).mockResolvedValueOnce([
        makeParticipant({ id: 1, activityId: 2, email: 'c@x.com' }),
        makeParticipant({ id: 2, activityId: 1, email: 'a@x.com' }),
        makeParticipant({ id: 3, activityId: 2, email: 'b@x.com' }),
      ]);

      const roster = await service.listActivities();

      expect(roster).toEqual([
        {
          name: 'Chess Club',
          description: 'Learn strategies and compete in chess tournaments',
          schedule: 'Fridays, 3:30 PM - 5:00 PM',
          maxParticipants: 12,
          participants: ['a@x.com'],
        },
        {
          name: 'Math Club',
          description: null,
          schedule: null,
          maxParticipants: 10,
          participants: ['c@x.com', 'b@x.com'],
        },
      ]);
      expect(deps.withTransaction).toHaveBeenCalledOnce();
    });
  });

  describe('signup', () => {
    it('adds the participant and confirms', async () => {
      const result = await service.signup('Chess Club', 'a@x.com');

      expect(result).toEqual({ ok: true, value: 'Signed up a@x.com for Chess Club' });
      expect(deps.participantRepo.add).toHaveBeenCalledWith({}, { activityId: 1, email: 'a@x.com' });
    });

    it('rejects unknown activity', async () => {
      vi.mocked(deps.activityRepo.findByName).mockResolvedValueOnce(null);

      const result = await service.signup('Knitting Circle', 'a@x.com');

      expect(result).toEqual({ ok: false, error: { kind: 'NOT_FOUND', message: 'Activity not found' } });
      expect(deps.participantRepo.add).not.toHaveBeenCalled();
    });

    it('rejects a duplicate signup before checking capacity', async () => {
      vi.mocked(deps.participantRepo.findByActivityAndEmail).mockResolvedValueOnce(makeParticipant());

      const result = await service.signup('Chess Club', 'a@x.com');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'ALREADY_SIGNED_UP', message: 'Student is already signed up' },
      });
      expect(deps.participantRepo.countByActivityId).not.toHaveBeenCalled();
      expect(deps.participantRepo.add).not.toHaveBeenCalled();
    });

    it('rejects when the activity is at capacity', async () => {
      vi.mocked(deps.participantRepo.countByActivityId).mockResolvedValueOnce(12);

      const result = await service.signup('Chess Club', 'm@x.com');

      expect(result).toEqual({ ok: false, error: { kind: 'ACTIVITY_FULL', message: 'Activity is full' } });
      expect(deps.participantRepo.add).not.toHaveBeenCalled();
    });

    it('accepts the last open seat', async () => {
      vi.mocked(deps.participantRepo.countByActivityId).mockResolvedValueOnce(11);

      const result = await service.signup('Chess Club', 'l@x.com');

      expect(result.ok).toBe(true);
      expect(deps.participantRepo.add).toHaveBeenCalledOnce();
    });

    it('treats a zero-capacity activity as full', async () => {
      vi.mocked(deps.activityRepo.findByName).mockResolvedValueOnce(makeActivity({ maxParticipants: 0 }));

      const result = await service.signup('Chess Club', 'a@x.com');

      expect(result).toMatchObject({ ok: false, error: { kind: 'ACTIVITY_FULL' } });
    });

    it('propagates store faults', async () => {
      vi.mocked(deps.participantRepo.add).mockRejectedValueOnce(new Error('disk I/O error'));

      await expect(service.signup('Chess Club', 'a@x.com')).rejects.toThrow('disk I/O error');
    });
  });

  describe('unregister', () => {
    it('removes the participant and confirms', async () => {
      vi.mocked(deps.participantRepo.findByActivityAndEmail).mockResolvedValueOnce(makeParticipant({ id: 42 }));

      const result = await service.unregister('Chess Club', 'a@x.com');

      expect(result).toEqual({ ok: true, value: 'Unregistered a@x.com from Chess Club' });
      expect(deps.participantRepo.remove).toHaveBeenCalledWith({}, 42);
    });

    it('rejects unknown activity', async () => {
      vi.mocked(deps.activityRepo.findByName).mockResolvedValueOnce(null);

      const result = await service.unregister('Knitting Circle', 'a@x.com');

      expect(result).toEqual({ ok: false, error: { kind: 'NOT_FOUND', message: 'Activity not found' } });
      expect(deps.participantRepo.findByActivityAndEmail).not.toHaveBeenCalled();
    });

    it('rejects a student who is not registered', async () => {
      const result = await service.unregister('Chess Club', 'z@x.com');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'NOT_REGISTERED', message: 'Student is not signed up for this activity' },
      });
      expect(deps.participantRepo.remove).not.toHaveBeenCalled();
    });
  });
});
