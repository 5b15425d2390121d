import { type NewActivity } from './activity';
import { type ActivityRepository, type WithTransaction } from './activity-ports';
import { DEFAULT_ACTIVITIES } from './catalog';

export interface SeedDeps {
  activityRepo: ActivityRepository;
  withTransaction: WithTransaction;
}

/** Inserts the catalog only into an empty store. Returns how many rows were added. */
export async function seedActivitiesIfEmpty(
  deps: SeedDeps,
  catalog: readonly NewActivity[] = DEFAULT_ACTIVITIES,
): Promise<number> {
  const { activityRepo } = deps;

  return deps.withTransaction(async (tx) => {
    const existing = await activityRepo.count(tx);
    if (existing > 0) return 0;

    for (const activity of catalog) {
      await activityRepo.create(tx, activity);
    }
    return catalog.length;
  });
}
