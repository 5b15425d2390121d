import { loadConfig, DatabaseConfigSchema } from '@activities/shared';
import { openStore } from './client';

async function migrate() {
  const config = loadConfig(DatabaseConfigSchema);
  const store = openStore({ path: config.DATABASE_PATH });

  try {
    const applied = store.migrate();
    for (const file of applied) {
      process.stdout.write(`Applied: ${file}\n`);
    }
    process.stdout.write('All migrations applied.\n');
  } finally {
    await store.close();
  }
}

migrate().catch((err) => {
  process.stderr.write(
    `Migration failed: ${err instanceof Error ? err.message : String(err)}\n`,
  );
  process.exit(1);
});
