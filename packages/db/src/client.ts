import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { createLogger } from '@activities/shared';

const logger = createLogger({ name: 'db' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Handle passed to repositories for the duration of one transaction. */
export class SqliteSession {
  private ended = false;

  constructor(private readonly database: Database.Database) {}

  get db(): Database.Database {
    if (this.ended) throw new Error('Session used after its transaction ended');
    return this.database;
  }

  end(): void {
    this.ended = true;
  }
}

export function sessionDb(tx: unknown): Database.Database {
  if (!(tx instanceof SqliteSession)) {
    throw new Error('Repository called outside Store.withTransaction');
  }
  return tx.db;
}

export interface StoreOptions {
  /** File path, or ':memory:' for a private in-process database. */
  path: string;
  migrationsDir?: string;
}

export class Store {
  private db: Database.Database | null;
  private tail: Promise<void> = Promise.resolve();
  private readonly migrationsDir: string;

  constructor(opts: StoreOptions) {
    this.db = new Database(opts.path);
    this.migrationsDir = opts.migrationsDir ?? MIGRATIONS_DIR;

    if (opts.path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    logger.info({ path: opts.path }, 'Database opened');
  }

  private handle(): Database.Database {
    if (!this.db) throw new Error('Store is closed');
    return this.db;
  }

  migrate(): string[] {
    const db = this.handle();
    db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      )
    `);

    const applied = new Set(
      db.prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY name')
        .all()
        .map((row) => row.name),
    );

    const files = readdirSync(this.migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    const record = db.prepare<[string]>('INSERT INTO _migrations (name) VALUES (?)');
    const newlyApplied: string[] = [];

    for (const file of files) {
      if (applied.has(file)) continue;

      const sql = readFileSync(join(this.migrationsDir, file), 'utf-8');
      db.transaction(() => {
        db.exec(sql);
        record.run(file);
      })();
      newlyApplied.push(file);
      logger.info({ migration: file }, 'Migration applied');
    }

    return newlyApplied;
  }

  /**
   * Transactions are queued so that async callbacks never interleave on the
   * single connection; BEGIN IMMEDIATE takes the write lock up front.
   */
  withTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runInTransaction(fn));
    // The queue advances whatever the outcome; callers observe failures through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runInTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
    const db = this.handle();
    const session = new SqliteSession(db);
    db.exec('BEGIN IMMEDIATE');
    try {
      const result = await fn(session);
      session.end();
      db.exec('COMMIT');
      return result;
    } catch (err) {
      session.end();
      if (db.inTransaction) db.exec('ROLLBACK');
      throw err;
    }
  }

  async close(): Promise<void> {
    if (!this.db) return;
    await this.tail;
    this.db.close();
    this.db = null;
    logger.info({}, 'Database closed');
  }
}

export function openStore(opts: StoreOptions): Store {
  return new Store(opts);
}
