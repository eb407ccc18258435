import type { Database as DatabaseType } from 'better-sqlite3';

export interface Migration {
  /** Monotonically increasing version number starting at 1. */
  readonly version: number;
  readonly description: string;
  readonly sql: string;
}

/**
 * v1: houses, residents (`users`) and vehicles (`cars`).
 *
 * A resident row is unique per (tg_id, house) so one Telegram account can be
 * registered in several buildings. Rows are soft-deleted through `date_del`.
 */
const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS houses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  house_name TEXT,
  chat_id INTEGER NOT NULL UNIQUE,
  house_city TEXT,
  house_address TEXT,
  date_add TEXT,
  date_del TEXT
);

CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  tg_id INTEGER NOT NULL,
  name TEXT,
  surname TEXT,
  house INTEGER REFERENCES houses(id),
  apartment TEXT,
  phone TEXT,
  date_add TEXT,
  date_del TEXT,
  UNIQUE (tg_id, house)
);

CREATE TABLE IF NOT EXISTS cars (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user INTEGER NOT NULL REFERENCES users(id),
  autonum TEXT NOT NULL,
  date_add TEXT,
  date_del TEXT
);

CREATE INDEX IF NOT EXISTS idx_users_tg_id ON users(tg_id);
CREATE INDEX IF NOT EXISTS idx_users_house ON users(house);
CREATE INDEX IF NOT EXISTS idx_cars_user ON cars(user);
`;

export const RESIDENCY_MIGRATIONS: readonly Migration[] = [
  { version: 1, description: 'houses, users and cars tables', sql: MIGRATION_V1 },
];

const SCHEMA_NAME = 'residency';

/**
 * Apply every migration newer than the stored version, each in its own
 * transaction. Re-running is a no-op.
 */
export function applyMigrations(
  db: DatabaseType,
  migrations: readonly Migration[] = RESIDENCY_MIGRATIONS,
): number {
  db.exec('CREATE TABLE IF NOT EXISTS _schema_meta (key TEXT PRIMARY KEY, value TEXT)');

  let currentVersion = getSchemaVersion(db);

  for (const migration of migrations) {
    if (migration.version <= currentVersion) {
      continue;
    }

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare<[string, string]>(
        'INSERT INTO _schema_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
      ).run(`${SCHEMA_NAME}_version`, String(migration.version));
    });
    apply();
    currentVersion = migration.version;
  }

  return currentVersion;
}

export function getSchemaVersion(db: DatabaseType): number {
  const row = db
    .prepare<[string], { value: string | null }>('SELECT value FROM _schema_meta WHERE key = ?')
    .get(`${SCHEMA_NAME}_version`);

  if (!row || row.value === null) {
    return 0;
  }
  return parseInt(row.value, 10);
}
