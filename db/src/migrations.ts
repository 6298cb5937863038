import { SQLiteDriver } from './driver';

export const CURRENT_SCHEMA_VERSION = 2;

interface Migration {
  version: number;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'create accounts, categories and transactions',
    sql: `
      CREATE TABLE IF NOT EXISTS accounts (
        account_id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL CHECK(length(name) > 0),
        account_type TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS categories (
        category_id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        category_type TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS transactions (
        transaction_id INTEGER PRIMARY KEY AUTOINCREMENT,
        account_id INTEGER NOT NULL,
        category_id INTEGER NOT NULL,
        amount INTEGER NOT NULL,
        transaction_date TEXT NOT NULL,
        description TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        FOREIGN KEY (account_id) REFERENCES accounts(account_id),
        FOREIGN KEY (category_id) REFERENCES categories(category_id)
      );
    `,
  },
  {
    version: 2,
    description: 'index transactions by account and date',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_transactions_account_date
        ON transactions(account_id, transaction_date);
      CREATE INDEX IF NOT EXISTS idx_transactions_date
        ON transactions(transaction_date);
      CREATE INDEX IF NOT EXISTS idx_categories_type
        ON categories(category_type);
    `,
  },
];

export function getSchemaVersion(driver: SQLiteDriver): number {
  const row = driver.get<{ user_version: number }>('PRAGMA user_version');
  return row?.user_version ?? 0;
}

/**
 * Applies every migration newer than the database's user_version.
 * Each version runs in its own transaction. Returns the versions applied.
 */
export function migrate(driver: SQLiteDriver): number[] {
  const current = getSchemaVersion(driver);
  const pending = MIGRATIONS.filter(m => m.version > current);

  if (pending.length === 0) return [];

  const applied: number[] = [];
  for (const migration of pending) {
    driver.transaction(() => {
      driver.exec(migration.sql);
      driver.exec(`PRAGMA user_version = ${migration.version}`);
    });
    applied.push(migration.version);
    console.log(`[DB Migration] Applied v${migration.version}: ${migration.description}`);
  }

  console.log(`[DB Migration] Schema is at v${CURRENT_SCHEMA_VERSION}.`);
  return applied;
}
