import BetterSqlite3 = require('better-sqlite3');
import { backOff } from 'exponential-backoff';
import { SQLiteDriver } from './driver';
import { BetterSqlite3Driver } from './drivers/better-sqlite3';
import { migrate } from './migrations';

export interface ConnectionConfig {
  /** Database file path, or ':memory:' */
  filename: string;
  /** How long a statement waits on a locked database before failing */
  timeoutMs?: number;
  /** Attempts at acquiring the connection before giving up */
  connectAttempts?: number;
  readonly?: boolean;
}

const DEFAULT_CONNECTION: Required<Omit<ConnectionConfig, 'filename'>> = {
  timeoutMs: 3000,
  connectAttempts: 3,
  readonly: false,
};

const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

const INITIAL_DELAY_MS = 100;
const MAX_DELAY_MS = 2000;

export function isRetryableConnectError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return typeof err.code === 'string' && RETRYABLE_CODES.has(err.code);
}

function acquire(filename: string, timeoutMs: number, readonly: boolean): BetterSqlite3Driver {
  const db = new BetterSqlite3(filename, { timeout: timeoutMs, readonly });
  try {
    db.pragma('foreign_keys = ON');
    db.prepare('SELECT 1').get();
  } catch (error) {
    db.close();
    throw error;
  }
  return new BetterSqlite3Driver(db);
}

/**
 * Opens a SQLite connection, enables foreign keys and checks it answers.
 * Busy/locked databases are retried with exponential backoff; any other
 * failure rejects immediately. Writable connections are migrated to the
 * current schema before they are handed out.
 */
export async function openConnection(config: ConnectionConfig): Promise<SQLiteDriver> {
  const { timeoutMs, connectAttempts, readonly } = { ...DEFAULT_CONNECTION, ...config };

  const driver = await backOff(
    async () => acquire(config.filename, timeoutMs, readonly),
    {
      numOfAttempts: connectAttempts,
      startingDelay: INITIAL_DELAY_MS,
      maxDelay: MAX_DELAY_MS,
      jitter: 'full',
      retry: (error: unknown, attemptNumber: number) => {
        if (isRetryableConnectError(error) && attemptNumber < connectAttempts) {
          const message = error instanceof Error ? error.message : String(error);
          console.warn(`[DB Connection] Retry ${attemptNumber}/${connectAttempts} for ${config.filename}: ${message}`);
          return true;
        }
        return false;
      },
    }
  );

  if (!readonly) {
    migrate(driver);
  }

  return driver;
}
