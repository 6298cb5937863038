/**
 * SQLite driver interface the repositories talk to.
 * Every statement method takes an optional AbortSignal that is checked
 * before the statement runs.
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface SQLiteDriver {
  run(sql: string, params?: unknown[], signal?: AbortSignal): RunResult;
  get<T>(sql: string, params?: unknown[], signal?: AbortSignal): T | undefined;
  all<T>(sql: string, params?: unknown[], signal?: AbortSignal): T[];
  exec(sql: string): void;
  transaction<T>(fn: () => T): T;
  close(): void;
}
