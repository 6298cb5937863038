// Types
export * from './types';
export { NotFoundError, isNotFoundError } from './errors';

// Driver & connection
export { SQLiteDriver, RunResult } from './driver';
export { BetterSqlite3Driver } from './drivers/better-sqlite3';
export { ConnectionConfig, openConnection, isRetryableConnectError } from './connection';
export { CURRENT_SCHEMA_VERSION, migrate, getSchemaVersion } from './migrations';

// Repositories
export { EntityDefinition, Repository, BaseRepository } from './repositories/base-repository';
export { AccountRepository } from './repositories/account-repository';
export { CategoryRepository } from './repositories/category-repository';
export { TransactionRepository } from './repositories/transaction-repository';
export { accountDefinition, categoryDefinition, transactionDefinition } from './entities';

// Utilities
export { toCents, fromCents, toDateKey, fromDateKey } from './utils';
