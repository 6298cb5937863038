import {
  AccountRepository,
  CategoryRepository,
  TransactionRepository,
  openConnection,
} from '@tally/db';
import type {
  Account,
  Category,
  ConnectionConfig,
  SQLiteDriver,
  Transaction,
  TransactionSummary,
} from '@tally/db';
import { ConfigurationError } from './errors';

export interface QueryRepositories {
  accounts?: AccountRepository;
  categories?: CategoryRepository;
  transactions?: TransactionRepository;
  /** Connection opened by withConnectionConfig; QueryOps.close() releases it. */
  connection?: SQLiteDriver;
}

/** Configures the repository set a QueryOps is built from. */
export type QueryOption = (repositories: QueryRepositories) => void | Promise<void>;

/** Uses already-constructed repositories. */
export function withRepositories(
  accounts: AccountRepository,
  categories: CategoryRepository,
  transactions: TransactionRepository
): QueryOption {
  return (repositories) => {
    repositories.accounts = accounts;
    repositories.categories = categories;
    repositories.transactions = transactions;
  };
}

/** Builds the repositories over an open connection. */
export function withDriver(driver: SQLiteDriver): QueryOption {
  return withRepositories(
    new AccountRepository(driver),
    new CategoryRepository(driver),
    new TransactionRepository(driver)
  );
}

/** Opens a connection from the config, then builds the repositories over it. */
export function withConnectionConfig(config: ConnectionConfig): QueryOption {
  return async (repositories) => {
    const driver = await openConnection(config);
    withDriver(driver)(repositories);
    repositories.connection = driver;
  };
}

/**
 * Applies the options in order. The first option that fails rejects the
 * whole construction. With no options the facade has no repositories and
 * every call throws ConfigurationError.
 */
export async function createQueryOps(...options: QueryOption[]): Promise<QueryOps> {
  const repositories: QueryRepositories = {};
  for (const option of options) {
    await option(repositories);
  }
  return new QueryOps(repositories);
}

export function newQueryOpsWithRepositories(
  accounts: AccountRepository,
  categories: CategoryRepository,
  transactions: TransactionRepository
): QueryOps {
  return new QueryOps({ accounts, categories, transactions });
}

/**
 * QueryOps - one flat read surface over the account, category and
 * transaction repositories. Every method forwards to a repository as is;
 * errors propagate unchanged.
 */
export class QueryOps {
  private repositories: QueryRepositories;

  constructor(repositories: QueryRepositories) {
    this.repositories = { ...repositories };
  }

  /**
   * Closes the connection the facade opened itself. Connections passed in
   * through withDriver or withRepositories stay with their owner.
   */
  close(): void {
    const { connection } = this.repositories;
    if (!connection) return;
    this.repositories = {};
    connection.close();
  }

  private get accounts(): AccountRepository {
    const repo = this.repositories.accounts;
    if (!repo) throw new ConfigurationError('QueryOps has no account repository');
    return repo;
  }

  private get categories(): CategoryRepository {
    const repo = this.repositories.categories;
    if (!repo) throw new ConfigurationError('QueryOps has no category repository');
    return repo;
  }

  private get transactions(): TransactionRepository {
    const repo = this.repositories.transactions;
    if (!repo) throw new ConfigurationError('QueryOps has no transaction repository');
    return repo;
  }

  // Accounts
  getAccountById(accountId: number, signal?: AbortSignal): Account {
    return this.accounts.findById(accountId, signal);
  }

  getAccountByName(name: string, signal?: AbortSignal): Account {
    return this.accounts.findByName(name, signal);
  }

  searchAccounts(keyword: string, signal?: AbortSignal): Account[] {
    return this.accounts.findByNameLike(keyword, signal);
  }

  getAllAccounts(signal?: AbortSignal): Account[] {
    return this.accounts.findAll(signal);
  }

  // Categories
  getCategoryById(categoryId: number, signal?: AbortSignal): Category {
    return this.categories.findById(categoryId, signal);
  }

  getCategoriesByType(categoryType: string, signal?: AbortSignal): Category[] {
    return this.categories.findByType(categoryType, signal);
  }

  searchCategories(keyword: string, signal?: AbortSignal): Category[] {
    return this.categories.findByNameLike(keyword, signal);
  }

  getAllCategories(signal?: AbortSignal): Category[] {
    return this.categories.findAll(signal);
  }

  // Transactions
  getTransactionById(transactionId: number, signal?: AbortSignal): Transaction {
    return this.transactions.findById(transactionId, signal);
  }

  getTransactionsByAccountId(accountId: number, signal?: AbortSignal): Transaction[] {
    return this.transactions.findByAccountId(accountId, signal);
  }

  getTransactionsByDateRange(start: Date, end: Date, signal?: AbortSignal): Transaction[] {
    return this.transactions.findByDateRange(start, end, signal);
  }

  getTransactionsByAccountAndDateRange(
    accountId: number,
    start: Date,
    end: Date,
    signal?: AbortSignal
  ): Transaction[] {
    return this.transactions.findByAccountAndDateRange(accountId, start, end, signal);
  }

  searchTransactionsByDescription(keyword: string, signal?: AbortSignal): Transaction[] {
    return this.transactions.findByDescriptionLike(keyword, signal);
  }

  /** Sum of the account's transaction amounts. */
  getAccountBalance(accountId: number, signal?: AbortSignal): number {
    return this.transactions.sumByAccountId(accountId, signal);
  }

  getTransactionCount(accountId: number, signal?: AbortSignal): number {
    return this.transactions.countByAccountId(accountId, signal);
  }

  getLatestTransactions(accountId: number, limit: number, signal?: AbortSignal): Transaction[] {
    return this.transactions.findLatestForAccount(accountId, limit, signal);
  }

  getTransactionSummaryByCategory(accountId: number, signal?: AbortSignal): TransactionSummary[] {
    return this.transactions.groupByCategory(accountId, signal);
  }

  getAllTransactions(signal?: AbortSignal): Transaction[] {
    return this.transactions.findAll(signal);
  }
}
