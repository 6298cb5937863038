import { SQLiteDriver } from '../driver';
import { accountDefinition, categoryDefinition, transactionDefinition } from '../entities';
import { AccountRow, CategoryRow, TransactionRow, TransactionSummaryRow } from '../row-types';
import type {
  Account,
  Category,
  Transaction,
  NewAccount,
  NewCategory,
  NewTransaction,
  TransactionSummary,
} from '../types';
import { containsPattern, fromCents, toDateKey } from '../utils';
import { BaseRepository, Repository } from './base-repository';

export class TransactionRepository implements Repository<Transaction, NewTransaction> {
  readonly base: BaseRepository<Transaction, NewTransaction, TransactionRow>;
  private accounts: BaseRepository<Account, NewAccount, AccountRow>;
  private categories: BaseRepository<Category, NewCategory, CategoryRow>;

  constructor(driver: SQLiteDriver) {
    this.base = new BaseRepository(driver, transactionDefinition);
    this.accounts = new BaseRepository(driver, accountDefinition);
    this.categories = new BaseRepository(driver, categoryDefinition);
  }

  create(transaction: NewTransaction, signal?: AbortSignal): Transaction {
    return this.base.create(transaction, signal);
  }

  findById(id: number, signal?: AbortSignal): Transaction {
    return this.base.findById(id, signal);
  }

  findAll(signal?: AbortSignal): Transaction[] {
    return this.base.findAll(signal);
  }

  update(transaction: Transaction, signal?: AbortSignal): Transaction {
    return this.base.update(transaction, signal);
  }

  delete(transaction: Transaction, signal?: AbortSignal): boolean {
    return this.base.delete(transaction, signal);
  }

  deleteById(id: number, signal?: AbortSignal): boolean {
    return this.base.deleteById(id, signal);
  }

  findByAccountId(accountId: number, signal?: AbortSignal): Transaction[] {
    const transactions = this.base.findWhere('account_id = ?', [accountId], signal);
    return this.resolveReferences(transactions, signal);
  }

  /** Transactions dated within [start, end], both ends inclusive. */
  findByDateRange(start: Date, end: Date, signal?: AbortSignal): Transaction[] {
    const transactions = this.base.findWhere(
      'transaction_date BETWEEN ? AND ?',
      [toDateKey(start), toDateKey(end)],
      signal
    );
    return this.resolveReferences(transactions, signal);
  }

  /** Null descriptions never match, not even an empty keyword. */
  findByDescriptionLike(keyword: string, signal?: AbortSignal): Transaction[] {
    const transactions = this.base.findWhere(
      "description IS NOT NULL AND casefold(description) LIKE ? ESCAPE '\\'",
      [containsPattern(keyword)],
      signal
    );
    return this.resolveReferences(transactions, signal);
  }

  findByAccountAndDateRange(accountId: number, start: Date, end: Date, signal?: AbortSignal): Transaction[] {
    const transactions = this.base.findWhere(
      'account_id = ? AND transaction_date BETWEEN ? AND ? ORDER BY transaction_date DESC, transaction_id DESC',
      [accountId, toDateKey(start), toDateKey(end)],
      signal
    );
    return this.resolveReferences(transactions, signal);
  }

  sumByAccountId(accountId: number, signal?: AbortSignal): number {
    const row = this.base.driver.get<{ total: number }>(
      'SELECT COALESCE(SUM(amount), 0) as total FROM transactions WHERE account_id = ?',
      [accountId],
      signal
    );
    return fromCents(row?.total ?? 0);
  }

  countByAccountId(accountId: number, signal?: AbortSignal): number {
    const row = this.base.driver.get<{ count: number }>(
      'SELECT COUNT(*) as count FROM transactions WHERE account_id = ?',
      [accountId],
      signal
    );
    return row?.count ?? 0;
  }

  findLatestForAccount(accountId: number, limit: number, signal?: AbortSignal): Transaction[] {
    if (Number.isNaN(limit) || limit < 1) return [];
    // LIMIT -1 is SQLite's "no limit"
    const rowLimit = Number.isFinite(limit) ? Math.floor(limit) : -1;
    const transactions = this.base.findWhere(
      'account_id = ? ORDER BY transaction_date DESC, transaction_id DESC LIMIT ?',
      [accountId, rowLimit],
      signal
    );
    return this.resolveReferences(transactions, signal);
  }

  /** Totals and counts of the account's transactions per category name. */
  groupByCategory(accountId: number, signal?: AbortSignal): TransactionSummary[] {
    const rows = this.base.driver.all<TransactionSummaryRow>(`
      SELECT
        c.name as category_name,
        SUM(t.amount) as total_amount,
        COUNT(t.transaction_id) as count
      FROM transactions t
      JOIN categories c ON t.category_id = c.category_id
      WHERE t.account_id = ?
      GROUP BY c.name
      ORDER BY c.name ASC
    `, [accountId], signal);

    return rows.map(row => ({
      categoryName: row.category_name,
      totalAmount: fromCents(row.total_amount),
      count: row.count,
    }));
  }

  // Loads referenced accounts and categories in one query per table
  private resolveReferences(transactions: Transaction[], signal?: AbortSignal): Transaction[] {
    if (transactions.length === 0) return transactions;

    const accountIds = [...new Set(transactions.map(t => t.accountId))];
    const categoryIds = [...new Set(transactions.map(t => t.categoryId))];

    const accounts = new Map(
      this.accounts.findByIds(accountIds, signal).map(a => [a.accountId, a] as const)
    );
    const categories = new Map(
      this.categories.findByIds(categoryIds, signal).map(c => [c.categoryId, c] as const)
    );

    return transactions.map(t => ({
      ...t,
      account: accounts.get(t.accountId),
      category: categories.get(t.categoryId),
    }));
  }
}
