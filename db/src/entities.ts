import type { EntityDefinition } from './repositories/base-repository';
import type {
  Account,
  Category,
  Transaction,
  NewAccount,
  NewCategory,
  NewTransaction,
} from './types';
import { AccountRow, CategoryRow, TransactionRow } from './row-types';
import { toCents, fromCents, toDateKey, fromDateKey } from './utils';

// Helper methods to map database rows to TypeScript objects
function mapAccount(r: AccountRow): Account {
  return {
    accountId: r.account_id,
    name: r.name,
    accountType: r.account_type,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

function mapCategory(r: CategoryRow): Category {
  return {
    categoryId: r.category_id,
    name: r.name,
    categoryType: r.category_type,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

function mapTransaction(r: TransactionRow): Transaction {
  return {
    transactionId: r.transaction_id,
    accountId: r.account_id,
    categoryId: r.category_id,
    amount: fromCents(r.amount),
    transactionDate: fromDateKey(r.transaction_date),
    description: r.description ?? null,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

export const accountDefinition: EntityDefinition<Account, NewAccount, AccountRow> = {
  name: 'account',
  table: 'accounts',
  idColumn: 'account_id',
  columns: ['name', 'account_type'],
  toValues: (a) => [a.name, a.accountType],
  fromRow: mapAccount,
  idOf: (a) => a.accountId,
};

export const categoryDefinition: EntityDefinition<Category, NewCategory, CategoryRow> = {
  name: 'category',
  table: 'categories',
  idColumn: 'category_id',
  columns: ['name', 'category_type'],
  toValues: (c) => [c.name, c.categoryType],
  fromRow: mapCategory,
  idOf: (c) => c.categoryId,
};

export const transactionDefinition: EntityDefinition<Transaction, NewTransaction, TransactionRow> = {
  name: 'transaction',
  table: 'transactions',
  idColumn: 'transaction_id',
  columns: ['account_id', 'category_id', 'amount', 'transaction_date', 'description'],
  toValues: (t) => [
    t.accountId,
    t.categoryId,
    toCents(t.amount),
    toDateKey(t.transactionDate),
    t.description ?? null,
  ],
  fromRow: mapTransaction,
  idOf: (t) => t.transactionId,
};
