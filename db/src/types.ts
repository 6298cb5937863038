// Entity types for the Tally data layer

export interface Account {
  accountId: number;
  name: string;
  accountType: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Category {
  categoryId: number;
  name: string;
  categoryType: string; // e.g. 'EXPENSE' | 'INCOME'
  createdAt: Date;
  updatedAt: Date;
}

export interface Transaction {
  transactionId: number;
  accountId: number;
  categoryId: number;
  amount: number; // two fractional digits, stored as integer cents
  transactionDate: Date; // calendar date at UTC midnight
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
  // Filled in by queries that eagerly resolve references
  account?: Account;
  category?: Category;
}

/** Fields a caller supplies when inserting; ids and timestamps are generated. */
export type NewAccount = Omit<Account, 'accountId' | 'createdAt' | 'updatedAt'>;
export type NewCategory = Omit<Category, 'categoryId' | 'createdAt' | 'updatedAt'>;
export type NewTransaction = Omit<
  Transaction,
  'transactionId' | 'createdAt' | 'updatedAt' | 'account' | 'category'
>;

/** Per-category aggregate of one account's transactions. */
export interface TransactionSummary {
  categoryName: string;
  totalAmount: number;
  count: number;
}
