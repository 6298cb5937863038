import { openConnection } from '../connection';
import { SQLiteDriver } from '../driver';
import { AccountRepository } from '../repositories/account-repository';
import { CategoryRepository } from '../repositories/category-repository';
import { TransactionRepository } from '../repositories/transaction-repository';

export interface TestStore {
  driver: SQLiteDriver;
  accounts: AccountRepository;
  categories: CategoryRepository;
  transactions: TransactionRepository;
}

export async function openTestStore(): Promise<TestStore> {
  const driver = await openConnection({ filename: ':memory:' });
  return {
    driver,
    accounts: new AccountRepository(driver),
    categories: new CategoryRepository(driver),
    transactions: new TransactionRepository(driver),
  };
}

export function day(key: string): Date {
  return new Date(`${key}T00:00:00.000Z`);
}
