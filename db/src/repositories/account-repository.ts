import { SQLiteDriver } from '../driver';
import { accountDefinition } from '../entities';
import { NotFoundError } from '../errors';
import { AccountRow } from '../row-types';
import type { Account, NewAccount } from '../types';
import { containsPattern } from '../utils';
import { BaseRepository, Repository } from './base-repository';

export class AccountRepository implements Repository<Account, NewAccount> {
  readonly base: BaseRepository<Account, NewAccount, AccountRow>;

  constructor(driver: SQLiteDriver) {
    this.base = new BaseRepository(driver, accountDefinition);
  }

  create(account: NewAccount, signal?: AbortSignal): Account {
    return this.base.create(account, signal);
  }

  findById(id: number, signal?: AbortSignal): Account {
    return this.base.findById(id, signal);
  }

  findAll(signal?: AbortSignal): Account[] {
    return this.base.findAll(signal);
  }

  update(account: Account, signal?: AbortSignal): Account {
    return this.base.update(account, signal);
  }

  delete(account: Account, signal?: AbortSignal): boolean {
    return this.base.delete(account, signal);
  }

  deleteById(id: number, signal?: AbortSignal): boolean {
    return this.base.deleteById(id, signal);
  }

  findByName(name: string, signal?: AbortSignal): Account {
    const [account] = this.base.findWhere('name = ? LIMIT 1', [name], signal);
    if (!account) {
      throw new NotFoundError('account', name);
    }
    return account;
  }

  /** Case-insensitive substring match on the account name. */
  findByNameLike(keyword: string, signal?: AbortSignal): Account[] {
    return this.base.findWhere(
      "casefold(name) LIKE ? ESCAPE '\\' ORDER BY name ASC",
      [containsPattern(keyword)],
      signal
    );
  }
}
