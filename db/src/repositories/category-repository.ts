import { SQLiteDriver } from '../driver';
import { categoryDefinition } from '../entities';
import { CategoryRow } from '../row-types';
import type { Category, NewCategory } from '../types';
import { containsPattern } from '../utils';
import { BaseRepository, Repository } from './base-repository';

export class CategoryRepository implements Repository<Category, NewCategory> {
  readonly base: BaseRepository<Category, NewCategory, CategoryRow>;

  constructor(driver: SQLiteDriver) {
    this.base = new BaseRepository(driver, categoryDefinition);
  }

  create(category: NewCategory, signal?: AbortSignal): Category {
    return this.base.create(category, signal);
  }

  findById(id: number, signal?: AbortSignal): Category {
    return this.base.findById(id, signal);
  }

  findAll(signal?: AbortSignal): Category[] {
    return this.base.findAll(signal);
  }

  update(category: Category, signal?: AbortSignal): Category {
    return this.base.update(category, signal);
  }

  delete(category: Category, signal?: AbortSignal): boolean {
    return this.base.delete(category, signal);
  }

  deleteById(id: number, signal?: AbortSignal): boolean {
    return this.base.deleteById(id, signal);
  }

  findByType(categoryType: string, signal?: AbortSignal): Category[] {
    return this.base.findWhere('category_type = ? ORDER BY name ASC', [categoryType], signal);
  }

  findByNameLike(keyword: string, signal?: AbortSignal): Category[] {
    return this.base.findWhere(
      "casefold(name) LIKE ? ESCAPE '\\' ORDER BY name ASC",
      [containsPattern(keyword)],
      signal
    );
  }
}
