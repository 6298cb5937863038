import { SQLiteDriver } from '../driver';
import { NotFoundError } from '../errors';

/**
 * Describes how one entity type maps onto its table.
 *
 * `columns` lists the writable columns (everything except the id and the
 * created_at/updated_at timestamps) in the order `toValues` produces them.
 */
export interface EntityDefinition<T extends TDraft, TDraft, TRow> {
  name: string;
  table: string;
  idColumn: string;
  columns: readonly string[];
  toValues(draft: TDraft): unknown[];
  fromRow(row: TRow): T;
  idOf(entity: T): number;
}

/** CRUD surface shared by every repository. */
export interface Repository<T extends TDraft, TDraft> {
  create(draft: TDraft, signal?: AbortSignal): T;
  findById(id: number, signal?: AbortSignal): T;
  findAll(signal?: AbortSignal): T[];
  update(entity: T, signal?: AbortSignal): T;
  delete(entity: T, signal?: AbortSignal): boolean;
  deleteById(id: number, signal?: AbortSignal): boolean;
}

export class BaseRepository<T extends TDraft, TDraft, TRow> implements Repository<T, TDraft> {
  readonly driver: SQLiteDriver;
  readonly definition: EntityDefinition<T, TDraft, TRow>;

  constructor(driver: SQLiteDriver, definition: EntityDefinition<T, TDraft, TRow>) {
    this.driver = driver;
    this.definition = definition;
  }

  create(draft: TDraft, signal?: AbortSignal): T {
    const { table, columns } = this.definition;
    const now = Date.now();
    const names = [...columns, 'created_at', 'updated_at'];
    const placeholders = names.map(() => '?').join(', ');

    const result = this.driver.run(
      `INSERT INTO ${table} (${names.join(', ')}) VALUES (${placeholders})`,
      [...this.definition.toValues(draft), now, now],
      signal
    );

    return this.findById(result.lastInsertRowid, signal);
  }

  findById(id: number, signal?: AbortSignal): T {
    const { table, idColumn } = this.definition;
    const row = this.driver.get<TRow>(`SELECT * FROM ${table} WHERE ${idColumn} = ?`, [id], signal);
    if (!row) {
      throw new NotFoundError(this.definition.name, id);
    }
    return this.definition.fromRow(row);
  }

  findByIds(ids: readonly number[], signal?: AbortSignal): T[] {
    if (ids.length === 0) return [];
    const { table, idColumn } = this.definition;
    const placeholders = ids.map(() => '?').join(',');
    const rows = this.driver.all<TRow>(
      `SELECT * FROM ${table} WHERE ${idColumn} IN (${placeholders})`,
      [...ids],
      signal
    );
    return rows.map(row => this.definition.fromRow(row));
  }

  findAll(signal?: AbortSignal): T[] {
    const rows = this.driver.all<TRow>(`SELECT * FROM ${this.definition.table}`, [], signal);
    return rows.map(row => this.definition.fromRow(row));
  }

  /** Finds rows matching a WHERE clause; used by the specialized repositories. */
  findWhere(where: string, params: unknown[], signal?: AbortSignal): T[] {
    const rows = this.driver.all<TRow>(`SELECT * FROM ${this.definition.table} WHERE ${where}`, params, signal);
    return rows.map(row => this.definition.fromRow(row));
  }

  /**
   * Replaces every writable column of the row with the entity's id.
   * Throws NotFoundError when no row has that id.
   */
  update(entity: T, signal?: AbortSignal): T {
    const { table, idColumn, columns } = this.definition;
    const id = this.definition.idOf(entity);
    const assignments = [...columns, 'updated_at'].map(c => `${c} = ?`).join(', ');

    const result = this.driver.run(
      `UPDATE ${table} SET ${assignments} WHERE ${idColumn} = ?`,
      [...this.definition.toValues(entity), Date.now(), id],
      signal
    );
    if (result.changes === 0) {
      throw new NotFoundError(this.definition.name, id);
    }

    return this.findById(id, signal);
  }

  delete(entity: T, signal?: AbortSignal): boolean {
    return this.deleteById(this.definition.idOf(entity), signal);
  }

  deleteById(id: number, signal?: AbortSignal): boolean {
    const { table, idColumn } = this.definition;
    const result = this.driver.run(`DELETE FROM ${table} WHERE ${idColumn} = ?`, [id], signal);
    return result.changes > 0;
  }
}
