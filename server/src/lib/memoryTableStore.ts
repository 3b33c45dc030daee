import type { TableName, TableRows } from '../types/store';
import { PRIMARY_KEYS, type TableStore } from './tableStore';

// In-process store, used when no database is configured
export class MemoryTableStore implements TableStore {
  private readonly tables: { [T in TableName]: Map<string, TableRows[T]> } = {
    games: new Map(),
    stats: new Map(),
    messages: new Map(),
  };

  async findOne<T extends TableName>(table: T, key: string): Promise<TableRows[T] | null> {
    const row = this.rows(table).get(key);
    return row ? { ...row } : null;
  }

  async insert<T extends TableName>(table: T, row: TableRows[T]): Promise<boolean> {
    const rows = this.rows(table);
    const key = String(row[PRIMARY_KEYS[table]]);
    if (rows.has(key)) return false;
    rows.set(key, { ...row });
    return true;
  }

  async update<T extends TableName>(table: T, key: string, fields: Partial<TableRows[T]>): Promise<boolean> {
    const rows = this.rows(table);
    const existing = rows.get(key);
    if (!existing) return false;
    rows.set(key, { ...existing, ...fields });
    return true;
  }

  count(table: TableName): number {
    return this.rows(table).size;
  }

  private rows<T extends TableName>(table: T): Map<string, TableRows[T]> {
    return this.tables[table];
  }
}
