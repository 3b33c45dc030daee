import type { Pool } from 'pg';
import type { TableName, TableRows } from '../types/store';
import { GameError, errorMessage } from './errors';
import { PRIMARY_KEYS, type TableStore } from './tableStore';

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function ident(name: string): string {
  if (!IDENTIFIER.test(name)) throw new Error(`unsafe identifier: ${name}`);
  return `"${name}"`;
}

/** Table store backed by Postgres; every call is one statement. */
export class PgTableStore implements TableStore {
  constructor(private readonly pool: Pool) {}

  async findOne<T extends TableName>(table: T, key: string): Promise<TableRows[T] | null> {
    const { rows } = await this.run<TableRows[T]>(
      `select * from ${ident(table)} where ${ident(PRIMARY_KEYS[table])} = $1 limit 1`,
      [key],
    );
    return rows[0] ?? null;
  }

  async insert<T extends TableName>(table: T, row: TableRows[T]): Promise<boolean> {
    const entries = Object.entries(row);
    const columns = entries.map(([column]) => ident(column)).join(', ');
    const placeholders = entries.map((_, i) => `$${i + 1}`).join(', ');
    const result = await this.run(
      `insert into ${ident(table)} (${columns}) values (${placeholders})
       on conflict (${ident(PRIMARY_KEYS[table])}) do nothing`,
      entries.map(([, value]) => value),
    );
    return (result.rowCount ?? 0) > 0;
  }

  async update<T extends TableName>(table: T, key: string, fields: Partial<TableRows[T]>): Promise<boolean> {
    const entries = Object.entries(fields).filter(([, value]) => value !== undefined);
    if (entries.length === 0) return (await this.findOne(table, key)) !== null;
    const assignments = entries.map(([column], i) => `${ident(column)} = $${i + 1}`).join(', ');
    const result = await this.run(
      `update ${ident(table)} set ${assignments} where ${ident(PRIMARY_KEYS[table])} = $${entries.length + 1}`,
      [...entries.map(([, value]) => value), key],
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async run<R extends Record<string, unknown> = Record<string, unknown>>(text: string, values: unknown[]) {
    try {
      return await this.pool.query<R>(text, values);
    } catch (err) {
      console.error('[db] query failed', errorMessage(err));
      throw new GameError('store_unavailable', 'table store request failed');
    }
  }
}
