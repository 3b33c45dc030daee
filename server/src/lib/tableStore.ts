import type { TableName, TableRows } from '../types/store';

/**
 * Key-addressed access to the external table store. Each call is a single
 * store operation; a multi-field `update` is applied as one unit.
 */
export interface TableStore {
  findOne<T extends TableName>(table: T, key: string): Promise<TableRows[T] | null>;
  /** Resolves `false` when a row with the same primary key already exists. */
  insert<T extends TableName>(table: T, row: TableRows[T]): Promise<boolean>;
  /** Resolves `false` when no row has this key. */
  update<T extends TableName>(table: T, key: string, fields: Partial<TableRows[T]>): Promise<boolean>;
}

export const PRIMARY_KEYS: { [T in TableName]: keyof TableRows[T] & string } = {
  games: 'id',
  stats: 'user_id',
  messages: 'id',
};
