import { Scalar } from '../value';

export type ColumnType = 'integer' | 'float' | 'text' | 'boolean' | 'date';

export type RawRow = { [column: string]: Scalar };

export interface ColumnHint {
  name: string,
  type: ColumnType,
  unique: boolean,
  nullable: boolean,
}

export interface IndexDefinition {
  name: string,
  column: string,
  // Non-null column values in ascending order.
  values: Scalar[],
  unique: boolean,
}

/**
 * Read-only view over the tables a query runs against. The engine never
 * mutates what it receives from here.
 */
export default interface Dataset {
  getTable(name: string): RawRow[] | null;
  getTableColumns(name: string): string[] | null;
  getTableNames(): string[];
  getIndexes(name: string): IndexDefinition[];
}
