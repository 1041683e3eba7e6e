import cloneDeep from 'lodash.clonedeep';
import { z } from 'zod';

import Dataset, { ColumnHint, ColumnType, IndexDefinition, RawRow }
  from './type';
import { Scalar, fromScalar, sortCompare } from '../value';
import { ConfigError } from '../errors';

interface MemoryTable {
  name: string,
  columns: ColumnHint[],
  rows: RawRow[],
  indexes: IndexDefinition[],
}

const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['integer', 'float', 'text', 'boolean', 'date']),
  unique: z.boolean().default(false),
  nullable: z.boolean().default(true),
});

const IndexSchema = z.object({
  name: z.string().min(1),
  column: z.string().min(1),
  // Defaults to the column's own flag.
  unique: z.boolean().optional(),
});

export const FixtureSchema = z.object({
  tables: z.record(z.object({
    columns: z.array(ColumnSchema).min(1),
    rows: z.array(z.record(
      z.union([z.number(), z.string(), z.boolean(), z.null()]))),
    indexes: z.array(IndexSchema).default([]),
  })),
});

export type Fixture = z.input<typeof FixtureSchema>;

function reviveValue(
  input: number | string | boolean | null, type: ColumnType,
): Scalar {
  if (input == null) return null;
  if (type === 'date' && typeof input === 'string') {
    let parsed = new Date(input);
    if (!isNaN(parsed.getTime())) return parsed;
  }
  return input;
}

export default class MemoryDataset implements Dataset {
  tables: { [key: string]: MemoryTable } = {};
  addTable(name: string, columns: (ColumnHint | string)[], rows: RawRow[]) {
    let hints = columns.map((column): ColumnHint => {
      if (typeof column !== 'string') return column;
      return { name: column, type: inferType(rows, column), unique: false,
        nullable: true };
    });
    let issues: { path: string, message: string }[] = [];
    for (let hint of hints) {
      if (hint.nullable) continue;
      rows.forEach((row, i) => {
        if (row[hint.name] == null) {
          issues.push({ path: `${name}.${i}.${hint.name}`,
            message: 'Column is not nullable' });
        }
      });
    }
    if (issues.length > 0) {
      throw new ConfigError(`NULL in non-nullable column of '${name}'`,
        issues);
    }
    this.tables[name.toLowerCase()] = {
      name: name.toLowerCase(),
      columns: hints,
      rows,
      indexes: [],
    };
    return this;
  }
  // Uniqueness defaults to the column's own flag.
  addIndex(table: string, name: string, column: string, unique?: boolean) {
    let entry = this.tables[table.toLowerCase()];
    if (entry == null) {
      throw new ConfigError(`Cannot index unknown table '${table}'`, []);
    }
    let hint = entry.columns.find(v => v.name === column);
    if (hint == null) {
      throw new ConfigError(
        `Cannot index unknown column '${column}' of '${table}'`, []);
    }
    let values = entry.rows
      .map(row => row[column] ?? null)
      .filter((value): value is Exclude<Scalar, null> => value != null)
      .sort((a, b) => sortCompare(fromScalar(a), fromScalar(b)));
    entry.indexes.push({
      name, column, values, unique: unique ?? hint.unique,
    });
    return this;
  }
  getTable(name: string): RawRow[] | null {
    let entry = this.tables[name.toLowerCase()];
    if (entry == null) return null;
    return cloneDeep(entry.rows);
  }
  getTableColumns(name: string): string[] | null {
    let entry = this.tables[name.toLowerCase()];
    if (entry == null) return null;
    return entry.columns.map(hint => hint.name);
  }
  getColumnHints(name: string): ColumnHint[] | null {
    let entry = this.tables[name.toLowerCase()];
    if (entry == null) return null;
    return entry.columns.map(hint => ({ ...hint }));
  }
  getTableNames(): string[] {
    return Object.keys(this.tables);
  }
  getIndexes(name: string): IndexDefinition[] {
    let entry = this.tables[name.toLowerCase()];
    if (entry == null) return [];
    return cloneDeep(entry.indexes);
  }
  static fromFixture(input: unknown): MemoryDataset {
    let result = FixtureSchema.safeParse(input);
    if (!result.success) {
      throw new ConfigError('Invalid dataset fixture',
        result.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })));
    }
    let dataset = new MemoryDataset();
    for (let [name, table] of Object.entries(result.data.tables)) {
      let rows = table.rows.map(row => {
        let output: RawRow = {};
        for (let column of table.columns) {
          output[column.name] = reviveValue(row[column.name] ?? null,
            column.type);
        }
        return output;
      });
      dataset.addTable(name, table.columns, rows);
      for (let index of table.indexes) {
        dataset.addIndex(name, index.name, index.column, index.unique);
      }
    }
    return dataset;
  }
}

function inferType(rows: RawRow[], column: string): ColumnType {
  for (let row of rows) {
    let value = fromScalar(row[column]);
    if (value.type !== 'null') return value.type;
  }
  return 'text';
}
