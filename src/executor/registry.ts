import Dataset, { RawRow } from '../dataset/type';
import { ValueRecord } from '../row';
import { fromScalar } from '../value';

export interface MaterializedTable {
  name: string,
  columns: string[],
  rows: ValueRecord[],
}

function toRecords(rows: RawRow[], columns: string[]): ValueRecord[] {
  return rows.map(row => {
    let record: ValueRecord = {};
    for (let column of columns) record[column] = fromScalar(row[column]);
    return record;
  });
}

/**
 * Name lookup for one execution. CTEs shadow dataset tables of the same
 * name, and are forgotten when the execution ends.
 */
export default class TableRegistry {
  dataset: Dataset;
  ctes: Map<string, MaterializedTable> = new Map();
  constructor(dataset: Dataset) {
    this.dataset = dataset;
  }
  register(table: MaterializedTable) {
    this.ctes.set(table.name.toLowerCase(), table);
  }
  has(name: string): boolean {
    let key = name.toLowerCase();
    return this.ctes.has(key) || this.dataset.getTableColumns(key) != null;
  }
  get(name: string): MaterializedTable | null {
    let key = name.toLowerCase();
    let cte = this.ctes.get(key);
    if (cte != null) return cte;
    let columns = this.dataset.getTableColumns(key);
    let rows = this.dataset.getTable(key);
    if (columns == null || rows == null) return null;
    return { name: key, columns, rows: toRecords(rows, columns) };
  }
  getNames(): string[] {
    let names = new Set(this.dataset.getTableNames());
    for (let name of this.ctes.keys()) names.add(name);
    return Array.from(names);
  }
}
