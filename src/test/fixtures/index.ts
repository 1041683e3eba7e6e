import MemoryDataset from '../../dataset/memory';
import { RawRow } from '../../dataset/type';
import { Logger } from '../../logger';
import { Row, ValueRecord } from '../../row';
import { fromScalar, toScalar } from '../../value';
import company from './company.json';

export function createCompany(): MemoryDataset {
  return MemoryDataset.fromFixture(company);
}

// One table of the given size with a unique index on id only.
export function createOrders(count: number = 1000): MemoryDataset {
  let rows: RawRow[] = [];
  for (let i = 1; i <= count; ++i) {
    rows.push({ id: i, customer: `customer${i % 50}`, amount: i % 97 });
  }
  return new MemoryDataset()
    .addTable('orders', ['id', 'customer', 'amount'], rows)
    .addIndex('orders', 'PRIMARY', 'id', true);
}

export const silentLogger = new Logger({ silent: true });

export function toRecords(rows: RawRow[]): ValueRecord[] {
  return rows.map(row => {
    let record: ValueRecord = {};
    for (let key of Object.keys(row)) record[key] = fromScalar(row[key]);
    return record;
  });
}

// Plain values of one table out of drained rows.
export function plainTable(rows: Row[], table: string): RawRow[] {
  return rows.map(row => {
    let record = row[table] ?? {};
    let output: RawRow = {};
    for (let key of Object.keys(record)) output[key] = toScalar(record[key]);
    return output;
  });
}
