import deepEqual from 'deep-equal';
import { RESULT_TABLE, Row } from '../row';
import RowIterator from './type';
import hashCode, { valueKey } from '../util/hashCode';

// Drops rows whose selected values repeat an earlier row.
export default class DistinctIterator implements RowIterator {
  input: RowIterator;
  seen: Map<number, string[][]> = new Map();
  constructor(input: RowIterator) {
    this.input = input;
  }
  isNew(row: Row): boolean {
    let record = row[RESULT_TABLE] ?? {};
    let keys = Object.keys(record).map(name => valueKey(record[name]));
    let hash = hashCode(keys);
    let bucket = this.seen.get(hash);
    if (bucket == null) {
      this.seen.set(hash, [keys]);
      return true;
    }
    if (bucket.some(entry => deepEqual(entry, keys))) return false;
    bucket.push(keys);
    return true;
  }
  next(): IteratorResult<Row[]> {
    let result = this.input.next();
    if (result.done) return { value: undefined, done: true };
    return { value: result.value.filter(row => this.isNew(row)), done: false };
  }
  getTables() {
    return this.input.getTables();
  }
  getColumns() {
    return this.input.getColumns();
  }
  rewind() {
    this.seen = new Map();
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
