import { Row } from '../row';
import RowIterator from './type';

export default class LimitIterator implements RowIterator {
  input: RowIterator;
  offset: number;
  start: number;
  end: number;
  constructor(input: RowIterator, limit: number, offset?: number | null) {
    this.input = input;
    this.offset = 0;
    this.start = offset == null ? 0 : offset;
    this.end = this.start + limit;
  }
  next(): IteratorResult<Row[]> {
    while (this.offset < this.end) {
      let result = this.input.next();
      if (result.done) return { value: undefined, done: true };
      let value = result.value;
      let batchStart = this.offset;
      this.offset += value.length;
      // Skip whatever lies before the offset, cut whatever lies past the end.
      let from = Math.max(0, this.start - batchStart);
      let to = Math.min(value.length, this.end - batchStart);
      if (from >= to) continue;
      return { value: value.slice(from, to), done: false };
    }
    return { value: undefined, done: true };
  }
  getTables() {
    return this.input.getTables();
  }
  getColumns() {
    return this.input.getColumns();
  }
  rewind() {
    this.offset = 0;
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
