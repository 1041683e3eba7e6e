import { Row, ValueRecord } from '../row';
import RowIterator from './type';

export default class InputIterator implements RowIterator {
  name: string;
  columns: string[];
  input: ValueRecord[];
  position: number;
  constructor(name: string, columns: string[], input: ValueRecord[]) {
    this.name = name;
    this.columns = columns;
    this.input = input;
    this.position = 0;
  }
  next(limit: number = 256): IteratorResult<Row[]> {
    if (this.position >= this.input.length) {
      return { done: true, value: undefined };
    }
    let value = this.input.slice(this.position, this.position + limit)
      .map(v => ({ [this.name]: v }));
    this.position += limit;
    return { done: false, value };
  }
  getTables() {
    return [this.name];
  }
  getColumns() {
    return { [this.name]: this.columns };
  }
  rewind() {
    this.position = 0;
  }
  [Symbol.iterator]() {
    return this;
  }
}
