import { RESULT_TABLE, Row } from '../row';
import RowIterator from './type';

// Renames the select-list record to `name` and drops the source tables.
export default class OutputIterator implements RowIterator {
  input: RowIterator;
  name: string;
  constructor(input: RowIterator, name: string) {
    this.input = input;
    this.name = name;
  }
  next(): IteratorResult<Row[]> {
    let result = this.input.next();
    if (result.done) return { value: undefined, done: true };
    return {
      value: result.value.map(entry => ({
        [this.name]: entry[RESULT_TABLE] ?? {},
      })),
      done: false,
    };
  }
  getTables() {
    return [this.name];
  }
  getColumns() {
    return { [this.name]: this.input.getColumns()[RESULT_TABLE] ?? [] };
  }
  rewind() {
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
