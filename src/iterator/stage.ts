import { Row } from '../row';
import RowIterator from './type';

export interface StageStats {
  name: string,
  // Clause text, or null when the clause is absent from the query.
  clause: string | null,
  inputRows: number,
  outputRows: number,
  active: boolean,
}

// Pass-through that counts the rows leaving a pipeline stage.
export default class StageIterator implements RowIterator {
  input: RowIterator;
  stats: StageStats;
  constructor(input: RowIterator, stats: StageStats) {
    this.input = input;
    this.stats = stats;
  }
  next(): IteratorResult<Row[]> {
    let result = this.input.next();
    if (result.done) return { value: undefined, done: true };
    this.stats.outputRows += result.value.length;
    return result;
  }
  getTables() {
    return this.input.getTables();
  }
  getColumns() {
    return this.input.getColumns();
  }
  rewind() {
    this.stats.outputRows = 0;
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
