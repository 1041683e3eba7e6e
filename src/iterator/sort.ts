import { OrderByItem } from '../parser/type';
import { Row } from '../row';
import RowIterator from './type';
import drainIterator from '../util/drainIterator';
import compileSorter from '../expression/sorter';
import getScope, { ScopeOptions } from '../util/scope';

export default class SortIterator implements RowIterator {
  input: RowIterator;
  order: OrderByItem[];
  sorter: (a: Row, b: Row) => number;
  done: boolean;
  constructor(input: RowIterator, order: OrderByItem[],
    options: ScopeOptions = {},
  ) {
    this.input = input;
    this.sorter = compileSorter(
      getScope(input, { ...options, clause: 'ORDER BY' }), order);
    this.order = order;
    this.done = false;
  }
  next(): IteratorResult<Row[]> {
    if (this.done) return { value: undefined, done: true };
    let result = drainIterator(this.input);
    this.done = true;
    // Array.prototype.sort is stable, so ties keep their input order.
    result.sort(this.sorter);
    return { value: result, done: false };
  }
  getTables() {
    return this.input.getTables();
  }
  getColumns() {
    return this.input.getColumns();
  }
  rewind() {
    this.done = false;
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
