import { Expression } from '../parser/type';
import { Row } from '../row';
import RowIterator from './type';
import { compilePredicate } from '../expression';
import getScope, { ScopeOptions } from '../util/scope';

export default class FilterIterator implements RowIterator {
  input: RowIterator;
  where: Expression;
  comparator: (input: Row) => boolean;
  constructor(input: RowIterator, where: Expression,
    options: ScopeOptions = {},
  ) {
    this.input = input;
    this.where = where;
    this.comparator = compilePredicate(getScope(input, options), where);
  }
  next(): IteratorResult<Row[]> {
    let result = this.input.next();
    if (result.done) return { value: undefined, done: true };
    return {
      value: result.value.filter(v => this.comparator(v)),
      done: false,
    };
  }
  getTables() {
    return this.input.getTables();
  }
  getColumns() {
    return this.input.getColumns();
  }
  rewind() {
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
