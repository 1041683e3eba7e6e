import { Expression } from '../parser/type';
import { RESULT_TABLE, Row, ValueRecord } from '../row';
import RowIterator from './type';
import compileExpression, { Evaluator } from '../expression';
import getScope, { ScopeOptions } from '../util/scope';

export interface MapColumn {
  name: string,
  expression: Expression,
}

/**
 * Evaluates the select list into RESULT_TABLE, keeping the source tables
 * around so ORDER BY can still read columns that were not selected.
 */
export default class MapIterator implements RowIterator {
  input: RowIterator;
  columns: { name: string, map: Evaluator }[];
  constructor(input: RowIterator, columns: MapColumn[],
    options: ScopeOptions = {},
  ) {
    this.input = input;
    let scope = getScope(input, { ...options, clause: 'SELECT' });
    this.columns = columns.map(column => ({
      name: column.name,
      map: compileExpression(scope, column.expression),
    }));
  }
  next(): IteratorResult<Row[]> {
    let result = this.input.next();
    if (result.done) return { value: undefined, done: true };
    return {
      value: result.value.map(entry => {
        let output: ValueRecord = {};
        this.columns.forEach(column => {
          output[column.name] = column.map(entry);
        });
        return { ...entry, [RESULT_TABLE]: output };
      }),
      done: false,
    };
  }
  getTables() {
    return [...this.input.getTables(), RESULT_TABLE];
  }
  getColumns() {
    return {
      ...this.input.getColumns(),
      [RESULT_TABLE]: this.columns.map(v => v.name),
    };
  }
  rewind() {
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
