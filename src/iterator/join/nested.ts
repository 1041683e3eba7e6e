import { Expression, JoinType } from '../../parser/type';
import { Row, ValueRecord } from '../../row';
import { NULL } from '../../value';
import RowIterator from '../type';
import { compilePredicate } from '../../expression';
import createJoinRow from '../../util/joinRow';
import drainIterator from '../../util/drainIterator';
import getScope, { ScopeOptions } from '../../util/scope';

function createFiller(columns: { [table: string]: string[] },
  tables: string[],
): Row {
  let output: Row = {};
  for (let table of tables) {
    let record: ValueRecord = {};
    for (let column of columns[table] ?? []) record[column] = NULL;
    output[table] = record;
  }
  return output;
}

/**
 * Nested-loop join. The right side is drained once and replayed for every
 * left row; the unmatched side of an outer join is filled with NULLs.
 */
export default class NestedJoinIterator implements RowIterator {
  left: RowIterator;
  right: RowIterator;
  type: JoinType;
  condition: ((row: Row) => boolean) | null;

  leftFiller: Row;
  rightFiller: Row;
  joinRow: ReturnType<typeof createJoinRow>;

  rightRows: Row[] | null = null;
  rightMatched: boolean[] = [];
  leftDone: boolean = false;
  finished: boolean = false;

  constructor(left: RowIterator, right: RowIterator, on: Expression | null,
    type: JoinType = 'INNER', options: ScopeOptions = {},
  ) {
    this.left = left;
    this.right = right;
    this.type = type;
    this.leftFiller = createFiller(left.getColumns(), left.getTables());
    this.rightFiller = createFiller(right.getColumns(), right.getTables());
    this.joinRow = createJoinRow(this.left.getTables(), this.right.getTables());
    this.condition = on != null
      ? compilePredicate(getScope(this, { ...options, clause: 'ON' }), on)
      : null;
  }
  next(): IteratorResult<Row[]> {
    if (this.finished) return { done: true, value: undefined };
    if (this.rightRows == null) {
      this.rightRows = drainIterator(this.right);
      this.rightMatched = this.rightRows.map(() => false);
    }
    let rightRows = this.rightRows;
    if (!this.leftDone) {
      let result = this.left.next();
      if (!result.done) {
        let output: Row[] = [];
        for (let leftRow of result.value) {
          let hit = false;
          for (let i = 0; i < rightRows.length; ++i) {
            let joined = this.joinRow(leftRow, rightRows[i]);
            if (this.condition == null || this.condition(joined)) {
              output.push(joined);
              hit = true;
              this.rightMatched[i] = true;
            }
          }
          if (!hit && this.type === 'LEFT') {
            output.push(this.joinRow(leftRow, this.rightFiller));
          }
        }
        return { done: false, value: output };
      }
      this.leftDone = true;
    }
    this.finished = true;
    if (this.type === 'RIGHT') {
      let output = rightRows
        .filter((_, i) => !this.rightMatched[i])
        .map(rightRow => this.joinRow(this.leftFiller, rightRow));
      if (output.length > 0) return { done: false, value: output };
    }
    return { done: true, value: undefined };
  }
  getTables() {
    return [...this.left.getTables(), ...this.right.getTables()];
  }
  getColumns() {
    return {
      ...this.left.getColumns(),
      ...this.right.getColumns(),
    };
  }
  rewind() {
    this.left.rewind();
    this.right.rewind();
    this.rightRows = null;
    this.rightMatched = [];
    this.leftDone = false;
    this.finished = false;
  }
  [Symbol.iterator]() {
    return this;
  }
}
