import deepEqual from 'deep-equal';
import { AggregateExpression, Expression } from '../parser/type';
import { AGGREGATE_TABLE, Row, ValueRecord } from '../row';
import { NULL, Value, integer } from '../value';
import RowIterator from './type';
import Aggregate from '../aggregate/type';
import AggregateTypes from '../aggregate';
import compileExpression, { Evaluator, getAggregateKey } from '../expression';
import { TypeMismatchError } from '../errors';
import drainIterator from '../util/drainIterator';
import hashCode, { valueKey } from '../util/hashCode';
import getScope, { ScopeOptions } from '../util/scope';

interface AggregateSpec {
  name: string,
  distinct: boolean,
  create: () => Aggregate,
  // null for COUNT(*), which counts rows rather than values.
  evaluate: Evaluator | null,
}

interface GroupRecord {
  row: Row,
  keys: string[],
  aggrs: Aggregate[],
  seen: Set<string>[],
}

export default class GroupHashIterator implements RowIterator {
  input: RowIterator;
  groupTargets: Evaluator[];
  aggregates: AggregateSpec[];
  warn: ((message: string) => void) | undefined;
  finished: boolean = false;
  constructor(
    input: RowIterator, group: Expression[], aggregates: AggregateExpression[],
    options: ScopeOptions = {},
  ) {
    this.input = input;
    this.warn = options.warn;
    let scope = getScope(input, { ...options, aggregates: false });
    this.groupTargets = group.map(v =>
      compileExpression({ ...scope, clause: 'GROUP BY' }, v));
    let names = new Set<string>();
    this.aggregates = [];
    for (let aggr of aggregates) {
      let name = getAggregateKey(aggr);
      if (names.has(name)) continue;
      names.add(name);
      this.aggregates.push({
        name,
        distinct: aggr.distinct,
        create: AggregateTypes[aggr.name],
        evaluate: aggr.value != null
          ? compileExpression({ ...scope, clause: 'an aggregate argument' },
            aggr.value)
          : null,
      });
    }
  }
  createRecord(row: Row, keys: string[]): GroupRecord {
    return {
      row,
      keys,
      aggrs: this.aggregates.map(v => {
        let aggr = v.create();
        aggr.init();
        return aggr;
      }),
      seen: this.aggregates.map(() => new Set<string>()),
    };
  }
  feed(record: GroupRecord, row: Row): void {
    this.aggregates.forEach((spec, i) => {
      let value: Value = spec.evaluate != null
        ? spec.evaluate(row) : integer(1);
      if (spec.distinct && value.type !== 'null') {
        let key = valueKey(value);
        if (record.seen[i].has(key)) return;
        record.seen[i].add(key);
      }
      try {
        record.aggrs[i].next(value);
      } catch (e) {
        if (!(e instanceof TypeMismatchError)) throw e;
        if (this.warn != null) this.warn(e.message);
      }
    });
  }
  emptyRow(): Row {
    let columns = this.input.getColumns();
    let output: Row = {};
    for (let table of this.input.getTables()) {
      let record: ValueRecord = {};
      for (let column of columns[table] ?? []) record[column] = NULL;
      output[table] = record;
    }
    return output;
  }
  next(): IteratorResult<Row[]> {
    if (this.finished) {
      return { value: undefined, done: true };
    }

    let records: GroupRecord[] = [];
    let recordsMap = new Map<number, number[]>();

    for (let row of drainIterator(this.input)) {
      let keys = this.groupTargets.map(evaluate => valueKey(evaluate(row)));
      let hash = hashCode(keys);
      let bucket = recordsMap.get(hash);
      if (bucket == null) {
        bucket = [];
        recordsMap.set(hash, bucket);
      }
      let index = bucket.find(i => deepEqual(records[i].keys, keys));
      if (index == null) {
        index = records.length;
        bucket.push(index);
        records.push(this.createRecord(row, keys));
      }
      this.feed(records[index], row);
    }

    // Without GROUP BY every row, or no row at all, forms one group.
    if (this.groupTargets.length === 0 && records.length === 0) {
      records.push(this.createRecord(this.emptyRow(), []));
    }

    this.finished = true;
    return {
      value: records.map(record => {
        let aggrs: ValueRecord = {};
        record.aggrs.forEach((aggr, i) => {
          aggrs[this.aggregates[i].name] = aggr.finalize();
        });
        return {
          ...record.row,
          [AGGREGATE_TABLE]: aggrs,
        };
      }),
      done: false,
    };
  }
  getTables() {
    return [...this.input.getTables(), AGGREGATE_TABLE];
  }
  getColumns() {
    return {
      ...this.input.getColumns(),
      [AGGREGATE_TABLE]: this.aggregates.map(v => v.name),
    };
  }
  rewind() {
    this.finished = false;
    this.input.rewind();
  }
  [Symbol.iterator]() {
    return this;
  }
}
