import parse, { AggregateExpression, Expression } from '../../parser';
import { collectAggregates } from '../../expression/traverse';
import InputIterator from '../../iterator/input';
import GroupHashIterator from '../../iterator/groupHash';
import RowIterator from '../../iterator/type';
import { AGGREGATE_TABLE } from '../../row';
import drainIterator from '../../util/drainIterator';
import { plainTable, toRecords } from '../fixtures';

function getGroup(code: string): {
  group: Expression[],
  aggregates: AggregateExpression[],
} {
  let parsed = parse(code);
  return {
    group: parsed.groupBy,
    aggregates: parsed.columns.flatMap(column =>
      collectAggregates(column.expression)),
  };
}

describe('GroupHashIterator', () => {
  let iterInput: RowIterator;
  let warnings: string[];
  beforeEach(() => {
    warnings = [];
    iterInput = new InputIterator('abc', ['a', 'b'], toRecords([
      { a: 'x', b: 1 },
      { a: 'y', b: 2 },
      { a: 'x', b: 3 },
      { a: 'x', b: null },
      { a: null, b: 4 },
    ]));
  });
  function group(code: string): GroupHashIterator {
    let { group, aggregates } = getGroup(code);
    return new GroupHashIterator(iterInput, group, aggregates, {
      warn: message => {
        warnings.push(message);
      },
    });
  }
  it('should aggregate each group in order of appearance', () => {
    let iter = group('SELECT a, COUNT(*), COUNT(b), SUM(b), MAX(b) ' +
      'FROM abc GROUP BY a');
    let rows = drainIterator(iter);
    expect(plainTable(rows, 'abc').map(row => row.a)).toEqual(['x', 'y', null]);
    expect(plainTable(rows, AGGREGATE_TABLE)).toEqual([
      { 'COUNT(*)': 3, 'COUNT(b)': 2, 'SUM(b)': 4, 'MAX(b)': 3 },
      { 'COUNT(*)': 1, 'COUNT(b)': 1, 'SUM(b)': 2, 'MAX(b)': 2 },
      { 'COUNT(*)': 1, 'COUNT(b)': 1, 'SUM(b)': 4, 'MAX(b)': 4 },
    ]);
  });
  it('should form one group without GROUP BY', () => {
    let iter = group('SELECT AVG(b), COUNT(DISTINCT a) FROM abc');
    expect(plainTable(drainIterator(iter), AGGREGATE_TABLE)).toEqual([
      { 'AVG(b)': 2.5, 'COUNT(DISTINCT a)': 2 },
    ]);
  });
  it('should warn and skip values that cannot be summed', () => {
    let iter = group('SELECT SUM(a) FROM abc');
    expect(plainTable(drainIterator(iter), AGGREGATE_TABLE))
      .toEqual([{ 'SUM(a)': null }]);
    expect(warnings.length).toBe(4);
  });
  it('should be rewindable', () => {
    let iter = group('SELECT a FROM abc GROUP BY a');
    drainIterator(iter);
    iter.rewind();
    expect(drainIterator(iter).length).toBe(3);
  });
});
