import parse, { Expression } from '../../parser';
import InputIterator from '../../iterator/input';
import FilterIterator from '../../iterator/filter';
import RowIterator from '../../iterator/type';
import { SyntaxError, UnknownColumnError } from '../../errors';
import drainIterator from '../../util/drainIterator';
import { plainTable, toRecords } from '../fixtures';

function getWhere(code: string): Expression {
  let where = parse(code).where;
  if (where == null) throw new Error('Given statement has no WHERE clause');
  return where;
}

describe('FilterIterator', () => {
  let iterInput: RowIterator;
  let iter: RowIterator;
  beforeEach(() => {
    iterInput = new InputIterator('abc', ['a', 'b'], toRecords([
      { a: 'test', b: 1 }, { a: 'abc', b: 3 }, { a: 'test', b: 3 },
      { a: null, b: 1 },
    ]));
    iter = new FilterIterator(iterInput, getWhere(
      'SELECT 1 FROM abc WHERE abc.a = \'test\' AND abc.b IN (1, 3);'));
  });
  it('should return right result', () => {
    expect(plainTable(drainIterator(iter), 'abc')).toEqual([
      { a: 'test', b: 1 },
      { a: 'test', b: 3 },
    ]);
  });
  it('should be rewindable', () => {
    drainIterator(iter);
    iter.rewind();
    expect(drainIterator(iter).length).toBe(2);
  });
  it('should drop rows whose condition is unknown', () => {
    iter = new FilterIterator(iterInput, getWhere(
      'SELECT 1 FROM abc WHERE NOT (a = \'test\')'));
    expect(plainTable(drainIterator(iter), 'abc')).toEqual([
      { a: 'abc', b: 3 },
    ]);
  });
  it('should match LIKE patterns without regard to case', () => {
    iter = new FilterIterator(iterInput, getWhere(
      'SELECT 1 FROM abc WHERE a LIKE \'T_s%\''));
    expect(drainIterator(iter).length).toBe(2);
  });
  it('should fail on unknown columns before reading rows', () => {
    expect(() => new FilterIterator(iterInput, getWhere(
      'SELECT 1 FROM abc WHERE abc.c = 1'))).toThrow(UnknownColumnError);
  });
  it('should fail on aggregates', () => {
    expect(() => new FilterIterator(iterInput, getWhere(
      'SELECT 1 FROM abc WHERE SUM(b) > 1'), { clause: 'WHERE' }))
      .toThrow(SyntaxError);
  });
});
