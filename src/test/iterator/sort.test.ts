import parse, { OrderByItem } from '../../parser';
import InputIterator from '../../iterator/input';
import SortIterator from '../../iterator/sort';
import RowIterator from '../../iterator/type';
import drainIterator from '../../util/drainIterator';
import { plainTable, toRecords } from '../fixtures';

function getOrderBy(code: string): OrderByItem[] {
  return parse(code).orderBy;
}

describe('SortIterator', () => {
  let iterInput: RowIterator;
  let iter: RowIterator;
  beforeEach(() => {
    iterInput = new InputIterator('abc', ['a', 'b'], toRecords([
      { a: 'test', b: 1 },
      { a: 'uv', b: 25 },
      { a: 'test', b: 5 },
      { a: 'test', b: 2 },
      { a: 'uv', b: 5 },
      { a: null, b: 7 },
    ]));
    iter = new SortIterator(iterInput, getOrderBy(
      'SELECT 1 FROM abc ORDER BY abc.a ASC, abc.b DESC;'));
  });
  it('should return right result', () => {
    expect(plainTable(drainIterator(iter), 'abc')).toEqual([
      { a: null, b: 7 },
      { a: 'test', b: 5 },
      { a: 'test', b: 2 },
      { a: 'test', b: 1 },
      { a: 'uv', b: 25 },
      { a: 'uv', b: 5 },
    ]);
  });
  it('should be rewindable', () => {
    drainIterator(iter);
    iter.rewind();
    expect(plainTable(drainIterator(iter), 'abc')[1]).toEqual(
      { a: 'test', b: 5 });
  });
  it('should put NULL last when descending', () => {
    iter = new SortIterator(iterInput, getOrderBy(
      'SELECT 1 FROM abc ORDER BY a DESC, b'));
    expect(plainTable(drainIterator(iter), 'abc').map(row => row.b))
      .toEqual([5, 25, 1, 2, 5, 7]);
  });
});
