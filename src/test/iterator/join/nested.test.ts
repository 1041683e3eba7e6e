import parse from '../../../parser';
import InputIterator from '../../../iterator/input';
import NestedJoinIterator from '../../../iterator/join/nested';
import drainIterator from '../../../util/drainIterator';
import { plainTable, toRecords } from '../../fixtures';

describe('NestedJoinIterator', () => {
  let left: InputIterator;
  let right: InputIterator;
  beforeEach(() => {
    left = new InputIterator('a', ['id', 'ref'], toRecords([
      { id: 1, ref: 10 }, { id: 2, ref: 20 }, { id: 3, ref: null },
    ]));
    right = new InputIterator('b', ['id', 'label'], toRecords([
      { id: 10, label: 'ten' }, { id: 10, label: 'TEN' },
      { id: 30, label: 'thirty' },
    ]));
  });
  function getOn(code: string) {
    return parse(code).joins[0].on;
  }
  it('should pair matching rows', () => {
    let iter = new NestedJoinIterator(left, right,
      getOn('SELECT 1 FROM a JOIN b ON a.ref = b.id'), 'INNER');
    let rows = drainIterator(iter);
    expect(plainTable(rows, 'a').map(row => row.id)).toEqual([1, 1]);
    expect(plainTable(rows, 'b').map(row => row.label))
      .toEqual(['ten', 'TEN']);
  });
  it('should fill the right side for LEFT JOIN', () => {
    let iter = new NestedJoinIterator(left, right,
      getOn('SELECT 1 FROM a LEFT JOIN b ON a.ref = b.id'), 'LEFT');
    let rows = drainIterator(iter);
    expect(plainTable(rows, 'a').map(row => row.id)).toEqual([1, 1, 2, 3]);
    expect(plainTable(rows, 'b').map(row => row.label))
      .toEqual(['ten', 'TEN', null, null]);
  });
  it('should add unmatched right rows for RIGHT JOIN', () => {
    let iter = new NestedJoinIterator(left, right,
      getOn('SELECT 1 FROM a RIGHT JOIN b ON a.ref = b.id'), 'RIGHT');
    let rows = drainIterator(iter);
    expect(plainTable(rows, 'b').map(row => row.id)).toEqual([10, 10, 30]);
    expect(plainTable(rows, 'a')[2]).toEqual({ id: null, ref: null });
  });
  it('should return every pair without a condition', () => {
    let iter = new NestedJoinIterator(left, right, null, 'CROSS');
    expect(drainIterator(iter).length).toBe(9);
    expect(iter.getTables()).toEqual(['a', 'b']);
  });
});
