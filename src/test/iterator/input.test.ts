import InputIterator from '../../iterator/input';
import drainIterator from '../../util/drainIterator';
import { plainTable, toRecords } from '../fixtures';

describe('InputIterator', () => {
  let iter: InputIterator;
  beforeEach(() => {
    iter = new InputIterator('a', ['id'],
      toRecords(Array.from({ length: 5 }, (_, i) => ({ id: i }))));
  });
  it('should return rows in batches', () => {
    let first = iter.next(2);
    expect(first.done).toBe(false);
    if (!first.done) expect(plainTable(first.value, 'a')).toEqual([
      { id: 0 }, { id: 1 },
    ]);
    expect(plainTable(drainIterator(iter), 'a')).toEqual([
      { id: 2 }, { id: 3 }, { id: 4 },
    ]);
    expect(iter.next().done).toBe(true);
  });
  it('should return schema', () => {
    expect(iter.getTables()).toEqual(['a']);
    expect(iter.getColumns()).toEqual({ a: ['id'] });
  });
  it('should be rewindable', () => {
    drainIterator(iter);
    iter.rewind();
    expect(drainIterator(iter).length).toBe(5);
  });
});
