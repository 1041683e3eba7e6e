import InputIterator from '../../iterator/input';
import LimitIterator from '../../iterator/limit';
import StageIterator, { StageStats } from '../../iterator/stage';
import drainIterator from '../../util/drainIterator';
import { plainTable, toRecords } from '../fixtures';

describe('LimitIterator', () => {
  let iterInput: InputIterator;
  let iter: LimitIterator;
  beforeEach(() => {
    iterInput = new InputIterator('a', ['id'],
      toRecords(Array.from({ length: 1000 }, (_, i) => ({ id: i }))));
    iter = new LimitIterator(iterInput, 1, 499);
  });
  it('should limit start', () => {
    expect(plainTable(drainIterator(iter), 'a')).toEqual([{ id: 499 }]);
  });
  it('should cut across batch boundaries', () => {
    iter = new LimitIterator(iterInput, 3, 255);
    expect(plainTable(drainIterator(iter), 'a')).toEqual([
      { id: 255 }, { id: 256 }, { id: 257 },
    ]);
  });
  it('should return schema', () => {
    expect(iter.getColumns()).toEqual({ a: ['id'] });
  });
  it('should be rewindable', () => {
    iter = new LimitIterator(iterInput, 2, 495);
    drainIterator(iter);
    iter.rewind();
    expect(plainTable(drainIterator(iter), 'a')).toEqual([
      { id: 495 }, { id: 496 },
    ]);
  });
  it('should stop pulling once the limit is reached', () => {
    let stats: StageStats = {
      name: 'FROM', clause: 'a', inputRows: 0, outputRows: 0, active: true,
    };
    iter = new LimitIterator(new StageIterator(iterInput, stats), 10);
    expect(drainIterator(iter).length).toBe(10);
    expect(stats.outputRows).toBe(256);
  });
});
