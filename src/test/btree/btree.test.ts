import BTree from '../../btree';
import { buildIndex, buildIndexFromTable } from '../../btree/build';
import { ConfigError, UnknownColumnError, UnknownTableError } from '../../errors';
import { createCompany } from '../fixtures';

function createTree(count: number, order: number = 4): BTree<string> {
  let tree = new BTree<string>(order);
  for (let i = 1; i <= count; ++i) tree.insert(i, `row${i}`);
  return tree;
}

describe('BTree', () => {
  let tree: BTree<string>;
  beforeEach(() => {
    tree = createTree(10);
  });
  it('should find every inserted key', () => {
    for (let i = 1; i <= 10; ++i) {
      expect(tree.search(i).value).toBe(`row${i}`);
    }
  });
  it('should trace one step per level', () => {
    let result = tree.search(7);
    expect(result.steps.length).toBe(tree.height());
    expect(result.steps.map(step => step.comparison)).toEqual([
      '7 >= 3, 7 >= 5 -> descend to child 2',
      '7 >= 6, 7 >= 7, 7 < 8 -> descend to child 2',
      '7 = 7',
    ]);
    expect(result.steps.map(step => step.action))
      .toEqual(['descend', 'descend', 'found']);
    expect(result.steps[2].keys).toEqual([7]);
  });
  it('should report a missing key', () => {
    let result = tree.search(11);
    expect(result.value).toBe(null);
    expect(result.steps[2]).toEqual({
      nodeId: result.steps[2].nodeId,
      keys: [8, 9, 10],
      comparison: '11 > 8, 11 > 9, 11 > 10',
      action: 'not_found',
    });
  });
  it('should grow in height as keys are added', () => {
    expect(createTree(3).height()).toBe(1);
    expect(createTree(4).height()).toBe(2);
    expect(createTree(10).height()).toBe(3);
  });
  it('should keep the root keys after splits', () => {
    let structure = tree.treeStructure();
    expect(structure.keys).toEqual([3, 5]);
    expect(structure.level).toBe(0);
    expect(structure.children.map(child => child.keys))
      .toEqual([[2], [4], [6, 7, 8]]);
    expect(structure.children[2].children.map(child => child.keys))
      .toEqual([[5], [6], [7], [8, 9, 10]]);
  });
  it('should scan across leaves for a range', () => {
    let result = tree.rangeSearch(4, 7);
    expect(result.results).toEqual([
      { key: 4, value: 'row4' },
      { key: 5, value: 'row5' },
      { key: 6, value: 'row6' },
      { key: 7, value: 'row7' },
    ]);
    expect(result.steps[0].comparison)
      .toBe('Finding start >= 4 -> descend to child 1');
    expect(result.steps.filter(step => step.action === 'scan').length)
      .toBe(6);
    expect(result.steps[2].comparison)
      .toBe('Scanning leaf for values in [4, 7]');
  });
  it('should return nothing for an empty range', () => {
    expect(tree.rangeSearch(20, 30).results).toEqual([]);
  });
  it('should keep duplicate keys', () => {
    let dupes = new BTree<number>(3);
    [5, 5, 5, 1].forEach((key, i) => dupes.insert(key, i));
    expect(dupes.rangeSearch(5, 5).results.map(entry => entry.value))
      .toEqual([0, 1, 2]);
  });
  it('should list every node', () => {
    let ids = tree.allNodes().map(node => node.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids.length).toBe(tree.nodes.size);
  });
  it('should reject an order below 3', () => {
    expect(() => new BTree(2)).toThrow(ConfigError);
    expect(() => new BTree(3.5)).toThrow(ConfigError);
  });
});

describe('buildIndex', () => {
  it('should give the same shape regardless of input order', () => {
    let a = buildIndex([[3, 'c'], [1, 'a'], [2, 'b'], [4, 'd']]);
    let b = buildIndex([[4, 'd'], [2, 'b'], [1, 'a'], [3, 'c']]);
    expect(a.treeStructure().keys).toEqual(b.treeStructure().keys);
    expect(a.search(3).value).toBe('c');
  });
  it('should index a table column by row position', () => {
    let tree = buildIndexFromTable(createCompany(), 'employees', 'salary');
    expect(tree.search(70000).value).toBe(2);
    expect(tree.rangeSearch(60000, 70000).results.map(entry => entry.value))
      .toEqual([5, 3, 2]);
  });
  it('should skip NULL values', () => {
    let tree = buildIndexFromTable(createCompany(), 'employees', 'email');
    let entries = tree.rangeSearch('a', 'z').results;
    expect(entries.length).toBe(6);
  });
  it('should reject unknown names', () => {
    let dataset = createCompany();
    expect(() => buildIndexFromTable(dataset, 'staff', 'id'))
      .toThrow(UnknownTableError);
    expect(() => buildIndexFromTable(dataset, 'employees', 'age'))
      .toThrow(UnknownColumnError);
  });
});
