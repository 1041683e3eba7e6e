import Dataset from '../dataset/type';
import { UnknownColumnError, UnknownTableError } from '../errors';
import BTree, { compareKeys } from '.';
import { BTreeKey } from './type';

/**
 * Builds a tree from (key, value) pairs. The pairs are sorted first so the
 * same input always gives the same shape.
 */
export function buildIndex<V>(pairs: [BTreeKey, V][], order: number = 4,
): BTree<V> {
  let tree = new BTree<V>(order);
  let sorted = pairs.slice().sort((a, b) => compareKeys(a[0], b[0]));
  for (let [key, value] of sorted) tree.insert(key, value);
  return tree;
}

// Index of one column, keyed by value with the row position as the value.
export function buildIndexFromTable(dataset: Dataset, table: string,
  column: string, order: number = 4,
): BTree<number> {
  let rows = dataset.getTable(table);
  let columns = dataset.getTableColumns(table);
  if (rows == null || columns == null) {
    throw new UnknownTableError(table, dataset.getTableNames());
  }
  if (!columns.includes(column)) {
    throw new UnknownColumnError(column, table, columns);
  }
  let pairs: [BTreeKey, number][] = [];
  rows.forEach((row, i) => {
    let value = row[column];
    if (value == null) return;
    pairs.push([typeof value === 'boolean' ? Number(value) : value, i]);
  });
  return buildIndex(pairs, order);
}
