import cloneDeep from 'lodash.clonedeep';

import { fromScalar, sortCompare, stringify } from '../value';
import { ConfigError } from '../errors';
import {
  BTreeKey, BTreeNode, RangeEntry, RangeSearchResult, SearchResult,
  TraversalStep, TreeStructure,
} from './type';

export * from './type';

// Shared by every tree in the process; ids are never handed out twice.
let nextNodeId = 0;

export function compareKeys(a: BTreeKey, b: BTreeKey): number {
  return sortCompare(fromScalar(a), fromScalar(b));
}

export function formatKey(key: BTreeKey): string {
  return stringify(fromScalar(key));
}

/**
 * B+tree over an arena of nodes. Values live in the leaves only, and leaves
 * are chained left to right so range scans can walk across them.
 */
export default class BTree<V = number> {
  order: number;
  nodes: Map<number, BTreeNode<V>> = new Map();
  rootId: number;
  constructor(order: number = 4) {
    if (!Number.isInteger(order) || order < 3) {
      throw new ConfigError('Invalid B-tree order', [
        { path: 'order', message: 'Must be an integer of at least 3' },
      ]);
    }
    this.order = order;
    this.rootId = this.createNode(true).id;
  }
  createNode(isLeaf: boolean): BTreeNode<V> {
    let node: BTreeNode<V> = {
      id: nextNodeId++,
      keys: [],
      values: [],
      children: [],
      isLeaf,
      next: null,
    };
    this.nodes.set(node.id, node);
    return node;
  }
  getNode(id: number): BTreeNode<V> {
    let node = this.nodes.get(id);
    if (node == null) throw new Error(`B-tree node ${id} does not exist`);
    return node;
  }
  isFull(node: BTreeNode<V>): boolean {
    return node.keys.length >= this.order - 1;
  }
  // Number of keys less than (or, with inclusive, at most) the target.
  childIndex(node: BTreeNode<V>, key: BTreeKey, inclusive: boolean): number {
    let i = 0;
    while (i < node.keys.length) {
      let result = compareKeys(key, node.keys[i]);
      if (result < 0 || (result === 0 && !inclusive)) break;
      i++;
    }
    return i;
  }
  splitChild(parent: BTreeNode<V>, index: number) {
    let child = this.getNode(parent.children[index]);
    let mid = Math.floor((this.order - 1) / 2);
    let sibling = this.createNode(child.isLeaf);
    let separator: BTreeKey;
    if (child.isLeaf) {
      // The right half keeps its first key; a copy goes up.
      sibling.keys = child.keys.slice(mid);
      sibling.values = child.values.slice(mid);
      child.keys = child.keys.slice(0, mid);
      child.values = child.values.slice(0, mid);
      sibling.next = child.next;
      child.next = sibling.id;
      separator = sibling.keys[0];
    } else {
      separator = child.keys[mid];
      sibling.keys = child.keys.slice(mid + 1);
      sibling.children = child.children.slice(mid + 1);
      child.keys = child.keys.slice(0, mid);
      child.children = child.children.slice(0, mid + 1);
    }
    parent.keys.splice(index, 0, separator);
    parent.children.splice(index + 1, 0, sibling.id);
  }
  /**
   * Single top-down pass: any full node on the way down is split before the
   * descent enters it, so the leaf always has room.
   */
  insert(key: BTreeKey, value: V) {
    let root = this.getNode(this.rootId);
    if (this.isFull(root)) {
      let newRoot = this.createNode(false);
      newRoot.children.push(root.id);
      this.splitChild(newRoot, 0);
      this.rootId = newRoot.id;
      root = newRoot;
    }
    let node = root;
    while (!node.isLeaf) {
      let i = this.childIndex(node, key, true);
      if (this.isFull(this.getNode(node.children[i]))) {
        this.splitChild(node, i);
        if (compareKeys(key, node.keys[i]) >= 0) i++;
      }
      node = this.getNode(node.children[i]);
    }
    let position = this.childIndex(node, key, true);
    node.keys.splice(position, 0, key);
    node.values.splice(position, 0, value);
  }
  search(key: BTreeKey): SearchResult<V> {
    let steps: TraversalStep[] = [];
    let node = this.getNode(this.rootId);
    let target = formatKey(key);
    while (!node.isLeaf) {
      let i = this.childIndex(node, key, true);
      let comparisons = node.keys.slice(0, i)
        .map(k => `${target} >= ${formatKey(k)}`);
      if (i < node.keys.length) {
        comparisons.push(`${target} < ${formatKey(node.keys[i])}`);
      }
      steps.push({
        nodeId: node.id,
        keys: node.keys.slice(),
        comparison: `${comparisons.join(', ') || 'empty'} -> descend to ` +
          `child ${i}`,
        action: 'descend',
      });
      node = this.getNode(node.children[i]);
    }
    let i = this.childIndex(node, key, false);
    let comparisons = node.keys.slice(0, i)
      .map(k => `${target} > ${formatKey(k)}`);
    let found = i < node.keys.length && compareKeys(key, node.keys[i]) === 0;
    if (i < node.keys.length) {
      comparisons.push(`${target} ${found ? '=' : '<'} ` +
        formatKey(node.keys[i]));
    }
    steps.push({
      nodeId: node.id,
      keys: node.keys.slice(),
      comparison: comparisons.length > 0 ? comparisons.join(', ') : 'empty',
      action: found ? 'found' : 'not_found',
    });
    return { value: found ? node.values[i] : null, steps };
  }
  /**
   * Descends to the leftmost leaf that can hold `low`, then follows sibling
   * links until a key passes `high`.
   */
  rangeSearch(low: BTreeKey, high: BTreeKey): RangeSearchResult<V> {
    let steps: TraversalStep[] = [];
    let results: RangeEntry<V>[] = [];
    let node = this.getNode(this.rootId);
    while (!node.isLeaf) {
      let i = this.childIndex(node, low, false);
      steps.push({
        nodeId: node.id,
        keys: node.keys.slice(),
        comparison: `Finding start >= ${formatKey(low)} -> descend to ` +
          `child ${i}`,
        action: 'descend',
      });
      node = this.getNode(node.children[i]);
    }
    let range = `[${formatKey(low)}, ${formatKey(high)}]`;
    let leaf: BTreeNode<V> | null = node;
    while (leaf != null) {
      steps.push({
        nodeId: leaf.id,
        keys: leaf.keys.slice(),
        comparison: `Scanning leaf for values in ${range}`,
        action: 'scan',
      });
      let passed = false;
      for (let i = 0; i < leaf.keys.length; ++i) {
        let key = leaf.keys[i];
        if (compareKeys(key, high) > 0) {
          passed = true;
          break;
        }
        if (compareKeys(key, low) >= 0) {
          results.push({ key, value: leaf.values[i] });
        }
      }
      if (passed || leaf.next == null) break;
      leaf = this.getNode(leaf.next);
    }
    return { results, steps };
  }
  height(): number {
    let height = 1;
    let node = this.getNode(this.rootId);
    while (!node.isLeaf) {
      node = this.getNode(node.children[0]);
      height++;
    }
    return height;
  }
  allNodes(): BTreeNode<V>[] {
    return Array.from(this.nodes.values()).map(node => cloneDeep(node));
  }
  treeStructure(): TreeStructure {
    let build = (id: number, level: number, position: number,
    ): TreeStructure => {
      let node = this.getNode(id);
      return {
        id: node.id,
        keys: node.keys.slice(),
        isLeaf: node.isLeaf,
        level,
        position,
        children: node.children.map((child, i) => build(child, level + 1, i)),
      };
    };
    return build(this.rootId, 0, 0);
  }
}
