export type BTreeKey = number | string | Date;

export interface BTreeNode<V> {
  id: number,
  keys: BTreeKey[],
  // Leaf only; parallel to keys.
  values: V[],
  // Internal only; always keys.length + 1 entries.
  children: number[],
  isLeaf: boolean,
  // Right sibling leaf.
  next: number | null,
}

export type TraversalAction =
  'compare' | 'descend' | 'found' | 'not_found' | 'scan';

export interface TraversalStep {
  nodeId: number,
  keys: BTreeKey[],
  comparison: string,
  action: TraversalAction,
}

export interface SearchResult<V> {
  value: V | null,
  steps: TraversalStep[],
}

export interface RangeEntry<V> {
  key: BTreeKey,
  value: V,
}

export interface RangeSearchResult<V> {
  results: RangeEntry<V>[],
  steps: TraversalStep[],
}

export interface TreeStructure {
  id: number,
  keys: BTreeKey[],
  isLeaf: boolean,
  level: number,
  position: number,
  children: TreeStructure[],
}
