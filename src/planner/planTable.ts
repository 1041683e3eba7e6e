import { CostOptions } from '../config';
import { IndexDefinition } from '../dataset/type';
import getIndexMap from './getIndexMap';
import {
  ACCESS_RANK, accessCost, estimateRows, filteredPercent,
} from './cost';
import { AccessType, TableCondition, TablePlan, TableSource } from './type';

function isPrefixPattern(cond: TableCondition): boolean {
  if (cond.value.kind !== 'literal') return false;
  let pattern = cond.value.value;
  return typeof pattern === 'string' && pattern.length > 0 &&
    pattern[0] !== '%' && pattern[0] !== '_';
}

// Access type one condition allows through one index, if any.
export function classifyCondition(cond: TableCondition,
  index: IndexDefinition,
): AccessType | null {
  switch (cond.op) {
    case '=':
      if (cond.ref != null) return index.unique ? 'eq_ref' : 'ref';
      if (cond.value.kind === 'literal') {
        return index.unique ? 'const' : 'ref';
      }
      return null;
    case '<':
    case '>':
    case '<=':
    case '>=':
      return cond.value.kind === 'literal' ? 'range' : null;
    case 'BETWEEN':
      return cond.value.kind === 'range' ? 'range' : null;
    case 'IN':
      return cond.value.kind === 'list' ? 'range' : null;
    case 'LIKE':
      return isPrefixPattern(cond) ? 'range' : null;
    default:
      return null;
  }
}

function isCovering(source: TableSource, index: IndexDefinition): boolean {
  let needed = source.needed;
  if (needed == null || needed.size === 0) return false;
  let column = index.column.toLowerCase();
  return Array.from(needed).every(name => name === column);
}

// Conditions a lookup through the index answers on its own.
function resolvedBy(source: TableSource, index: IndexDefinition,
): TableCondition[] {
  let column = index.column.toLowerCase();
  return source.conditions.filter(cond => usable(cond) &&
    cond.column.toLowerCase() === column &&
    classifyCondition(cond, index) != null);
}

function usable(cond: TableCondition): boolean {
  return cond.conjunct && !cond.wrapped;
}

interface Candidate {
  type: AccessType,
  index: IndexDefinition | null,
  ref: string | null,
  rows: number,
  cost: number,
}

/**
 * Picks the access path for one table from the given indexes. Every lookup
 * and covering scan is priced through the cost module and the cheapest
 * wins, with ties going to the better access type. A full scan is the
 * fallback.
 */
export default function planTable(source: TableSource,
  indexes: IndexDefinition[], cost: CostOptions,
): TablePlan {
  let candidate = (type: AccessType, index: IndexDefinition | null,
    ref: string | null,
  ): Candidate => {
    let rows = estimateRows(type, source.rowCount, cost);
    return { type, index, ref, rows, cost: accessCost(type, rows, cost) };
  };
  let best = candidate('ALL', null, null);
  let consider = (next: Candidate) => {
    if (next.cost < best.cost || (next.cost === best.cost &&
      ACCESS_RANK[next.type] < ACCESS_RANK[best.type])) {
      best = next;
    }
  };
  let indexMap = getIndexMap(indexes);
  for (let cond of source.conditions) {
    if (!usable(cond)) continue;
    for (let index of indexMap[cond.column.toLowerCase()] ?? []) {
      let type = classifyCondition(cond, index);
      if (type == null) continue;
      consider(candidate(type, index, cond.ref ??
        (type === 'const' || type === 'ref' ? 'const' : null)));
    }
  }
  for (let index of indexes) {
    if (isCovering(source, index)) consider(candidate('index', index, null));
  }
  let chosen = best.index;
  let resolved = chosen == null || best.type === 'index'
    ? [] : resolvedBy(source, chosen);
  return {
    type: best.type,
    index: chosen,
    ref: best.ref,
    rows: best.rows,
    cost: best.cost,
    filtered: filteredPercent(
      source.conditions.length - resolved.length, cost),
    resolved,
    covering: chosen != null && isCovering(source, chosen),
  };
}
