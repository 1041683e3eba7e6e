import { CostOptions } from '../config';
import { Scalar } from '../value';
import { AccessType } from './type';

// Lower is better.
export const ACCESS_RANK: { [key in AccessType]: number } = {
  const: 0,
  eq_ref: 1,
  ref: 2,
  range: 3,
  index: 4,
  ALL: 5,
};

export function estimateRows(type: AccessType, total: number,
  cost: CostOptions,
): number {
  switch (type) {
    case 'const':
    case 'eq_ref':
      return 1;
    case 'ref':
      return Math.max(1, Math.floor(total * cost.refFraction));
    case 'range':
      return Math.max(1, Math.floor(total * cost.rangeFraction));
    case 'index':
    case 'ALL':
      return total;
  }
}

export function accessCost(type: AccessType, rows: number,
  cost: CostOptions,
): number {
  return type === 'index' ? rows * cost.indexScanFactor : rows;
}

// Share of examined rows expected to survive the conditions left over.
export function filteredPercent(unresolved: number, cost: CostOptions,
): number {
  if (unresolved === 0) return 100;
  let percent = 100 / (unresolved + 1);
  percent = Math.min(100, Math.max(cost.minFilteredPercent, percent));
  return Math.round(percent * 100) / 100;
}

function valueLength(value: Scalar): number {
  if (value == null) return 0;
  if (typeof value === 'number') return Number.isInteger(value) ? 4 : 8;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'string') return 4 * value.length + 2;
  return 3;
}

// Bytes of the widest key in the index, using utf8mb4 sizes for text.
export function keyLength(values: Scalar[]): number {
  if (values.length === 0) return 4;
  return values.reduce<number>((max, v) => Math.max(max, valueLength(v)), 0);
}
