import { CompareOp, ConditionOp } from '../parser/type';

const COMPARE_REVERSES: { [key in CompareOp]: CompareOp } = {
  '=': '=',
  '<>': '<>',
  '<': '>',
  '>': '<',
  '<=': '>=',
  '>=': '<=',
};

// Operator to use when both sides of a comparison swap places.
export function reverseCompareOp(op: CompareOp): CompareOp {
  return COMPARE_REVERSES[op];
}

const COMPARE_INVERSES: { [key in CompareOp]: CompareOp } = {
  '=': '<>',
  '<>': '=',
  '<': '>=',
  '>': '<=',
  '<=': '>',
  '>=': '<',
};

export function invertCompareOp(op: CompareOp): CompareOp {
  return COMPARE_INVERSES[op];
}

const RANGE_OPS: ConditionOp[] = ['<', '>', '<=', '>=', 'BETWEEN', 'IN'];

export function isRangeOp(op: ConditionOp): boolean {
  return RANGE_OPS.includes(op);
}

export function isCompareOp(op: string): op is CompareOp {
  return op in COMPARE_REVERSES;
}
