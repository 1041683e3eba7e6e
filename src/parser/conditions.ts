import {
  Condition, ConditionOp, ConditionValue, Expression, HavingCondition,
} from './type';
import formatExpression from './format';
import { reverseCompareOp } from '../expression/op';
import { Scalar, toScalar } from '../value';

interface ColumnTarget {
  table: string | null,
  column: string,
  wrappedIn: string | null,
}

function columnOf(expr: Expression): ColumnTarget | null {
  if (expr.type === 'column') {
    return { table: expr.table, column: expr.name, wrappedIn: null };
  }
  if (expr.type === 'function' && expr.args.length >= 1 &&
    expr.args[0].type === 'column') {
    let arg = expr.args[0];
    return { table: arg.table, column: arg.name, wrappedIn: expr.name };
  }
  return null;
}

function literalOf(expr: Expression): Scalar | undefined {
  if (expr.type !== 'literal') return undefined;
  return toScalar(expr.value);
}

function valueOf(expr: Expression): ConditionValue {
  let literal = literalOf(expr);
  if (literal !== undefined) return { kind: 'literal', value: literal };
  if (expr.type === 'column') {
    return { kind: 'column', table: expr.table, column: expr.name };
  }
  return { kind: 'expression', text: formatExpression(expr) };
}

function listOf(values: Expression[]): ConditionValue {
  let output: Scalar[] = [];
  for (let value of values) {
    let literal = literalOf(value);
    if (literal === undefined) {
      return { kind: 'expression', text: values.map(formatExpression)
        .join(', ') };
    }
    output.push(literal);
  }
  return { kind: 'list', values: output };
}

function rangeOf(min: Expression, max: Expression): ConditionValue {
  let low = literalOf(min);
  let high = literalOf(max);
  if (low === undefined || high === undefined) {
    return { kind: 'expression',
      text: `${formatExpression(min)} AND ${formatExpression(max)}` };
  }
  return { kind: 'range', low, high };
}

interface Leaf {
  target: Expression,
  op: ConditionOp,
  value: ConditionValue,
  conjunct: boolean,
}

/**
 * Yields the comparison leaves under AND, OR and NOT. A leaf reached through
 * AND nodes alone is a conjunct: every matching row satisfies it.
 */
function collectLeaves(expr: Expression, output: Leaf[],
  conjunct: boolean = true,
): void {
  switch (expr.type) {
    case 'logical': {
      let inner = conjunct && expr.op === 'and';
      expr.values.forEach(value => collectLeaves(value, output, inner));
      return;
    }
    case 'unary':
      if (expr.op === 'not') collectLeaves(expr.value, output, false);
      return;
    case 'compare':
      if (columnOf(expr.left) == null && columnOf(expr.right) != null) {
        output.push({ target: expr.right, op: reverseCompareOp(expr.op),
          value: valueOf(expr.left), conjunct });
      } else {
        output.push({ target: expr.left, op: expr.op,
          value: valueOf(expr.right), conjunct });
      }
      return;
    case 'like':
      output.push({ target: expr.target, op: expr.not ? 'NOT LIKE' : 'LIKE',
        value: valueOf(expr.pattern), conjunct });
      return;
    case 'in':
      output.push({ target: expr.target, op: expr.not ? 'NOT IN' : 'IN',
        value: listOf(expr.values), conjunct });
      return;
    case 'between':
      output.push({ target: expr.target,
        op: expr.not ? 'NOT BETWEEN' : 'BETWEEN',
        value: rangeOf(expr.min, expr.max), conjunct });
      return;
    case 'isNull':
      output.push({ target: expr.target,
        op: expr.not ? 'IS NOT NULL' : 'IS NULL', value: { kind: 'none' },
        conjunct });
      return;
    default:
      return;
  }
}

/**
 * Flattens a predicate tree into per-column conditions. Leaves whose left
 * side is not a (possibly function-wrapped) column are dropped.
 */
export function flattenConditions(expr: Expression | null): Condition[] {
  if (expr == null) return [];
  let leaves: Leaf[] = [];
  collectLeaves(expr, leaves);
  let output: Condition[] = [];
  for (let leaf of leaves) {
    let target = columnOf(leaf.target);
    if (target == null) continue;
    output.push({
      table: target.table,
      column: target.column,
      op: leaf.op,
      value: leaf.value,
      wrappedIn: target.wrappedIn,
      conjunct: leaf.conjunct,
    });
  }
  return output;
}

export function flattenHaving(expr: Expression | null): HavingCondition[] {
  if (expr == null) return [];
  let leaves: Leaf[] = [];
  collectLeaves(expr, leaves);
  return leaves.map(leaf => ({
    expression: formatExpression(leaf.target),
    op: leaf.op,
    value: leaf.value,
  }));
}
