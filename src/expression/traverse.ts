import { AggregateExpression, ColumnExpression, Expression }
  from '../parser/type';

export function getChildren(expr: Expression): Expression[] {
  switch (expr.type) {
    case 'logical':
      return expr.values;
    case 'unary':
      return [expr.value];
    case 'compare':
    case 'binary':
      return [expr.left, expr.right];
    case 'between':
      return [expr.target, expr.min, expr.max];
    case 'in':
      return [expr.target, ...expr.values];
    case 'like':
      return [expr.target, expr.pattern];
    case 'isNull':
      return [expr.target];
    case 'function':
      return expr.args;
    case 'aggregation':
      return expr.value != null ? [expr.value] : [];
    default:
      return [];
  }
}

/**
 * Visits the expression tree in pre-order. Returning false from the visitor
 * skips the children of that node.
 */
export function walk(
  expr: Expression, visitor: (expr: Expression) => boolean | void,
): void {
  if (visitor(expr) === false) return;
  for (let child of getChildren(expr)) walk(child, visitor);
}

export function containsAggregate(expr: Expression): boolean {
  let found = false;
  walk(expr, node => {
    if (node.type === 'aggregation') found = true;
    return !found;
  });
  return found;
}

export function collectAggregates(expr: Expression): AggregateExpression[] {
  let output: AggregateExpression[] = [];
  walk(expr, node => {
    if (node.type === 'aggregation') {
      output.push(node);
      return false;
    }
  });
  return output;
}

export function collectColumns(expr: Expression): ColumnExpression[] {
  let output: ColumnExpression[] = [];
  walk(expr, node => {
    if (node.type === 'column') output.push(node);
  });
  return output;
}

export function containsSubquery(expr: Expression): boolean {
  let found = false;
  walk(expr, node => {
    if (node.type === 'subquery') found = true;
    return !found;
  });
  return found;
}

/**
 * Rewrites the tree bottom-up, rebuilding only the nodes whose children
 * changed.
 */
export function rewritePostOrder(
  expr: Expression, mapper: (expr: Expression) => Expression,
): Expression {
  let map = (child: Expression) => rewritePostOrder(child, mapper);
  let next: Expression = expr;
  switch (expr.type) {
    case 'logical': {
      let values = expr.values.map(map);
      if (values.some((v, i) => v !== expr.values[i])) {
        next = { ...expr, values };
      }
      break;
    }
    case 'unary': {
      let value = map(expr.value);
      if (value !== expr.value) next = { ...expr, value };
      break;
    }
    case 'compare':
    case 'binary': {
      let left = map(expr.left);
      let right = map(expr.right);
      if (left !== expr.left || right !== expr.right) {
        next = { ...expr, left, right };
      }
      break;
    }
    case 'between': {
      let target = map(expr.target);
      let min = map(expr.min);
      let max = map(expr.max);
      if (target !== expr.target || min !== expr.min || max !== expr.max) {
        next = { ...expr, target, min, max };
      }
      break;
    }
    case 'in': {
      let target = map(expr.target);
      let values = expr.values.map(map);
      if (target !== expr.target ||
        values.some((v, i) => v !== expr.values[i])
      ) {
        next = { ...expr, target, values };
      }
      break;
    }
    case 'like': {
      let target = map(expr.target);
      let pattern = map(expr.pattern);
      if (target !== expr.target || pattern !== expr.pattern) {
        next = { ...expr, target, pattern };
      }
      break;
    }
    case 'isNull': {
      let target = map(expr.target);
      if (target !== expr.target) next = { ...expr, target };
      break;
    }
    case 'function': {
      let args = expr.args.map(map);
      if (args.some((v, i) => v !== expr.args[i])) next = { ...expr, args };
      break;
    }
    // Aggregate arguments are evaluated per input row, so they are left
    // untouched.
    default:
      break;
  }
  return mapper(next);
}
