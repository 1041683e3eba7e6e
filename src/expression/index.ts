import { Expression, AggregateExpression } from '../parser/type';
import formatExpression from '../parser/format';
import { Row, AGGREGATE_TABLE, RESULT_TABLE } from '../row';
import {
  NULL, Value, arithmetic, boolean, compareValues, negate, stringify, truthy,
} from '../value';
import {
  SyntaxError, TypeMismatchError, UnknownColumnError, UnknownTableError,
  UnsupportedFeatureError,
} from '../errors';
import { getFunction, getFunctionNames } from './functions';

export type Evaluator = (row: Row) => Value;

export interface ScopeTable {
  name: string,
  columns: string[],
}

export interface Scope {
  tables: ScopeTable[],
  // Whether aggregate calls may appear; they read from AGGREGATE_TABLE.
  aggregates: boolean,
  // Clause name used in error messages.
  clause?: string,
  // Receives per-row evaluation problems that were turned into NULL.
  warn?: (message: string) => void,
}

export function getAggregateKey(expr: AggregateExpression): string {
  return formatExpression(expr);
}

function resolveColumn(scope: Scope, table: string | null, name: string,
): { table: string, column: string } {
  let lower = name.toLowerCase();
  if (table != null) {
    let entry = scope.tables.find(v => v.name === table);
    if (entry == null) {
      throw new UnknownTableError(table, scope.tables.map(v => v.name),
        `'${table}' is not a table or alias in this query`);
    }
    let column = entry.columns.find(v => v.toLowerCase() === lower);
    if (column == null) {
      throw new UnknownColumnError(name, entry.name, entry.columns);
    }
    return { table: entry.name, column };
  }
  for (let entry of scope.tables) {
    let column = entry.columns.find(v => v.toLowerCase() === lower);
    if (column != null) return { table: entry.name, column };
  }
  let visible = scope.tables.filter(v =>
    v.name !== AGGREGATE_TABLE && v.name !== RESULT_TABLE);
  throw new UnknownColumnError(name,
    visible.map(v => v.name).join(', '),
    visible.reduce<string[]>((acc, v) => acc.concat(v.columns), []));
}

// Runs a comparison, turning a per-row type mismatch into Unknown.
function guarded(scope: Scope, evaluate: () => Value): Value {
  try {
    return evaluate();
  } catch (e) {
    if (!(e instanceof TypeMismatchError)) throw e;
    if (scope.warn != null) scope.warn(e.message);
    return NULL;
  }
}

function fromTruth(input: boolean | null): Value {
  return input == null ? NULL : boolean(input);
}

function compileLike(pattern: string): RegExp {
  let source = '';
  for (let char of pattern) {
    if (char === '%') source += '[\\s\\S]*';
    else if (char === '_') source += '[\\s\\S]';
    else source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp('^' + source + '$', 'i');
}

function compileNode(scope: Scope, expr: Expression): Evaluator {
  switch (expr.type) {
    case 'literal': {
      let value = expr.value;
      return () => value;
    }
    case 'column': {
      let { table, column } = resolveColumn(scope, expr.table, expr.name);
      return row => {
        let record = row[table];
        if (record == null) return NULL;
        return record[column] ?? NULL;
      };
    }
    case 'wildcard':
      throw new SyntaxError(`'${formatExpression(expr)}' is only allowed ` +
        'in the select list', null, 'Name the columns explicitly');
    case 'subquery':
      throw new UnsupportedFeatureError('Subqueries',
        'Rewrite the subquery as a JOIN or a CTE');
    case 'unary': {
      let value = compileNode(scope, expr.value);
      if (expr.op === 'not') {
        return row => {
          let result = truthy(value(row));
          return fromTruth(result == null ? null : !result);
        };
      }
      return row => guarded(scope, () => negate(value(row)));
    }
    case 'binary': {
      let left = compileNode(scope, expr.left);
      let right = compileNode(scope, expr.right);
      let op = expr.op;
      return row => guarded(scope,
        () => arithmetic(op, left(row), right(row)));
    }
    case 'compare': {
      let left = compileNode(scope, expr.left);
      let right = compileNode(scope, expr.right);
      let op = expr.op;
      return row => guarded(scope, () => {
        let result = compareValues(left(row), right(row));
        if (result == null) return NULL;
        switch (op) {
          case '=': return boolean(result === 0);
          case '<>': return boolean(result !== 0);
          case '<': return boolean(result < 0);
          case '>': return boolean(result > 0);
          case '<=': return boolean(result <= 0);
          case '>=': return boolean(result >= 0);
        }
      });
    }
    case 'logical': {
      let values = expr.values.map(v => compileNode(scope, v));
      // AND stops at the first FALSE, OR at the first TRUE.
      let decisive = expr.op === 'or';
      return row => {
        let unknown = false;
        for (let value of values) {
          let result = truthy(value(row));
          if (result == null) unknown = true;
          else if (result === decisive) return boolean(decisive);
        }
        return unknown ? NULL : boolean(!decisive);
      };
    }
    case 'like': {
      let target = compileNode(scope, expr.target);
      let not = expr.not;
      let fixed = expr.pattern.type === 'literal' &&
        expr.pattern.value.type === 'text'
        ? compileLike(expr.pattern.value.value)
        : null;
      let pattern = compileNode(scope, expr.pattern);
      return row => {
        let value = target(row);
        if (value.type === 'null') return NULL;
        let regex = fixed;
        if (regex == null) {
          let patternValue = pattern(row);
          if (patternValue.type === 'null') return NULL;
          regex = compileLike(stringify(patternValue));
        }
        return boolean(regex.test(stringify(value)) !== not);
      };
    }
    case 'in': {
      let target = compileNode(scope, expr.target);
      let values = expr.values.map(v => compileNode(scope, v));
      let not = expr.not;
      return row => guarded(scope, () => {
        let value = target(row);
        if (value.type === 'null') return NULL;
        let unknown = false;
        for (let candidate of values) {
          let result = compareValues(value, candidate(row));
          if (result == null) unknown = true;
          else if (result === 0) return boolean(!not);
        }
        return unknown ? NULL : boolean(not);
      });
    }
    case 'between': {
      let target = compileNode(scope, expr.target);
      let min = compileNode(scope, expr.min);
      let max = compileNode(scope, expr.max);
      let not = expr.not;
      return row => guarded(scope, () => {
        let value = target(row);
        let low = compareValues(min(row), value);
        let high = compareValues(value, max(row));
        let inside: boolean | null;
        if (low != null && low > 0) inside = false;
        else if (high != null && high > 0) inside = false;
        else if (low == null || high == null) inside = null;
        else inside = true;
        if (inside == null) return NULL;
        return boolean(inside !== not);
      });
    }
    case 'isNull': {
      let target = compileNode(scope, expr.target);
      let not = expr.not;
      return row => boolean((target(row).type === 'null') !== not);
    }
    case 'function': {
      let fn = getFunction(expr.name);
      if (fn == null) {
        throw new UnsupportedFeatureError(
          `Function ${expr.name.toUpperCase()}()`,
          `Supported functions: ${getFunctionNames().join(', ')}`);
      }
      if (expr.args.length < fn.minArgs || expr.args.length > fn.maxArgs) {
        throw new SyntaxError(
          `Wrong number of arguments to ${expr.name.toUpperCase()}()`,
          null, `${expr.name.toUpperCase()}() takes ${fn.minArgs}` +
          (fn.maxArgs === fn.minArgs ? '' : ' or more') + ' arguments');
      }
      let args = expr.args.map(v => compileNode(scope, v));
      let call = fn.call;
      return row => guarded(scope, () => call(args.map(arg => arg(row))));
    }
    case 'aggregation': {
      if (!scope.aggregates) {
        let clause = scope.clause ?? 'this clause';
        throw new SyntaxError(
          `Invalid use of aggregate ${formatExpression(expr)} in ${clause}`,
          null, 'Filter on aggregates with HAVING instead of WHERE');
      }
      let key = getAggregateKey(expr);
      return row => {
        let record = row[AGGREGATE_TABLE];
        if (record == null) return NULL;
        return record[key] ?? NULL;
      };
    }
  }
}

/**
 * Compiles an expression into a closure over rows. Every column reference is
 * resolved against the scope here, so unknown names fail before any row is
 * read.
 */
export default function compileExpression(
  scope: Scope, expr: Expression,
): Evaluator {
  return compileNode(scope, expr);
}

// Predicate form: only TRUE passes.
export function compilePredicate(
  scope: Scope, expr: Expression,
): (row: Row) => boolean {
  let evaluate = compileNode(scope, expr);
  return row => truthy(evaluate(row)) === true;
}
