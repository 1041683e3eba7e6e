import { Expression, LiteralExpression } from './type';
import { stringify } from '../value';

function formatLiteral(expr: LiteralExpression): string {
  if (expr.value.type === 'text') {
    return `'${expr.value.value.replace(/'/g, '\'\'')}'`;
  }
  return stringify(expr.value);
}

function wrap(expr: Expression): string {
  let text = formatExpression(expr);
  switch (expr.type) {
    case 'binary':
    case 'logical':
    case 'compare':
      return `(${text})`;
    default:
      return text;
  }
}

/**
 * Renders an expression back to canonical SQL text. Used for aggregate keys,
 * HAVING condition labels and error messages.
 */
export default function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'literal':
      return formatLiteral(expr);
    case 'column':
      return expr.table != null ? `${expr.table}.${expr.name}` : expr.name;
    case 'wildcard':
      return expr.table != null ? `${expr.table}.*` : '*';
    case 'unary':
      return expr.op === 'not'
        ? `NOT ${wrap(expr.value)}`
        : `-${wrap(expr.value)}`;
    case 'binary':
      return `${wrap(expr.left)} ${expr.op} ${wrap(expr.right)}`;
    case 'compare':
      return `${wrap(expr.left)} ${expr.op} ${wrap(expr.right)}`;
    case 'logical':
      return expr.values.map(wrap).join(` ${expr.op.toUpperCase()} `);
    case 'like':
      return `${wrap(expr.target)} ${expr.not ? 'NOT LIKE' : 'LIKE'} ` +
        wrap(expr.pattern);
    case 'in':
      return `${wrap(expr.target)} ${expr.not ? 'NOT IN' : 'IN'} (` +
        expr.values.map(formatExpression).join(', ') + ')';
    case 'between':
      return `${wrap(expr.target)} ${expr.not ? 'NOT BETWEEN' : 'BETWEEN'} ` +
        `${wrap(expr.min)} AND ${wrap(expr.max)}`;
    case 'isNull':
      return `${wrap(expr.target)} ${expr.not ? 'IS NOT NULL' : 'IS NULL'}`;
    case 'aggregation': {
      let inner = expr.value == null ? '*' : formatExpression(expr.value);
      return `${expr.name.toUpperCase()}(${expr.distinct ? 'DISTINCT ' : ''}` +
        `${inner})`;
    }
    case 'function':
      return `${expr.name.toUpperCase()}(` +
        expr.args.map(formatExpression).join(', ') + ')';
    case 'subquery':
      return `(${expr.text})`;
  }
}
