import { isKeyword } from '../parser/tokenize';
import { ParsedQuery, Token } from '../parser/type';
import { OverallSeverity, QueryIssue } from './type';

function hasLeadingWildcard(tokens: Token[]): boolean {
  return tokens.some((token, i) => isKeyword(token, 'LIKE') &&
    tokens[i + 1]?.type === 'string' && tokens[i + 1].value.startsWith('%'));
}

function hasNotIn(tokens: Token[]): boolean {
  return tokens.some((token, i) => isKeyword(token, 'NOT') &&
    isKeyword(tokens[i + 1], 'IN'));
}

// A SELECT opened by a parenthesis that is not a CTE body.
function hasSubquery(tokens: Token[]): boolean {
  return tokens.some((token, i) => i >= 2 && isKeyword(token, 'SELECT') &&
    tokens[i - 1].type === 'lparen' && !isKeyword(tokens[i - 2], 'AS'));
}

function orAcrossColumns(tokens: Token[], parsed: ParsedQuery): boolean {
  if (!tokens.some(token => isKeyword(token, 'OR'))) return false;
  let columns = new Set(parsed.whereConditions
    .map(cond => cond.column.toLowerCase()));
  return columns.size > 1;
}

export default function detectIssues(tokens: Token[], parsed: ParsedQuery,
): QueryIssue[] {
  let issues: QueryIssue[] = [];
  if (parsed.columns.some(column => column.expression.type === 'wildcard')) {
    issues.push({
      code: 'select_star',
      severity: 'warning',
      title: 'SELECT * Usage',
      description: 'Every column is fetched, even the ones that are not ' +
        'needed.',
      fix: 'List only the columns you need: SELECT id, name FROM ...',
    });
  }
  let wrapped = parsed.whereConditions.find(cond => cond.wrappedIn != null);
  if (wrapped != null && wrapped.wrappedIn != null) {
    let name = wrapped.wrappedIn.toUpperCase();
    issues.push({
      code: 'function_on_column',
      severity: 'error',
      title: `Function on Column: ${name}()`,
      description: 'A function around a column hides it from its index, so ' +
        'every row must be read and computed.',
      fix: `Compare the bare column against a range instead of using ${name}()`,
    });
  }
  if (hasLeadingWildcard(tokens)) {
    issues.push({
      code: 'leading_wildcard',
      severity: 'error',
      title: 'Leading Wildcard LIKE',
      description: "LIKE '%value' cannot use a B-tree index because the " +
        'start of the value is unknown.',
      fix: "Use a trailing wildcard such as LIKE 'value%', or a FULLTEXT index",
    });
  }
  if (orAcrossColumns(tokens, parsed)) {
    issues.push({
      code: 'or_different_columns',
      severity: 'warning',
      title: 'OR on Different Columns',
      description: 'OR across different columns usually keeps any single ' +
        'index from answering the condition.',
      fix: 'Run one query per column and combine them with UNION',
    });
  }
  if (hasNotIn(tokens)) {
    issues.push({
      code: 'not_in',
      severity: 'warning',
      title: 'NOT IN Usage',
      description: 'NOT IN returns no rows at all once the list holds a ' +
        'NULL, and rarely uses an index.',
      fix: 'Use NOT EXISTS, which handles NULL the way most people expect',
    });
  }
  if (parsed.orderBy.length > 0 && parsed.limit == null) {
    issues.push({
      code: 'order_without_limit',
      severity: 'warning',
      title: 'ORDER BY Without LIMIT',
      description: 'Every matching row is sorted even if only the first ' +
        'few are read.',
      fix: 'Add a LIMIT for the rows you actually need',
    });
  }
  if (tokens.some(token => isKeyword(token, 'DISTINCT'))) {
    issues.push({
      code: 'distinct',
      severity: 'info',
      title: 'DISTINCT Usage',
      description: 'DISTINCT hashes or sorts the whole result. It sometimes ' +
        'hides a JOIN that multiplies rows.',
      fix: 'Check whether the JOIN conditions make DISTINCT unnecessary',
    });
  }
  if (hasSubquery(tokens)) {
    issues.push({
      code: 'subquery',
      severity: 'info',
      title: 'Subquery Detected',
      description: 'Subqueries can often be written as JOINs.',
      fix: 'Consider whether a JOIN or a CTE expresses the same thing',
    });
  }
  if (parsed.where == null && parsed.tables.length > 0) {
    issues.push({
      code: 'no_where',
      severity: 'info',
      title: 'No WHERE Clause',
      description: 'The whole table is read. That is fine for small tables.',
      fix: 'Add conditions if only some rows are needed',
    });
  }
  return issues;
}

export function overallSeverity(issues: QueryIssue[]): OverallSeverity {
  if (issues.some(issue => issue.severity === 'error')) return 'critical';
  if (issues.some(issue => issue.severity === 'warning')) return 'warning';
  return 'good';
}
