import { isKeyword } from '../parser/tokenize';
import { ParsedQuery, Token } from '../parser/type';
import Dataset from '../dataset/type';
import { collectColumns } from '../expression/traverse';
import { ExplainResult } from '../planner/type';
import { QueryResult } from '../executor/type';
import {
  AccessRating, IndexRecommendation, QueryIssue, QueryRewrite,
} from './type';

const MAX_RECOMMENDATIONS = 3;

interface YearComparison {
  start: number,
  end: number,
  column: string,
  year: number,
  negated: boolean,
}

function isName(token: Token | undefined): boolean {
  return token != null && (token.type === 'word' || token.type === 'ident');
}

/**
 * Finds `YEAR(col) = yyyy` comparisons, with source offsets so they can be
 * replaced in place.
 */
export function findYearComparisons(sql: string, tokens: Token[],
): YearComparison[] {
  let output: YearComparison[] = [];
  for (let i = 0; i < tokens.length; ++i) {
    if (!isKeyword(tokens[i], 'YEAR') || tokens[i + 1]?.type !== 'lparen') {
      continue;
    }
    let pos = i + 2;
    if (!isName(tokens[pos])) continue;
    let columnStart = tokens[pos].start;
    pos++;
    if (tokens[pos]?.type === 'dot' && isName(tokens[pos + 1])) pos += 2;
    let columnEnd = tokens[pos - 1].end;
    if (tokens[pos]?.type !== 'rparen') continue;
    let op = tokens[pos + 1];
    let year = tokens[pos + 2];
    if (op == null || op.type !== 'op' || op.value !== '=') continue;
    if (year == null || !/^\d{4}$/.test(year.value) ||
      year.type !== 'number') {
      continue;
    }
    output.push({
      start: tokens[i].start,
      end: year.end,
      column: sql.slice(columnStart, columnEnd),
      year: Number(year.value),
      negated: isKeyword(tokens[i - 1], 'NOT'),
    });
  }
  return output;
}

function yearRange(match: YearComparison): string {
  let range = `${match.column} >= '${match.year}-01-01' AND ` +
    `${match.column} < '${match.year + 1}-01-01'`;
  return match.negated ? `(${range})` : range;
}

function indexStatement(name: string, table: string, columns: string[],
): string {
  return `CREATE INDEX ${name} ON ${table}(${columns.join(', ')});`;
}

function unique(values: string[]): string[] {
  return values.filter((value, i) => values.indexOf(value) === i);
}

/**
 * Index suggestions for the FROM table, most specific first: one per
 * unindexed filter column, then ORDER BY, composite and covering indexes.
 */
export function recommendIndexes(parsed: ParsedQuery, dataset: Dataset,
): IndexRecommendation[] {
  let from = parsed.from;
  if (from == null) return [];
  let table = from.table;
  let alias = from.alias ?? table;
  let columns = dataset.getTableColumns(table) ?? [];
  let canonical = (qualifier: string | null, name: string): string[] => {
    if (qualifier != null && qualifier !== alias) return [];
    let lower = name.toLowerCase();
    return columns.filter(column => column.toLowerCase() === lower);
  };
  let existing = new Set(dataset.getIndexes(table)
    .map(index => index.column.toLowerCase()));
  let whereColumns = unique(parsed.whereConditions
    .filter(cond => cond.wrappedIn == null)
    .flatMap(cond => canonical(cond.table, cond.column)));
  let orderColumns = unique(parsed.orderBy.flatMap(item =>
    item.expression.type === 'column'
      ? canonical(item.expression.table, item.expression.name) : []));

  let output: IndexRecommendation[] = [];
  for (let column of whereColumns) {
    if (existing.has(column.toLowerCase())) continue;
    output.push({
      type: 'WHERE filter',
      table,
      columns: [column],
      sql: indexStatement(`idx_${table}_${column}`, table, [column]),
      reason: `The query filters on '${column}'; an index turns the scan ` +
        'into a lookup',
    });
  }
  if (orderColumns.length > 0 &&
    !existing.has(orderColumns[0].toLowerCase())) {
    output.push({
      type: 'ORDER BY',
      table,
      columns: orderColumns,
      sql: indexStatement(`idx_${table}_${orderColumns.join('_')}`, table,
        orderColumns),
      reason: 'An index in ORDER BY order avoids the filesort',
    });
  }
  if (whereColumns.length > 0 && orderColumns.length > 0) {
    let combined = unique([...whereColumns, ...orderColumns]);
    if (combined.length > 1) {
      output.push({
        type: 'Composite',
        table,
        columns: combined,
        sql: indexStatement(`idx_${table}_composite`, table, combined),
        reason: 'One index serves both the WHERE filter and the ORDER BY',
      });
    }
  }
  let readsAll = parsed.columns
    .some(column => column.expression.type === 'wildcard');
  if (!readsAll && parsed.columns.length <= 5) {
    let selected = parsed.columns.flatMap(column =>
      collectColumns(column.expression)
        .flatMap(expr => canonical(expr.table, expr.name)));
    let needed = unique([...selected, ...whereColumns]);
    if (needed.length > 1 && needed.length <= 5) {
      output.push({
        type: 'Covering',
        table,
        columns: needed,
        sql: indexStatement(`idx_${table}_covering`, table, needed),
        reason: 'Every column the query reads is in the index, so the ' +
          'table is never touched',
      });
    }
  }
  return output.slice(0, MAX_RECOMMENDATIONS);
}

export function suggestRewrites(sql: string, tokens: Token[],
  parsed: ParsedQuery, issues: QueryIssue[], dataset: Dataset,
): QueryRewrite[] {
  let output: QueryRewrite[] = [];
  let has = (code: QueryIssue['code']) =>
    issues.some(issue => issue.code === code);
  if (has('select_star') && parsed.from != null) {
    let table = parsed.from.table;
    let columns = dataset.getTableColumns(table);
    output.push({
      originalPattern: 'SELECT *',
      rewritten: `SELECT ${columns != null ? columns.join(', ') : 'id, ...'} ` +
        `FROM ${table}`,
      reason: 'Name only the columns that are needed',
      improvement: 'Less data is read and a covering index becomes possible',
    });
  }
  for (let match of findYearComparisons(sql, tokens)) {
    output.push({
      originalPattern: sql.slice(match.start, match.end),
      rewritten: yearRange(match),
      reason: 'The column is compared directly instead of through YEAR()',
      improvement: 'An index on the date column can serve the range',
    });
  }
  if (has('leading_wildcard')) {
    output.push({
      originalPattern: "LIKE '%value%'",
      rewritten: "LIKE 'value%' where possible, or a FULLTEXT index",
      reason: 'A leading wildcard keeps the B-tree from being searched',
      improvement: 'A trailing wildcard becomes an index range scan',
    });
  }
  if (has('not_in')) {
    output.push({
      originalPattern: 'NOT IN (subquery)',
      rewritten: 'NOT EXISTS (SELECT 1 FROM ... WHERE ...)',
      reason: 'NOT IN matches nothing once the list contains NULL',
      improvement: 'NOT EXISTS handles NULL and can stop at the first match',
    });
  }
  if (has('or_different_columns')) {
    output.push({
      originalPattern: 'WHERE col1 = x OR col2 = y',
      rewritten: '(SELECT ... WHERE col1 = x) UNION ' +
        '(SELECT ... WHERE col2 = y)',
      reason: 'OR across columns keeps a single index from answering it',
      improvement: 'Each half of the UNION can use its own index',
    });
  }
  return output;
}

// The query with every YEAR(col) = yyyy turned into a date range.
export function optimizeQuery(sql: string, tokens: Token[]): string | null {
  let matches = findYearComparisons(sql, tokens);
  if (matches.length === 0) return null;
  let output = sql;
  for (let match of matches.slice().reverse()) {
    output = output.slice(0, match.start) + yearRange(match) +
      output.slice(match.end);
  }
  return output;
}

export function rateAccess(explain: ExplainResult | null): AccessRating {
  if (explain == null) return 'good';
  if (explain.rows.some(row => row.type === 'ALL')) return 'bad';
  if (explain.rows.some(row => row.type === 'index')) return 'caution';
  return 'good';
}

export function generateTips(issues: QueryIssue[], rating: AccessRating,
  explain: ExplainResult | null, result: QueryResult | null,
): string[] {
  let tips: string[] = [];
  if (rating === 'bad') {
    tips.push('Index the filtered columns to avoid full table scans');
  }
  if (issues.some(issue => issue.code === 'select_star')) {
    tips.push('Selecting specific columns reduces I/O and memory use');
  }
  let extras = explain != null ? explain.rows.flatMap(row => row.extra) : [];
  if (extras.includes('Using filesort')) {
    tips.push('An index that matches ORDER BY avoids the filesort');
  }
  if (extras.includes('Using temporary')) {
    tips.push('GROUP BY and ORDER BY on different columns need a ' +
      'temporary table');
  }
  if (result != null && result.rowCount > 100) {
    tips.push('Add a LIMIT if not every row is needed');
  }
  if (tips.length === 0) {
    tips.push('The query looks reasonable. Check timings on real data too.');
  }
  return tips;
}
