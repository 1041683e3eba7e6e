import tokenize, { isKeyword } from './tokenize';
import { extractCtes } from './cte';
import SelectParser, { SelectClauses } from './select';
import { flattenConditions, flattenHaving } from './conditions';
import { collectColumns, walk } from '../expression/traverse';
import {
  Diagnostic, Expression, ParsedQuery, StatementType, Token,
} from './type';

export { splitUnionAll, referencesTable } from './cte';
export { default as tokenize } from './tokenize';
export { default as formatExpression } from './format';

function classify(token: Token | undefined): StatementType {
  if (isKeyword(token, 'SELECT')) return 'SELECT';
  if (isKeyword(token, 'INSERT')) return 'INSERT';
  if (isKeyword(token, 'UPDATE')) return 'UPDATE';
  if (isKeyword(token, 'DELETE')) return 'DELETE';
  return 'UNKNOWN';
}

function nameAfter(tokens: Token[], start: number, keyword: string,
): string | null {
  for (let i = start; i < tokens.length - 1; ++i) {
    if (isKeyword(tokens[i], keyword)) {
      let next = tokens[i + 1];
      if (next.type === 'word' || next.type === 'ident') {
        return next.value.toLowerCase();
      }
      return null;
    }
  }
  return null;
}

// Target table of INSERT / UPDATE / DELETE.
function modificationTarget(type: StatementType, tokens: Token[],
  start: number,
): string | null {
  switch (type) {
    case 'INSERT':
      return nameAfter(tokens, start, 'INTO');
    case 'UPDATE':
      return nameAfter(tokens, start, 'UPDATE');
    case 'DELETE':
      return nameAfter(tokens, start, 'FROM');
    default:
      return null;
  }
}

function readsColumns(clauses: SelectClauses): boolean {
  let expressions: Expression[] = [
    ...clauses.columns.map(column => column.expression),
    ...clauses.groupBy,
  ];
  if (clauses.where != null) expressions.push(clauses.where);
  if (clauses.having != null) expressions.push(clauses.having);
  return expressions.some(expr => {
    let found = collectColumns(expr).length > 0;
    walk(expr, node => {
      if (node.type === 'wildcard') found = true;
    });
    return found;
  });
}

/**
 * Parses one SQL statement. Never throws: anything that cannot be made sense
 * of is reported through `diagnostics` and the affected clause is left out.
 */
export default function parse(sql: string): ParsedQuery {
  let tokens = tokenize(sql);
  let diagnostics: Diagnostic[] = [];
  for (let token of tokens) {
    if (token.unterminated) {
      diagnostics.push({
        code: 'unterminated_string',
        message: 'Unterminated quoted text',
        near: token.value,
        position: token.start,
      });
    }
  }
  let prefix = extractCtes(sql, tokens);
  diagnostics.push(...prefix.diagnostics);
  let first = tokens[prefix.mainStart];
  let mainQuery = first != null ? sql.slice(first.start).trim() : '';
  let type = classify(first);

  let result: ParsedQuery = {
    type,
    tables: [],
    from: null,
    columns: [],
    distinct: false,
    where: null,
    whereConditions: [],
    groupBy: [],
    having: null,
    havingConditions: [],
    orderBy: [],
    limit: null,
    offset: null,
    joins: [],
    ctes: prefix.ctes,
    isRecursive: prefix.isRecursive,
    aliases: {},
    mainQuery,
    raw: sql,
    diagnostics,
  };

  if (type === 'SELECT') {
    let parser = new SelectParser(sql, tokens, prefix.mainStart);
    let clauses = parser.guard(() => parser.parseSelect());
    diagnostics.push(...parser.diagnostics);
    if (clauses != null) {
      Object.assign(result, clauses);
      let refs = [...(clauses.from != null ? [clauses.from] : []),
        ...clauses.joins];
      result.tables = refs.map(ref => ref.table);
      for (let ref of refs) {
        result.aliases[ref.alias ?? ref.table] = ref.table;
      }
      result.whereConditions = flattenConditions(clauses.where);
      result.havingConditions = flattenHaving(clauses.having);
      if (refs.length === 0 && readsColumns(clauses) &&
        !diagnostics.some(entry => entry.code === 'missing_table')) {
        diagnostics.push({
          code: 'missing_table',
          message: 'No table specified in query',
          near: null,
          position: sql.length,
        });
      }
    }
  } else if (type === 'UNKNOWN') {
    if (first != null && prefix.diagnostics.length === 0) {
      diagnostics.push({
        code: 'unexpected_token',
        message: 'Unrecognized statement',
        near: first.value,
        position: first.start,
      });
    }
  } else {
    let target = modificationTarget(type, tokens, prefix.mainStart);
    if (target != null) result.tables = [target];
  }
  return result;
}

export * from './type';
