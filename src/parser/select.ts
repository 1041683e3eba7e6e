import ExpressionParser, { ParseFailure } from './expression';
import { findClosingParen, isKeyword } from './tokenize';
import {
  Expression, JoinClause, JoinType, OrderByItem, SelectColumn, TableRef,
  Token,
} from './type';
import { keywordTypo } from '../errors';

export interface SelectClauses {
  columns: SelectColumn[],
  distinct: boolean,
  from: TableRef | null,
  joins: JoinClause[],
  where: Expression | null,
  groupBy: Expression[],
  having: Expression | null,
  orderBy: OrderByItem[],
  limit: number | null,
  offset: number | null,
}

// Keywords that end whatever clause is being scanned.
const BOUNDARIES = ['SELECT', 'FROM', 'WHERE', 'GROUP', 'HAVING', 'ORDER',
  'LIMIT', 'UNION', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'CROSS', 'FULL', 'ON'];

/**
 * Scans one SELECT statement clause by clause. A clause that does not parse
 * leaves a diagnostic and scanning resumes at the next top-level comma or
 * clause keyword.
 */
export default class SelectParser extends ExpressionParser {
  guard<T>(parser: () => T): T | null {
    let start = this.pos;
    try {
      return parser();
    } catch (e) {
      if (!(e instanceof ParseFailure)) throw e;
      this.diagnose(e.code, e.message, e.token);
      this.resync(start);
      return null;
    }
  }
  resync(start: number): void {
    // Always make progress past the token that started the failed item,
    // unless it is itself a boundary.
    if (this.pos === start && !this.atBoundary()) this.pos++;
    let depth = 0;
    while (!this.atEnd()) {
      let token = this.peek();
      if (token == null) break;
      if (depth === 0 && this.atBoundary()) break;
      if (token.type === 'lparen') depth++;
      if (token.type === 'rparen' && depth > 0) depth--;
      this.pos++;
    }
  }
  atBoundary(): boolean {
    let token = this.peek();
    if (token == null) return true;
    if (token.type === 'comma' || token.type === 'semicolon') return true;
    return isKeyword(token, ...BOUNDARIES);
  }
  parseList<T>(parser: () => T): T[] {
    let output: T[] = [];
    do {
      let item = this.guard(parser);
      if (item != null) output.push(item);
    } while (this.acceptType('comma') != null);
    return output;
  }

  parseSelect(): SelectClauses {
    let result: SelectClauses = {
      columns: [],
      distinct: false,
      from: null,
      joins: [],
      where: null,
      groupBy: [],
      having: null,
      orderBy: [],
      limit: null,
      offset: null,
    };
    this.expectKeyword('SELECT');
    if (this.acceptKeyword('DISTINCT')) result.distinct = true;
    else this.acceptKeyword('ALL');
    result.columns = this.parseList(() => this.parseSelectColumn());
    if (this.acceptKeyword('FROM')) {
      this.parseFrom(result);
    }
    if (this.acceptKeyword('WHERE')) {
      result.where = this.guard(() => this.parseExpression());
    }
    if (this.isKeyword('GROUP')) {
      this.guard(() => {
        this.pos++;
        this.expectKeyword('BY');
      });
      result.groupBy = this.parseList(() => this.parseExpression());
    }
    if (this.acceptKeyword('HAVING')) {
      result.having = this.guard(() => this.parseExpression());
    }
    if (this.isKeyword('ORDER')) {
      this.guard(() => {
        this.pos++;
        this.expectKeyword('BY');
      });
      result.orderBy = this.parseList(() => this.parseOrderItem());
    }
    if (this.acceptKeyword('LIMIT')) {
      this.guard(() => this.parseLimit(result));
    }
    if (this.isKeyword('UNION')) {
      this.diagnose('unsupported', 'UNION', this.peek());
      this.pos = this.end;
    }
    this.acceptType('semicolon');
    if (!this.atEnd()) {
      this.diagnose('unexpected_token', 'Unexpected input after query',
        this.peek());
    }
    return result;
  }
  parseAlias(allowString: boolean = false): string | null {
    if (this.acceptKeyword('AS')) {
      let token = this.peek();
      if (token != null && (token.type === 'word' || token.type === 'ident' ||
        (allowString && token.type === 'string'))) {
        this.pos++;
        return token.value;
      }
      this.fail('Expected an alias', token);
    }
    let token = this.peek();
    if (!this.isIdentifier(token) || token == null) return null;
    if (token.type === 'word' && keywordTypo(token.value) != null) {
      this.fail('Unexpected word', token);
    }
    this.pos++;
    return token.value;
  }
  parseSelectColumn(): SelectColumn {
    let start = this.pos;
    let expression: Expression;
    if (this.acceptType('op', '*') != null) {
      expression = { type: 'wildcard', table: null };
    } else {
      expression = this.parseExpression();
    }
    let text = this.textBetween(start, this.pos);
    let alias = expression.type === 'wildcard' ? null : this.parseAlias(true);
    if (!this.atBoundary() && !this.atEnd()) {
      this.fail('Unexpected token in select list', this.peek());
    }
    return { expression, alias, text };
  }
  parseTableRef(): TableRef | null {
    let token = this.peek();
    if (token != null && token.type === 'lparen') {
      let close = findClosingParen(this.tokens, this.pos);
      this.diagnose('unsupported', 'Derived tables',
        this.peek(1));
      this.pos = close === -1 || close >= this.end ? this.end : close + 1;
      this.parseAlias();
      return null;
    }
    if (!this.isIdentifier(token) || token == null) {
      this.diagnose('missing_table', 'Expected a table name', token);
      return null;
    }
    if (token.type === 'word' && keywordTypo(token.value) != null) {
      this.fail('Unexpected word', token);
    }
    this.pos++;
    let table = token.value.toLowerCase();
    let alias = this.parseAlias();
    return { table, alias: alias != null ? alias.toLowerCase() : null };
  }
  parseJoinType(): JoinType | null {
    if (this.acceptKeyword('JOIN')) return 'INNER';
    let token = this.peek();
    let type: JoinType | null = null;
    if (isKeyword(token, 'INNER')) type = 'INNER';
    else if (isKeyword(token, 'LEFT')) type = 'LEFT';
    else if (isKeyword(token, 'RIGHT')) type = 'RIGHT';
    else if (isKeyword(token, 'CROSS')) type = 'CROSS';
    else if (isKeyword(token, 'FULL')) {
      this.diagnose('unsupported', 'FULL OUTER JOIN', token);
      type = 'INNER';
    }
    if (type == null) return null;
    this.pos++;
    if (type === 'LEFT' || type === 'RIGHT') this.acceptKeyword('OUTER');
    if (isKeyword(token, 'FULL')) this.acceptKeyword('OUTER');
    this.expectKeyword('JOIN');
    return type;
  }
  parseFrom(result: SelectClauses): void {
    result.from = this.guard(() => this.parseTableRef());
    while (!this.atEnd()) {
      if (this.acceptType('comma') != null) {
        let ref = this.guard(() => this.parseTableRef());
        if (ref != null) {
          result.joins.push({ ...ref, type: 'CROSS', on: null, onText: null });
        }
        continue;
      }
      let start = this.pos;
      let type = this.guard(() => this.parseJoinType());
      if (type == null) {
        if (this.pos === start) break;
        continue;
      }
      let joinToken = this.tokens[start];
      let ref = this.guard(() => this.parseTableRef());
      let on: Expression | null = null;
      let onText: string | null = null;
      if (this.acceptKeyword('ON')) {
        let onStart = this.pos;
        on = this.guard(() => this.parseExpression());
        onText = this.textBetween(onStart, this.pos);
      } else if (this.isKeyword('USING')) {
        this.diagnose('unsupported', 'JOIN ... USING',
          this.peek());
        this.pos++;
        this.skipParens();
      } else if (type === 'LEFT' || type === 'RIGHT') {
        this.diagnose('unexpected_token', `${type} JOIN requires ON`,
          joinToken);
      }
      if (ref != null) {
        result.joins.push({ ...ref, type: on == null ? 'CROSS' : type, on,
          onText });
      }
    }
  }
  skipParens(): void {
    if (this.peek()?.type !== 'lparen') return;
    let close = findClosingParen(this.tokens, this.pos);
    this.pos = close === -1 || close >= this.end ? this.end : close + 1;
  }
  parseOrderItem(): OrderByItem {
    let start = this.pos;
    let expression = this.parseExpression();
    let text = this.textBetween(start, this.pos);
    let direction: 'ASC' | 'DESC' = 'ASC';
    if (this.acceptKeyword('DESC')) direction = 'DESC';
    else this.acceptKeyword('ASC');
    return { expression, direction, text };
  }
  parseCount(): number {
    let token: Token | undefined = this.peek();
    if (token == null || token.type !== 'number' || token.value.includes('.')) {
      this.fail('Expected a row count', token);
    }
    this.pos++;
    return parseInt(token.value, 10);
  }
  parseLimit(result: SelectClauses): void {
    let first = this.parseCount();
    if (this.acceptType('comma') != null) {
      result.offset = first;
      result.limit = this.parseCount();
    } else if (this.acceptKeyword('OFFSET')) {
      result.limit = first;
      result.offset = this.parseCount();
    } else {
      result.limit = first;
    }
  }
}
