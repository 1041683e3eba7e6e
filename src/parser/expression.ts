import {
  AggregateName, CompareOp, Diagnostic, DiagnosticCode, Expression, Token,
  TokenType,
} from './type';
import { findClosingParen, isKeyword } from './tokenize';
import { NULL, boolean, float, integer, text } from '../value';

export const RESERVED = new Set([
  'SELECT', 'FROM', 'WHERE', 'GROUP', 'BY', 'HAVING', 'ORDER', 'LIMIT',
  'OFFSET', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'OUTER', 'CROSS', 'FULL', 'ON',
  'USING', 'AS', 'AND', 'OR', 'NOT', 'IN', 'LIKE', 'BETWEEN', 'IS', 'NULL',
  'UNION', 'ALL', 'DISTINCT', 'ASC', 'DESC', 'WITH', 'RECURSIVE', 'TRUE',
  'FALSE', 'EXISTS',
]);

const AGGREGATES: AggregateName[] = ['count', 'sum', 'avg', 'min', 'max'];

const COMPARE_OPS: { [key: string]: CompareOp } = {
  '=': '=',
  '<>': '<>',
  '!=': '<>',
  '<': '<',
  '>': '>',
  '<=': '<=',
  '>=': '>=',
};

function isAggregateName(name: string): name is AggregateName {
  return AGGREGATES.some(aggr => aggr === name);
}

// Raised inside the parser to unwind to the nearest clause boundary. Never
// leaves parse().
export class ParseFailure extends Error {
  token: Token | null;
  code: DiagnosticCode;
  constructor(message: string, token: Token | null,
    code: DiagnosticCode = 'unexpected_token',
  ) {
    super(message);
    this.token = token;
    this.code = code;
  }
}

/**
 * Recursive-descent parser over a token window. Precedence from loosest to
 * tightest: OR, AND, NOT, predicates, + -, * / %, unary minus.
 */
export default class ExpressionParser {
  source: string;
  tokens: Token[];
  pos: number;
  end: number;
  diagnostics: Diagnostic[] = [];
  constructor(source: string, tokens: Token[], start: number = 0,
    end: number = tokens.length,
  ) {
    this.source = source;
    this.tokens = tokens;
    this.pos = start;
    this.end = end;
  }
  peek(offset: number = 0): Token | undefined {
    let index = this.pos + offset;
    return index < this.end ? this.tokens[index] : undefined;
  }
  advance(): Token | undefined {
    let token = this.peek();
    if (token != null) this.pos++;
    return token;
  }
  atEnd(): boolean {
    return this.pos >= this.end;
  }
  isKeyword(...keywords: string[]): boolean {
    return isKeyword(this.peek(), ...keywords);
  }
  acceptKeyword(...keywords: string[]): boolean {
    if (!this.isKeyword(...keywords)) return false;
    this.pos++;
    return true;
  }
  expectKeyword(keyword: string): Token {
    let token = this.peek();
    if (token == null || !isKeyword(token, keyword)) {
      this.fail(`Expected ${keyword}`, token);
    }
    this.pos++;
    return token;
  }
  acceptType(type: TokenType, value?: string): Token | null {
    let token = this.peek();
    if (token == null || token.type !== type) return null;
    if (value != null && token.value !== value) return null;
    this.pos++;
    return token;
  }
  expectType(type: TokenType, what: string): Token {
    let token = this.acceptType(type);
    if (token == null) this.fail(`Expected ${what}`, this.peek());
    return token;
  }
  fail(message: string, token: Token | undefined | null,
    code: DiagnosticCode = 'unexpected_token',
  ): never {
    let suffix = token != null ? '' : ' at end of input';
    throw new ParseFailure(message + suffix, token ?? null, code);
  }
  diagnose(code: DiagnosticCode, message: string,
    token: Token | undefined | null,
  ): void {
    this.diagnostics.push({
      code,
      message,
      near: token != null ? token.value : null,
      position: token != null ? token.start : this.source.length,
    });
  }
  textBetween(start: number, end: number): string {
    if (end <= start) return '';
    return this.source.slice(this.tokens[start].start,
      this.tokens[end - 1].end);
  }
  isIdentifier(token: Token | undefined): boolean {
    if (token == null) return false;
    if (token.type === 'ident') return true;
    return token.type === 'word' && !RESERVED.has(token.value.toUpperCase());
  }

  parseExpression(): Expression {
    return this.parseOr();
  }
  parseOr(): Expression {
    let values = [this.parseAnd()];
    while (this.acceptKeyword('OR')) values.push(this.parseAnd());
    if (values.length === 1) return values[0];
    return { type: 'logical', op: 'or', values };
  }
  parseAnd(): Expression {
    let values = [this.parseNot()];
    while (this.acceptKeyword('AND')) values.push(this.parseNot());
    if (values.length === 1) return values[0];
    return { type: 'logical', op: 'and', values };
  }
  parseNot(): Expression {
    if (this.acceptKeyword('NOT')) {
      return { type: 'unary', op: 'not', value: this.parseNot() };
    }
    return this.parsePredicate();
  }
  parsePredicate(): Expression {
    let left = this.parseAdditive();
    let token = this.peek();
    if (token != null && token.type === 'op' && COMPARE_OPS[token.value]) {
      this.pos++;
      let right = this.parseAdditive();
      return { type: 'compare', op: COMPARE_OPS[token.value], left, right };
    }
    if (this.acceptKeyword('IS')) {
      let not = this.acceptKeyword('NOT');
      this.expectKeyword('NULL');
      return { type: 'isNull', not, target: left };
    }
    let not = false;
    if (this.isKeyword('NOT') && isKeyword(this.peek(1), 'LIKE', 'IN',
      'BETWEEN')) {
      this.pos++;
      not = true;
    }
    if (this.acceptKeyword('LIKE')) {
      return { type: 'like', not, target: left,
        pattern: this.parseAdditive() };
    }
    if (this.acceptKeyword('IN')) {
      return this.parseInList(left, not);
    }
    if (this.acceptKeyword('BETWEEN')) {
      let min = this.parseAdditive();
      this.expectKeyword('AND');
      let max = this.parseAdditive();
      return { type: 'between', not, target: left, min, max };
    }
    return left;
  }
  parseInList(target: Expression, not: boolean): Expression {
    let open = this.pos;
    this.expectType('lparen', '(');
    if (this.isKeyword('SELECT')) {
      let subquery = this.parseSubquery(open);
      return { type: 'in', not, target, values: [subquery] };
    }
    let values: Expression[] = [];
    if (this.acceptType('rparen') == null) {
      do {
        values.push(this.parseAdditive());
      } while (this.acceptType('comma') != null);
      this.expectType('rparen', ')');
    }
    return { type: 'in', not, target, values };
  }
  // Expects pos just past the opening parenthesis at `open`.
  parseSubquery(open: number): Expression {
    let close = findClosingParen(this.tokens, open);
    if (close === -1 || close >= this.end) {
      this.fail('Unclosed subquery', this.tokens[open]);
    }
    let text = this.textBetween(open + 1, close);
    this.diagnose('unsupported', 'Subqueries',
      this.tokens[open + 1]);
    this.pos = close + 1;
    return { type: 'subquery', text };
  }
  peekOp(): string | null {
    let token = this.peek();
    return token != null && token.type === 'op' ? token.value : null;
  }
  parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (true) {
      let op = this.peekOp();
      if (op !== '+' && op !== '-') break;
      this.pos++;
      let right = this.parseMultiplicative();
      left = { type: 'binary', op, left, right };
    }
    return left;
  }
  parseMultiplicative(): Expression {
    let left = this.parseUnary();
    while (true) {
      let op = this.peekOp();
      if (op !== '*' && op !== '/' && op !== '%') break;
      this.pos++;
      let right = this.parseUnary();
      left = { type: 'binary', op, left, right };
    }
    return left;
  }
  parseUnary(): Expression {
    if (this.acceptType('op', '-') != null) {
      let value = this.parseUnary();
      if (value.type === 'literal' && value.value.type === 'integer') {
        return { type: 'literal', value: integer(-value.value.value) };
      }
      if (value.type === 'literal' && value.value.type === 'float') {
        return { type: 'literal', value: float(-value.value.value) };
      }
      return { type: 'unary', op: '-', value };
    }
    if (this.acceptType('op', '+') != null) return this.parseUnary();
    return this.parsePrimary();
  }
  parsePrimary(): Expression {
    let token = this.peek();
    if (token == null) this.fail('Expected an expression', token);
    switch (token.type) {
      case 'number':
        this.pos++;
        return {
          type: 'literal',
          value: token.value.includes('.')
            ? float(parseFloat(token.value))
            : integer(parseInt(token.value, 10)),
        };
      case 'string':
        this.pos++;
        return { type: 'literal', value: text(token.value) };
      case 'lparen': {
        let open = this.pos;
        this.pos++;
        if (this.isKeyword('SELECT')) return this.parseSubquery(open);
        let inner = this.parseExpression();
        this.expectType('rparen', ')');
        return inner;
      }
      case 'word':
      case 'ident':
        return this.parseName(token);
      default:
        this.fail('Unexpected token', token);
    }
  }
  parseName(token: Token): Expression {
    let upper = token.value.toUpperCase();
    if (token.type === 'word') {
      if (upper === 'NULL') {
        this.pos++;
        return { type: 'literal', value: NULL };
      }
      if (upper === 'TRUE' || upper === 'FALSE') {
        this.pos++;
        return { type: 'literal', value: boolean(upper === 'TRUE') };
      }
      if (upper === 'EXISTS' && this.peek(1)?.type === 'lparen') {
        this.pos += 2;
        if (!this.isKeyword('SELECT')) this.fail('Expected SELECT', this.peek());
        return this.parseSubquery(this.pos - 1);
      }
      if (this.peek(1)?.type === 'lparen') return this.parseCall(token);
      if (RESERVED.has(upper)) this.fail('Unexpected keyword', token);
    }
    this.pos++;
    if (this.acceptType('dot') == null) {
      return { type: 'column', table: null, name: token.value };
    }
    let qualifier = token.value.toLowerCase();
    if (this.acceptType('op', '*') != null) {
      return { type: 'wildcard', table: qualifier };
    }
    let name = this.peek();
    if (name == null || (name.type !== 'word' && name.type !== 'ident')) {
      this.fail('Expected a column name', name);
    }
    this.pos++;
    return { type: 'column', table: qualifier, name: name.value };
  }
  parseCall(token: Token): Expression {
    let name = token.value.toLowerCase();
    this.pos += 2;
    if (isAggregateName(name)) {
      let distinct = this.acceptKeyword('DISTINCT');
      if (!distinct) this.acceptKeyword('ALL');
      let value: Expression | null;
      if (this.acceptType('op', '*') != null) {
        if (name !== 'count' || distinct) {
          this.fail(`${name.toUpperCase()}(*) is not valid`, token);
        }
        value = null;
      } else {
        value = this.parseExpression();
      }
      this.expectType('rparen', ')');
      return { type: 'aggregation', name, distinct, value };
    }
    let args: Expression[] = [];
    if (this.acceptType('rparen') == null) {
      do {
        args.push(this.parseExpression());
      } while (this.acceptType('comma') != null);
      this.expectType('rparen', ')');
    }
    return { type: 'function', name, args };
  }
}
