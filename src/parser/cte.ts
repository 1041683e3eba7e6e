import tokenize, { findClosingParen, isKeyword } from './tokenize';
import { CTEDefinition, Diagnostic, Token } from './type';

export interface CTEPrefix {
  ctes: CTEDefinition[],
  isRecursive: boolean,
  // Token index where the main statement starts.
  mainStart: number,
  diagnostics: Diagnostic[],
}

function diagnostic(message: string, token: Token | undefined,
  source: string,
): Diagnostic {
  return {
    code: 'unexpected_token',
    message,
    near: token != null ? token.value : null,
    position: token != null ? token.start : source.length,
  };
}

function isName(token: Token | undefined): token is Token {
  return token != null && (token.type === 'word' || token.type === 'ident');
}

// Keywords that close a FROM list at its own parenthesis depth.
const FROM_LIST_END = ['WHERE', 'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'UNION'];

/**
 * Whether the body reads from `name` through FROM, JOIN or a comma join
 * following a FROM target.
 */
export function referencesTable(body: string, name: string): boolean {
  let tokens = tokenize(body);
  let target = name.toLowerCase();
  // Parenthesis depths whose FROM list is still open.
  let fromDepths: number[] = [];
  let depth = 0;
  let expectTable = false;
  let inFromList = () => fromDepths[fromDepths.length - 1] === depth;
  for (let token of tokens) {
    if (expectTable && isName(token) &&
      token.value.toLowerCase() === target) {
      return true;
    }
    expectTable = false;
    if (token.type === 'lparen') {
      depth++;
    } else if (token.type === 'rparen') {
      if (inFromList()) fromDepths.pop();
      depth--;
    } else if (token.type === 'comma') {
      expectTable = inFromList();
    } else if (isKeyword(token, 'FROM')) {
      if (!inFromList()) fromDepths.push(depth);
      expectTable = true;
    } else if (isKeyword(token, 'JOIN')) {
      expectTable = true;
    } else if (isKeyword(token, ...FROM_LIST_END) && inFromList()) {
      fromDepths.pop();
    }
  }
  return false;
}

/**
 * Peels `WITH [RECURSIVE] name [(cols)] AS (body) [, ...]` off the front of
 * the token list. Bodies are located by parenthesis depth, so nested
 * parentheses inside them are harmless.
 */
export function extractCtes(source: string, tokens: Token[]): CTEPrefix {
  let result: CTEPrefix = {
    ctes: [],
    isRecursive: false,
    mainStart: 0,
    diagnostics: [],
  };
  if (!isKeyword(tokens[0], 'WITH')) return result;
  let pos = 1;
  if (isKeyword(tokens[pos], 'RECURSIVE')) {
    result.isRecursive = true;
    pos++;
  }
  while (pos < tokens.length) {
    let nameToken = tokens[pos];
    if (!isName(nameToken)) {
      result.diagnostics.push(
        diagnostic('Expected a CTE name', nameToken, source));
      break;
    }
    pos++;
    let columns: string[] = [];
    if (tokens[pos]?.type === 'lparen') {
      let close = findClosingParen(tokens, pos);
      if (close === -1) {
        result.diagnostics.push(
          diagnostic('Unclosed CTE column list', tokens[pos], source));
        pos = tokens.length;
        break;
      }
      for (let i = pos + 1; i < close; ++i) {
        let token = tokens[i];
        if (isName(token)) columns.push(token.value);
      }
      pos = close + 1;
    }
    if (!isKeyword(tokens[pos], 'AS')) {
      result.diagnostics.push(diagnostic('Expected AS', tokens[pos], source));
      break;
    }
    pos++;
    if (tokens[pos]?.type !== 'lparen') {
      result.diagnostics.push(diagnostic('Expected (', tokens[pos], source));
      break;
    }
    let close = findClosingParen(tokens, pos);
    if (close === -1) {
      result.diagnostics.push(
        diagnostic('Unclosed CTE body', tokens[pos], source));
      pos = tokens.length;
      break;
    }
    let query = close > pos + 1
      ? source.slice(tokens[pos + 1].start, tokens[close - 1].end).trim()
      : '';
    let name = nameToken.value.toLowerCase();
    result.ctes.push({
      name,
      query,
      columns,
      isRecursive: result.isRecursive && referencesTable(query, name),
    });
    pos = close + 1;
    if (tokens[pos]?.type === 'comma') {
      pos++;
      continue;
    }
    break;
  }
  result.mainStart = Math.min(pos, tokens.length);
  return result;
}

/**
 * Splits a query at every top-level UNION ALL.
 */
export function splitUnionAll(sql: string): string[] {
  let tokens = tokenize(sql);
  let parts: string[] = [];
  let depth = 0;
  let partStart = 0;
  for (let i = 0; i < tokens.length; ++i) {
    let token = tokens[i];
    if (token.type === 'lparen') depth++;
    else if (token.type === 'rparen') depth--;
    else if (depth === 0 && isKeyword(token, 'UNION') &&
      isKeyword(tokens[i + 1], 'ALL')) {
      parts.push(sql.slice(partStart, token.start).trim());
      partStart = tokens[i + 1].end;
      i++;
    }
  }
  parts.push(sql.slice(partStart).trim());
  return parts;
}
