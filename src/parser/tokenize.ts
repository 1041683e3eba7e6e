import { Token } from './type';

const OPS = ['<=', '>=', '<>', '!=', '=', '<', '>', '+', '-', '*', '/', '%'];

const PUNCTUATION: { [key: string]: Token['type'] } = {
  ',': 'comma',
  '.': 'dot',
  '(': 'lparen',
  ')': 'rparen',
  ';': 'semicolon',
};

function isWordStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isWordPart(char: string): boolean {
  return /[A-Za-z0-9_$]/.test(char);
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/**
 * Splits SQL into tokens. Never throws: characters outside the grammar
 * become 'unknown' tokens and an unclosed string is flagged on its token.
 */
export default function tokenize(input: string): Token[] {
  let tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    let char = input[i];
    if (/\s/.test(char)) {
      i++;
      continue;
    }
    // Line comments
    if (char === '-' && input[i + 1] === '-') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }
    if (char === '\'' || char === '"') {
      let start = i;
      let quote = char;
      let value = '';
      let closed = false;
      i++;
      while (i < input.length) {
        if (input[i] === '\\' && i + 1 < input.length) {
          value += input[i + 1];
          i += 2;
        } else if (input[i] === quote) {
          if (input[i + 1] === quote) {
            value += quote;
            i += 2;
          } else {
            i++;
            closed = true;
            break;
          }
        } else {
          value += input[i];
          i++;
        }
      }
      let token: Token = { type: 'string', value, start, end: i };
      if (!closed) token.unterminated = true;
      tokens.push(token);
      continue;
    }
    if (char === '`') {
      let start = i;
      let close = input.indexOf('`', i + 1);
      let end = close === -1 ? input.length : close;
      let token: Token = {
        type: 'ident',
        value: input.slice(i + 1, end),
        start,
        end: close === -1 ? input.length : close + 1,
      };
      if (close === -1) token.unterminated = true;
      tokens.push(token);
      i = token.end;
      continue;
    }
    if (isDigit(char)) {
      let start = i;
      while (i < input.length && isDigit(input[i])) i++;
      if (input[i] === '.' && isDigit(input[i + 1] ?? '')) {
        i++;
        while (i < input.length && isDigit(input[i])) i++;
      }
      tokens.push({ type: 'number', value: input.slice(start, i), start,
        end: i });
      continue;
    }
    if (isWordStart(char)) {
      let start = i;
      while (i < input.length && isWordPart(input[i])) i++;
      tokens.push({ type: 'word', value: input.slice(start, i), start,
        end: i });
      continue;
    }
    let punctuation = PUNCTUATION[char];
    if (punctuation != null) {
      tokens.push({ type: punctuation, value: char, start: i, end: i + 1 });
      i++;
      continue;
    }
    let op = OPS.find(candidate => input.startsWith(candidate, i));
    if (op != null) {
      tokens.push({ type: 'op', value: op, start: i, end: i + op.length });
      i += op.length;
      continue;
    }
    tokens.push({ type: 'unknown', value: char, start: i, end: i + 1 });
    i++;
  }
  return tokens;
}

export function isKeyword(token: Token | undefined, ...keywords: string[]) {
  if (token == null || token.type !== 'word') return false;
  return keywords.includes(token.value.toUpperCase());
}

/**
 * Index of the right parenthesis matching the left one at `open`, or -1.
 */
export function findClosingParen(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; ++i) {
    if (tokens[i].type === 'lparen') depth++;
    else if (tokens[i].type === 'rparen') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
