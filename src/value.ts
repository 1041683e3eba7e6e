import { TypeMismatchError } from './errors';

export type IntegerValue = { type: 'integer', value: number };
export type FloatValue = { type: 'float', value: number };
export type TextValue = { type: 'text', value: string };
export type BooleanValue = { type: 'boolean', value: boolean };
export type DateValue = { type: 'date', value: Date };
export type NullValue = { type: 'null' };

export type Value = IntegerValue | FloatValue | TextValue | BooleanValue |
  DateValue | NullValue;

export type ValueType = Value['type'];

// What the dataset hands us, and what callers usually want back.
export type Scalar = number | string | boolean | Date | null;

export const NULL: NullValue = { type: 'null' };

export function integer(value: number): IntegerValue {
  return { type: 'integer', value: Math.trunc(value) };
}

export function float(value: number): FloatValue {
  return { type: 'float', value };
}

export function text(value: string): TextValue {
  return { type: 'text', value };
}

export function boolean(value: boolean): BooleanValue {
  return { type: 'boolean', value };
}

export function date(value: Date): DateValue {
  return { type: 'date', value };
}

export function fromScalar(input: Scalar | undefined): Value {
  if (input == null) return NULL;
  if (typeof input === 'number') {
    return Number.isInteger(input) ? integer(input) : float(input);
  }
  if (typeof input === 'string') return text(input);
  if (typeof input === 'boolean') return boolean(input);
  return date(input);
}

export function toScalar(input: Value): Scalar {
  if (input.type === 'null') return null;
  return input.value;
}

export function toPlainRows(
  rows: { [column: string]: Value }[], columns: string[],
): { [column: string]: Scalar }[] {
  return rows.map(row => {
    let output: { [column: string]: Scalar } = {};
    for (let column of columns) {
      output[column] = toScalar(row[column] ?? NULL);
    }
    return output;
  });
}

export function isNull(input: Value): input is NullValue {
  return input.type === 'null';
}

function isNumeric(input: Value): input is IntegerValue | FloatValue {
  return input.type === 'integer' || input.type === 'float';
}

function numericOf(input: Value): number | null {
  if (isNumeric(input)) return input.value;
  if (input.type === 'boolean') return input.value ? 1 : 0;
  return null;
}

function parseDate(input: string): number | null {
  let time = Date.parse(input);
  return isNaN(time) ? null : time;
}

function sign(diff: number): number {
  if (diff > 0) return 1;
  if (diff < 0) return -1;
  return 0;
}

/**
 * Compares two non-null values. Returns null when either side is NULL, which
 * callers treat as Unknown. Throws TypeMismatchError when the kinds cannot be
 * compared at all.
 */
export function compareValues(a: Value, b: Value): number | null {
  if (a.type === 'null' || b.type === 'null') return null;
  if (a.type === 'text' && b.type === 'text') {
    if (a.value < b.value) return -1;
    if (a.value > b.value) return 1;
    return 0;
  }
  if (a.type === 'date' || b.type === 'date') {
    let left = a.type === 'date' ? a.value.getTime() :
      a.type === 'text' ? parseDate(a.value) : null;
    let right = b.type === 'date' ? b.value.getTime() :
      b.type === 'text' ? parseDate(b.value) : null;
    if (left == null || right == null) {
      throw new TypeMismatchError(a.type, b.type, describe(a));
    }
    return sign(left - right);
  }
  if (a.type === 'boolean' && b.type === 'boolean') {
    return sign(Number(a.value) - Number(b.value));
  }
  let left = numericOf(a);
  let right = numericOf(b);
  if (left == null || right == null) {
    throw new TypeMismatchError(a.type, b.type, describe(a));
  }
  return sign(left - right);
}

// Rank used to keep sorting total across mixed kinds.
const TYPE_RANK: { [key in ValueType]: number } = {
  null: 0,
  boolean: 1,
  integer: 2,
  float: 2,
  date: 3,
  text: 4,
};

/**
 * Total order for ORDER BY: NULL sorts lowest, kinds that cannot be compared
 * fall back to a fixed rank so the sort stays deterministic.
 */
export function sortCompare(a: Value, b: Value): number {
  if (a.type === 'null') return b.type === 'null' ? 0 : -1;
  if (b.type === 'null') return 1;
  try {
    let result = compareValues(a, b);
    if (result != null) return result;
  } catch (e) {
    if (!(e instanceof TypeMismatchError)) throw e;
  }
  return sign(TYPE_RANK[a.type] - TYPE_RANK[b.type]);
}

export function valuesEqual(a: Value, b: Value): boolean | null {
  let result = compareValues(a, b);
  if (result == null) return null;
  return result === 0;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';

export function arithmetic(op: ArithmeticOp, a: Value, b: Value): Value {
  if (a.type === 'null' || b.type === 'null') return NULL;
  let left = numericOf(a);
  let right = numericOf(b);
  if (left == null || right == null) {
    throw new TypeMismatchError(a.type, b.type, describe(a));
  }
  let bothInteger = a.type !== 'float' && b.type !== 'float';
  switch (op) {
    case '+':
      return bothInteger ? integer(left + right) : float(left + right);
    case '-':
      return bothInteger ? integer(left - right) : float(left - right);
    case '*':
      return bothInteger ? integer(left * right) : float(left * right);
    case '/':
      if (right === 0) return NULL;
      return float(left / right);
    case '%':
      if (right === 0) return NULL;
      return bothInteger ? integer(left % right) : float(left % right);
  }
}

export function negate(input: Value): Value {
  if (input.type === 'integer') return integer(-input.value);
  if (input.type === 'float') return float(-input.value);
  if (input.type === 'null') return NULL;
  throw new TypeMismatchError(input.type, 'integer', describe(input));
}

export function truthy(input: Value): boolean | null {
  switch (input.type) {
    case 'null':
      return null;
    case 'boolean':
      return input.value;
    case 'integer':
    case 'float':
      return input.value !== 0;
    case 'text':
      return input.value.length > 0;
    case 'date':
      return true;
  }
}

export function stringify(input: Value): string {
  switch (input.type) {
    case 'null':
      return 'NULL';
    case 'date':
      return input.value.toISOString().slice(0, 10);
    case 'boolean':
      return input.value ? 'TRUE' : 'FALSE';
    default:
      return String(input.value);
  }
}

function describe(input: Value): string {
  return input.type === 'text' ? `'${input.value}'` : stringify(input);
}
