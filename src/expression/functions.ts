import {
  NULL, Value, float, integer, stringify, text,
} from '../value';
import { TypeMismatchError } from '../errors';

export interface ScalarFunction {
  minArgs: number,
  maxArgs: number,
  call: (args: Value[]) => Value,
}

function dateOf(input: Value): Date {
  if (input.type === 'date') return input.value;
  if (input.type === 'text') {
    let parsed = new Date(input.value);
    if (!isNaN(parsed.getTime())) return parsed;
  }
  throw new TypeMismatchError('date', input.type);
}

function roundHalfAway(value: number, digits: number): number {
  let factor = Math.pow(10, digits);
  return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}

const FUNCTIONS: { [name: string]: ScalarFunction } = {
  upper: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => input.type === 'null'
      ? NULL : text(stringify(input).toUpperCase()),
  },
  lower: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => input.type === 'null'
      ? NULL : text(stringify(input).toLowerCase()),
  },
  length: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => input.type === 'null'
      ? NULL : integer(stringify(input).length),
  },
  abs: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => {
      if (input.type === 'null') return NULL;
      if (input.type === 'integer') return integer(Math.abs(input.value));
      if (input.type === 'float') return float(Math.abs(input.value));
      throw new TypeMismatchError('integer', input.type);
    },
  },
  round: {
    minArgs: 1,
    maxArgs: 2,
    call: ([input, digitsValue]) => {
      if (input.type === 'null') return NULL;
      let digits = 0;
      if (digitsValue != null) {
        if (digitsValue.type === 'null') return NULL;
        if (digitsValue.type !== 'integer') {
          throw new TypeMismatchError('integer', digitsValue.type);
        }
        digits = digitsValue.value;
      }
      if (input.type !== 'integer' && input.type !== 'float') {
        throw new TypeMismatchError('float', input.type);
      }
      let rounded = roundHalfAway(input.value, digits);
      return digits <= 0 ? integer(rounded) : float(rounded);
    },
  },
  coalesce: {
    minArgs: 1,
    maxArgs: Infinity,
    call: args => args.find(arg => arg.type !== 'null') ?? NULL,
  },
  year: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => {
      if (input.type === 'null') return NULL;
      return integer(dateOf(input).getUTCFullYear());
    },
  },
  month: {
    minArgs: 1,
    maxArgs: 1,
    call: ([input]) => {
      if (input.type === 'null') return NULL;
      return integer(dateOf(input).getUTCMonth() + 1);
    },
  },
  concat: {
    minArgs: 1,
    maxArgs: Infinity,
    call: args => {
      if (args.some(arg => arg.type === 'null')) return NULL;
      return text(args.map(stringify).join(''));
    },
  },
};

export function getFunction(name: string): ScalarFunction | null {
  return FUNCTIONS[name.toLowerCase()] ?? null;
}

export function getFunctionNames(): string[] {
  return Object.keys(FUNCTIONS).map(name => name.toUpperCase());
}
