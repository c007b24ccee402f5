/**
 * Built-in functions of TW BASIC.
 */

import { Value, mkNumber, mkText, asNumber, asText, formatNumber } from '../values';
import { RuntimeError } from '../errors';
import { RandomState, nextFloat } from '../random';

export interface BasicFunction {
  minArgs: number;
  maxArgs: number;
  call(args: Value[], random: RandomState): Value;
}

function numeric(name: string, fn: (n: number) => number): BasicFunction {
  return {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkNumber(fn(asNumber(args[0], `argument of ${name}`))),
  };
}

function textIndex(n: number, name: string): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new RuntimeError('invalid-argument', `${name} expects a non-negative whole number, got ${formatNumber(n)}`);
  }
  return n;
}

const functions: Record<string, BasicFunction> = {
  ABS: numeric('ABS', Math.abs),
  INT: numeric('INT', Math.floor),
  SGN: numeric('SGN', Math.sign),
  SIN: numeric('SIN', Math.sin),
  COS: numeric('COS', Math.cos),
  TAN: numeric('TAN', Math.tan),
  ATN: numeric('ATN', Math.atan),
  EXP: numeric('EXP', Math.exp),
  SQR: numeric('SQR', (n) => {
    if (n < 0) throw new RuntimeError('invalid-argument', 'SQR of a negative number');
    return Math.sqrt(n);
  }),
  LOG: numeric('LOG', (n) => {
    if (n <= 0) throw new RuntimeError('invalid-argument', 'LOG of a non-positive number');
    return Math.log(n);
  }),
  RND: {
    minArgs: 0,
    maxArgs: 1,
    call: (args, random) => {
      const r = nextFloat(random);
      if (args.length === 0) return mkNumber(r);
      // RND(n) with n > 1 gives a whole number from 1 to n
      const n = asNumber(args[0], 'argument of RND');
      return mkNumber(n > 1 ? Math.floor(r * n) + 1 : r);
    },
  },
  LEN: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkNumber(asText(args[0], 'argument of LEN').length),
  },
  'LEFT$': {
    minArgs: 2,
    maxArgs: 2,
    call: (args) => mkText(asText(args[0], 'LEFT$ text').slice(0, textIndex(asNumber(args[1], 'LEFT$ length'), 'LEFT$'))),
  },
  'RIGHT$': {
    minArgs: 2,
    maxArgs: 2,
    call: (args) => {
      const s = asText(args[0], 'RIGHT$ text');
      const n = textIndex(asNumber(args[1], 'RIGHT$ length'), 'RIGHT$');
      return mkText(n === 0 ? '' : s.slice(-n));
    },
  },
  'MID$': {
    minArgs: 2,
    maxArgs: 3,
    call: (args) => {
      const s = asText(args[0], 'MID$ text');
      // positions are 1-based
      const start = textIndex(asNumber(args[1], 'MID$ start') - 1, 'MID$');
      if (args.length === 2) return mkText(s.slice(start));
      const length = textIndex(asNumber(args[2], 'MID$ length'), 'MID$');
      return mkText(s.slice(start, start + length));
    },
  },
  'STR$': {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkText(formatNumber(asNumber(args[0], 'argument of STR$'))),
  },
  VAL: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => {
      const n = parseFloat(asText(args[0], 'argument of VAL'));
      return mkNumber(Number.isFinite(n) ? n : 0);
    },
  },
  'CHR$': {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkText(String.fromCharCode(asNumber(args[0], 'argument of CHR$'))),
  },
  ASC: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => {
      const s = asText(args[0], 'argument of ASC');
      if (s === '') throw new RuntimeError('invalid-argument', 'ASC of empty text');
      return mkNumber(s.charCodeAt(0));
    },
  },
  'UPPER$': {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkText(asText(args[0], 'argument of UPPER$').toUpperCase()),
  },
  'LOWER$': {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkText(asText(args[0], 'argument of LOWER$').toLowerCase()),
  },
};
functions.SQRT = functions.SQR;
functions['UCASE$'] = functions['UPPER$'];
functions['LCASE$'] = functions['LOWER$'];

export const BASIC_FUNCTIONS: ReadonlyMap<string, BasicFunction> = new Map(Object.entries(functions));

/** Logo palette indices accepted by SETCOLOR. */
export const PALETTE: readonly string[] = [
  'black', 'blue', 'green', 'cyan', 'red', 'magenta', 'yellow', 'white',
  'brown', 'tan', 'forestgreen', 'aqua', 'salmon', 'purple', 'orange', 'grey',
];
