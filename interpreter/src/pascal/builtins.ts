/**
 * Built-in functions of TW Pascal.
 */

import { Value, mkBoolean, mkNumber, mkText, asNumber, asText, describeKind } from '../values';
import { RuntimeError, TypeMismatchError } from '../errors';
import { RandomState, nextFloat, nextInt } from '../random';

export interface PascalBuiltin {
  minArgs: number;
  maxArgs: number;
  call(args: Value[], random: RandomState): Value;
}

function numeric(fn: (n: number) => number): PascalBuiltin {
  return { minArgs: 1, maxArgs: 1, call: (args) => mkNumber(fn(asNumber(args[0]))) };
}

function text(fn: (s: string) => string): PascalBuiltin {
  return { minArgs: 1, maxArgs: 1, call: (args) => mkText(fn(asText(args[0]))) };
}

/** Round half away from zero. */
function round(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n));
}

const builtins: Record<string, PascalBuiltin> = {
  abs: numeric(Math.abs),
  sqr: numeric((n) => n * n),
  sqrt: numeric((n) => {
    if (n < 0) throw new RuntimeError('invalid-argument', 'sqrt of a negative number');
    return Math.sqrt(n);
  }),
  sin: numeric(Math.sin),
  cos: numeric(Math.cos),
  arctan: numeric(Math.atan),
  exp: numeric(Math.exp),
  ln: numeric((n) => {
    if (n <= 0) throw new RuntimeError('invalid-argument', 'ln of a non-positive number');
    return Math.log(n);
  }),
  round: numeric(round),
  trunc: numeric(Math.trunc),
  odd: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkBoolean(Math.abs(asNumber(args[0])) % 2 === 1),
  },
  length: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => {
      const v = args[0];
      if (v.kind === 'text') return mkNumber(v.value.length);
      if (v.kind === 'list') return mkNumber(v.elements.length);
      throw new TypeMismatchError(`length expects a string or an array, got ${describeKind(v.kind)}`);
    },
  },
  upcase: text((s) => s.toUpperCase()),
  lowercase: text((s) => s.toLowerCase()),
  chr: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => mkText(String.fromCharCode(asNumber(args[0]))),
  },
  ord: {
    minArgs: 1,
    maxArgs: 1,
    call: (args) => {
      const v = args[0];
      if (v.kind === 'boolean') return mkNumber(v.value ? 1 : 0);
      if (v.kind === 'number') return v;
      const s = asText(v);
      if (s === '') throw new RuntimeError('invalid-argument', 'ord of an empty string');
      return mkNumber(s.charCodeAt(0));
    },
  },
  copy: {
    minArgs: 3,
    maxArgs: 3,
    call: (args) => {
      const s = asText(args[0]);
      const start = Math.max(1, asNumber(args[1]));
      const count = Math.max(0, asNumber(args[2]));
      return mkText(s.slice(start - 1, start - 1 + count));
    },
  },
  pos: {
    minArgs: 2,
    maxArgs: 2,
    call: (args) => mkNumber(asText(args[1]).indexOf(asText(args[0])) + 1),
  },
  random: {
    minArgs: 0,
    maxArgs: 1,
    call: (args, random) => {
      if (args.length === 0) return mkNumber(nextFloat(random));
      const n = asNumber(args[0]);
      if (!Number.isInteger(n) || n < 1) {
        throw new RuntimeError('invalid-argument', 'random expects a positive whole number');
      }
      return mkNumber(nextInt(random, 0, n));
    },
  },
};

export const PASCAL_BUILTINS: ReadonlyMap<string, PascalBuiltin> = new Map(Object.entries(builtins));
