/**
 * Deterministic built-in predicates and arithmetic for TW Prolog.
 *
 * Control constructs (`,` `;` `->` `\+` `!` `call/1`) are handled by the
 * solver; nondeterministic list predicates are library clauses.
 */

import { RuntimeError } from '../errors';
import { IOChannel } from '../io';
import { Bindings, Term, Variable, formatTerm, listItems, mkList, mkNum } from './terms';
import { UnifyOptions, identical, unify } from './unify';

export type InputKind = 'readln' | 'readint';

export interface BuiltinContext {
  readonly bindings: Bindings;
  readonly unifyOptions: UnifyOptions;
  readonly channel: IOChannel;
  /** Suspend until the host supplies a line, then unify it with `target`. */
  requestInput(kind: InputKind, target: Term): void;
  halt(): void;
  freshVariable(): Variable;
}

/** Returns false when the goal fails. */
export type Builtin = (args: readonly Term[], ctx: BuiltinContext) => boolean;

function arithmeticError(detail: string): RuntimeError {
  return new RuntimeError('arithmetic', detail);
}

/**
 * Evaluate an arithmetic expression as `is/2` does.
 */
export function evaluate(term: Term, bindings: Bindings): number {
  const t = bindings.deref(term);
  switch (t.kind) {
    case 'number':
      return t.value;
    case 'var':
      throw arithmeticError(`unbound variable ${t.name} in arithmetic expression`);
    case 'atom':
      if (t.name === 'pi') return Math.PI;
      if (t.name === 'e') return Math.E;
      throw arithmeticError(`'${t.name}' is not a number`);
    case 'string':
      throw arithmeticError(`"${t.value}" is not a number`);
    case 'compound':
      break;
  }
  if (t.args.length === 1) {
    const x = evaluate(t.args[0], bindings);
    switch (t.functor) {
      case '-': return -x;
      case '+': return x;
      case 'abs': return Math.abs(x);
      case 'sqrt':
        if (x < 0) throw arithmeticError('sqrt of a negative number');
        return Math.sqrt(x);
      case 'sin': return Math.sin(x);
      case 'cos': return Math.cos(x);
      case 'exp': return Math.exp(x);
      case 'log':
        if (x <= 0) throw arithmeticError('log of a non-positive number');
        return Math.log(x);
      case 'truncate': return Math.trunc(x);
      case 'round': return Math.sign(x) * Math.round(Math.abs(x));
      case 'float': return x;
      default: break;
    }
  } else if (t.args.length === 2) {
    const x = evaluate(t.args[0], bindings);
    const y = evaluate(t.args[1], bindings);
    const nonZero = (): number => {
      if (y === 0) throw arithmeticError('division by zero');
      return y;
    };
    switch (t.functor) {
      case '+': return x + y;
      case '-': return x - y;
      case '*': return x * y;
      case '/': return x / nonZero();
      case '//': return Math.trunc(x / nonZero());
      // mod takes the sign of the divisor, rem of the dividend
      case 'mod': return ((x % nonZero()) + y) % y;
      case 'rem': return x % nonZero();
      case 'min': return Math.min(x, y);
      case 'max': return Math.max(x, y);
      case '**':
      case '^': return Math.pow(x, y);
      default: break;
    }
  }
  throw arithmeticError(`unknown arithmetic function ${t.functor}/${t.args.length}`);
}

function compare(test: (x: number, y: number) => boolean): Builtin {
  return (args, ctx) => test(evaluate(args[0], ctx.bindings), evaluate(args[1], ctx.bindings));
}

function typeCheck(test: (t: Term) => boolean): Builtin {
  return (args, ctx) => test(ctx.bindings.deref(args[0]));
}

const write: Builtin = (args, ctx) => {
  ctx.channel.write(args.map((a) => formatTerm(a, ctx.bindings)).join(''));
  return true;
};

const table: Array<[string, Builtin]> = [
  ['=/2', (args, ctx) => unify(args[0], args[1], ctx.bindings, ctx.unifyOptions)],
  ['\\=/2', (args, ctx) => {
    const mark = ctx.bindings.mark();
    const unified = unify(args[0], args[1], ctx.bindings, ctx.unifyOptions);
    ctx.bindings.undo(mark);
    return !unified;
  }],
  ['==/2', (args, ctx) => identical(args[0], args[1], ctx.bindings)],
  ['\\==/2', (args, ctx) => !identical(args[0], args[1], ctx.bindings)],
  ['is/2', (args, ctx) => unify(args[0], mkNum(evaluate(args[1], ctx.bindings)), ctx.bindings, ctx.unifyOptions)],
  ['=:=/2', compare((x, y) => x === y)],
  ['=\\=/2', compare((x, y) => x !== y)],
  ['</2', compare((x, y) => x < y)],
  ['>/2', compare((x, y) => x > y)],
  ['=</2', compare((x, y) => x <= y)],
  ['>=/2', compare((x, y) => x >= y)],
  ['nl/0', (_args, ctx) => {
    ctx.channel.writeLine('');
    return true;
  }],
  ['writeln/1', (args, ctx) => {
    ctx.channel.writeLine(formatTerm(args[0], ctx.bindings));
    return true;
  }],
  ['length/2', (args, ctx) => {
    const items = listItems(args[0], ctx.bindings);
    if (items !== null) return unify(args[1], mkNum(items.length), ctx.bindings, ctx.unifyOptions);
    const n = ctx.bindings.deref(args[1]);
    if (n.kind !== 'number' || !Number.isInteger(n.value) || n.value < 0) return false;
    const fresh = Array.from({ length: n.value }, () => ctx.freshVariable());
    return unify(args[0], mkList(fresh), ctx.bindings, ctx.unifyOptions);
  }],
  ['atom/1', typeCheck((t) => t.kind === 'atom')],
  ['number/1', typeCheck((t) => t.kind === 'number')],
  ['integer/1', typeCheck((t) => t.kind === 'number' && Number.isInteger(t.value))],
  ['atomic/1', typeCheck((t) => t.kind === 'atom' || t.kind === 'number' || t.kind === 'string')],
  ['var/1', typeCheck((t) => t.kind === 'var')],
  ['nonvar/1', typeCheck((t) => t.kind !== 'var')],
  ['is_list/1', (args, ctx) => listItems(args[0], ctx.bindings) !== null],
  ['readln/1', (args, ctx) => {
    ctx.requestInput('readln', args[0]);
    return true;
  }],
  ['readint/1', (args, ctx) => {
    ctx.requestInput('readint', args[0]);
    return true;
  }],
  ['halt/0', (_args, ctx) => {
    ctx.halt();
    return true;
  }],
];

// write/1 .. write/8 print their arguments one after another
for (let arity = 1; arity <= 8; arity++) table.push([`write/${arity}`, write]);

export const BUILTINS: ReadonlyMap<string, Builtin> = new Map(table);
