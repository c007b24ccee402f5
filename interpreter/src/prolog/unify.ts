/**
 * Unification and term identity for TW Prolog.
 */

import { Bindings, Term, Variable } from './terms';

export interface UnifyOptions {
  occursCheck: boolean;
}

function occurs(variable: Variable, term: Term, bindings: Bindings): boolean {
  const t = bindings.deref(term);
  if (t.kind === 'var') return t.id === variable.id;
  if (t.kind === 'compound') return t.args.some((a) => occurs(variable, a, bindings));
  return false;
}

/**
 * Make two terms equal by extending `bindings`. On failure the bindings made
 * during the attempt are left on the trail; callers undo to their own mark.
 */
export function unify(a: Term, b: Term, bindings: Bindings, options: UnifyOptions = { occursCheck: false }): boolean {
  const pending: Array<[Term, Term]> = [[a, b]];
  while (pending.length > 0) {
    const pair = pending.pop();
    if (pair === undefined) break;
    const x = bindings.deref(pair[0]);
    const y = bindings.deref(pair[1]);
    if (x.kind === 'var' && y.kind === 'var' && x.id === y.id) continue;
    if (x.kind === 'var') {
      if (options.occursCheck && occurs(x, y, bindings)) return false;
      bindings.bind(x, y);
      continue;
    }
    if (y.kind === 'var') {
      if (options.occursCheck && occurs(y, x, bindings)) return false;
      bindings.bind(y, x);
      continue;
    }
    switch (x.kind) {
      case 'atom':
        if (y.kind !== 'atom' || y.name !== x.name) return false;
        break;
      case 'number':
        if (y.kind !== 'number' || y.value !== x.value) return false;
        break;
      case 'string':
        if (y.kind !== 'string' || y.value !== x.value) return false;
        break;
      case 'compound':
        if (y.kind !== 'compound' || y.functor !== x.functor || y.args.length !== x.args.length) return false;
        for (let i = x.args.length - 1; i >= 0; i--) pending.push([x.args[i], y.args[i]]);
        break;
    }
  }
  return true;
}

/** `==`: equal without binding anything. */
export function identical(a: Term, b: Term, bindings: Bindings): boolean {
  const x = bindings.deref(a);
  const y = bindings.deref(b);
  switch (x.kind) {
    case 'var': return y.kind === 'var' && y.id === x.id;
    case 'atom': return y.kind === 'atom' && y.name === x.name;
    case 'number': return y.kind === 'number' && y.value === x.value;
    case 'string': return y.kind === 'string' && y.value === x.value;
    case 'compound':
      return y.kind === 'compound'
        && y.functor === x.functor
        && y.args.length === x.args.length
        && x.args.every((arg, i) => identical(arg, y.args[i], bindings));
  }
}
