/**
 * Terms and bindings for TW Prolog.
 *
 * Terms are immutable. Variables are identified by number; their values live
 * in a `Bindings` store whose trail lets backtracking undo every binding made
 * after a given mark.
 */

import { formatNumber } from '../values';

export type Term =
  | { readonly kind: 'atom'; readonly name: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'var'; readonly id: number; readonly name: string }
  | { readonly kind: 'compound'; readonly functor: string; readonly args: readonly Term[] };

export type Compound = Extract<Term, { kind: 'compound' }>;
export type Variable = Extract<Term, { kind: 'var' }>;

export function mkAtom(name: string): Term {
  return { kind: 'atom', name };
}

export function mkNum(value: number): Term {
  return { kind: 'number', value };
}

export function mkStr(value: string): Term {
  return { kind: 'string', value };
}

export function mkVar(id: number, name = `_G${id}`): Variable {
  return { kind: 'var', id, name };
}

export function mkCompound(functor: string, args: readonly Term[]): Term {
  return args.length === 0 ? mkAtom(functor) : { kind: 'compound', functor, args };
}

export const NIL = mkAtom('[]');
export const TRUE = mkAtom('true');
export const FAIL = mkAtom('fail');

export function mkList(items: readonly Term[], tail: Term = NIL): Term {
  return items.reduceRight<Term>((rest, item) => mkCompound('.', [item, rest]), tail);
}

/** Predicate indicator `name/arity` of a callable term. */
export function indicator(term: Term): string | null {
  if (term.kind === 'atom') return `${term.name}/0`;
  if (term.kind === 'compound') return `${term.functor}/${term.args.length}`;
  return null;
}

export class Bindings {
  private readonly values = new Map<number, Term>();
  private readonly trail: number[] = [];

  bind(variable: Variable, value: Term): void {
    this.values.set(variable.id, value);
    this.trail.push(variable.id);
  }

  /** Follow variable bindings until an unbound variable or a non-variable. */
  deref(term: Term): Term {
    let current = term;
    while (current.kind === 'var') {
      const value = this.values.get(current.id);
      if (value === undefined) return current;
      current = value;
    }
    return current;
  }

  /** Apply bindings all the way down. */
  resolve(term: Term): Term {
    const t = this.deref(term);
    if (t.kind !== 'compound') return t;
    return { kind: 'compound', functor: t.functor, args: t.args.map((a) => this.resolve(a)) };
  }

  mark(): number {
    return this.trail.length;
  }

  undo(mark: number): void {
    while (this.trail.length > mark) {
      const id = this.trail.pop();
      if (id !== undefined) this.values.delete(id);
    }
  }
}

/**
 * Elements of a proper list, or null for partial lists and non-lists.
 */
export function listItems(term: Term, bindings: Bindings): Term[] | null {
  const items: Term[] = [];
  let current = bindings.deref(term);
  while (current.kind === 'compound' && current.functor === '.' && current.args.length === 2) {
    items.push(current.args[0]);
    current = bindings.deref(current.args[1]);
  }
  return current.kind === 'atom' && current.name === '[]' ? items : null;
}

/** Copy a term, shifting every variable id by `offset`. */
export function renameTerm(term: Term, offset: number): Term {
  switch (term.kind) {
    case 'var':
      return mkVar(term.id + offset, term.name);
    case 'compound':
      return { kind: 'compound', functor: term.functor, args: term.args.map((a) => renameTerm(a, offset)) };
    default:
      return term;
  }
}

// ---- Printing ----

const INFIX_PRINT = new Set([
  ':-', ';', '->', ',', '=', '\\=', '==', '\\==', 'is', '=:=', '=\\=', '<', '>', '=<', '>=', '=..',
  '+', '-', '*', '/', '//', 'mod', 'rem', '**', '^',
]);

/**
 * Render a term the way `write/1` prints it: atoms and strings unquoted,
 * lists in bracket notation, operators infix.
 */
export function formatTerm(term: Term, bindings: Bindings): string {
  const t = bindings.deref(term);
  switch (t.kind) {
    case 'atom':
      return t.name;
    case 'number':
      return formatNumber(t.value);
    case 'string':
      return t.value;
    case 'var':
      return `_G${t.id}`;
    case 'compound': {
      if (t.functor === '.' && t.args.length === 2) return formatList(t, bindings);
      if (t.args.length === 2 && INFIX_PRINT.has(t.functor)) {
        const sep = /^[a-z]/.test(t.functor) ? ` ${t.functor} ` : t.functor;
        return `${formatTerm(t.args[0], bindings)}${sep}${formatTerm(t.args[1], bindings)}`;
      }
      if (t.args.length === 1 && (t.functor === '-' || t.functor === '\\+')) {
        return `${t.functor}${formatTerm(t.args[0], bindings)}`;
      }
      return `${t.functor}(${t.args.map((a) => formatTerm(a, bindings)).join(',')})`;
    }
  }
}

function formatList(list: Compound, bindings: Bindings): string {
  const parts: string[] = [];
  let current: Term = list;
  while (current.kind === 'compound' && current.functor === '.' && current.args.length === 2) {
    parts.push(formatTerm(current.args[0], bindings));
    current = bindings.deref(current.args[1]);
  }
  if (current.kind === 'atom' && current.name === '[]') return `[${parts.join(',')}]`;
  return `[${parts.join(',')}|${formatTerm(current, bindings)}]`;
}
