/**
 * List and enumeration predicates that are defined in Prolog itself.
 */

import { indicator } from './terms';
import { Clause, parseClauses } from './parser';

const PRELUDE = `
member(X, [X|_]).
member(X, [_|T]) :- member(X, T).

append([], L, L).
append([H|T], L, [H|R]) :- append(T, L, R).

reverse(L, R) :- '$rev'(L, [], R).
'$rev'([], A, A).
'$rev'([H|T], A, R) :- '$rev'(T, [H|A], R).

nth0(I, L, E) :- '$nth'(L, 0, I, E).
'$nth'([H|_], N, N, H).
'$nth'([_|T], N0, I, E) :- N1 is N0 + 1, '$nth'(T, N1, I, E).

between(L, H, L) :- L =< H.
between(L, H, X) :- L < H, L1 is L + 1, between(L1, H, X).
`;

let cached: ReadonlyMap<string, readonly Clause[]> | null = null;

/** The library clause database, parsed on first use. */
export function libraryClauses(): ReadonlyMap<string, readonly Clause[]> {
  if (cached === null) {
    const table = new Map<string, Clause[]>();
    for (const clause of parseClauses(PRELUDE, { line: 1, column: 1 }).clauses) {
      const key = indicator(clause.head);
      if (key === null) continue;
      const list = table.get(key);
      if (list === undefined) table.set(key, [clause]);
      else list.push(clause);
    }
    cached = table;
  }
  return cached;
}
