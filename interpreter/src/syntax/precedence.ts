/**
 * Precedence climbing over a per-language table of left-associative binary
 * operator levels.
 */

import { SourceLocation } from '../errors';
import { Token } from './scanner';
import { TokenCursor } from './cursor';

export interface BinaryLevel {
  /** Operator or keyword values (as folded by the scanner). */
  operators: readonly string[];
  /** Operators at this level may not be chained (`a < b < c`). */
  nonAssociative?: boolean;
}

export interface BinaryHooks<E> {
  operand(cursor: TokenCursor): E;
  combine(operator: string, left: E, right: E, location: SourceLocation): E;
}

function matchLevel(token: Token, level: BinaryLevel): string | null {
  if (token.kind !== 'operator' && token.kind !== 'keyword') return null;
  return level.operators.includes(token.value) ? token.value : null;
}

/**
 * Parse `operand (op operand)*` for levels ordered from loosest to tightest.
 */
export function parseBinaryLevels<E>(
  cursor: TokenCursor,
  levels: readonly BinaryLevel[],
  hooks: BinaryHooks<E>,
  index = 0,
): E {
  if (index >= levels.length) return hooks.operand(cursor);
  const level = levels[index];
  let left = parseBinaryLevels(cursor, levels, hooks, index + 1);
  for (;;) {
    const token = cursor.peek();
    const operator = matchLevel(token, level);
    if (operator === null) return left;
    cursor.next();
    const right = parseBinaryLevels(cursor, levels, hooks, index + 1);
    left = hooks.combine(operator, left, right, cursor.location(token));
    if (level.nonAssociative && matchLevel(cursor.peek(), level) !== null) {
      throw cursor.error(`operator '${cursor.peek().text}' cannot be chained`);
    }
  }
}
