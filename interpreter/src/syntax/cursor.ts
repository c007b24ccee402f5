/**
 * Token cursor used by the recursive-descent parsers.
 */

import { ParseError, SourceLocation } from '../errors';
import { Token, TokenKind } from './scanner';

export class TokenCursor {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {
    if (tokens.length === 0 || tokens[tokens.length - 1].kind !== 'eof') {
      throw new Error('token stream must end with an eof token');
    }
  }

  peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  atEnd(): boolean {
    return this.peek().kind === 'eof';
  }

  /**
   * Does the current token have this kind (and value, when given)?
   */
  check(kind: TokenKind, value?: string): boolean {
    const token = this.peek();
    return token.kind === kind && (value === undefined || token.value === value);
  }

  checkKeyword(...values: string[]): boolean {
    const token = this.peek();
    return token.kind === 'keyword' && values.includes(token.value);
  }

  checkOperator(...values: string[]): boolean {
    const token = this.peek();
    return token.kind === 'operator' && values.includes(token.value);
  }

  accept(kind: TokenKind, value?: string): Token | null {
    return this.check(kind, value) ? this.next() : null;
  }

  expect(kind: TokenKind, value: string | undefined, what: string): Token {
    if (this.check(kind, value)) return this.next();
    throw this.error(`expected ${what}, found ${describeToken(this.peek())}`);
  }

  error(message: string, token: Token = this.peek()): ParseError {
    return new ParseError(message, token.line, token.column);
  }

  location(token: Token = this.peek()): SourceLocation {
    return { line: token.line, column: token.column };
  }

  /** Current position, for parsers that need to back up. */
  mark(): number {
    return this.pos;
  }

  reset(mark: number): void {
    this.pos = mark;
  }
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof': return 'end of input';
    case 'newline': return 'end of line';
    case 'string': return `string ${token.text}`;
    default: return `'${token.text}'`;
  }
}
