/**
 * Table-driven scanner shared by the three languages.
 *
 * Each language passes its own `LexerRules`; the scanner itself knows nothing
 * about BASIC, Pascal or Prolog.
 */

import { LexError } from '../errors';

export type TokenKind = 'number' | 'string' | 'identifier' | 'keyword' | 'operator' | 'newline' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Source text as written. */
  text: string;
  /** Case-folded name, decoded string contents, or the operator itself. */
  value: string;
  line: number;
  column: number;
  /** Whitespace or a comment separates this token from the previous one. */
  spaceBefore: boolean;
  /** Quote character of a string token. */
  quote?: string;
}

export interface LexerRules {
  /** How identifiers and keywords are normalised into `Token.value`. */
  fold: 'upper' | 'lower' | 'none';
  /** Keywords in folded form. */
  keywords: ReadonlySet<string>;
  operators: readonly string[];
  /** Characters allowed to end an identifier, such as `$` in BASIC. */
  identifierSuffixes?: string;
  stringQuotes: readonly string[];
  lineComments: readonly string[];
  /** Words (folded) that comment out the rest of the line, such as REM. */
  commentWords?: ReadonlySet<string>;
  blockComments?: ReadonlyArray<readonly [string, string]>;
  /** Emit `newline` tokens instead of skipping line breaks. */
  newlines: boolean;
}

export interface Origin {
  line: number;
  column: number;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

export class Scanner {
  private i = 0;
  private line: number;
  private col: number;
  private sawSpace = false;
  private readonly operators: readonly string[];

  constructor(
    private readonly src: string,
    private readonly rules: LexerRules,
    origin: Origin = { line: 1, column: 1 },
  ) {
    this.line = origin.line;
    this.col = origin.column;
    this.operators = [...rules.operators].sort((a, b) => b.length - a.length);
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (!this.isEOF()) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        this.sawSpace = true;
        continue;
      }
      if (ch === '\n') {
        if (this.rules.newlines) tokens.push(this.makeToken('newline', '\n', '\n', this.line, this.col));
        this.advance();
        this.sawSpace = true;
        continue;
      }
      if (this.skipComment()) continue;

      const line = this.line;
      const col = this.col;

      if (isDigit(ch)) {
        tokens.push(this.readNumber(line, col));
      } else if (isIdentStart(ch)) {
        const word = this.readWord(line, col);
        if (word === null) continue;
        tokens.push(word);
      } else if (this.rules.stringQuotes.includes(ch)) {
        tokens.push(this.readString(ch, line, col));
      } else {
        const op = this.operators.find((candidate) => this.src.startsWith(candidate, this.i));
        if (op === undefined) {
          throw new LexError(`unexpected character '${ch}'`, line, col);
        }
        for (let k = 0; k < op.length; k++) this.advance();
        tokens.push(this.makeToken('operator', op, op, line, col));
      }
    }
    tokens.push(this.makeToken('eof', '', '', this.line, this.col));
    return tokens;
  }

  private skipComment(): boolean {
    for (const prefix of this.rules.lineComments) {
      if (this.src.startsWith(prefix, this.i)) {
        this.skipToLineEnd();
        return true;
      }
    }
    for (const [open, close] of this.rules.blockComments ?? []) {
      if (this.src.startsWith(open, this.i)) {
        const line = this.line;
        const col = this.col;
        const end = this.src.indexOf(close, this.i + open.length);
        if (end < 0) throw new LexError(`unterminated comment`, line, col);
        while (this.i < end + close.length) this.advance();
        this.sawSpace = true;
        return true;
      }
    }
    return false;
  }

  private skipToLineEnd(): void {
    while (!this.isEOF() && this.peek() !== '\n') this.advance();
    this.sawSpace = true;
  }

  private readNumber(line: number, col: number): Token {
    const start = this.i;
    while (isDigit(this.peek())) this.advance();
    if (this.peek() === '.' && isDigit(this.peek2())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }
    const exp = this.peek();
    if ((exp === 'e' || exp === 'E')
      && (isDigit(this.peek2()) || ((this.peek2() === '+' || this.peek2() === '-') && isDigit(this.src[this.i + 2] ?? '')))) {
      this.advance();
      if (this.peek() === '+' || this.peek() === '-') this.advance();
      while (isDigit(this.peek())) this.advance();
    }
    const text = this.src.slice(start, this.i);
    return this.makeToken('number', text, text, line, col);
  }

  /** Returns null when the word starts a comment. */
  private readWord(line: number, col: number): Token | null {
    const start = this.i;
    while (isIdentPart(this.peek())) this.advance();
    const suffixes = this.rules.identifierSuffixes ?? '';
    if (suffixes !== '' && suffixes.includes(this.peek())) this.advance();
    const text = this.src.slice(start, this.i);
    const value = this.fold(text);
    if (this.rules.commentWords?.has(value)) {
      this.skipToLineEnd();
      return null;
    }
    const kind: TokenKind = this.rules.keywords.has(value) ? 'keyword' : 'identifier';
    return this.makeToken(kind, text, value, line, col);
  }

  private readString(quote: string, line: number, col: number): Token {
    const start = this.i;
    this.advance();
    let value = '';
    for (;;) {
      if (this.isEOF() || this.peek() === '\n') {
        throw new LexError('unterminated string', line, col);
      }
      const ch = this.peek();
      this.advance();
      if (ch === quote) {
        // a doubled quote stands for one quote character
        if (this.peek() === quote) {
          this.advance();
          value += quote;
          continue;
        }
        break;
      }
      value += ch;
    }
    const token = this.makeToken('string', this.src.slice(start, this.i), value, line, col);
    token.quote = quote;
    return token;
  }

  private fold(text: string): string {
    switch (this.rules.fold) {
      case 'upper': return text.toUpperCase();
      case 'lower': return text.toLowerCase();
      case 'none': return text;
    }
  }

  private makeToken(kind: TokenKind, text: string, value: string, line: number, column: number): Token {
    const token: Token = { kind, text, value, line, column, spaceBefore: this.sawSpace };
    this.sawSpace = false;
    return token;
  }

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(): string {
    return this.src[this.i] ?? '';
  }

  private peek2(): string {
    return this.src[this.i + 1] ?? '';
  }

  private advance(): void {
    if (this.src[this.i] === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    this.i++;
  }
}

export function tokenize(source: string, rules: LexerRules, origin?: Origin): Token[] {
  return new Scanner(source, rules, origin).tokenize();
}
