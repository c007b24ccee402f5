/**
 * Parser for TW BASIC.
 *
 * Every source line is classified on its own: a leading number makes it a
 * numbered line, `*NAME` a PILOT label, `X:` (with an optional `Y`/`N`
 * condition) a PILOT command; anything else is a list of BASIC and Logo
 * statements separated by `:`.
 */

import { ParseError, SourceLocation } from '../errors';
import { LexerRules, Token, tokenize } from '../syntax/scanner';
import { TokenCursor } from '../syntax/cursor';
import { BinaryLevel, parseBinaryLevels } from '../syntax/precedence';
import { BASIC_FUNCTIONS } from './builtins';
import { BasicLine, BasicProgram, Expr, PrintItem, Statement, Target, TurtleOp } from './ast';

const TURTLE_ALIASES: Record<string, TurtleOp> = {
  FORWARD: 'FORWARD', FD: 'FORWARD',
  BACK: 'BACK', BK: 'BACK',
  RIGHT: 'RIGHT', RT: 'RIGHT',
  LEFT: 'LEFT', LT: 'LEFT',
  PENUP: 'PENUP', PU: 'PENUP',
  PENDOWN: 'PENDOWN', PD: 'PENDOWN',
  HOME: 'HOME',
  CLEARSCREEN: 'CLEARSCREEN', CS: 'CLEARSCREEN', CLS: 'CLEARSCREEN',
  SETXY: 'SETXY',
  SETHEADING: 'SETHEADING', SETH: 'SETHEADING',
  SETCOLOR: 'SETCOLOR', SETPENCOLOR: 'SETCOLOR',
  SETPENSIZE: 'SETPENSIZE',
  CIRCLE: 'CIRCLE',
  HIDETURTLE: 'HIDETURTLE', HT: 'HIDETURTLE',
  SHOWTURTLE: 'SHOWTURTLE', ST: 'SHOWTURTLE',
};

const TURTLE_ARITY: Record<TurtleOp, number> = {
  FORWARD: 1, BACK: 1, RIGHT: 1, LEFT: 1, PENUP: 0, PENDOWN: 0, HOME: 0, CLEARSCREEN: 0,
  SETXY: 2, SETHEADING: 1, SETCOLOR: 1, SETPENSIZE: 1, CIRCLE: 1, HIDETURTLE: 0, SHOWTURTLE: 0,
};

export const BASIC_RULES: LexerRules = {
  fold: 'upper',
  keywords: new Set([
    'LET', 'PRINT', 'INPUT', 'GOTO', 'GOSUB', 'RETURN', 'IF', 'THEN', 'ELSE', 'END', 'STOP',
    'FOR', 'TO', 'STEP', 'NEXT', 'DIM', 'AND', 'OR', 'NOT', 'MOD', 'REPEAT',
    ...Object.keys(TURTLE_ALIASES),
  ]),
  operators: ['<=', '>=', '<>', '=', '<', '>', '+', '-', '*', '/', '^', '(', ')', ',', ';', ':', '[', ']', '?'],
  identifierSuffixes: '$',
  stringQuotes: ['"'],
  lineComments: ["'"],
  commentWords: new Set(['REM']),
  newlines: false,
};

const LEVELS: readonly BinaryLevel[] = [
  { operators: ['OR'] },
  { operators: ['AND'] },
];

const COMPARISON = ['=', '<>', '<', '<=', '>', '>='];

const ARITHMETIC: readonly BinaryLevel[] = [
  { operators: ['+', '-'] },
  { operators: ['*', '/', 'MOD'] },
];

const PILOT_LINE = /^([TAMYNJUECR])([YN])?:(.*)$/i;
const LABEL_LINE = /^\*([A-Za-z_][A-Za-z0-9_]*)\s*$/;
const NUMBERED_LINE = /^(\d+)\s*/;

type Stop = 'line' | 'bracket' | 'then';

class StatementParser {
  constructor(private readonly cursor: TokenCursor) {}

  parseAll(): Statement[] {
    const statements = this.parseSequence('line');
    if (!this.cursor.atEnd()) {
      throw this.cursor.error(`unexpected '${this.cursor.peek().text}'`);
    }
    return statements;
  }

  private atSequenceEnd(stop: Stop): boolean {
    const c = this.cursor;
    if (c.atEnd()) return true;
    if (stop !== 'line' && c.checkOperator(']')) return true;
    return stop === 'then' && c.checkKeyword('ELSE');
  }

  private parseSequence(stop: Stop): Statement[] {
    const statements: Statement[] = [];
    for (;;) {
      while (this.cursor.accept('operator', ':')) { /* empty statement */ }
      if (this.atSequenceEnd(stop)) return statements;
      statements.push(...this.parseOne(stop));
    }
  }

  private parseOne(stop: Stop): Statement[] {
    return this.parseMulti() ?? [this.parseStatement(stop)];
  }

  private parseStatement(stop: Stop): Statement {
    const c = this.cursor;
    const token = c.peek();
    const loc = c.location(token);

    if (token.kind === 'identifier') return this.parseAssignment(loc);
    if (c.checkOperator('?')) {
      c.next();
      return this.parsePrint(loc, stop);
    }
    if (token.kind !== 'keyword') {
      throw c.error(`expected a statement, found '${token.text}'`);
    }

    const turtle = TURTLE_ALIASES[token.value];
    if (turtle !== undefined) {
      c.next();
      return this.parseTurtle(turtle, loc);
    }

    c.next();
    switch (token.value) {
      case 'LET':
        return this.parseAssignment(loc);
      case 'PRINT':
        return this.parsePrint(loc, stop);
      case 'GOTO':
        return { kind: 'goto', line: this.parseLineNumber(), loc };
      case 'GOSUB':
        return { kind: 'gosub', line: this.parseLineNumber(), loc };
      case 'RETURN':
        return { kind: 'return', loc };
      case 'END':
      case 'STOP':
        return { kind: 'end', loc };
      case 'IF':
        return this.parseIf(loc, stop);
      case 'FOR':
        return this.parseFor(loc);
      case 'NEXT': {
        const variable = c.accept('identifier');
        return variable === null ? { kind: 'next', loc } : { kind: 'next', variable: variable.value, loc };
      }
      case 'REPEAT': {
        const count = this.parseExpression();
        c.expect('operator', '[', "'['");
        const body = this.parseSequence('bracket');
        c.expect('operator', ']', "']'");
        return { kind: 'repeat', count, body, loc };
      }
      default:
        throw c.error(`'${token.text}' cannot start a statement`, token);
    }
  }

  /** INPUT and DIM may name several variables; they expand to one statement each. */
  private parseMulti(): Statement[] | null {
    const c = this.cursor;
    const token = c.peek();
    const loc = c.location(token);
    if (c.checkKeyword('INPUT')) {
      c.next();
      return this.parseInput(loc);
    }
    if (c.checkKeyword('DIM')) {
      c.next();
      const dims: Statement[] = [];
      do {
        const name = c.expect('identifier', undefined, 'an array name');
        c.expect('operator', '(', "'('");
        const size = this.parseExpression();
        c.expect('operator', ')', "')'");
        dims.push({ kind: 'dim', name: name.value, size, loc: c.location(name) });
      } while (c.accept('operator', ','));
      return dims;
    }
    return null;
  }

  private parseInput(loc: SourceLocation): Statement[] {
    const c = this.cursor;
    let prompt: string | undefined;
    const promptToken = c.accept('string');
    if (promptToken !== null) {
      prompt = promptToken.value;
      if (c.accept('operator', ',') === null) c.expect('operator', ';', "';' after the prompt");
    }
    const statements: Statement[] = [];
    do {
      const target = this.parseTarget();
      statements.push(
        statements.length === 0 && prompt !== undefined
          ? { kind: 'input', prompt, target, loc }
          : { kind: 'input', target, loc },
      );
    } while (c.accept('operator', ','));
    return statements;
  }

  private parseAssignment(loc: SourceLocation): Statement {
    const target = this.parseTarget();
    this.cursor.expect('operator', '=', "'='");
    return { kind: 'let', target, value: this.parseExpression(), loc };
  }

  private parseTarget(): Target {
    const c = this.cursor;
    const name = c.expect('identifier', undefined, 'a variable name');
    const loc = c.location(name);
    if (c.accept('operator', '(')) {
      const index = this.parseExpression();
      c.expect('operator', ')', "')'");
      return { name: name.value, index, loc };
    }
    return { name: name.value, loc };
  }

  private parsePrint(loc: SourceLocation, stop: Stop): Statement {
    const c = this.cursor;
    const items: PrintItem[] = [];
    while (!this.atSequenceEnd(stop) && !c.checkOperator(':')) {
      const expr = this.parseExpression();
      const sep = c.accept('operator', ';') ?? c.accept('operator', ',');
      const separator = sep === null ? null : sep.value === ';' ? ';' : ',';
      items.push({ expr, separator });
      if (separator === null) break;
    }
    return { kind: 'print', items, loc };
  }

  private parseLineNumber(): number {
    const token = this.cursor.expect('number', undefined, 'a line number');
    const n = Number(token.value);
    if (!Number.isInteger(n)) throw this.cursor.error('line numbers are whole numbers', token);
    return n;
  }

  private parseBranch(stop: Stop): Statement[] {
    const c = this.cursor;
    if (c.check('number')) {
      const loc = c.location();
      return [{ kind: 'goto', line: this.parseLineNumber(), loc }];
    }
    return this.parseSequence(stop);
  }

  private parseIf(loc: SourceLocation, outer: Stop): Statement {
    const c = this.cursor;
    const condition = this.parseExpression();
    c.expect('keyword', 'THEN', "'THEN'");
    const then = this.parseBranch('then');
    let otherwise: Statement[] = [];
    if (c.accept('keyword', 'ELSE')) otherwise = this.parseBranch(outer);
    if (then.length === 0) throw c.error("empty 'THEN' branch");
    return { kind: 'if', condition, then, else: otherwise, loc };
  }

  private parseFor(loc: SourceLocation): Statement {
    const c = this.cursor;
    const variable = c.expect('identifier', undefined, 'a loop variable');
    c.expect('operator', '=', "'='");
    const start = this.parseExpression();
    c.expect('keyword', 'TO', "'TO'");
    const limit = this.parseExpression();
    if (c.accept('keyword', 'STEP')) {
      return { kind: 'for', variable: variable.value, start, limit, step: this.parseExpression(), loc };
    }
    return { kind: 'for', variable: variable.value, start, limit, loc };
  }

  private parseTurtle(op: TurtleOp, loc: SourceLocation): Statement {
    const args: Expr[] = [];
    for (let i = 0; i < TURTLE_ARITY[op]; i++) {
      if (i > 0) this.cursor.expect('operator', ',', "','");
      args.push(this.parseExpression());
    }
    return { kind: 'turtle', op, args, loc };
  }

  // ---- Expressions ----

  parseExpression(): Expr {
    return parseBinaryLevels(this.cursor, LEVELS, {
      operand: () => this.parseNot(),
      combine: (operator, left, right, loc) => ({ kind: 'binary', operator, left, right, loc }),
    });
  }

  private parseNot(): Expr {
    const c = this.cursor;
    const token = c.accept('keyword', 'NOT');
    if (token !== null) {
      return { kind: 'unary', operator: 'NOT', operand: this.parseNot(), loc: c.location(token) };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const c = this.cursor;
    const left = this.parseArithmetic();
    if (!c.checkOperator(...COMPARISON)) return left;
    const op = c.next();
    const right = this.parseArithmetic();
    if (c.checkOperator(...COMPARISON)) {
      throw c.error(`operator '${c.peek().text}' cannot be chained`);
    }
    return { kind: 'binary', operator: op.value, left, right, loc: c.location(op) };
  }

  private parseArithmetic(): Expr {
    return parseBinaryLevels(this.cursor, ARITHMETIC, {
      operand: () => this.parseUnary(),
      combine: (operator, left, right, loc) => ({ kind: 'binary', operator, left, right, loc }),
    });
  }

  private parseUnary(): Expr {
    const c = this.cursor;
    const minus = c.accept('operator', '-');
    if (minus !== null) {
      return { kind: 'unary', operator: '-', operand: this.parseUnary(), loc: c.location(minus) };
    }
    if (c.accept('operator', '+')) return this.parseUnary();
    return this.parsePower();
  }

  private parsePower(): Expr {
    const c = this.cursor;
    const base = this.parsePrimary();
    const caret = c.accept('operator', '^');
    if (caret === null) return base;
    // right associative; the exponent may carry its own sign
    const exponent = this.parseUnary();
    return { kind: 'binary', operator: '^', left: base, right: exponent, loc: c.location(caret) };
  }

  private parsePrimary(): Expr {
    const c = this.cursor;
    const token = c.peek();
    const loc = c.location(token);
    switch (token.kind) {
      case 'number':
        c.next();
        return { kind: 'number', value: Number(token.value), loc };
      case 'string':
        c.next();
        return { kind: 'string', value: token.value, loc };
      case 'identifier':
        c.next();
        return this.parseNamed(token, loc);
      case 'operator':
        if (token.value === '(') {
          c.next();
          const inner = this.parseExpression();
          c.expect('operator', ')', "')'");
          return inner;
        }
        if (token.value === ':') {
          // Logo variable reference `:SIZE`
          const name = c.peek(1);
          if (name.kind === 'identifier' && !name.spaceBefore) {
            c.next();
            c.next();
            return { kind: 'variable', name: name.value, loc };
          }
        }
        break;
      default:
        break;
    }
    throw c.error(`expected an expression, found ${token.kind === 'eof' ? 'end of line' : `'${token.text}'`}`);
  }

  private parseNamed(token: Token, loc: SourceLocation): Expr {
    const c = this.cursor;
    const fn = BASIC_FUNCTIONS.get(token.value);
    if (c.checkOperator('(')) {
      c.next();
      if (fn === undefined) {
        const index = this.parseExpression();
        c.expect('operator', ')', "')'");
        return { kind: 'element', name: token.value, index, loc };
      }
      const args: Expr[] = [];
      if (!c.checkOperator(')')) {
        do {
          args.push(this.parseExpression());
        } while (c.accept('operator', ','));
      }
      c.expect('operator', ')', "')'");
      if (args.length < fn.minArgs || args.length > fn.maxArgs) {
        throw new ParseError(`${token.value} takes ${describeArity(fn.minArgs, fn.maxArgs)}`, loc.line, loc.column);
      }
      return { kind: 'call', name: token.value, args, loc };
    }
    if (fn !== undefined) {
      if (fn.minArgs > 0) throw c.error(`${token.value} needs arguments in parentheses`, token);
      return { kind: 'call', name: token.value, args: [], loc };
    }
    return { kind: 'variable', name: token.value, loc };
  }
}

function describeArity(min: number, max: number): string {
  if (min === max) return `${min} argument${min === 1 ? '' : 's'}`;
  return `${min} to ${max} arguments`;
}

function parseStatements(text: string, origin: SourceLocation): Statement[] {
  const parser = new StatementParser(new TokenCursor(tokenize(text, BASIC_RULES, origin)));
  return parser.parseAll();
}

// ---- PILOT ----

function parseLabel(text: string, loc: SourceLocation): string {
  const match = /^\s*\*?([A-Za-z_][A-Za-z0-9_]*)\s*$/.exec(text);
  if (match === null) throw new ParseError('expected a label', loc.line, loc.column);
  return match[1].toUpperCase();
}

function parsePilot(command: string, condition: string | undefined, body: string, loc: SourceLocation, bodyColumn: number): Statement[] {
  const bodyOrigin = { line: loc.line, column: bodyColumn };
  let statements: Statement[];
  switch (command) {
    case 'T':
      statements = [{ kind: 'tell', text: body.trimStart(), loc }];
      break;
    case 'Y':
      statements = [{ kind: 'guard', when: true, body: { kind: 'tell', text: body.trimStart(), loc }, loc }];
      break;
    case 'N':
      statements = [{ kind: 'guard', when: false, body: { kind: 'tell', text: body.trimStart(), loc }, loc }];
      break;
    case 'A': {
      const name = body.trim();
      if (name === '') {
        statements = [{ kind: 'accept', loc }];
      } else {
        const target = /^[A-Za-z_][A-Za-z0-9_]*\$?$/.test(name) ? name.toUpperCase() : null;
        if (target === null) throw new ParseError(`'${name}' is not a variable name`, loc.line, bodyColumn);
        statements = [{ kind: 'accept', target: { name: target, loc: bodyOrigin }, loc }];
      }
      break;
    }
    case 'M':
      statements = [{
        kind: 'match',
        patterns: body.split(',').map((p) => p.trim()).filter((p) => p !== ''),
        loc,
      }];
      break;
    case 'J':
      statements = [{ kind: 'jump', label: parseLabel(body, bodyOrigin), loc }];
      break;
    case 'U':
      statements = [{ kind: 'use', label: parseLabel(body, bodyOrigin), loc }];
      break;
    case 'E':
      statements = [{ kind: 'endsub', loc }];
      break;
    case 'C':
      statements = parseStatements(body, bodyOrigin);
      break;
    case 'R':
      return [];
    default:
      throw new ParseError(`unknown PILOT command '${command}:'`, loc.line, loc.column);
  }
  if (condition === undefined) return statements;
  const when = condition === 'Y';
  return statements.map((s) => ({ kind: 'guard', when, body: s, loc }));
}

// ---- Program ----

interface Entry {
  key: number;
  numbered: boolean;
  seq: number;
  line: BasicLine;
  label?: string;
}

/**
 * Parse a whole TW BASIC program. Throws LexError or ParseError; never returns
 * a partial program.
 */
export function parseBasic(source: string): BasicProgram {
  const rawLines = source.split('\n');
  const numbered = new Map<number, Entry>();
  const entries: Entry[] = [];
  let group = -Infinity;

  rawLines.forEach((raw, index) => {
    const lineNo = index + 1;
    const text = raw.replace(/\r$/, '');
    const indent = text.length - text.trimStart().length;
    let rest = text.trimStart();
    if (rest === '') return;

    let column = indent + 1;
    let number: number | null = null;
    const numberMatch = NUMBERED_LINE.exec(rest);
    if (numberMatch !== null) {
      number = Number(numberMatch[1]);
      column += numberMatch[0].length;
      rest = rest.slice(numberMatch[0].length);
      if (rest.trim() === '') {
        throw new ParseError(`line ${number} has no statements`, lineNo, indent + 1);
      }
    }

    const loc = { line: lineNo, column };
    const entry = parseLine(rest, loc, number);
    if (number !== null) {
      group = number;
      const existing = numbered.get(number);
      if (existing !== undefined) entries.splice(entries.indexOf(existing), 1);
      numbered.set(number, entry);
      entry.key = number;
      entry.numbered = true;
    } else {
      entry.key = group;
    }
    entry.seq = index;
    entries.push(entry);
  });

  entries.sort((a, b) => a.key - b.key || Number(b.numbered) - Number(a.numbered) || a.seq - b.seq);

  const lines: BasicLine[] = [];
  const lineIndex = new Map<number, number>();
  const labels = new Map<string, number>();
  for (const entry of entries) {
    const position = lines.length;
    if (entry.line.number !== null) lineIndex.set(entry.line.number, position);
    if (entry.label !== undefined) {
      if (labels.has(entry.label)) {
        throw new ParseError(`label *${entry.label} is defined twice`, entry.line.loc.line, entry.line.loc.column);
      }
      labels.set(entry.label, position);
    }
    lines.push(entry.line);
  }
  return { language: 'basic', lines, lineIndex, labels };
}

function parseLine(rest: string, loc: SourceLocation, number: number | null): Entry {
  const make = (statements: Statement[], label?: string): Entry => ({
    key: 0,
    numbered: false,
    seq: 0,
    line: { number, statements, loc },
    label,
  });

  const label = LABEL_LINE.exec(rest);
  if (label !== null) return make([], label[1].toUpperCase());

  const pilot = PILOT_LINE.exec(rest);
  if (pilot !== null) {
    const bodyColumn = loc.column + rest.length - pilot[3].length;
    const condition = pilot[2] === undefined ? undefined : pilot[2].toUpperCase();
    return make(parsePilot(pilot[1].toUpperCase(), condition, pilot[3], loc, bodyColumn));
  }

  return make(parseStatements(rest, loc));
}
