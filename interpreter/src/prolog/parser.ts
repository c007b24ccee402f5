/**
 * Operator-precedence parser for TW Prolog.
 *
 * Accepts plain clause files with `?-`/`:-` directives and the sectioned
 * layout (`domains`, `predicates`, `clauses`, `goal`), where each line of the
 * predicates section declares one predicate without a closing period.
 */

import { ParseError, SourceLocation } from '../errors';
import { LexerRules, Token, tokenize } from '../syntax/scanner';
import { TokenCursor } from '../syntax/cursor';
import { Term, Variable, indicator, mkAtom, mkCompound, mkList, mkNum, mkStr, mkVar, NIL } from './terms';

export const PROLOG_RULES: LexerRules = {
  fold: 'none',
  keywords: new Set(),
  operators: [
    ':-', '?-', '-->', '->', '\\+', '\\==', '\\=', '==', '=:=', '=\\=', '=<', '>=', '=..',
    '@<', '@>', '@=<', '@>=', '<', '>', '=', '+', '-', '*', '//', '/', '**', '^',
    ',', ';', '|', '!', '(', ')', '[', ']', '.',
  ],
  stringQuotes: ["'", '"'],
  lineComments: ['%'],
  blockComments: [['/*', '*/']],
  newlines: false,
};

type OpType = 'xfx' | 'xfy' | 'yfx' | 'fy' | 'fx';

interface OpDef {
  priority: number;
  type: OpType;
}

const INFIX: ReadonlyMap<string, OpDef> = new Map<string, OpDef>([
  [':-', { priority: 1200, type: 'xfx' }],
  ['-->', { priority: 1200, type: 'xfx' }],
  [';', { priority: 1100, type: 'xfy' }],
  ['|', { priority: 1100, type: 'xfy' }],
  ['->', { priority: 1050, type: 'xfy' }],
  [',', { priority: 1000, type: 'xfy' }],
  ...['=', '\\=', '==', '\\==', '@<', '@>', '@=<', '@>=', '=..', 'is', '=:=', '=\\=', '<', '>', '=<', '>=']
    .map((op): [string, OpDef] => [op, { priority: 700, type: 'xfx' }]),
  ['+', { priority: 500, type: 'yfx' }],
  ['-', { priority: 500, type: 'yfx' }],
  ...['*', '/', '//', 'mod', 'rem'].map((op): [string, OpDef] => [op, { priority: 400, type: 'yfx' }]),
  ['**', { priority: 200, type: 'xfx' }],
  ['^', { priority: 200, type: 'xfy' }],
]);

const PREFIX: ReadonlyMap<string, OpDef> = new Map<string, OpDef>([
  [':-', { priority: 1200, type: 'fx' }],
  ['?-', { priority: 1200, type: 'fx' }],
  ['\\+', { priority: 900, type: 'fy' }],
  ['-', { priority: 200, type: 'fy' }],
  ['+', { priority: 200, type: 'fy' }],
]);

/** Goals the solver handles itself; clauses cannot define them. */
const CONTROL: ReadonlySet<string> = new Set([',/2', ';/2', '->/2', '!/0', '\\+/1', 'call/1', 'true/0', 'fail/0']);

export interface Clause {
  head: Term;
  body: Term;
  /** Variables are numbered 0..varCount-1 and renamed apart on every use. */
  varCount: number;
  loc: SourceLocation;
}

export interface Directive {
  goal: Term;
  varCount: number;
  loc: SourceLocation;
}

export interface PrologProgram {
  readonly language: 'prolog';
  /** `name/arity` to clauses in insertion order. */
  readonly clauses: ReadonlyMap<string, readonly Clause[]>;
  /** Predicates declared in a `predicates` section; calling one without clauses fails. */
  readonly declared: ReadonlySet<string>;
  readonly directives: readonly Directive[];
}

export interface ParsedClauses {
  clauses: Clause[];
  directives: Directive[];
}

function isVariableName(name: string): boolean {
  const first = name[0];
  return first === '_' || (first >= 'A' && first <= 'Z');
}

/** Token text that may name an atom or operator. */
function atomName(token: Token): string | null {
  if (token.kind === 'identifier' && !isVariableName(token.value)) return token.value;
  if (token.kind === 'string' && token.quote === "'") return token.value;
  if (token.kind === 'operator' && !['(', ')', '[', ']', ',', '|', '.'].includes(token.value)) return token.value;
  return null;
}

class TermParser {
  private variables = new Map<string, Variable>();
  private varCount = 0;

  constructor(private readonly cursor: TokenCursor) {}

  /** Start a new clause: variable names are scoped to one clause. */
  resetVariables(): void {
    this.variables = new Map();
    this.varCount = 0;
  }

  get variableCount(): number {
    return this.varCount;
  }

  parse(maxPriority: number): Term {
    const [left, leftPriority] = this.parsePrimary(maxPriority);
    return this.parseInfix(left, leftPriority, maxPriority);
  }

  private parseInfix(initial: Term, initialPriority: number, maxPriority: number): Term {
    const c = this.cursor;
    let left = initial;
    let leftPriority = initialPriority;
    for (;;) {
      const token = c.peek();
      const name = token.kind === 'operator' ? token.value : token.kind === 'identifier' ? token.value : null;
      const op = name === null ? undefined : INFIX.get(name);
      if (name === null || op === undefined) return left;
      const leftMax = op.type === 'yfx' ? op.priority : op.priority - 1;
      const rightMax = op.type === 'xfy' ? op.priority : op.priority - 1;
      if (op.priority > maxPriority || leftPriority > leftMax) return left;
      c.next();
      const right = this.parse(rightMax);
      // `a | b` in a body is read as a disjunction
      left = mkCompound(name === '|' ? ';' : name, [left, right]);
      leftPriority = op.priority;
    }
  }

  private parsePrimary(maxPriority: number): [Term, number] {
    const c = this.cursor;
    const token = c.next();
    switch (token.kind) {
      case 'number':
        return [mkNum(Number(token.value)), 0];
      case 'string':
        if (token.quote === '"') return [mkStr(token.value), 0];
        return this.parseNamed(token.value, maxPriority);
      case 'identifier':
        if (isVariableName(token.value)) return [this.variable(token.value), 0];
        return this.parseNamed(token.value, maxPriority);
      case 'operator':
        switch (token.value) {
          case '(': {
            const inner = this.parse(1200);
            c.expect('operator', ')', "')'");
            return [inner, 0];
          }
          case '[':
            return [this.parseList(), 0];
          case '-':
            if (c.check('number') && !c.peek().spaceBefore) {
              return [mkNum(-Number(c.next().value)), 0];
            }
            return this.parseNamed('-', maxPriority);
          default: {
            const name = atomName(token);
            if (name !== null) return this.parseNamed(name, maxPriority);
          }
        }
        break;
      default:
        break;
    }
    throw c.error(`unexpected ${token.kind === 'eof' ? 'end of input' : `'${token.text}'`}`, token);
  }

  private parseNamed(name: string, maxPriority: number): [Term, number] {
    const c = this.cursor;
    if (c.checkOperator('(') && !c.peek().spaceBefore) {
      c.next();
      const args: Term[] = [this.parse(999)];
      while (c.accept('operator', ',')) args.push(this.parse(999));
      c.expect('operator', ')', "')'");
      return [mkCompound(name, args), 0];
    }
    const prefix = PREFIX.get(name);
    if (prefix !== undefined && this.startsTerm(c.peek())) {
      let priority = prefix.priority;
      let argMax = prefix.type === 'fy' ? priority : priority - 1;
      if (priority > maxPriority) {
        priority = 999;
        argMax = 999;
      }
      const arg = this.parse(argMax);
      return [mkCompound(name, [arg]), priority];
    }
    return [mkAtom(name), 0];
  }

  /** Can this token begin the operand of a prefix operator? */
  private startsTerm(token: Token): boolean {
    switch (token.kind) {
      case 'number':
      case 'string':
        return true;
      case 'identifier':
        return !INFIX.has(token.value);
      case 'operator':
        if (token.value === '(' || token.value === '[') return true;
        return atomName(token) !== null && !INFIX.has(token.value);
      default:
        return false;
    }
  }

  private parseList(): Term {
    const c = this.cursor;
    if (c.accept('operator', ']')) return NIL;
    const items: Term[] = [this.parse(999)];
    while (c.accept('operator', ',')) items.push(this.parse(999));
    const tail = c.accept('operator', '|') ? this.parse(999) : NIL;
    c.expect('operator', ']', "']'");
    return mkList(items, tail);
  }

  private variable(name: string): Term {
    if (name === '_') return mkVar(this.varCount++, '_');
    let v = this.variables.get(name);
    if (v === undefined) {
      v = mkVar(this.varCount++, name);
      this.variables.set(name, v);
    }
    return v;
  }
}

function toClause(term: Term, varCount: number, loc: SourceLocation): Clause {
  let head = term;
  let body: Term = mkAtom('true');
  if (term.kind === 'compound' && term.functor === ':-' && term.args.length === 2) {
    head = term.args[0];
    body = term.args[1];
  }
  if (head.kind !== 'atom' && head.kind !== 'compound') {
    throw new ParseError('clause head must be an atom or a compound term', loc.line, loc.column);
  }
  const key = indicator(head);
  if (key !== null && CONTROL.has(key)) {
    throw new ParseError(`cannot redefine control construct ${key}`, loc.line, loc.column);
  }
  return { head, body, varCount, loc };
}

/**
 * Parse a run of clauses and directives, each ending in `.`. In a goal
 * section every clause is a directive.
 */
export function parseClauses(source: string, origin: SourceLocation, goalSection = false): ParsedClauses {
  const cursor = new TokenCursor(tokenize(source, PROLOG_RULES, origin));
  const parser = new TermParser(cursor);
  const result: ParsedClauses = { clauses: [], directives: [] };
  while (!cursor.atEnd()) {
    parser.resetVariables();
    const loc = cursor.location();
    const term = parser.parse(1200);
    cursor.expect('operator', '.', "'.' at the end of the clause");
    const varCount = parser.variableCount;
    if (term.kind === 'compound' && term.args.length === 1 && (term.functor === ':-' || term.functor === '?-')) {
      result.directives.push({ goal: term.args[0], varCount, loc });
    } else if (goalSection) {
      result.directives.push({ goal: term, varCount, loc });
    } else {
      result.clauses.push(toClause(term, varCount, loc));
    }
  }
  return result;
}

/** `name/arity` of one predicates-section line such as `likes(symbol, symbol)`. */
function parseDeclaration(text: string, origin: SourceLocation): string {
  const cursor = new TokenCursor(tokenize(text.replace(/^\s*(nondeterm|determ)\s+/, ''), PROLOG_RULES, origin));
  const term = new TermParser(cursor).parse(999);
  cursor.accept('operator', '.');
  if (!cursor.atEnd()) throw cursor.error(`unexpected '${cursor.peek().text}' in predicate declaration`);
  const key = indicator(term);
  if (key === null) throw new ParseError('expected a predicate declaration', origin.line, origin.column);
  return key;
}

type Section = 'clauses' | 'domains' | 'predicates' | 'goal';

const SECTION_HEADER = /^\s*(domains|predicates|clauses|goal)\s*$/i;

interface Segment {
  section: Section;
  startLine: number;
  lines: string[];
}

function splitSections(source: string): Segment[] {
  const segments: Segment[] = [{ section: 'clauses', startLine: 1, lines: [] }];
  source.split('\n').forEach((line, index) => {
    const header = SECTION_HEADER.exec(line);
    if (header !== null) {
      const name = header[1].toLowerCase();
      const section: Section = name === 'domains' || name === 'predicates' || name === 'goal' ? name : 'clauses';
      segments.push({ section, startLine: index + 2, lines: [] });
      return;
    }
    segments[segments.length - 1].lines.push(line);
  });
  return segments;
}

/**
 * Parse a TW Prolog program. Clauses from `library` come first; a predicate
 * the program defines itself replaces the library's definition.
 */
export function parseProlog(source: string, library: ReadonlyMap<string, readonly Clause[]> = new Map()): PrologProgram {
  const clauses = new Map<string, Clause[]>();
  for (const [key, list] of library) clauses.set(key, [...list]);
  const defined = new Set<string>();
  const declared = new Set<string>();
  const directives: Directive[] = [];

  for (const segment of splitSections(source)) {
    const origin = { line: segment.startLine, column: 1 };
    switch (segment.section) {
      case 'domains':
        break;
      case 'predicates':
        segment.lines.forEach((line, i) => {
          if (line.trim() === '' || line.trim().startsWith('%')) return;
          declared.add(parseDeclaration(line, { line: segment.startLine + i, column: 1 }));
        });
        break;
      case 'goal': {
        let text = segment.lines.join('\n');
        if (!/\.\s*$/.test(text.replace(/%.*$/gm, '')) && text.trim() !== '') text += ' .';
        directives.push(...parseClauses(text, origin, true).directives);
        break;
      }
      case 'clauses': {
        const parsed = parseClauses(segment.lines.join('\n'), origin);
        for (const clause of parsed.clauses) {
          const key = indicator(clause.head);
          if (key === null) continue;
          if (!defined.has(key)) {
            defined.add(key);
            clauses.set(key, []);
          }
          clauses.get(key)?.push(clause);
        }
        directives.push(...parsed.directives);
        break;
      }
    }
  }
  return { language: 'prolog', clauses, declared, directives };
}
