/**
 * Recursive-descent parser for TW Pascal.
 */

import { SourceLocation } from '../errors';
import { LexerRules, tokenize } from '../syntax/scanner';
import { TokenCursor } from '../syntax/cursor';
import { BinaryLevel, parseBinaryLevels } from '../syntax/precedence';
import {
  CaseArm, ConstDecl, Designator, Expr, ParamDecl, ProgramDecl, RoutineDecl,
  ScalarType, Statement, TypeSpec, VarDecl, WriteArg,
} from './ast';

export const PASCAL_RULES: LexerRules = {
  fold: 'lower',
  keywords: new Set([
    'program', 'const', 'var', 'begin', 'end', 'procedure', 'function',
    'if', 'then', 'else', 'while', 'do', 'repeat', 'until', 'for', 'to', 'downto',
    'case', 'of', 'array', 'and', 'or', 'not', 'div', 'mod', 'true', 'false',
  ]),
  operators: [':=', '<=', '>=', '<>', '..', '=', '<', '>', '+', '-', '*', '/', '(', ')', '[', ']', ';', ':', ',', '.'],
  stringQuotes: ["'"],
  lineComments: ['//'],
  blockComments: [['{', '}'], ['(*', '*)']],
  newlines: false,
};

const LEVELS: readonly BinaryLevel[] = [
  { operators: ['=', '<>', '<', '<=', '>', '>='], nonAssociative: true },
  { operators: ['+', '-', 'or'] },
  { operators: ['*', '/', 'div', 'mod', 'and'] },
];

const SCALARS: Record<string, ScalarType> = {
  integer: 'integer',
  longint: 'integer',
  real: 'real',
  boolean: 'boolean',
  string: 'string',
  char: 'char',
};

class PascalParser {
  constructor(private readonly cursor: TokenCursor) {}

  parseProgram(): ProgramDecl {
    const c = this.cursor;
    let name: string | undefined;
    if (c.accept('keyword', 'program')) {
      name = c.expect('identifier', undefined, 'a program name').value;
      c.expect('operator', ';', "';'");
    }
    const consts: ConstDecl[] = [];
    const vars: VarDecl[] = [];
    const routines: RoutineDecl[] = [];
    for (;;) {
      if (c.accept('keyword', 'const')) consts.push(...this.parseConsts());
      else if (c.accept('keyword', 'var')) vars.push(...this.parseVars());
      else if (c.checkKeyword('procedure', 'function')) routines.push(this.parseRoutine());
      else break;
    }
    const main = this.parseCompound();
    c.expect('operator', '.', "'.' after the main block");
    if (!c.atEnd()) throw c.error(`unexpected '${c.peek().text}' after the end of the program`);
    return { name, consts, vars, routines, main };
  }

  // ---- Declarations ----

  private parseConsts(): ConstDecl[] {
    const c = this.cursor;
    const consts: ConstDecl[] = [];
    do {
      const name = c.expect('identifier', undefined, 'a constant name');
      c.expect('operator', '=', "'='");
      const value = this.parseExpression();
      c.expect('operator', ';', "';'");
      consts.push({ name: name.value, value, loc: c.location(name) });
    } while (c.check('identifier'));
    return consts;
  }

  private parseVars(): VarDecl[] {
    const c = this.cursor;
    const vars: VarDecl[] = [];
    do {
      const names = this.parseNameList();
      c.expect('operator', ':', "':'");
      const type = this.parseType();
      c.expect('operator', ';', "';'");
      for (const [name, loc] of names) vars.push({ name, type, loc });
    } while (c.check('identifier'));
    return vars;
  }

  private parseNameList(): Array<[string, SourceLocation]> {
    const c = this.cursor;
    const names: Array<[string, SourceLocation]> = [];
    do {
      const token = c.expect('identifier', undefined, 'a name');
      names.push([token.value, c.location(token)]);
    } while (c.accept('operator', ','));
    return names;
  }

  private parseType(): TypeSpec {
    const c = this.cursor;
    if (c.accept('keyword', 'array')) {
      c.expect('operator', '[', "'['");
      const low = c.expect('number', undefined, 'the lower bound');
      c.expect('operator', '..', "'..'");
      const high = c.expect('number', undefined, 'the upper bound');
      c.expect('operator', ']', "']'");
      c.expect('keyword', 'of', "'of'");
      const element = this.parseType();
      if (Number(low.value) !== 0) throw c.error('arrays must start at index 0', low);
      const size = Number(high.value) + 1;
      if (!Number.isInteger(size) || size < 1) throw c.error('invalid array bounds', high);
      return { kind: 'array', size, element };
    }
    const token = c.expect('identifier', undefined, 'a type');
    const scalar = SCALARS[token.value];
    if (scalar === undefined) throw c.error(`unknown type '${token.text}'`, token);
    return { kind: scalar };
  }

  private parseRoutine(): RoutineDecl {
    const c = this.cursor;
    const keyword = c.next();
    const kind = keyword.value === 'function' ? 'function' : 'procedure';
    const name = c.expect('identifier', undefined, `a ${kind} name`);
    const params: ParamDecl[] = [];
    if (c.accept('operator', '(')) {
      if (!c.checkOperator(')')) {
        do {
          const mode = c.accept('keyword', 'var') ? 'var' : 'value';
          const names = this.parseNameList();
          c.expect('operator', ':', "':'");
          const type = this.parseType();
          for (const [paramName, loc] of names) params.push({ name: paramName, type, mode, loc });
        } while (c.accept('operator', ';'));
      }
      c.expect('operator', ')', "')'");
    }
    let resultType: TypeSpec | undefined;
    if (kind === 'function') {
      c.expect('operator', ':', "':' and the result type");
      resultType = this.parseType();
    }
    c.expect('operator', ';', "';'");

    const consts: ConstDecl[] = [];
    const vars: VarDecl[] = [];
    for (;;) {
      if (c.accept('keyword', 'const')) consts.push(...this.parseConsts());
      else if (c.accept('keyword', 'var')) vars.push(...this.parseVars());
      else if (c.checkKeyword('procedure', 'function')) throw c.error('nested routines are not supported');
      else break;
    }
    const body = this.parseCompound();
    c.expect('operator', ';', "';' after the routine body");
    return { kind, name: name.value, params, resultType, consts, vars, body, loc: c.location(keyword) };
  }

  // ---- Statements ----

  private parseCompound(): Statement {
    const c = this.cursor;
    const begin = c.expect('keyword', 'begin', "'begin'");
    const body = this.parseStatementList('end');
    c.expect('keyword', 'end', "'end'");
    return { kind: 'compound', body, loc: c.location(begin) };
  }

  private parseStatementList(...terminators: string[]): Statement[] {
    const c = this.cursor;
    const body: Statement[] = [this.parseStatement()];
    while (c.accept('operator', ';')) body.push(this.parseStatement());
    if (!c.checkKeyword(...terminators)) {
      throw c.error(`expected ';' or '${terminators[0]}', found '${c.peek().text || 'end of input'}'`);
    }
    return body.filter((s) => s.kind !== 'empty');
  }

  private parseStatement(): Statement {
    const c = this.cursor;
    const token = c.peek();
    const loc = c.location(token);
    if (token.kind === 'keyword') {
      switch (token.value) {
        case 'begin':
          return this.parseCompound();
        case 'if': {
          c.next();
          const condition = this.parseExpression();
          c.expect('keyword', 'then', "'then'");
          const then = this.parseStatement();
          if (c.accept('keyword', 'else')) return { kind: 'if', condition, then, else: this.parseStatement(), loc };
          return { kind: 'if', condition, then, loc };
        }
        case 'while': {
          c.next();
          const condition = this.parseExpression();
          c.expect('keyword', 'do', "'do'");
          return { kind: 'while', condition, body: this.parseStatement(), loc };
        }
        case 'repeat': {
          c.next();
          const body = this.parseStatementList('until');
          c.expect('keyword', 'until', "'until'");
          return { kind: 'repeat', body, condition: this.parseExpression(), loc };
        }
        case 'for':
          return this.parseFor(loc);
        case 'case':
          return this.parseCase(loc);
        default:
          return { kind: 'empty', loc };
      }
    }
    if (token.kind !== 'identifier') return { kind: 'empty', loc };
    c.next();

    if (c.checkOperator(':=', '[')) {
      const target = this.parseDesignatorRest(token.value, loc);
      c.expect('operator', ':=', "':='");
      return { kind: 'assign', target, value: this.parseExpression(), loc };
    }

    switch (token.value) {
      case 'write':
      case 'writeln':
        return { kind: 'write', newline: token.value === 'writeln', args: this.parseWriteArgs(), loc };
      case 'read':
      case 'readln': {
        const targets: Designator[] = [];
        if (c.accept('operator', '(')) {
          do {
            const name = c.expect('identifier', undefined, 'a variable');
            targets.push(this.parseDesignatorRest(name.value, c.location(name)));
          } while (c.accept('operator', ','));
          c.expect('operator', ')', "')'");
        }
        return { kind: 'read', newline: token.value === 'readln', targets, loc };
      }
      case 'exit':
        if (c.accept('operator', '(')) c.expect('operator', ')', "')'");
        return { kind: 'exit', loc };
      case 'inc':
      case 'dec':
        return this.parseIncDec(token.value, loc);
      default:
        return { kind: 'call', name: token.value, args: this.parseArgs(), loc };
    }
  }

  private parseDesignatorRest(name: string, loc: SourceLocation): Designator {
    const c = this.cursor;
    if (c.accept('operator', '[')) {
      const index = this.parseExpression();
      c.expect('operator', ']', "']'");
      return { name, index, loc };
    }
    return { name, loc };
  }

  private parseArgs(): Expr[] {
    const c = this.cursor;
    const args: Expr[] = [];
    if (c.accept('operator', '(')) {
      if (!c.checkOperator(')')) {
        do {
          args.push(this.parseExpression());
        } while (c.accept('operator', ','));
      }
      c.expect('operator', ')', "')'");
    }
    return args;
  }

  private parseWriteArgs(): WriteArg[] {
    const c = this.cursor;
    const args: WriteArg[] = [];
    if (!c.accept('operator', '(')) return args;
    if (c.accept('operator', ')')) return args;
    do {
      const value = this.parseExpression();
      if (!c.accept('operator', ':')) {
        args.push({ value });
        continue;
      }
      const width = this.parseExpression();
      if (c.accept('operator', ':')) args.push({ value, width, decimals: this.parseExpression() });
      else args.push({ value, width });
    } while (c.accept('operator', ','));
    c.expect('operator', ')', "')'");
    return args;
  }

  /** `inc(x)` / `dec(x, n)` become assignments. */
  private parseIncDec(which: string, loc: SourceLocation): Statement {
    const c = this.cursor;
    c.expect('operator', '(', "'('");
    const name = c.expect('identifier', undefined, 'a variable');
    const target = this.parseDesignatorRest(name.value, c.location(name));
    const amount: Expr = c.accept('operator', ',') ? this.parseExpression() : { kind: 'number', value: 1, loc };
    c.expect('operator', ')', "')'");
    const current: Expr = target.index === undefined
      ? { kind: 'name', name: target.name, loc: target.loc }
      : { kind: 'index', name: target.name, index: target.index, loc: target.loc };
    const operator = which === 'inc' ? '+' : '-';
    return { kind: 'assign', target, value: { kind: 'binary', operator, left: current, right: amount, loc }, loc };
  }

  private parseFor(loc: SourceLocation): Statement {
    const c = this.cursor;
    c.next();
    const variable = c.expect('identifier', undefined, 'a loop variable');
    c.expect('operator', ':=', "':='");
    const from = this.parseExpression();
    let down = false;
    if (c.accept('keyword', 'downto')) down = true;
    else c.expect('keyword', 'to', "'to' or 'downto'");
    const to = this.parseExpression();
    c.expect('keyword', 'do', "'do'");
    return { kind: 'for', variable: variable.value, from, to, down, body: this.parseStatement(), loc };
  }

  private parseCase(loc: SourceLocation): Statement {
    const c = this.cursor;
    c.next();
    const selector = this.parseExpression();
    c.expect('keyword', 'of', "'of'");
    const arms: CaseArm[] = [];
    let otherwise: Statement[] | undefined;
    while (!c.checkKeyword('end')) {
      if (c.accept('keyword', 'else')) {
        otherwise = this.parseStatementList('end');
        break;
      }
      const labels: Expr[] = [];
      do {
        labels.push(this.parseExpression());
      } while (c.accept('operator', ','));
      c.expect('operator', ':', "':'");
      arms.push({ labels, body: this.parseStatement() });
      if (!c.accept('operator', ';') && !c.checkKeyword('else')) break;
    }
    c.expect('keyword', 'end', "'end'");
    return otherwise === undefined
      ? { kind: 'case', selector, arms, loc }
      : { kind: 'case', selector, arms, else: otherwise, loc };
  }

  // ---- Expressions ----

  private parseExpression(): Expr {
    return parseBinaryLevels(this.cursor, LEVELS, {
      operand: () => this.parseFactor(),
      combine: (operator, left, right, loc) => ({ kind: 'binary', operator, left, right, loc }),
    });
  }

  private parseFactor(): Expr {
    const c = this.cursor;
    const token = c.next();
    const loc = c.location(token);
    switch (token.kind) {
      case 'number':
        return { kind: 'number', value: Number(token.value), loc };
      case 'string':
        return { kind: 'string', value: token.value, loc };
      case 'identifier': {
        if (c.checkOperator('(')) return { kind: 'call', name: token.value, args: this.parseArgs(), loc };
        if (c.accept('operator', '[')) {
          const index = this.parseExpression();
          c.expect('operator', ']', "']'");
          return { kind: 'index', name: token.value, index, loc };
        }
        return { kind: 'name', name: token.value, loc };
      }
      case 'keyword':
        if (token.value === 'true' || token.value === 'false') {
          return { kind: 'boolean', value: token.value === 'true', loc };
        }
        if (token.value === 'not') return { kind: 'unary', operator: 'not', operand: this.parseFactor(), loc };
        break;
      case 'operator':
        if (token.value === '(') {
          const inner = this.parseExpression();
          c.expect('operator', ')', "')'");
          return inner;
        }
        if (token.value === '-') return { kind: 'unary', operator: '-', operand: this.parseFactor(), loc };
        if (token.value === '+') return this.parseFactor();
        break;
      default:
        break;
    }
    throw c.error(`expected an expression, found ${token.kind === 'eof' ? 'end of input' : `'${token.text}'`}`, token);
  }
}

/**
 * Parse TW Pascal source. Throws LexError or ParseError.
 */
export function parsePascal(source: string): ProgramDecl {
  return new PascalParser(new TokenCursor(tokenize(source, PASCAL_RULES))).parseProgram();
}
