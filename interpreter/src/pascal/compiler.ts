/**
 * Compiles the TW Pascal syntax tree into flat instruction lists, one per
 * routine plus one for the main block. Names are resolved here, so unknown
 * identifiers and wrong argument counts are reported before the program runs.
 */

import { ParseError, SourceLocation } from '../errors';
import { Value, mkBoolean, mkNumber, mkText, asNumber } from '../values';
import { PASCAL_BUILTINS } from './builtins';
import {
  ConstDecl, Designator, Expr, ParamDecl, ProgramDecl, RoutineDecl, Statement, TypeSpec, VarDecl,
  describeType,
} from './ast';

export type CallArg =
  | { mode: 'value' }
  | { mode: 'var'; name: string; loc: SourceLocation }
  /** An array or string element passed by reference; the index is on the operand stack. */
  | { mode: 'element'; name: string; element: TypeSpec; loc: SourceLocation };

export interface WriteFormat {
  width: boolean;
  decimals: boolean;
}

export type Instruction =
  | { op: 'push'; value: Value }
  | { op: 'load'; name: string; loc: SourceLocation }
  | { op: 'store'; name: string; loc: SourceLocation }
  /** Pops the index. */
  | { op: 'loadIndex'; name: string; loc: SourceLocation }
  /** Pops the value, then the index. */
  | { op: 'storeIndex'; name: string; element: TypeSpec; loc: SourceLocation }
  | { op: 'unary'; operator: '-' | 'not'; loc: SourceLocation }
  | { op: 'binary'; operator: string; loc: SourceLocation }
  | { op: 'jump'; target: number }
  | { op: 'jumpIfFalse'; target: number; loc: SourceLocation }
  | { op: 'jumpIfTrue'; target: number; loc: SourceLocation }
  | { op: 'dup' }
  | { op: 'pop' }
  | { op: 'call'; name: string; args: CallArg[]; keepResult: boolean; loc: SourceLocation }
  | { op: 'builtin'; name: string; argc: number; loc: SourceLocation }
  /** Pops the values and their width/decimals operands. */
  | { op: 'write'; formats: WriteFormat[]; newline: boolean }
  /** Suspends for a line of input; `null` discards the line. */
  | { op: 'read'; target: ReadTarget | null; loc: SourceLocation }
  | { op: 'bind'; name: string; type: TypeSpec }
  | { op: 'unbind'; name: string }
  | { op: 'return' };

export interface ReadTarget {
  name: string;
  /** The index is on the operand stack. */
  indexed: boolean;
  type: TypeSpec;
}

export interface Routine {
  kind: 'procedure' | 'function' | 'main';
  name: string;
  params: ParamDecl[];
  resultType?: TypeSpec;
  /** Constants and local variables, created at every activation. */
  locals: Local[];
  code: Instruction[];
  loc: SourceLocation;
}

export type Local =
  | { kind: 'const'; name: string; value: Value }
  | { kind: 'var'; name: string; type: TypeSpec };

export interface PascalProgram {
  readonly language: 'pascal';
  readonly name?: string;
  /** Global constants and variables. */
  readonly globals: readonly Local[];
  readonly routines: ReadonlyMap<string, Routine>;
  readonly main: Routine;
}

type SymbolInfo =
  | { kind: 'const'; value: Value }
  | { kind: 'var'; type: TypeSpec };

interface Signature {
  kind: 'procedure' | 'function';
  params: ParamDecl[];
}

class Scope {
  private readonly symbols = new Map<string, SymbolInfo>();

  constructor(readonly parent: Scope | null) {}

  declare(name: string, symbol: SymbolInfo, loc: SourceLocation): void {
    if (this.symbols.has(name)) throw new ParseError(`'${name}' is declared twice`, loc.line, loc.column);
    this.symbols.set(name, symbol);
  }

  undeclare(name: string): void {
    this.symbols.delete(name);
  }

  resolve(name: string): SymbolInfo | undefined {
    return this.symbols.get(name) ?? this.parent?.resolve(name);
  }

  hasOwn(name: string): boolean {
    return this.symbols.has(name);
  }
}

function fail(message: string, loc: SourceLocation): ParseError {
  return new ParseError(message, loc.line, loc.column);
}

/** Values of a constant declaration: literals, other constants, and arithmetic on them. */
function foldConstant(expr: Expr, scope: Scope): Value {
  switch (expr.kind) {
    case 'number': return mkNumber(expr.value);
    case 'string': return mkText(expr.value);
    case 'boolean': return mkBoolean(expr.value);
    case 'name': {
      const symbol = scope.resolve(expr.name);
      if (symbol?.kind === 'const') return symbol.value;
      break;
    }
    case 'unary':
      if (expr.operator === '-') return mkNumber(-asNumber(foldConstant(expr.operand, scope)));
      break;
    case 'binary': {
      const left = asNumber(foldConstant(expr.left, scope));
      const right = asNumber(foldConstant(expr.right, scope));
      switch (expr.operator) {
        case '+': return mkNumber(left + right);
        case '-': return mkNumber(left - right);
        case '*': return mkNumber(left * right);
        default: break;
      }
      break;
    }
    default:
      break;
  }
  throw fail('constant expression expected', expr.loc);
}

class RoutineCompiler {
  readonly code: Instruction[] = [];
  private loops = 0;

  constructor(
    private readonly scope: Scope,
    private readonly signatures: ReadonlyMap<string, Signature>,
    private readonly owner: RoutineDecl | null,
  ) {}

  private emit(instruction: Instruction): number {
    this.code.push(instruction);
    return this.code.length - 1;
  }

  private here(): number {
    return this.code.length;
  }

  private patch(at: number, target: number): void {
    const instruction = this.code[at];
    if (instruction.op === 'jump' || instruction.op === 'jumpIfFalse' || instruction.op === 'jumpIfTrue') {
      instruction.target = target;
    }
  }

  compileBody(body: Statement): Instruction[] {
    this.statement(body);
    this.emit({ op: 'return' });
    return this.code;
  }

  // ---- Statements ----

  private statement(s: Statement): void {
    switch (s.kind) {
      case 'empty':
        return;
      case 'compound':
        for (const inner of s.body) this.statement(inner);
        return;
      case 'assign':
        this.assign(s.target, s.value);
        return;
      case 'call':
        this.call(s.name, s.args, false, s.loc);
        return;
      case 'if': {
        this.expr(s.condition);
        const toElse = this.emit({ op: 'jumpIfFalse', target: -1, loc: s.condition.loc });
        this.statement(s.then);
        if (s.else === undefined) {
          this.patch(toElse, this.here());
          return;
        }
        const toEnd = this.emit({ op: 'jump', target: -1 });
        this.patch(toElse, this.here());
        this.statement(s.else);
        this.patch(toEnd, this.here());
        return;
      }
      case 'while': {
        const top = this.here();
        this.expr(s.condition);
        const exit = this.emit({ op: 'jumpIfFalse', target: -1, loc: s.condition.loc });
        this.statement(s.body);
        this.emit({ op: 'jump', target: top });
        this.patch(exit, this.here());
        return;
      }
      case 'repeat': {
        const top = this.here();
        for (const inner of s.body) this.statement(inner);
        this.expr(s.condition);
        this.emit({ op: 'jumpIfFalse', target: top, loc: s.condition.loc });
        return;
      }
      case 'for':
        this.forLoop(s.variable, s.from, s.to, s.down, s.body, s.loc);
        return;
      case 'case':
        this.caseStatement(s.selector, s.arms, s.else);
        return;
      case 'write': {
        for (const arg of s.args) {
          this.expr(arg.value);
          if (arg.width !== undefined) this.expr(arg.width);
          if (arg.decimals !== undefined) this.expr(arg.decimals);
        }
        this.emit({
          op: 'write',
          formats: s.args.map((a) => ({ width: a.width !== undefined, decimals: a.decimals !== undefined })),
          newline: s.newline,
        });
        return;
      }
      case 'read':
        if (s.targets.length === 0) {
          this.emit({ op: 'read', target: null, loc: s.loc });
          return;
        }
        for (const target of s.targets) {
          const type = this.variableType(target.name, target.loc);
          if (target.index !== undefined) {
            this.expr(target.index);
            this.emit({ op: 'read', target: { name: target.name, indexed: true, type: elementType(type, target.loc) }, loc: target.loc });
          } else {
            if (type.kind === 'array') throw fail(`cannot read a whole array into '${target.name}'`, target.loc);
            this.emit({ op: 'read', target: { name: target.name, indexed: false, type }, loc: target.loc });
          }
        }
        return;
      case 'exit':
        this.emit({ op: 'return' });
        return;
    }
  }

  private assign(target: Designator, value: Expr): void {
    const type = this.variableType(target.name, target.loc);
    if (target.index !== undefined) {
      const element = elementType(type, target.loc);
      this.expr(target.index);
      this.expr(value);
      this.emit({ op: 'storeIndex', name: target.name, element, loc: target.loc });
      return;
    }
    this.expr(value);
    this.emit({ op: 'store', name: target.name, loc: target.loc });
  }

  /** Type of an assignable name; constants and unknown names are compile errors. */
  private variableType(name: string, loc: SourceLocation): TypeSpec {
    const symbol = this.scope.resolve(name);
    if (symbol === undefined) throw fail(`unknown variable '${name}'`, loc);
    if (symbol.kind === 'const') throw fail(`cannot assign to constant '${name}'`, loc);
    return symbol.type;
  }

  private forLoop(variable: string, from: Expr, to: Expr, down: boolean, body: Statement, loc: SourceLocation): void {
    // an undeclared loop variable lives only as long as the loop
    const declared = this.scope.resolve(variable);
    if (declared?.kind === 'const') throw fail(`cannot assign to constant '${variable}'`, loc);
    const integer: TypeSpec = { kind: 'integer' };
    if (declared === undefined) {
      this.scope.declare(variable, { kind: 'var', type: integer }, loc);
      this.emit({ op: 'bind', name: variable, type: integer });
    }
    const limit = `for#${++this.loops}`;
    this.emit({ op: 'bind', name: limit, type: { kind: 'real' } });

    this.expr(from);
    this.emit({ op: 'store', name: variable, loc });
    this.expr(to);
    this.emit({ op: 'store', name: limit, loc });
    const top = this.here();
    this.emit({ op: 'load', name: variable, loc });
    this.emit({ op: 'load', name: limit, loc });
    this.emit({ op: 'binary', operator: down ? '>=' : '<=', loc });
    const exit = this.emit({ op: 'jumpIfFalse', target: -1, loc });
    this.statement(body);
    this.emit({ op: 'load', name: variable, loc });
    this.emit({ op: 'push', value: mkNumber(1) });
    this.emit({ op: 'binary', operator: down ? '-' : '+', loc });
    this.emit({ op: 'store', name: variable, loc });
    this.emit({ op: 'jump', target: top });
    this.patch(exit, this.here());

    this.emit({ op: 'unbind', name: limit });
    if (declared === undefined) {
      this.emit({ op: 'unbind', name: variable });
      this.scope.undeclare(variable);
    }
  }

  private caseStatement(selector: Expr, arms: { labels: Expr[]; body: Statement }[], otherwise: Statement[] | undefined): void {
    this.expr(selector);
    const toEnd: number[] = [];
    for (const arm of arms) {
      const toBody: number[] = [];
      for (const label of arm.labels) {
        this.emit({ op: 'dup' });
        this.emit({ op: 'push', value: foldConstant(label, this.scope) });
        this.emit({ op: 'binary', operator: '=', loc: label.loc });
        toBody.push(this.emit({ op: 'jumpIfTrue', target: -1, loc: label.loc }));
      }
      const toNext = this.emit({ op: 'jump', target: -1 });
      for (const at of toBody) this.patch(at, this.here());
      this.emit({ op: 'pop' });
      this.statement(arm.body);
      toEnd.push(this.emit({ op: 'jump', target: -1 }));
      this.patch(toNext, this.here());
    }
    this.emit({ op: 'pop' });
    for (const s of otherwise ?? []) this.statement(s);
    for (const at of toEnd) this.patch(at, this.here());
  }

  private call(name: string, args: Expr[], keepResult: boolean, loc: SourceLocation): void {
    const signature = this.signatures.get(name);
    if (signature === undefined) {
      const builtin = PASCAL_BUILTINS.get(name);
      if (builtin !== undefined) {
        if (args.length < builtin.minArgs || args.length > builtin.maxArgs) {
          throw fail(`${name} takes ${describeArity(builtin.minArgs, builtin.maxArgs)}`, loc);
        }
        for (const arg of args) this.expr(arg);
        this.emit({ op: 'builtin', name, argc: args.length, loc });
        if (!keepResult) this.emit({ op: 'pop' });
        return;
      }
      throw fail(`unknown procedure or function '${name}'`, loc);
    }
    if (keepResult && signature.kind === 'procedure') {
      throw fail(`procedure '${name}' does not return a value`, loc);
    }
    if (args.length !== signature.params.length) {
      throw fail(`'${name}' takes ${describeArity(signature.params.length, signature.params.length)}`, loc);
    }
    const modes: CallArg[] = signature.params.map((param, i) => {
      const arg = args[i];
      if (param.mode === 'value') {
        this.expr(arg);
        return { mode: 'value' };
      }
      if (arg.kind === 'index') {
        const element = elementType(this.variableType(arg.name, arg.loc), arg.loc);
        this.expr(arg.index);
        return { mode: 'element', name: arg.name, element, loc: arg.loc };
      }
      if (arg.kind !== 'name') throw fail(`var parameter '${param.name}' needs a variable`, arg.loc);
      this.variableType(arg.name, arg.loc);
      return { mode: 'var', name: arg.name, loc: arg.loc };
    });
    this.emit({ op: 'call', name, args: modes, keepResult, loc });
  }

  // ---- Expressions ----

  private expr(e: Expr): void {
    switch (e.kind) {
      case 'number':
        this.emit({ op: 'push', value: mkNumber(e.value) });
        return;
      case 'string':
        this.emit({ op: 'push', value: mkText(e.value) });
        return;
      case 'boolean':
        this.emit({ op: 'push', value: mkBoolean(e.value) });
        return;
      case 'name': {
        const symbol = this.scope.resolve(e.name);
        if (symbol?.kind === 'const') {
          this.emit({ op: 'push', value: symbol.value });
          return;
        }
        // a parameterless function's bare name calls it, even inside its own body
        const recursive = this.owner !== null && this.owner.name === e.name && this.owner.params.length === 0;
        if (symbol !== undefined && !recursive) {
          this.emit({ op: 'load', name: e.name, loc: e.loc });
          return;
        }
        if (this.signatures.has(e.name) || PASCAL_BUILTINS.has(e.name)) {
          this.call(e.name, [], true, e.loc);
          return;
        }
        throw fail(`unknown identifier '${e.name}'`, e.loc);
      }
      case 'index':
        this.variableType(e.name, e.loc);
        this.expr(e.index);
        this.emit({ op: 'loadIndex', name: e.name, loc: e.loc });
        return;
      case 'call':
        this.call(e.name, e.args, true, e.loc);
        return;
      case 'unary':
        this.expr(e.operand);
        this.emit({ op: 'unary', operator: e.operator, loc: e.loc });
        return;
      case 'binary':
        this.expr(e.left);
        this.expr(e.right);
        this.emit({ op: 'binary', operator: e.operator, loc: e.loc });
        return;
    }
  }
}

function elementType(type: TypeSpec, loc: SourceLocation): TypeSpec {
  if (type.kind === 'array') return type.element;
  if (type.kind === 'string') return { kind: 'char' };
  throw fail(`cannot index a ${describeType(type)}`, loc);
}

function describeArity(min: number, max: number): string {
  if (min === max) return `${min} argument${min === 1 ? '' : 's'}`;
  return `${min} to ${max} arguments`;
}

function declareLocals(scope: Scope, consts: ConstDecl[], vars: VarDecl[]): Local[] {
  const locals: Local[] = [];
  for (const c of consts) {
    const value = foldConstant(c.value, scope);
    scope.declare(c.name, { kind: 'const', value }, c.loc);
    locals.push({ kind: 'const', name: c.name, value });
  }
  for (const v of vars) {
    scope.declare(v.name, { kind: 'var', type: v.type }, v.loc);
    locals.push({ kind: 'var', name: v.name, type: v.type });
  }
  return locals;
}

function compileRoutine(decl: RoutineDecl, globals: Scope, signatures: ReadonlyMap<string, Signature>): Routine {
  const scope = new Scope(globals);
  for (const param of decl.params) scope.declare(param.name, { kind: 'var', type: param.type }, param.loc);
  if (decl.resultType !== undefined) {
    scope.declare(decl.name, { kind: 'var', type: decl.resultType }, decl.loc);
    if (!scope.hasOwn('result')) scope.declare('result', { kind: 'var', type: decl.resultType }, decl.loc);
  }
  const locals = declareLocals(scope, decl.consts, decl.vars);
  const code = new RoutineCompiler(scope, signatures, decl).compileBody(decl.body);
  return {
    kind: decl.kind,
    name: decl.name,
    params: decl.params,
    resultType: decl.resultType,
    locals,
    code,
    loc: decl.loc,
  };
}

/**
 * Compile a parsed program. Throws ParseError for name and arity errors.
 */
export function compilePascal(decl: ProgramDecl): PascalProgram {
  const globalScope = new Scope(null);
  const globals = declareLocals(globalScope, decl.consts, decl.vars);

  const signatures = new Map<string, Signature>();
  for (const routine of decl.routines) {
    if (signatures.has(routine.name) || globalScope.hasOwn(routine.name)) {
      throw fail(`'${routine.name}' is declared twice`, routine.loc);
    }
    signatures.set(routine.name, { kind: routine.kind, params: routine.params });
  }

  const routines = new Map<string, Routine>();
  for (const routine of decl.routines) {
    routines.set(routine.name, compileRoutine(routine, globalScope, signatures));
  }

  const mainLoc = decl.main.loc;
  const main: Routine = {
    kind: 'main',
    name: decl.name ?? 'main',
    params: [],
    locals: [],
    code: new RoutineCompiler(globalScope, signatures, null).compileBody(decl.main),
    loc: mainLoc,
  };
  return { language: 'pascal', name: decl.name, globals, routines, main };
}
