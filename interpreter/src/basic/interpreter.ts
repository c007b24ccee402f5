/**
 * TW BASIC interpreter.
 *
 * The machine keeps an explicit control position (line, statement, and the
 * stack of open IF/REPEAT blocks) plus GOSUB and FOR stacks, so execution can
 * stop after any statement and continue on the next `run`.
 */

import {
  Value, mkNumber, mkText, mkBoolean, mkList, asNumber, isTruthy,
  valueToString, compareValues, withElement, describeKind, formatNumber,
} from '../values';
import { Environment } from '../environment';
import { EngineUsageError, RuntimeError, TypeMismatchError, UndefinedVariableError } from '../errors';
import { CompletionReason } from '../io';
import { RandomState } from '../random';
import { TurtleCommand, applyCommand } from '../turtle';
import { LanguageRuntime, RunContext, RunOutcome, parseNumericInput } from '../runtime';
import { BasicProgram, Expr, PrintItem, Statement, Target, TurtleOp, isTextName } from './ast';
import { BASIC_FUNCTIONS, PALETTE } from './builtins';

interface BlockFrame {
  readonly statements: readonly Statement[];
  index: number;
  /** Further passes over `statements` (REPEAT). */
  remaining: number;
}

interface Position {
  line: number;
  statement: number;
  blocks: BlockFrame[];
}

interface ForFrame {
  variable: string;
  limit: number;
  step: number;
  /** Position just after the FOR statement. */
  body: Position;
}

interface PendingInput {
  target?: Target;
}

export interface BasicMachine {
  readonly program: BasicProgram;
  readonly env: Environment;
  readonly random: RandomState;
  position: Position;
  returns: Position[];
  loops: ForFrame[];
  /** Last PILOT answer, consulted by `M:`. */
  answer: string;
  matched: boolean;
  /** Column of the open PRINT line, for print zones. */
  column: number;
  pending: PendingInput | null;
  finished: boolean;
}

/** Arrays used without DIM get indices 0..10. */
const DEFAULT_ARRAY_SIZE = 11;

function clonePosition(p: Position): Position {
  return { line: p.line, statement: p.statement, blocks: p.blocks.map((b) => ({ ...b })) };
}

function arrayKey(name: string): string {
  return `${name}()`;
}

function acceptFor(name: string): (value: Value) => Value {
  const wantText = isTextName(name);
  return (value) => {
    if ((value.kind === 'text') !== wantText || (value.kind !== 'text' && value.kind !== 'number')) {
      throw new TypeMismatchError(`cannot assign ${describeKind(value.kind)} to ${wantText ? 'text' : 'numeric'} variable ${name}`);
    }
    return value;
  };
}

/**
 * Advance the position and return the statement it pointed at, or null past
 * the last line.
 */
function fetch(program: BasicProgram, position: Position): Statement | null {
  for (;;) {
    const block = position.blocks[position.blocks.length - 1];
    if (block !== undefined) {
      if (block.index < block.statements.length) return block.statements[block.index++];
      if (block.remaining > 0) {
        block.remaining--;
        block.index = 0;
        continue;
      }
      position.blocks.pop();
      continue;
    }
    const line = program.lines[position.line];
    if (line === undefined) return null;
    if (position.statement < line.statements.length) return line.statements[position.statement++];
    position.line++;
    position.statement = 0;
  }
}

export class BasicInterpreter implements LanguageRuntime<BasicProgram, BasicMachine> {
  constructor(private readonly variables?: Environment) {}

  createMachine(program: BasicProgram, context: RunContext): BasicMachine {
    return {
      program,
      env: this.variables ?? new Environment(),
      random: { seed: context.config.randomSeed },
      position: { line: 0, statement: 0, blocks: [] },
      returns: [],
      loops: [],
      answer: '',
      matched: false,
      column: 0,
      pending: null,
      finished: false,
    };
  }

  run(m: BasicMachine, ctx: RunContext): RunOutcome {
    for (;;) {
      if (m.finished) return 'finished';
      ctx.tick();
      const statement = fetch(m.program, m.position);
      if (statement === null) {
        m.finished = true;
        return 'finished';
      }
      try {
        this.execute(m, statement, ctx);
      } catch (e) {
        if (e instanceof RuntimeError) throw e.at(statement.loc);
        throw e;
      }
      if (m.pending !== null) return 'suspended';
      if (m.finished) return 'finished';
      if (ctx.channel.hasEvents()) return 'yielded';
    }
  }

  completionReason(): CompletionReason {
    return 'finished';
  }

  acceptInput(m: BasicMachine, text: string): boolean {
    const pending = m.pending;
    if (pending === null) throw new EngineUsageError('the program is not waiting for input');
    m.answer = text;
    const target = pending.target;
    if (target !== undefined) {
      let value: Value;
      if (isTextName(target.name)) {
        value = mkText(text);
      } else {
        const n = parseNumericInput(text);
        if (n === null) return false;
        value = mkNumber(n);
      }
      try {
        this.assign(m, target, value);
      } catch (e) {
        if (e instanceof RuntimeError) throw e.at(target.loc);
        throw e;
      }
    }
    m.pending = null;
    return true;
  }

  // ---- Statements ----

  private execute(m: BasicMachine, s: Statement, ctx: RunContext): void {
    switch (s.kind) {
      case 'let':
        this.assign(m, s.target, this.evaluate(m, s.value));
        return;
      case 'print':
        this.print(m, s.items, ctx);
        return;
      case 'input':
        m.column = 0;
        ctx.channel.requestInput(s.prompt);
        m.pending = { target: s.target };
        return;
      case 'goto':
        this.jumpToLine(m, s.line);
        return;
      case 'gosub':
        m.returns.push(clonePosition(m.position));
        this.jumpToLine(m, s.line);
        return;
      case 'return': {
        const back = m.returns.pop();
        if (back === undefined) throw new RuntimeError('invalid-control', 'RETURN without GOSUB');
        m.position = back;
        return;
      }
      case 'end':
        m.finished = true;
        return;
      case 'if': {
        const branch = isTruthy(this.evaluate(m, s.condition)) ? s.then : s.else;
        if (branch.length > 0) m.position.blocks.push({ statements: branch, index: 0, remaining: 0 });
        return;
      }
      case 'for':
        this.startFor(m, s.variable, s.start, s.limit, s.step);
        return;
      case 'next':
        this.next(m, s.variable);
        return;
      case 'dim': {
        const size = asNumber(this.evaluate(m, s.size), 'array size');
        if (!Number.isInteger(size) || size < 0) {
          throw new RuntimeError('invalid-argument', `array size must be a whole number, got ${formatNumber(size)}`);
        }
        m.env.assignOrDefine(arrayKey(s.name), newArray(s.name, size + 1));
        return;
      }
      case 'repeat': {
        const count = Math.floor(asNumber(this.evaluate(m, s.count), 'REPEAT count'));
        if (count > 0 && s.body.length > 0) {
          m.position.blocks.push({ statements: s.body, index: 0, remaining: count - 1 });
        }
        return;
      }
      case 'turtle':
        this.turtle(m, s.op, s.args.map((a) => this.evaluate(m, a)), ctx);
        return;
      case 'tell':
        m.column = 0;
        ctx.channel.tell(this.interpolate(m, s.text));
        return;
      case 'accept':
        m.column = 0;
        ctx.channel.requestInput();
        m.pending = s.target === undefined ? {} : { target: s.target };
        return;
      case 'match': {
        const answer = m.answer.toUpperCase();
        m.matched = s.patterns.some((p) => answer.includes(p.toUpperCase()));
        return;
      }
      case 'jump':
        this.jumpToLabel(m, s.label);
        return;
      case 'use':
        m.returns.push(clonePosition(m.position));
        this.jumpToLabel(m, s.label);
        return;
      case 'endsub': {
        const back = m.returns.pop();
        if (back === undefined) m.finished = true;
        else m.position = back;
        return;
      }
      case 'guard':
        if (m.matched === s.when) this.execute(m, s.body, ctx);
        return;
    }
  }

  private jumpToLine(m: BasicMachine, line: number): void {
    const index = m.program.lineIndex.get(line);
    if (index === undefined) throw new RuntimeError('undefined-line', `line ${line} does not exist`);
    m.position = { line: index, statement: 0, blocks: [] };
  }

  private jumpToLabel(m: BasicMachine, label: string): void {
    const index = m.program.labels.get(label);
    if (index === undefined) throw new RuntimeError('undefined-line', `label *${label} does not exist`);
    m.position = { line: index, statement: 0, blocks: [] };
  }

  private print(m: BasicMachine, items: readonly PrintItem[], ctx: RunContext): void {
    const zone = ctx.config.printZoneWidth;
    let text = '';
    for (const item of items) {
      text += valueToString(this.evaluate(m, item.expr));
      if (item.separator === ',') {
        const column = m.column + text.length;
        text += ' '.repeat(zone - (column % zone));
      }
    }
    const last = items[items.length - 1];
    if (last === undefined || last.separator === null) {
      ctx.channel.writeLine(text);
      m.column = 0;
    } else {
      ctx.channel.write(text);
      m.column += text.length;
    }
  }

  private startFor(m: BasicMachine, variable: string, startExpr: Expr, limitExpr: Expr, stepExpr: Expr | undefined): void {
    const start = this.evaluate(m, startExpr);
    const limit = asNumber(this.evaluate(m, limitExpr), 'FOR limit');
    const step = stepExpr === undefined ? 1 : asNumber(this.evaluate(m, stepExpr), 'FOR step');
    m.env.assignOrDefine(variable, start, acceptFor(variable));
    const value = asNumber(start, 'FOR start');

    const existing = m.loops.findIndex((f) => f.variable === variable);
    if (existing >= 0) m.loops.length = existing;

    if (step >= 0 ? value > limit : value < limit) {
      this.skipPastNext(m, variable);
      return;
    }
    m.loops.push({ variable, limit, step, body: clonePosition(m.position) });
  }

  /** The loop runs zero times: continue after its NEXT. */
  private skipPastNext(m: BasicMachine, variable: string): void {
    const scan = clonePosition(m.position);
    let depth = 0;
    for (let s = fetch(m.program, scan); s !== null; s = fetch(m.program, scan)) {
      if (s.kind === 'for') depth++;
      else if (s.kind === 'next') {
        if (depth === 0 && (s.variable === undefined || s.variable === variable)) {
          m.position = scan;
          return;
        }
        depth--;
      }
    }
    m.position = scan;
    m.finished = true;
  }

  private next(m: BasicMachine, variable: string | undefined): void {
    let index = m.loops.length - 1;
    if (variable !== undefined) {
      while (index >= 0 && m.loops[index].variable !== variable) index--;
    }
    if (index < 0) {
      throw new RuntimeError('invalid-control', variable === undefined ? 'NEXT without FOR' : `NEXT ${variable} without FOR`);
    }
    m.loops.length = index + 1;
    const frame = m.loops[index];
    const value = asNumber(m.env.get(frame.variable), 'loop variable') + frame.step;
    m.env.assignOrDefine(frame.variable, mkNumber(value), acceptFor(frame.variable));
    if (frame.step >= 0 ? value <= frame.limit : value >= frame.limit) {
      m.position = clonePosition(frame.body);
    } else {
      m.loops.pop();
    }
  }

  private turtle(m: BasicMachine, op: TurtleOp, args: Value[], ctx: RunContext): void {
    const command = turtleCommand(op, args);
    const { state, primitives } = applyCommand(ctx.turtle, command);
    ctx.turtle = state;
    if (primitives.length > 0) m.column = 0;
    for (const primitive of primitives) ctx.channel.draw(primitive);
  }

  /** `$NAME` inserts NAME$, `#N` inserts N; unknown names stay as written. */
  private interpolate(m: BasicMachine, text: string): string {
    return text.replace(/([$#])([A-Za-z_][A-Za-z0-9_]*)/g, (whole: string, sigil: string, name: string) => {
      const key = sigil === '$' ? `${name.toUpperCase()}$` : name.toUpperCase();
      const value = m.env.lookup(key)?.value;
      return value === undefined ? whole : valueToString(value);
    });
  }

  // ---- Variables ----

  private assign(m: BasicMachine, target: Target, value: Value): void {
    if (target.index === undefined) {
      m.env.assignOrDefine(target.name, value, acceptFor(target.name));
      return;
    }
    const elements = this.arrayOf(m, target.name);
    const index = this.checkIndex(target.name, asNumber(this.evaluate(m, target.index), 'array index'), elements.length);
    m.env.assignOrDefine(arrayKey(target.name), withElement(elements, index, acceptFor(target.name)(value)));
  }

  private arrayOf(m: BasicMachine, name: string): readonly Value[] {
    const key = arrayKey(name);
    let list = m.env.lookup(key)?.value;
    if (list === undefined) {
      list = newArray(name, DEFAULT_ARRAY_SIZE);
      m.env.assignOrDefine(key, list);
    }
    if (list.kind !== 'list') throw new TypeMismatchError(`${name} is not an array`);
    return list.elements;
  }

  private checkIndex(name: string, index: number, length: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RuntimeError('index-out-of-range', `index ${formatNumber(index)} is outside ${name}(0..${length - 1})`);
    }
    return index;
  }

  // ---- Expressions ----

  private evaluate(m: BasicMachine, e: Expr): Value {
    switch (e.kind) {
      case 'number':
        return mkNumber(e.value);
      case 'string':
        return mkText(e.value);
      case 'variable': {
        const value = m.env.lookup(e.name)?.value;
        if (value === undefined) throw new UndefinedVariableError(e.name, e.loc);
        return value;
      }
      case 'element': {
        const elements = this.arrayOf(m, e.name);
        const index = this.checkIndex(e.name, asNumber(this.evaluate(m, e.index), 'array index'), elements.length);
        return elements[index];
      }
      case 'call': {
        const fn = BASIC_FUNCTIONS.get(e.name);
        if (fn === undefined) throw new RuntimeError('undefined-routine', `unknown function ${e.name}`, e.loc);
        return fn.call(e.args.map((a) => this.evaluate(m, a)), m.random);
      }
      case 'unary': {
        const operand = this.evaluate(m, e.operand);
        if (e.operator === '-') return mkNumber(-asNumber(operand, 'operand of unary -'));
        return mkBoolean(!isTruthy(operand));
      }
      case 'binary':
        return this.binary(m, e.operator, e.left, e.right);
    }
  }

  private binary(m: BasicMachine, op: string, leftExpr: Expr, rightExpr: Expr): Value {
    if (op === 'AND') {
      return mkBoolean(isTruthy(this.evaluate(m, leftExpr)) && isTruthy(this.evaluate(m, rightExpr)));
    }
    if (op === 'OR') {
      return mkBoolean(isTruthy(this.evaluate(m, leftExpr)) || isTruthy(this.evaluate(m, rightExpr)));
    }
    const left = this.evaluate(m, leftExpr);
    const right = this.evaluate(m, rightExpr);
    switch (op) {
      case '+':
        if (left.kind === 'text' && right.kind === 'text') return mkText(left.value + right.value);
        if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value + right.value);
        throw new TypeMismatchError(`cannot add ${describeKind(left.kind)} and ${describeKind(right.kind)}`);
      case '-': return mkNumber(asNumber(left) - asNumber(right));
      case '*': return mkNumber(asNumber(left) * asNumber(right));
      case '/': {
        const divisor = asNumber(right);
        if (divisor === 0) throw new RuntimeError('division-by-zero', 'division by zero');
        return mkNumber(asNumber(left) / divisor);
      }
      case 'MOD': {
        const divisor = asNumber(right);
        if (divisor === 0) throw new RuntimeError('division-by-zero', 'MOD by zero');
        return mkNumber(asNumber(left) % divisor);
      }
      case '^': return mkNumber(Math.pow(asNumber(left), asNumber(right)));
      case '=': return mkBoolean(compareValues(left, right) === 0);
      case '<>': return mkBoolean(compareValues(left, right) !== 0);
      case '<': return mkBoolean(compareValues(left, right) < 0);
      case '<=': return mkBoolean(compareValues(left, right) <= 0);
      case '>': return mkBoolean(compareValues(left, right) > 0);
      case '>=': return mkBoolean(compareValues(left, right) >= 0);
      default:
        throw new RuntimeError('invalid-argument', `unknown operator ${op}`);
    }
  }
}

function newArray(name: string, length: number): Value {
  const fill = isTextName(name) ? mkText('') : mkNumber(0);
  return mkList(Array.from({ length }, () => fill));
}

function colorName(value: Value): string {
  if (value.kind === 'text') return value.value.toLowerCase();
  const index = asNumber(value, 'SETCOLOR argument');
  const color = PALETTE[index];
  if (!Number.isInteger(index) || color === undefined) {
    throw new RuntimeError('invalid-argument', `no palette color ${formatNumber(index)}`);
  }
  return color;
}

function turtleCommand(op: TurtleOp, args: readonly Value[]): TurtleCommand {
  const num = (i: number): number => asNumber(args[i], `${op} argument`);
  switch (op) {
    case 'FORWARD': return { kind: 'forward', distance: num(0) };
    case 'BACK': return { kind: 'back', distance: num(0) };
    case 'RIGHT': return { kind: 'right', degrees: num(0) };
    case 'LEFT': return { kind: 'left', degrees: num(0) };
    case 'PENUP': return { kind: 'pen', down: false };
    case 'PENDOWN': return { kind: 'pen', down: true };
    case 'HOME': return { kind: 'home' };
    case 'CLEARSCREEN': return { kind: 'clear' };
    case 'SETXY': return { kind: 'setxy', x: num(0), y: num(1) };
    case 'SETHEADING': return { kind: 'setheading', degrees: num(0) };
    case 'SETCOLOR': return { kind: 'color', color: colorName(args[0]) };
    case 'SETPENSIZE': return { kind: 'width', width: num(0) };
    case 'CIRCLE': return { kind: 'circle', radius: num(0) };
    case 'HIDETURTLE': return { kind: 'visibility', visible: false };
    case 'SHOWTURTLE': return { kind: 'visibility', visible: true };
  }
}
