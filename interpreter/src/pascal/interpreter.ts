/**
 * Stack machine for compiled TW Pascal.
 *
 * Each activation is a frame holding its routine, program counter and scope;
 * operands live on one shared stack. `run` executes instructions until one
 * produces an event, so a `readln` deep inside nested calls suspends with all
 * of that state in the machine.
 */

import {
  Value, mkBoolean, mkList, mkNumber, mkText, asBoolean, asNumber, asText,
  compareValues, describeKind, formatNumber, valueToString, withElement,
} from '../values';
import { Cell, Environment, mkCell } from '../environment';
import { EngineUsageError, RuntimeError, TypeMismatchError, UndefinedVariableError } from '../errors';
import { CompletionReason } from '../io';
import { RandomState } from '../random';
import { LanguageRuntime, RunContext, RunOutcome, parseNumericInput } from '../runtime';
import { describeType, TypeSpec } from './ast';
import { PASCAL_BUILTINS } from './builtins';
import { CallArg, Instruction, Local, PascalProgram, ReadTarget, Routine, WriteFormat } from './compiler';

interface Frame {
  readonly routine: Routine;
  pc: number;
  readonly env: Environment;
  readonly keepResult: boolean;
  readonly result?: Cell;
}

interface PendingRead {
  target: ReadTarget | null;
  index?: number;
  env: Environment;
}

export interface PascalMachine {
  readonly program: PascalProgram;
  readonly globals: Environment;
  readonly frames: Frame[];
  readonly stack: Value[];
  readonly random: RandomState;
  pending: PendingRead | null;
}

export function defaultValue(type: TypeSpec): Value {
  switch (type.kind) {
    case 'integer':
    case 'real':
      return mkNumber(0);
    case 'boolean':
      return mkBoolean(false);
    case 'string':
    case 'char':
      return mkText('');
    case 'array':
      return mkList(Array.from({ length: type.size }, () => defaultValue(type.element)));
  }
}

/** Check a value against a declared type before it is stored. */
export function checkType(type: TypeSpec, value: Value, name: string): Value {
  const mismatch = (): TypeMismatchError =>
    new TypeMismatchError(`cannot assign ${describeKind(value.kind)} to '${name}' of type ${describeType(type)}`);
  switch (type.kind) {
    case 'integer':
      if (value.kind !== 'number') throw mismatch();
      if (!Number.isInteger(value.value)) {
        throw new TypeMismatchError(`cannot assign ${formatNumber(value.value)} to integer '${name}'`);
      }
      return value;
    case 'real':
      if (value.kind !== 'number') throw mismatch();
      return value;
    case 'boolean':
      if (value.kind !== 'boolean') throw mismatch();
      return value;
    case 'string':
    case 'char':
      if (value.kind !== 'text') throw mismatch();
      return value;
    case 'array':
      if (value.kind !== 'list' || value.elements.length !== type.size) throw mismatch();
      return value;
  }
}

function typedCell(type: TypeSpec, name: string, value: Value | undefined): Cell {
  return mkCell(value, (v) => checkType(type, v, name));
}

function defineLocals(env: Environment, locals: readonly Local[]): void {
  for (const local of locals) {
    if (local.kind === 'const') env.define(local.name, mkCell(local.value, undefined, true));
    else env.define(local.name, typedCell(local.type, local.name, defaultValue(local.type)));
  }
}

/** `write(x:width:decimals)` */
function formatWrite(value: Value, width: number | undefined, decimals: number | undefined): string {
  let text = decimals !== undefined && value.kind === 'number'
    ? value.value.toFixed(Math.max(0, decimals))
    : valueToString(value);
  if (width !== undefined && text.length < width) text = text.padStart(width);
  return text;
}

function coerceInput(type: TypeSpec, text: string): Value | null {
  switch (type.kind) {
    case 'integer': {
      const n = parseNumericInput(text);
      return n !== null && Number.isInteger(n) ? mkNumber(n) : null;
    }
    case 'real': {
      const n = parseNumericInput(text);
      return n === null ? null : mkNumber(n);
    }
    case 'boolean': {
      const word = text.trim().toLowerCase();
      return word === 'true' ? mkBoolean(true) : word === 'false' ? mkBoolean(false) : null;
    }
    case 'string':
    case 'char':
      return mkText(text);
    case 'array':
      return null;
  }
}

export class PascalInterpreter implements LanguageRuntime<PascalProgram, PascalMachine> {
  createMachine(program: PascalProgram, context: RunContext): PascalMachine {
    const globals = new Environment();
    defineLocals(globals, program.globals);
    return {
      program,
      globals,
      frames: [{ routine: program.main, pc: 0, env: globals, keepResult: false }],
      stack: [],
      random: { seed: context.config.randomSeed },
      pending: null,
    };
  }

  run(m: PascalMachine, ctx: RunContext): RunOutcome {
    for (;;) {
      const frame = m.frames[m.frames.length - 1];
      if (frame === undefined) return 'finished';
      ctx.tick();
      const instruction = frame.routine.code[frame.pc++];
      try {
        this.execute(m, frame, instruction, ctx);
      } catch (e) {
        if (e instanceof RuntimeError) throw e.at('loc' in instruction ? instruction.loc : undefined);
        throw e;
      }
      if (m.pending !== null) return 'suspended';
      if (m.frames.length === 0) return 'finished';
      if (ctx.channel.hasEvents()) return 'yielded';
    }
  }

  completionReason(): CompletionReason {
    return 'finished';
  }

  acceptInput(m: PascalMachine, text: string): boolean {
    const pending = m.pending;
    if (pending === null) throw new EngineUsageError('the program is not waiting for input');
    const target = pending.target;
    if (target !== null) {
      const value = coerceInput(target.type, text);
      if (value === null) return false;
      if (pending.index !== undefined) this.storeElement(pending.env, target.name, pending.index, value, target.type);
      else pending.env.set(target.name, value);
    }
    m.pending = null;
    return true;
  }

  private pop(m: PascalMachine): Value {
    const value = m.stack.pop();
    if (value === undefined) throw new Error('operand stack underflow');
    return value;
  }

  private execute(m: PascalMachine, frame: Frame, ins: Instruction, ctx: RunContext): void {
    switch (ins.op) {
      case 'push':
        m.stack.push(ins.value);
        return;
      case 'load':
        m.stack.push(frame.env.get(ins.name));
        return;
      case 'store':
        frame.env.set(ins.name, this.pop(m));
        return;
      case 'loadIndex': {
        const index = asNumber(this.pop(m), 'index');
        m.stack.push(readElement(ins.name, frame.env.get(ins.name), index));
        return;
      }
      case 'storeIndex': {
        const value = this.pop(m);
        const index = asNumber(this.pop(m), 'index');
        this.storeElement(frame.env, ins.name, index, value, ins.element);
        return;
      }
      case 'unary': {
        const operand = this.pop(m);
        m.stack.push(ins.operator === '-' ? mkNumber(-asNumber(operand)) : mkBoolean(!asBoolean(operand)));
        return;
      }
      case 'binary': {
        const right = this.pop(m);
        const left = this.pop(m);
        m.stack.push(binary(ins.operator, left, right));
        return;
      }
      case 'jump':
        frame.pc = ins.target;
        return;
      case 'jumpIfFalse':
        if (!asBoolean(this.pop(m), 'condition')) frame.pc = ins.target;
        return;
      case 'jumpIfTrue':
        if (asBoolean(this.pop(m), 'condition')) frame.pc = ins.target;
        return;
      case 'dup':
        m.stack.push(m.stack[m.stack.length - 1]);
        return;
      case 'pop':
        this.pop(m);
        return;
      case 'call':
        this.call(m, frame, ins.name, ins.args, ins.keepResult, ctx);
        return;
      case 'builtin': {
        const fn = PASCAL_BUILTINS.get(ins.name);
        if (fn === undefined) throw new RuntimeError('undefined-routine', `unknown function '${ins.name}'`);
        const args = m.stack.splice(m.stack.length - ins.argc, ins.argc);
        m.stack.push(fn.call(args, m.random));
        return;
      }
      case 'write':
        this.write(m, ins.formats, ins.newline, ctx);
        return;
      case 'read': {
        const index = ins.target?.indexed ? asNumber(this.pop(m), 'index') : undefined;
        ctx.channel.requestInput();
        m.pending = index === undefined
          ? { target: ins.target, env: frame.env }
          : { target: ins.target, index, env: frame.env };
        return;
      }
      case 'bind':
        frame.env.define(ins.name, typedCell(ins.type, ins.name, defaultValue(ins.type)));
        return;
      case 'unbind':
        frame.env.remove(ins.name);
        return;
      case 'return':
        this.return(m);
        return;
    }
  }

  private call(
    m: PascalMachine,
    caller: Frame,
    name: string,
    args: readonly CallArg[],
    keepResult: boolean,
    ctx: RunContext,
  ): void {
    const routine = m.program.routines.get(name);
    if (routine === undefined) throw new RuntimeError('undefined-routine', `unknown procedure or function '${name}'`);
    if (m.frames.length > ctx.config.maxCallDepth) {
      throw new RuntimeError('stack-overflow', `call depth exceeded ${ctx.config.maxCallDepth} in '${name}'`);
    }
    const operandCount = args.filter((a) => a.mode !== 'var').length;
    const values = m.stack.splice(m.stack.length - operandCount, operandCount);
    const env = m.globals.child();
    let next = 0;
    routine.params.forEach((param, i) => {
      const arg = args[i];
      if (arg.mode === 'value') {
        const value = values[next++];
        env.define(param.name, typedCell(param.type, param.name, checkType(param.type, value, param.name)));
        return;
      }
      // var parameters share the caller's cell
      const cell = caller.env.lookup(arg.name);
      if (cell === undefined) throw new UndefinedVariableError(arg.name, arg.loc);
      if (arg.mode === 'var') {
        env.define(param.name, cell);
        return;
      }
      const index = asNumber(values[next++], 'index');
      const container = cell.value;
      if (container === undefined) throw new UndefinedVariableError(arg.name, arg.loc);
      readElement(arg.name, container, index);
      env.define(param.name, new ElementCell(cell, arg.name, index, arg.element));
    });
    let result: Cell | undefined;
    if (routine.resultType !== undefined) {
      result = typedCell(routine.resultType, routine.name, undefined);
      env.define(routine.name, result);
      if (!env.hasOwn('result')) env.define('result', result);
    }
    defineLocals(env, routine.locals);
    m.frames.push({ routine, pc: 0, env, keepResult, result });
  }

  private return(m: PascalMachine): void {
    const frame = m.frames.pop();
    if (frame === undefined || frame.result === undefined) return;
    const value = frame.result.value;
    if (value === undefined) {
      throw new RuntimeError(
        'missing-result',
        `function '${frame.routine.name}' returned without assigning its result`,
        frame.routine.loc,
      );
    }
    if (frame.keepResult) m.stack.push(value);
  }

  private write(m: PascalMachine, formats: readonly WriteFormat[], newline: boolean, ctx: RunContext): void {
    const operands = formats.reduce((n, f) => n + 1 + Number(f.width) + Number(f.decimals), 0);
    const values = m.stack.splice(m.stack.length - operands, operands);
    let text = '';
    let i = 0;
    for (const format of formats) {
      const value = values[i++];
      const width = format.width ? asNumber(values[i++], 'field width') : undefined;
      const decimals = format.decimals ? asNumber(values[i++], 'decimal places') : undefined;
      text += formatWrite(value, width, decimals);
    }
    if (newline) ctx.channel.writeLine(text);
    else ctx.channel.write(text);
  }

  private storeElement(env: Environment, name: string, index: number, value: Value, element: TypeSpec): void {
    env.set(name, replaceElement(name, env.get(name), index, value, element));
  }
}

/**
 * A `var` parameter bound to one element of an array or string. Reads and
 * writes go through to the caller's variable.
 */
class ElementCell implements Cell {
  readonly constant = false;

  constructor(
    private readonly container: Cell,
    private readonly name: string,
    private readonly index: number,
    private readonly element: TypeSpec,
  ) {}

  get value(): Value | undefined {
    const container = this.container.value;
    return container === undefined ? undefined : readElement(this.name, container, this.index);
  }

  set value(value: Value | undefined) {
    const container = this.container.value;
    if (value === undefined || container === undefined) return;
    this.container.value = replaceElement(this.name, container, this.index, value, this.element);
  }
}

/** Arrays index from 0, strings from 1. */
function readElement(name: string, container: Value, index: number): Value {
  if (container.kind === 'list') {
    return container.elements[checkIndex(name, index, 0, container.elements.length - 1)];
  }
  const s = asText(container, `'${name}'`);
  return mkText(s[checkIndex(name, index, 1, s.length) - 1]);
}

function replaceElement(name: string, container: Value, index: number, value: Value, element: TypeSpec): Value {
  if (container.kind === 'list') {
    const i = checkIndex(name, index, 0, container.elements.length - 1);
    return withElement(container.elements, i, checkType(element, value, `${name}[${formatNumber(index)}]`));
  }
  const s = asText(container, `'${name}'`);
  const ch = asText(value, 'character');
  const i = checkIndex(name, index, 1, s.length);
  return mkText(s.slice(0, i - 1) + ch + s.slice(i));
}

function checkIndex(name: string, index: number, low: number, high: number): number {
  if (!Number.isInteger(index) || index < low || index > high) {
    throw new RuntimeError('index-out-of-range', `index ${formatNumber(index)} is outside ${name}[${low}..${high}]`);
  }
  return index;
}

function binary(op: string, left: Value, right: Value): Value {
  switch (op) {
    case '+':
      if (left.kind === 'text' && right.kind === 'text') return mkText(left.value + right.value);
      return mkNumber(asNumber(left) + asNumber(right));
    case '-': return mkNumber(asNumber(left) - asNumber(right));
    case '*': return mkNumber(asNumber(left) * asNumber(right));
    case '/': {
      const divisor = asNumber(right);
      if (divisor === 0) throw new RuntimeError('division-by-zero', 'division by zero');
      return mkNumber(asNumber(left) / divisor);
    }
    case 'div': {
      const divisor = asNumber(right);
      if (divisor === 0) throw new RuntimeError('division-by-zero', 'div by zero');
      return mkNumber(Math.trunc(asNumber(left) / divisor));
    }
    case 'mod': {
      const divisor = asNumber(right);
      if (divisor === 0) throw new RuntimeError('division-by-zero', 'mod by zero');
      return mkNumber(asNumber(left) % divisor);
    }
    case 'and': return mkBoolean(asBoolean(left) && asBoolean(right));
    case 'or': return mkBoolean(asBoolean(left) || asBoolean(right));
    case '=': return mkBoolean(compareValues(left, right) === 0);
    case '<>': return mkBoolean(compareValues(left, right) !== 0);
    case '<': return mkBoolean(compareValues(left, right) < 0);
    case '<=': return mkBoolean(compareValues(left, right) <= 0);
    case '>': return mkBoolean(compareValues(left, right) > 0);
    case '>=': return mkBoolean(compareValues(left, right) >= 0);
    default:
      throw new RuntimeError('invalid-argument', `unknown operator '${op}'`);
  }
}
