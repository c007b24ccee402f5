/**
 * Host-facing engine: load a program, start it, and drive it one event at a
 * time.
 *
 * Everything a run needs between steps lives in its ExecutionState, so a host
 * can keep any number of runs side by side and interleave them freely.
 */

import * as path from 'path';
import { EngineConfig, EngineConfigInput, resolveConfig } from './config';
import { Environment } from './environment';
import { EngineUsageError, RuntimeError, SourceError } from './errors';
import { CompletionReason, ExecutionEvent, IOChannel } from './io';
import { AbortedSignal, LanguageRuntime, RunContext, RunOutcome } from './runtime';
import { INITIAL_TURTLE, TurtleState } from './turtle';
import { BasicProgram } from './basic/ast';
import { BasicInterpreter } from './basic/interpreter';
import { parseBasic } from './basic/parser';
import { PascalProgram, compilePascal } from './pascal/compiler';
import { PascalInterpreter } from './pascal/interpreter';
import { parsePascal } from './pascal/parser';
import { libraryClauses } from './prolog/library';
import { PrologProgram, parseProlog } from './prolog/parser';
import { PrologInterpreter } from './prolog/solver';

export type LanguageKind = 'basic' | 'pascal' | 'prolog';

export const LANGUAGES: readonly LanguageKind[] = ['basic', 'pascal', 'prolog'];

export type Program = BasicProgram | PascalProgram | PrologProgram;

export type LoadResult =
  | { ok: true; program: Program }
  | { ok: false; error: SourceError };

export type ExecutionStatus = 'running' | 'awaiting-input' | 'completed';

export interface StartOptions {
  config?: EngineConfigInput;
  /** Aborting the signal has the same effect as `abort(state)`. */
  signal?: AbortSignal;
  /**
   * BASIC variables to run against instead of a fresh scope. Immediate mode
   * passes the same environment to every line it runs.
   */
  variables?: Environment;
}

/** A language runtime bound to one machine. */
interface Driver {
  run(ctx: RunContext): RunOutcome;
  acceptInput(text: string, ctx: RunContext): boolean;
  completionReason(): CompletionReason;
}

function bind<P, M>(runtime: LanguageRuntime<P, M>, program: P, ctx: RunContext): Driver {
  const machine = runtime.createMachine(program, ctx);
  return {
    run: (c) => runtime.run(machine, c),
    acceptInput: (text, c) => runtime.acceptInput(machine, text, c),
    completionReason: () => runtime.completionReason(machine),
  };
}

function createDriver(program: Program, ctx: RunContext, variables: Environment | undefined): Driver {
  switch (program.language) {
    case 'basic':
      return bind(new BasicInterpreter(variables), program, ctx);
    case 'pascal':
      return bind(new PascalInterpreter(), program, ctx);
    case 'prolog':
      return bind(new PrologInterpreter(), program, ctx);
  }
}

export class ExecutionState implements RunContext {
  status: ExecutionStatus = 'running';
  turtle: TurtleState = INITIAL_TURTLE;
  readonly channel = new IOChannel();
  /** Statements, instructions or resolution steps executed so far. */
  steps = 0;
  aborted = false;
  /** The program stopped; its terminal event is queued or delivered. */
  ended = false;
  /** Terminal event, repeated by every `step` after completion. */
  terminal: ExecutionEvent | null = null;
  private readonly driver: Driver;

  constructor(
    readonly program: Program,
    readonly config: EngineConfig,
    private readonly signal?: AbortSignal,
    variables?: Environment,
  ) {
    this.driver = createDriver(program, this, variables);
  }

  get language(): LanguageKind {
    return this.program.language;
  }

  isAborted(): boolean {
    if (!this.aborted && this.signal?.aborted === true) this.aborted = true;
    return this.aborted;
  }

  tick(): void {
    if (this.isAborted()) throw new AbortedSignal();
    this.steps++;
    if (this.steps > this.config.maxSteps) {
      throw new RuntimeError('step-limit', `step limit of ${this.config.maxSteps} exceeded`);
    }
  }

  /** Run the interpreter until it queues something. */
  advance(): void {
    try {
      if (this.driver.run(this) === 'finished') {
        this.ended = true;
        this.channel.emit({ kind: 'completed', reason: this.driver.completionReason() });
      }
    } catch (e) {
      if (e instanceof AbortedSignal) return;
      if (e instanceof RuntimeError) {
        this.fail(e);
        return;
      }
      throw e;
    }
  }

  acceptInput(text: string): boolean {
    try {
      return this.driver.acceptInput(text, this);
    } catch (e) {
      if (e instanceof RuntimeError) {
        this.fail(e);
        return true;
      }
      throw e;
    }
  }

  private fail(error: RuntimeError): void {
    this.ended = true;
    const event: ExecutionEvent = error.location === undefined
      ? { kind: 'runtime-error', category: error.category, message: error.detail }
      : { kind: 'runtime-error', category: error.category, message: error.detail, location: error.location };
    this.channel.emit(event);
  }
}

/**
 * Parse (and for Pascal, compile) a program. Syntax errors are returned,
 * never thrown.
 */
export function load(language: LanguageKind, source: string): LoadResult {
  try {
    switch (language) {
      case 'basic':
        return { ok: true, program: parseBasic(source) };
      case 'pascal':
        return { ok: true, program: compilePascal(parsePascal(source)) };
      case 'prolog':
        return { ok: true, program: parseProlog(source, libraryClauses()) };
    }
  } catch (e) {
    if (e instanceof SourceError) return { ok: false, error: e };
    throw e;
  }
}

export function start(program: Program, options: StartOptions = {}): ExecutionState {
  return new ExecutionState(program, resolveConfig(options.config ?? {}), options.signal, options.variables);
}

function deliver(state: ExecutionState, event: ExecutionEvent): ExecutionEvent {
  switch (event.kind) {
    case 'input-requested':
      state.status = 'awaiting-input';
      break;
    case 'completed':
    case 'runtime-error':
      state.status = 'completed';
      state.terminal = event;
      break;
    default:
      break;
  }
  return event;
}

function completeAborted(state: ExecutionState): ExecutionEvent {
  state.channel.discard();
  state.ended = true;
  return deliver(state, { kind: 'completed', reason: 'aborted' });
}

/**
 * Advance the run until one event is available and return it.
 */
export function step(state: ExecutionState): ExecutionEvent {
  if (state.terminal !== null) return state.terminal;
  for (;;) {
    if (state.isAborted()) return completeAborted(state);
    const event = state.channel.shift();
    if (event !== undefined) return deliver(state, event);
    if (state.status === 'awaiting-input') {
      throw new EngineUsageError('the program is waiting for input; call resume');
    }
    state.advance();
  }
}

/**
 * Answer the outstanding input request and continue to the next event. Text
 * that cannot be coerced to the requested type repeats the request.
 */
export function resume(state: ExecutionState, text: string): ExecutionEvent {
  if (state.status !== 'awaiting-input') {
    throw new EngineUsageError('no input request is outstanding');
  }
  if (state.isAborted()) return completeAborted(state);
  state.status = 'running';
  if (state.acceptInput(text)) {
    state.channel.clearRequest();
  } else {
    state.channel.repeatRequest();
  }
  return step(state);
}

/**
 * Stop the run. The next `step` reports `completed` with reason `aborted`;
 * aborting a finished run changes nothing.
 */
export function abort(state: ExecutionState): void {
  if (state.terminal === null) state.aborted = true;
}

const EXTENSIONS: ReadonlyMap<string, LanguageKind> = new Map<string, LanguageKind>([
  ['.twb', 'basic'], ['.bas', 'basic'], ['.logo', 'basic'], ['.pilot', 'basic'], ['.tw', 'basic'],
  ['.twp', 'pascal'], ['.pas', 'pascal'],
  ['.tpr', 'prolog'], ['.plg', 'prolog'], ['.pro', 'prolog'],
]);

/**
 * Guess the language of a program: by file extension when one is known,
 * otherwise by its content.
 */
export function detectLanguage(source: string, fileName?: string): LanguageKind {
  if (fileName !== undefined) {
    const byExtension = EXTENSIONS.get(path.extname(fileName).toLowerCase());
    if (byExtension !== undefined) return byExtension;
  }
  if (/^\s*program\s+\w+\s*;/im.test(source) || /\bbegin\b[\s\S]*\bend\s*\.\s*$/i.test(source)) return 'pascal';
  if (/:-|\?-/.test(source) || /^\s*(clauses|goal)\s*$/im.test(source)) return 'prolog';
  return 'basic';
}
