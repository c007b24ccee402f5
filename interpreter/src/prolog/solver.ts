/**
 * Resolution engine for TW Prolog.
 *
 * The continuation is a linked list of goals and backtracking runs off an
 * explicit choice-point stack, so a proof can stop after any resolution step
 * (or at `readln`) and pick up again on the next `run`.
 */

import { EngineUsageError, RuntimeError, SourceLocation } from '../errors';
import { CompletionReason } from '../io';
import { LanguageRuntime, RunContext, RunOutcome, parseNumericInput } from '../runtime';
import { BUILTINS, BuiltinContext, InputKind } from './builtins';
import { Clause, PrologProgram } from './parser';
import { Bindings, Compound, FAIL, Term, formatTerm, indicator, mkAtom, mkCompound, mkNum, mkVar, renameTerm } from './terms';
import { UnifyOptions, unify } from './unify';

interface GoalFrame {
  readonly goal: Term;
  /** Choice-stack height a `!` in this goal cuts back to. */
  readonly cutBarrier: number;
  readonly next: GoalList;
}

type GoalList = GoalFrame | null;

type Alternative =
  | { kind: 'clauses'; goal: Term; clauses: readonly Clause[]; index: number; next: GoalList }
  | { kind: 'goals'; goals: GoalList };

interface ChoicePoint {
  trailMark: number;
  alternative: Alternative;
}

interface PendingRead {
  kind: InputKind;
  target: Term;
}

export interface PrologMachine {
  program: PrologProgram;
  bindings: Bindings;
  choices: ChoicePoint[];
  goals: GoalList;
  /** A directive is being proved. */
  active: boolean;
  /** Index of the next directive to start. */
  directive: number;
  location: SourceLocation | undefined;
  varCounter: number;
  unifyOptions: UnifyOptions;
  pending: PendingRead | null;
  halted: boolean;
}

const CUT_TO = '$cut';

function cutTo(mark: number): Term {
  return mkCompound(CUT_TO, [mkNum(mark)]);
}

function frame(goal: Term, cutBarrier: number, next: GoalList): GoalFrame {
  return { goal, cutBarrier, next };
}

function isCompound(term: Term, functor: string, arity: number): term is Compound {
  return term.kind === 'compound' && term.functor === functor && term.args.length === arity;
}

export class PrologInterpreter implements LanguageRuntime<PrologProgram, PrologMachine> {
  createMachine(program: PrologProgram, context: RunContext): PrologMachine {
    return {
      program,
      bindings: new Bindings(),
      choices: [],
      goals: null,
      active: false,
      directive: 0,
      location: undefined,
      varCounter: 0,
      unifyOptions: { occursCheck: context.config.occursCheck },
      pending: null,
      halted: false,
    };
  }

  run(m: PrologMachine, ctx: RunContext): RunOutcome {
    for (;;) {
      if (m.pending !== null) return 'suspended';
      if (m.halted) return 'finished';
      if (!m.active && !this.startDirective(m)) return 'finished';
      ctx.tick();
      try {
        this.solveStep(m, ctx);
      } catch (e) {
        if (e instanceof RuntimeError) throw e.at(m.location);
        throw e;
      }
      if (m.pending !== null) return 'suspended';
      if (ctx.channel.hasEvents()) return 'yielded';
    }
  }

  acceptInput(m: PrologMachine, text: string): boolean {
    const pending = m.pending;
    if (pending === null) throw new EngineUsageError('the program is not waiting for input');
    let value: Term;
    if (pending.kind === 'readint') {
      const n = parseNumericInput(text);
      if (n === null || !Number.isInteger(n)) return false;
      value = mkNum(n);
    } else {
      value = mkAtom(text.trim());
    }
    m.pending = null;
    if (!unify(pending.target, value, m.bindings, m.unifyOptions)) {
      m.goals = frame(FAIL, m.choices.length, m.goals);
    }
    return true;
  }

  completionReason(m: PrologMachine): CompletionReason {
    return m.halted ? 'finished' : 'no-more-solutions';
  }

  private startDirective(m: PrologMachine): boolean {
    const directive = m.program.directives[m.directive];
    if (directive === undefined) return false;
    m.directive++;
    m.bindings = new Bindings();
    m.choices = [];
    m.location = directive.loc;
    const offset = m.varCounter;
    m.varCounter += directive.varCount;
    m.goals = frame(renameTerm(directive.goal, offset), 0, null);
    m.active = true;
    return true;
  }

  private solveStep(m: PrologMachine, ctx: RunContext): void {
    const current = m.goals;
    if (current === null) {
      // a solution was found; directives collect every solution
      this.backtrack(m);
      return;
    }
    m.goals = current.next;
    this.call(m, m.bindings.deref(current.goal), current.cutBarrier, current.next, ctx);
  }

  /** Pop choice points until one yields a goal list to continue with. */
  private backtrack(m: PrologMachine): void {
    for (;;) {
      const choice = m.choices.pop();
      if (choice === undefined) {
        m.active = false;
        m.goals = null;
        return;
      }
      m.bindings.undo(choice.trailMark);
      const alt = choice.alternative;
      if (alt.kind === 'goals') {
        m.goals = alt.goals;
        return;
      }
      if (this.resolve(m, alt.goal, alt.clauses, alt.index, alt.next)) return;
    }
  }

  private cut(m: PrologMachine, barrier: number): void {
    if (m.choices.length > barrier) m.choices.length = barrier;
  }

  private call(m: PrologMachine, goal: Term, cb: number, next: GoalList, ctx: RunContext): void {
    if (goal.kind === 'var') {
      throw new RuntimeError('invalid-argument', 'goal is an unbound variable');
    }
    const key = indicator(goal);
    if (key === null) {
      throw new RuntimeError('invalid-argument', `${formatTerm(goal, m.bindings)} is not callable`);
    }
    const args = goal.kind === 'compound' ? goal.args : [];

    switch (key) {
      case 'true/0':
        return;
      case 'fail/0':
      case 'false/0':
        this.backtrack(m);
        return;
      case ',/2':
        m.goals = frame(args[0], cb, frame(args[1], cb, next));
        return;
      case '!/0':
        this.cut(m, cb);
        return;
      case `${CUT_TO}/1`: {
        const mark = m.bindings.deref(args[0]);
        if (mark.kind === 'number') this.cut(m, mark.value);
        return;
      }
      case ';/2': {
        const condition = m.bindings.deref(args[0]);
        const mark = m.choices.length;
        m.choices.push({ trailMark: m.bindings.mark(), alternative: { kind: 'goals', goals: frame(args[1], cb, next) } });
        if (isCompound(condition, '->', 2)) {
          m.goals = frame(condition.args[0], m.choices.length, frame(cutTo(mark), cb, frame(condition.args[1], cb, next)));
        } else {
          m.goals = frame(args[0], cb, next);
        }
        return;
      }
      case '->/2': {
        const mark = m.choices.length;
        m.goals = frame(args[0], mark, frame(cutTo(mark), cb, frame(args[1], cb, next)));
        return;
      }
      case '\\+/1':
      case 'not/1': {
        const mark = m.choices.length;
        m.choices.push({ trailMark: m.bindings.mark(), alternative: { kind: 'goals', goals: next } });
        m.goals = frame(args[0], m.choices.length, frame(cutTo(mark), cb, frame(FAIL, cb, null)));
        return;
      }
      case 'call/1':
        m.goals = frame(args[0], m.choices.length, next);
        return;
      default:
        break;
    }

    const builtin = BUILTINS.get(key);
    if (builtin !== undefined) {
      if (!builtin(args, this.builtinContext(m, ctx))) this.backtrack(m);
      return;
    }

    const clauses = m.program.clauses.get(key);
    if (clauses !== undefined && clauses.length > 0) {
      if (!this.resolve(m, goal, clauses, 0, next)) this.backtrack(m);
      return;
    }
    if (m.program.declared.has(key)) {
      this.backtrack(m);
      return;
    }
    throw new RuntimeError('undefined-predicate', `unknown predicate ${key}`);
  }

  /**
   * Try `clauses` from `start` against `goal`, leaving a choice point for the
   * rest. Returns false when no clause head unifies.
   */
  private resolve(m: PrologMachine, goal: Term, clauses: readonly Clause[], start: number, next: GoalList): boolean {
    const barrier = m.choices.length;
    for (let i = start; i < clauses.length; i++) {
      const clause = clauses[i];
      const mark = m.bindings.mark();
      const offset = m.varCounter;
      m.varCounter += clause.varCount;
      if (unify(renameTerm(clause.head, offset), goal, m.bindings, m.unifyOptions)) {
        if (i + 1 < clauses.length) {
          m.choices.push({ trailMark: mark, alternative: { kind: 'clauses', goal, clauses, index: i + 1, next } });
        }
        m.goals = frame(renameTerm(clause.body, offset), barrier, next);
        return true;
      }
      m.bindings.undo(mark);
    }
    return false;
  }

  private builtinContext(m: PrologMachine, ctx: RunContext): BuiltinContext {
    return {
      bindings: m.bindings,
      unifyOptions: m.unifyOptions,
      channel: ctx.channel,
      requestInput: (kind, target) => {
        m.pending = { kind, target };
        ctx.channel.requestInput();
      },
      halt: () => {
        m.halted = true;
        m.active = false;
        m.goals = null;
        m.choices = [];
      },
      freshVariable: () => mkVar(m.varCounter++),
    };
  }
}
