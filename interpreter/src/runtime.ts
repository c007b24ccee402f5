/**
 * Contract between the engine and the three language interpreters.
 *
 * An interpreter keeps all of its progress in a machine object it creates at
 * `start`; the engine stores that object in the ExecutionState and hands it
 * back on every step. Nothing lives on the JavaScript call stack between steps.
 */

import { EngineConfig } from './config';
import { CompletionReason, IOChannel } from './io';
import { TurtleState } from './turtle';

export interface RunContext {
  readonly channel: IOChannel;
  readonly config: EngineConfig;
  turtle: TurtleState;
  /**
   * Called at every statement, instruction or resolution step. Throws
   * `AbortedSignal` when the host aborted and a `step-limit` RuntimeError
   * when the step budget is spent.
   */
  tick(): void;
}

/**
 * Why `run` returned control to the engine.
 */
export type RunOutcome = 'yielded' | 'suspended' | 'finished';

export interface LanguageRuntime<P, M> {
  createMachine(program: P, context: RunContext): M;
  /**
   * Execute until at least one event is queued, an input request is issued,
   * or the program ends.
   */
  run(machine: M, context: RunContext): RunOutcome;
  /**
   * Deliver input for the pending request. Returns false when the text cannot
   * be coerced to the requested type; the request stays outstanding.
   */
  acceptInput(machine: M, text: string, context: RunContext): boolean;
  /** Reason reported in the `completed` event once `run` returned 'finished'. */
  completionReason(machine: M): CompletionReason;
}

/**
 * Signal thrown out of `tick` when the host aborted the run.
 * This is NOT an error -- it unwinds to the step boundary.
 */
export class AbortedSignal {}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse numeric input the way INPUT and readln do: surrounding blanks are
 * ignored and the rest must be a decimal number.
 */
export function parseNumericInput(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}
