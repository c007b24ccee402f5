/**
 * Batch driver for hosts that know every input up front (tests, the CLI with
 * piped stdin, the MCP server).
 */

import { ExecutionState, resume, step } from './engine';
import { ExecutionEvent } from './io';
import { DrawPrimitive } from './turtle';

export interface ScriptedRun {
  events: ExecutionEvent[];
  /** Output lines in order. */
  output: string[];
  drawing: DrawPrimitive[];
  /** The last event: `completed`, `runtime-error`, or an unanswered `input-requested`. */
  final: ExecutionEvent;
  /** Scripted inputs that were never requested. */
  unusedInputs: string[];
}

export interface ScriptedOptions {
  /** Stop after this many events; `final` is then the last one collected. */
  maxEvents?: number;
}

/**
 * Run until the program ends, or until it asks for input and no scripted input
 * is left. Inputs answer requests in order; an answer the program rejects is
 * consumed like any other.
 */
export function runScripted(
  state: ExecutionState,
  inputs: readonly string[] = [],
  options: ScriptedOptions = {},
): ScriptedRun {
  const maxEvents = options.maxEvents ?? Number.POSITIVE_INFINITY;
  const queue = [...inputs];
  const events: ExecutionEvent[] = [];
  let event = step(state);
  for (;;) {
    events.push(event);
    if (event.kind === 'completed' || event.kind === 'runtime-error' || events.length >= maxEvents) break;
    if (event.kind === 'input-requested') {
      const answer = queue.shift();
      if (answer === undefined) break;
      event = resume(state, answer);
    } else {
      event = step(state);
    }
  }
  const output: string[] = [];
  const drawing: DrawPrimitive[] = [];
  for (const e of events) {
    if (e.kind === 'output') output.push(e.text);
    else if (e.kind === 'draw') drawing.push(e.primitive);
  }
  return { events, output, drawing, final: event, unusedInputs: queue };
}
