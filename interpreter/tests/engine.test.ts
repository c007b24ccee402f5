/**
 * The host-facing engine: load, start, step, resume, abort.
 */

import { ZodError } from 'zod';
import { EngineUsageError } from '../src/errors';
import { ExecutionState, LANGUAGES, LanguageKind, abort, detectLanguage, load, resume, start, step } from '../src/engine';
import { runScripted } from '../src/host';

function startSource(language: LanguageKind, source: string): ExecutionState {
  const loaded = load(language, source);
  if (!loaded.ok) throw loaded.error;
  return start(loaded.program);
}

// ==================================================================
// End-to-end scenarios
// ==================================================================

describe('scenarios', () => {
  test('BASIC prints a string', () => {
    const state = startSource('basic', '10 PRINT "HI"');
    expect(step(state)).toEqual({ kind: 'output', text: 'HI' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
    expect(state.status).toBe('completed');
  });

  test('BASIC arithmetic', () => {
    const state = startSource('basic', 'LET X = 2\nPRINT X * 3');
    expect(step(state)).toEqual({ kind: 'output', text: '6' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
  });

  test('Logo draws two segments at a right angle', () => {
    const state = startSource('basic', 'FORWARD 100\nRIGHT 90\nFORWARD 50');
    expect(step(state)).toEqual({
      kind: 'draw',
      primitive: { kind: 'line', from: { x: 0, y: 0 }, to: { x: 0, y: 100 }, color: 'black', width: 1 },
    });
    expect(step(state)).toEqual({
      kind: 'draw',
      primitive: { kind: 'line', from: { x: 0, y: 100 }, to: { x: 50, y: 100 }, color: 'black', width: 1 },
    });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
    expect(state.turtle.heading).toBe(90);
  });

  test('Pascal factorial', () => {
    const source = [
      'program Fact;',
      'function factorial(n: integer): integer;',
      'begin',
      '  if n = 0 then factorial := 1 else factorial := n * factorial(n - 1)',
      'end;',
      'begin',
      '  writeln(factorial(4))',
      'end.',
    ].join('\n');
    const state = startSource('pascal', source);
    expect(step(state)).toEqual({ kind: 'output', text: '24' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
  });

  test('Prolog reports every solution, then no more solutions', () => {
    const state = startSource('prolog', 'clauses\nperson(john).\nperson(mary).\ngoal\nperson(X), write(X), nl.');
    expect(step(state)).toEqual({ kind: 'output', text: 'john' });
    expect(step(state)).toEqual({ kind: 'output', text: 'mary' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'no-more-solutions' });
  });

  test('input round trip', () => {
    const state = startSource('basic', 'INPUT X\nPRINT X');
    expect(step(state)).toEqual({ kind: 'input-requested' });
    expect(state.status).toBe('awaiting-input');
    expect(resume(state, '7')).toEqual({ kind: 'output', text: '7' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
  });
});

// ==================================================================
// Protocol
// ==================================================================

describe('step and resume', () => {
  test('step after completion repeats the terminal event', () => {
    const state = startSource('basic', 'PRINT 1');
    step(state);
    const done = step(state);
    expect(step(state)).toEqual(done);
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
  });

  test('a runtime error is terminal', () => {
    const state = startSource('basic', '10 GOTO 99');
    const error = step(state);
    expect(error).toMatchObject({ kind: 'runtime-error', category: 'undefined-line' });
    expect(state.status).toBe('completed');
    expect(step(state)).toEqual(error);
  });

  test('step while input is outstanding is a usage error', () => {
    const state = startSource('basic', 'INPUT A');
    step(state);
    expect(() => step(state)).toThrow(EngineUsageError);
  });

  test('resume without a request is a usage error', () => {
    const state = startSource('basic', 'PRINT 1');
    expect(() => resume(state, 'x')).toThrow(EngineUsageError);
  });

  test('only one input request is outstanding at a time', () => {
    const state = startSource('basic', 'INPUT A\nINPUT B\nPRINT A + B');
    expect(step(state)).toEqual({ kind: 'input-requested' });
    expect(resume(state, '1')).toEqual({ kind: 'input-requested' });
    expect(resume(state, '2')).toEqual({ kind: 'output', text: '3' });
  });

  test('runs are independent and can be interleaved', () => {
    const a = startSource('basic', 'FOR I = 1 TO 3: PRINT "a"; I: NEXT');
    const b = startSource('pascal', "var i: integer; begin for i := 1 to 3 do writeln('b', i) end.");
    const seen: string[] = [];
    for (let k = 0; k < 3; k++) {
      for (const state of [a, b]) {
        const event = step(state);
        if (event.kind === 'output') seen.push(event.text);
      }
    }
    expect(seen).toEqual(['a1', 'b1', 'a2', 'b2', 'a3', 'b3']);
  });

  test('the same program and inputs give the same events', () => {
    const source = 'INPUT N\nFOR I = 1 TO N: PRINT RND(6);: NEXT\nPRINT';
    const first = runScripted(startSource('basic', source), ['5']).events;
    const second = runScripted(startSource('basic', source), ['5']).events;
    expect(second).toEqual(first);
  });
});

describe('abort', () => {
  test('the next step reports an aborted completion', () => {
    const state = startSource('basic', '10 PRINT "A"\n20 GOTO 10');
    expect(step(state)).toEqual({ kind: 'output', text: 'A' });
    abort(state);
    expect(step(state)).toEqual({ kind: 'completed', reason: 'aborted' });
    expect(step(state)).toEqual({ kind: 'completed', reason: 'aborted' });
  });

  test('aborting while waiting for input', () => {
    const state = startSource('basic', 'INPUT A');
    step(state);
    abort(state);
    expect(resume(state, '1')).toEqual({ kind: 'completed', reason: 'aborted' });
  });

  test('aborting a finished run changes nothing', () => {
    const state = startSource('basic', 'PRINT 1');
    step(state);
    step(state);
    abort(state);
    expect(step(state)).toEqual({ kind: 'completed', reason: 'finished' });
  });

  test('an AbortSignal stops the run', () => {
    const loaded = load('basic', '10 PRINT "A"\n20 GOTO 10');
    if (!loaded.ok) throw loaded.error;
    const controller = new AbortController();
    const state = start(loaded.program, { signal: controller.signal });
    step(state);
    controller.abort();
    expect(step(state)).toEqual({ kind: 'completed', reason: 'aborted' });
  });
});

describe('configuration', () => {
  test('invalid settings are rejected', () => {
    const loaded = load('basic', 'PRINT 1');
    if (!loaded.ok) throw loaded.error;
    expect(() => start(loaded.program, { config: { maxSteps: -1 } })).toThrow(ZodError);
  });

  test('the print zone width is configurable', () => {
    const loaded = load('basic', 'PRINT 1, 2');
    if (!loaded.ok) throw loaded.error;
    const state = start(loaded.program, { config: { printZoneWidth: 4 } });
    expect(step(state)).toEqual({ kind: 'output', text: '1   2' });
  });
});

// ==================================================================
// Loading and detection
// ==================================================================

test('every language loads', () => {
  expect(LANGUAGES).toEqual(['basic', 'pascal', 'prolog']);
  expect(load('basic', 'PRINT 1').ok).toBe(true);
  expect(load('pascal', 'begin end.').ok).toBe(true);
  expect(load('prolog', 'a.').ok).toBe(true);
});

describe('detectLanguage', () => {
  test('by file extension', () => {
    expect(detectLanguage('', 'demo.pas')).toBe('pascal');
    expect(detectLanguage('', 'FAMILY.TPR')).toBe('prolog');
    expect(detectLanguage('', 'square.logo')).toBe('basic');
  });

  test('by content', () => {
    expect(detectLanguage('program x;\nbegin\nend.')).toBe('pascal');
    expect(detectLanguage('begin\n  writeln(1)\nend.')).toBe('pascal');
    expect(detectLanguage('parent(a, b).\n?- parent(a, X).')).toBe('prolog');
    expect(detectLanguage('clauses\n  a.')).toBe('prolog');
    expect(detectLanguage('10 PRINT "HI"')).toBe('basic');
    expect(detectLanguage('T:Hello')).toBe('basic');
  });

  test('unknown extensions fall back to the content', () => {
    expect(detectLanguage('a :- b.', 'notes.txt')).toBe('prolog');
  });
});

// ==================================================================
// Scripted host driver
// ==================================================================

describe('runScripted', () => {
  test('stops at an unanswered input request', () => {
    const run = runScripted(startSource('basic', 'INPUT A\nPRINT A'));
    expect(run.final).toEqual({ kind: 'input-requested' });
    expect(run.output).toEqual([]);
  });

  test('reports inputs that were never requested', () => {
    const run = runScripted(startSource('basic', 'INPUT A\nPRINT A'), ['1', 'extra']);
    expect(run.output).toEqual(['1']);
    expect(run.unusedInputs).toEqual(['extra']);
  });

  test('maxEvents bounds an endless program', () => {
    const run = runScripted(startSource('basic', '10 PRINT 1\n20 GOTO 10'), [], { maxEvents: 3 });
    expect(run.events).toHaveLength(3);
    expect(run.final).toEqual({ kind: 'output', text: '1' });
  });
});
