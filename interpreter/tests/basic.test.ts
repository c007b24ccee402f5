/**
 * TW BASIC, including its PILOT and Logo statements, run through the engine.
 */

import { EngineConfigInput } from '../src/config';
import { load, start } from '../src/engine';
import { ScriptedRun, runScripted } from '../src/host';
import { parseNumericInput } from '../src/runtime';
import { parseBasic } from '../src/basic/parser';

function runBasic(source: string, inputs: string[] = [], config: EngineConfigInput = {}): ScriptedRun {
  const loaded = load('basic', source);
  if (!loaded.ok) throw loaded.error;
  return runScripted(start(loaded.program, { config }), inputs);
}

function outputOf(source: string, inputs: string[] = []): string[] {
  const run = runBasic(source, inputs);
  expect(run.final).toEqual({ kind: 'completed', reason: 'finished' });
  return run.output;
}

// ==================================================================
// Parsing
// ==================================================================

describe('parseBasic', () => {
  test('numbered lines run in numeric order, free-form lines follow their predecessor', () => {
    const program = parseBasic('20 PRINT "b"\n10 PRINT "a"\nPRINT "a2"');
    expect(program.lines.map((l) => l.number)).toEqual([10, null, 20]);
    expect(program.lineIndex.get(20)).toBe(2);
  });

  test('a repeated line number replaces the earlier line', () => {
    expect(outputOf('10 PRINT "x"\n10 PRINT "y"')).toEqual(['y']);
  });

  test('labels index the line they start', () => {
    const program = parseBasic('T:one\n*MAIN\nT:two');
    expect(program.labels.get('MAIN')).toBe(1);
  });

  test('syntax errors come back from load with their position', () => {
    const result = load('basic', 'PRINT 1\nPRINT 1 +');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.line).toBe(2);
      expect(result.error.detail).toBe('expected an expression, found end of line');
    }
  });

  test('function arity is checked when parsing', () => {
    const result = load('basic', 'PRINT LEFT$("A")');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.detail).toBe('LEFT$ takes 2 arguments');
  });

  test('a number alone is not a line', () => {
    expect(load('basic', '10').ok).toBe(false);
  });

  test('duplicate labels are rejected', () => {
    expect(() => parseBasic('*A\n*A')).toThrow('label *A is defined twice');
  });
});

// ==================================================================
// Statements
// ==================================================================

describe('BASIC statements', () => {
  test('PRINT of a string literal', () => {
    expect(outputOf('PRINT "HI"')).toEqual(['HI']);
  });

  test('LET and arithmetic', () => {
    expect(outputOf('10 LET A = 2\n20 PRINT A * 3')).toEqual(['6']);
  });

  test('precedence and power', () => {
    expect(outputOf('PRINT 2 + 3 * 4; " "; 2 ^ 3 ^ 2; " "; -2 ^ 2')).toEqual(['14 512 -4']);
  });

  test('comma pads to the next print zone', () => {
    expect(outputOf('PRINT "A", "B"')).toEqual([`A${' '.repeat(13)}B`]);
  });

  test('a trailing semicolon keeps the line open', () => {
    expect(outputOf('PRINT "X";\nPRINT "Y"')).toEqual(['XY']);
  });

  test('text concatenation with +', () => {
    expect(outputOf('A$ = "Time"\nB$ = A$ + " Warp"\nPRINT B$')).toEqual(['Time Warp']);
  });

  test('comparisons yield truth values for IF', () => {
    expect(outputOf('A = 5\nIF A > 3 THEN PRINT "big" ELSE PRINT "small"')).toEqual(['big']);
    expect(outputOf('A = 1\nIF A > 3 AND A < 9 THEN PRINT "mid" ELSE PRINT "out"')).toEqual(['out']);
  });

  test('IF ... THEN line number jumps', () => {
    expect(outputOf('10 IF 1 THEN 30\n20 PRINT "skip"\n30 PRINT "end"')).toEqual(['end']);
  });

  test('FOR loops count up to and including the limit', () => {
    expect(outputOf('FOR I = 1 TO 3\nPRINT I\nNEXT I\nPRINT I')).toEqual(['1', '2', '3', '4']);
  });

  test('negative STEP', () => {
    expect(outputOf('FOR I = 3 TO 1 STEP -1: PRINT I;: NEXT')).toEqual(['321']);
  });

  test('a FOR loop that cannot start skips past its NEXT', () => {
    expect(outputOf('FOR I = 5 TO 1\nPRINT I\nNEXT I\nPRINT "done"')).toEqual(['done']);
  });

  test('nested FOR loops', () => {
    const source = 'FOR I = 1 TO 2\nFOR J = 1 TO 2\nPRINT I * 10 + J\nNEXT J\nNEXT I';
    expect(outputOf(source)).toEqual(['11', '12', '21', '22']);
  });

  test('GOSUB and RETURN', () => {
    const source = '10 GOSUB 100\n20 PRINT "back"\n30 END\n100 PRINT "sub"\n110 RETURN';
    expect(outputOf(source)).toEqual(['sub', 'back']);
  });

  test('END stops the program', () => {
    expect(outputOf('PRINT 1\nEND\nPRINT 2')).toEqual(['1']);
  });

  test('DIM arrays hold elements 0..n', () => {
    expect(outputOf('DIM A(3)\nA(3) = 7\nPRINT A(3) + A(0)')).toEqual(['7']);
  });

  test('arrays used without DIM have eleven elements', () => {
    expect(outputOf('B(10) = 2: PRINT B(10)')).toEqual(['2']);
    const run = runBasic('B(11) = 1');
    expect(run.final).toMatchObject({ kind: 'runtime-error', category: 'index-out-of-range', message: 'index 11 is outside B(0..10)' });
  });

  test('built-in functions', () => {
    expect(outputOf('PRINT LEFT$("HELLO", 2); MID$("HELLO", 2, 3); LEN("abc")')).toEqual(['HEELL3']);
    expect(outputOf('PRINT INT(-2.5); ABS(-4); SQR(16); STR$(7) + "!"')).toEqual(['-3447!']);
  });

  test('RND repeats for the same seed', () => {
    const first = outputOf('FOR I = 1 TO 3: PRINT RND(100): NEXT');
    const second = outputOf('FOR I = 1 TO 3: PRINT RND(100): NEXT');
    expect(second).toEqual(first);
    for (const line of first) {
      const n = Number(line);
      expect(Number.isInteger(n) && n >= 1 && n <= 100).toBe(true);
    }
  });
});

// ==================================================================
// Input
// ==================================================================

describe('BASIC input', () => {
  test('INPUT with a prompt', () => {
    const run = runBasic('INPUT "N"; A\nPRINT A * 2', ['21']);
    expect(run.events).toEqual([
      { kind: 'input-requested', prompt: 'N' },
      { kind: 'output', text: '42' },
      { kind: 'completed', reason: 'finished' },
    ]);
  });

  test('text that is not a number repeats the request', () => {
    const run = runBasic('INPUT "N"; A\nPRINT A', ['abc', ' 5 ']);
    expect(run.events).toEqual([
      { kind: 'input-requested', prompt: 'N' },
      { kind: 'input-requested', prompt: 'N' },
      { kind: 'output', text: '5' },
      { kind: 'completed', reason: 'finished' },
    ]);
  });

  test('only decimal numbers are numeric input', () => {
    const run = runBasic('INPUT A\nPRINT A', ['0x10', '0b1', 'Infinity', '1e2']);
    expect(run.events.filter((e) => e.kind === 'input-requested')).toHaveLength(4);
    expect(run.output).toEqual(['100']);
    expect(parseNumericInput(' -2.5 ')).toBe(-2.5);
    expect(parseNumericInput('.5')).toBe(0.5);
    expect(parseNumericInput('7.')).toBe(7);
    expect(parseNumericInput('1_000')).toBeNull();
  });

  test('text variables take the input as typed', () => {
    const run = runBasic('INPUT N$\nPRINT "Hi "; N$', ['Ann']);
    expect(run.events[0]).toEqual({ kind: 'input-requested' });
    expect(run.output).toEqual(['Hi Ann']);
  });

  test('INPUT of several variables asks once per variable', () => {
    expect(outputOf('INPUT A, B\nPRINT A + B', ['2', '3'])).toEqual(['5']);
  });
});

// ==================================================================
// Runtime errors
// ==================================================================

describe('BASIC runtime errors', () => {
  test('GOTO a missing line', () => {
    const run = runBasic('10 GOTO 99');
    expect(run.final).toEqual({
      kind: 'runtime-error',
      category: 'undefined-line',
      message: 'line 99 does not exist',
      location: { line: 1, column: 4 },
    });
  });

  test('reading an unset variable', () => {
    const run = runBasic('PRINT X');
    expect(run.final).toEqual({
      kind: 'runtime-error',
      category: 'undefined-variable',
      message: "undefined variable 'X'",
      location: { line: 1, column: 7 },
    });
  });

  test('numbers cannot be stored in text variables', () => {
    expect(runBasic('A$ = 5').final).toMatchObject({ kind: 'runtime-error', category: 'type-mismatch' });
  });

  test('division by zero', () => {
    expect(runBasic('PRINT 1 / 0').final).toMatchObject({ kind: 'runtime-error', category: 'division-by-zero' });
  });

  test('RETURN without GOSUB', () => {
    expect(runBasic('RETURN').final).toMatchObject({
      kind: 'runtime-error',
      category: 'invalid-control',
      message: 'RETURN without GOSUB',
    });
  });

  test('NEXT without FOR', () => {
    expect(runBasic('NEXT I').final).toMatchObject({ category: 'invalid-control', message: 'NEXT I without FOR' });
  });

  test('output before the error is still delivered', () => {
    const run = runBasic('PRINT "before"\nPRINT Y');
    expect(run.output).toEqual(['before']);
    expect(run.final.kind).toBe('runtime-error');
  });

  test('an endless loop stops at the step limit', () => {
    const run = runBasic('10 GOTO 10', [], { maxSteps: 100 });
    expect(run.final).toEqual({ kind: 'runtime-error', category: 'step-limit', message: 'step limit of 100 exceeded' });
  });
});

// ==================================================================
// Logo
// ==================================================================

describe('Logo statements', () => {
  test('REPEAT draws a square and returns home', () => {
    const loaded = load('basic', 'REPEAT 4 [FD 10 RT 90]');
    if (!loaded.ok) throw loaded.error;
    const state = start(loaded.program);
    const run = runScripted(state);
    expect(run.drawing).toEqual([
      { kind: 'line', from: { x: 0, y: 0 }, to: { x: 0, y: 10 }, color: 'black', width: 1 },
      { kind: 'line', from: { x: 0, y: 10 }, to: { x: 10, y: 10 }, color: 'black', width: 1 },
      { kind: 'line', from: { x: 10, y: 10 }, to: { x: 10, y: 0 }, color: 'black', width: 1 },
      { kind: 'line', from: { x: 10, y: 0 }, to: { x: 0, y: 0 }, color: 'black', width: 1 },
    ]);
    expect(state.turtle).toMatchObject({ x: 0, y: 0, heading: 0 });
  });

  test('colon reads a variable', () => {
    const run = runBasic('SIZE = 20\nFD :SIZE');
    expect(run.drawing).toEqual([
      { kind: 'line', from: { x: 0, y: 0 }, to: { x: 0, y: 20 }, color: 'black', width: 1 },
    ]);
  });

  test('pen up moves without drawing and palette colors apply', () => {
    const run = runBasic('PU\nFD 5\nPD\nSETCOLOR 4\nSETPENSIZE 2\nSETXY 0, 0');
    expect(run.drawing).toEqual([
      { kind: 'line', from: { x: 0, y: 5 }, to: { x: 0, y: 0 }, color: 'red', width: 2 },
    ]);
  });

  test('an unknown palette index is an invalid argument', () => {
    expect(runBasic('SETCOLOR 99').final).toMatchObject({
      category: 'invalid-argument',
      message: 'no palette color 99',
    });
  });
});

// ==================================================================
// PILOT
// ==================================================================

describe('PILOT statements', () => {
  test('T: before A: becomes the prompt, $NAME interpolates', () => {
    const run = runBasic('T:What is your name?\nA:NAME$\nT:Hello, $NAME!', ['Ann']);
    expect(run.events).toEqual([
      { kind: 'input-requested', prompt: 'What is your name?' },
      { kind: 'output', text: 'Hello, Ann!' },
      { kind: 'completed', reason: 'finished' },
    ]);
  });

  test('M: sets the match flag for Y: and N:', () => {
    const source = 'A:\nM:yes,y\nY:Great\nN:Too bad';
    expect(outputOf(source, ['Yes please'])).toEqual(['Great']);
    expect(outputOf(source, ['nope'])).toEqual(['Too bad']);
  });

  test('condition suffixes guard any command', () => {
    expect(outputOf('TY:matched\nTN:nothing yet')).toEqual(['nothing yet']);
  });

  test('J: jumps to a label', () => {
    expect(outputOf('J:*SKIP\nT:never\n*SKIP\nT:done')).toEqual(['done']);
  });

  test('U: calls a label and E: returns', () => {
    expect(outputOf('U:*GREET\nT:after\nE:\n*GREET\nT:hi\nE:')).toEqual(['hi', 'after']);
  });

  test('C: computes and #N interpolates', () => {
    expect(outputOf('C:X = 2 + 3\nT:#X items')).toEqual(['5 items']);
  });

  test('R: is a remark', () => {
    expect(outputOf('R:nothing happens\nT:ok')).toEqual(['ok']);
  });

  test('jumping to a missing label', () => {
    expect(runBasic('J:*NOWHERE').final).toMatchObject({
      category: 'undefined-line',
      message: 'label *NOWHERE does not exist',
    });
  });
});
