/**
 * TW Pascal: parsing, compilation and execution through the engine.
 */

import { EngineConfigInput } from '../src/config';
import { load, start } from '../src/engine';
import { ScriptedRun, runScripted } from '../src/host';
import { compilePascal } from '../src/pascal/compiler';
import { parsePascal } from '../src/pascal/parser';

function runPascal(source: string, inputs: string[] = [], config: EngineConfigInput = {}): ScriptedRun {
  const loaded = load('pascal', source);
  if (!loaded.ok) throw loaded.error;
  return runScripted(start(loaded.program, { config }), inputs);
}

function outputOf(source: string, inputs: string[] = []): string[] {
  const run = runPascal(source, inputs);
  expect(run.final).toEqual({ kind: 'completed', reason: 'finished' });
  return run.output;
}

function loadError(source: string): string {
  const result = load('pascal', source);
  if (result.ok) throw new Error('expected a syntax error');
  return result.error.detail;
}

// ==================================================================
// Parsing and compilation
// ==================================================================

describe('parsePascal', () => {
  test('program header is optional', () => {
    expect(parsePascal('begin end.').name).toBeUndefined();
    expect(parsePascal('program Demo; begin end.').name).toBe('demo');
  });

  test('routines are compiled by name', () => {
    const program = compilePascal(parsePascal('procedure p; begin end;\nfunction f: integer; begin f := 1 end;\nbegin end.'));
    expect([...program.routines.keys()]).toEqual(['p', 'f']);
    expect(program.routines.get('f')?.kind).toBe('function');
  });

  test('missing final period', () => {
    expect(loadError('begin end')).toBe("expected '.' after the main block, found end of input");
  });

  test('arrays must start at index 0', () => {
    expect(loadError('var a: array[1..3] of integer; begin end.')).toBe('arrays must start at index 0');
  });

  test('comparisons cannot be chained', () => {
    expect(loadError('begin writeln(1 < 2 < 3) end.')).toBe("operator '<' cannot be chained");
  });

  test('unknown names are reported before running', () => {
    const result = load('pascal', 'begin\n  x := 1\nend.');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.detail).toBe("unknown variable 'x'");
      expect(result.error.line).toBe(2);
      expect(result.error.column).toBe(3);
    }
    expect(loadError('begin writeln(foo(1)) end.')).toBe("unknown procedure or function 'foo'");
  });

  test('argument counts are checked', () => {
    expect(loadError('procedure p(a: integer); begin end;\nbegin p(1, 2) end.')).toBe("'p' takes 1 argument");
    expect(loadError('begin writeln(sqrt(1, 2)) end.')).toBe('sqrt takes 1 argument');
  });

  test('constants cannot be assigned', () => {
    expect(loadError('const max = 3; begin max := 4 end.')).toBe("cannot assign to constant 'max'");
  });

  test('nested routines are rejected', () => {
    expect(loadError('procedure a; procedure b; begin end; begin end;\nbegin end.')).toBe('nested routines are not supported');
  });
});

// ==================================================================
// Execution
// ==================================================================

describe('Pascal execution', () => {
  test('functions and for loops', () => {
    const source = [
      'program Squares;',
      'var i: integer;',
      'function sq(n: integer): integer;',
      'begin',
      '  sq := n * n',
      'end;',
      'begin',
      '  for i := 1 to 3 do writeln(sq(i))',
      'end.',
    ].join('\n');
    expect(outputOf(source)).toEqual(['1', '4', '9']);
  });

  test('recursive factorial', () => {
    const source = [
      'function fact(n: integer): integer;',
      'begin',
      '  if n <= 1 then fact := 1 else fact := n * fact(n - 1)',
      'end;',
      'begin',
      '  writeln(fact(4))',
      'end.',
    ].join('\n');
    expect(outputOf(source)).toEqual(['24']);
  });

  test('downto counts backwards', () => {
    expect(outputOf('var i: integer; begin for i := 3 downto 1 do write(i); writeln end.')).toEqual(['321']);
  });

  test('while, repeat and case', () => {
    const source = [
      'var i, s: integer;',
      'begin',
      '  i := 0; s := 0;',
      '  while i < 5 do begin i := i + 1; s := s + i end;',
      '  writeln(s);',
      '  repeat i := i - 2 until i < 0;',
      '  writeln(i);',
      '  case s of',
      "    1, 2: writeln('small');",
      "    15: writeln('fifteen')",
      '  else',
      "    writeln('other')",
      '  end',
      'end.',
    ].join('\n');
    expect(outputOf(source)).toEqual(['15', '-1', 'fifteen']);
  });

  test('case falls through to else', () => {
    expect(outputOf("begin case 7 of 1: writeln('one'); else writeln('other') end end.")).toEqual(['other']);
  });

  test('field width and decimals', () => {
    expect(outputOf("begin writeln('x=', 3.14159:8:2); writeln(5:3) end.")).toEqual(['x=    3.14', '  5']);
  });

  test('write keeps the line open until writeln', () => {
    expect(outputOf("begin write('a'); write('b'); writeln end.")).toEqual(['ab']);
  });

  test('var parameters share the caller variable', () => {
    const source = [
      'var a: integer;',
      'procedure bump(var x: integer);',
      'begin',
      '  x := x + 1',
      'end;',
      'procedure keep(x: integer);',
      'begin',
      '  x := 0',
      'end;',
      'begin',
      '  a := 1; bump(a); bump(a); keep(a); writeln(a)',
      'end.',
    ].join('\n');
    expect(outputOf(source)).toEqual(['3']);
  });

  test('array elements can be passed as var parameters', () => {
    const source = [
      'var a: array[0..2] of integer; i: integer;',
      'procedure swap(var x, y: integer);',
      'var t: integer;',
      'begin',
      '  t := x; x := y; y := t',
      'end;',
      'begin',
      '  a[0] := 1; a[1] := 2; a[2] := 3;',
      '  i := 0;',
      '  swap(a[i], a[2]);',
      '  writeln(a[0], a[1], a[2]);',
      '  swap(a[3], a[0])',
      'end.',
    ].join('\n');
    const run = runPascal(source);
    expect(run.output).toEqual(['321']);
    expect(run.final).toMatchObject({
      kind: 'runtime-error',
      category: 'index-out-of-range',
      message: 'index 3 is outside a[0..2]',
    });
  });

  test('an undeclared for variable exists only inside its loop', () => {
    expect(outputOf('begin for k := 1 to 2 do write(k); for k := 3 to 4 do write(k); writeln end.')).toEqual(['1234']);
    expect(loadError('begin for k := 1 to 2 do write(k); writeln(k) end.')).toBe("unknown identifier 'k'");
  });

  test('a declared for variable keeps its last value', () => {
    expect(outputOf("var i: integer; begin for i := 1 to 3 do write(''); writeln(i) end.")).toEqual(['4']);
  });

  test('arrays hold their declared element count', () => {
    const source = [
      'var a: array[0..4] of integer; i: integer;',
      'begin',
      '  for i := 0 to 4 do a[i] := i * i;',
      '  writeln(a[2] + a[4]);',
      '  a[5] := 1',
      'end.',
    ].join('\n');
    const run = runPascal(source);
    expect(run.output).toEqual(['20']);
    expect(run.final).toMatchObject({
      kind: 'runtime-error',
      category: 'index-out-of-range',
      message: 'index 5 is outside a[0..4]',
    });
  });

  test('string builtins and indexing', () => {
    const source = "var s: string; begin s := 'hello'; writeln(upcase(s), ' ', length(s), ' ', copy(s, 2, 3), ' ', pos('ll', s)); writeln(s[1]) end.";
    expect(outputOf(source)).toEqual(['HELLO 5 ell 3', 'h']);
  });

  test('booleans print in upper case', () => {
    expect(outputOf("begin writeln(odd(3), ' ', not true) end.")).toEqual(['TRUE FALSE']);
  });

  test('inc and dec', () => {
    expect(outputOf('var i: integer; begin i := 5; inc(i); dec(i, 3); writeln(i) end.')).toEqual(['3']);
  });

  test('exit leaves the procedure', () => {
    const source = [
      'procedure p(n: integer);',
      'begin',
      '  if n > 0 then exit;',
      "  writeln('zero')",
      'end;',
      'begin p(1); p(0) end.',
    ].join('\n');
    expect(outputOf(source)).toEqual(['zero']);
  });

  test('variables start at their default values', () => {
    expect(outputOf("var n: integer; s: string; b: boolean; begin writeln(n, '[', s, ']', b) end.")).toEqual(['0[]FALSE']);
  });

  test('integer division and modulo', () => {
    expect(outputOf('begin writeln(7 div 2, 7 mod 3, -7 div 2) end.')).toEqual(['31-3']);
  });
});

// ==================================================================
// Input
// ==================================================================

describe('Pascal input', () => {
  test('readln coerces to the variable type and repeats on bad input', () => {
    const source = [
      'var n: integer; name: string;',
      'begin',
      "  write('Number? ');",
      '  readln(n);',
      '  readln(name);',
      "  writeln(name, ' ', n * 2)",
      'end.',
    ].join('\n');
    const run = runPascal(source, ['x', '4', 'Bob']);
    expect(run.events).toEqual([
      { kind: 'input-requested', prompt: 'Number? ' },
      { kind: 'input-requested', prompt: 'Number? ' },
      { kind: 'input-requested' },
      { kind: 'output', text: 'Bob 8' },
      { kind: 'completed', reason: 'finished' },
    ]);
  });

  test('integers reject fractions but reals accept them', () => {
    const run = runPascal('var i: integer; r: real; begin readln(i); readln(r); writeln(i + r) end.', ['2.5', '2', '2.5']);
    expect(run.events.filter((e) => e.kind === 'input-requested')).toHaveLength(3);
    expect(run.output).toEqual(['4.5']);
  });

  test('readln inside a nested call suspends the whole stack', () => {
    const source = [
      'function ask: integer;',
      'var n: integer;',
      'begin',
      '  readln(n);',
      '  ask := n + 1',
      'end;',
      'begin writeln(ask * 2) end.',
    ].join('\n');
    expect(outputOf(source, ['4'])).toEqual(['10']);
  });
});

// ==================================================================
// Runtime errors
// ==================================================================

describe('Pascal runtime errors', () => {
  test('assigning the wrong type', () => {
    expect(runPascal("var i: integer; begin i := 'a' end.").final).toMatchObject({
      kind: 'runtime-error',
      category: 'type-mismatch',
      message: "cannot assign text to 'i' of type integer",
    });
  });

  test('fractions do not fit integers', () => {
    expect(runPascal('var i: integer; begin i := 7 / 2 end.').final).toMatchObject({
      category: 'type-mismatch',
      message: "cannot assign 3.5 to integer 'i'",
    });
  });

  test('div by zero', () => {
    expect(runPascal('begin writeln(1 div 0) end.').final).toMatchObject({
      category: 'division-by-zero',
      message: 'div by zero',
    });
  });

  test('a function that never sets its result', () => {
    const run = runPascal('function f: integer; begin end;\nbegin writeln(f) end.');
    expect(run.final).toEqual({
      kind: 'runtime-error',
      category: 'missing-result',
      message: "function 'f' returned without assigning its result",
      location: { line: 1, column: 1 },
    });
  });

  test('unbounded recursion overflows the call stack', () => {
    const run = runPascal('procedure loop; begin loop end;\nbegin loop end.', [], { maxCallDepth: 50 });
    expect(run.final).toMatchObject({
      category: 'stack-overflow',
      message: "call depth exceeded 50 in 'loop'",
    });
  });
});
