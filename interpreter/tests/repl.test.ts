import { BasicWorkspace } from '../src/repl';
import { load, start } from '../src/engine';
import { ScriptedRun, runScripted } from '../src/host';

function runLine(ws: BasicWorkspace, line: string): ScriptedRun {
  const loaded = load('basic', line);
  if (!loaded.ok) throw loaded.error;
  return runScripted(start(loaded.program, { variables: ws.variables }));
}

describe('BasicWorkspace', () => {
  test('numbered lines are stored and listed in order', () => {
    const ws = new BasicWorkspace();
    expect(ws.enter('20 PRINT "B"')).toBe(true);
    expect(ws.enter('10 PRINT "A"')).toBe(true);
    expect(ws.listing()).toEqual(['10 PRINT "A"', '20 PRINT "B"']);
    expect(ws.size).toBe(2);
  });

  test('re-entering a number replaces the line', () => {
    const ws = new BasicWorkspace();
    ws.enter('10 PRINT 1');
    ws.enter('10 PRINT 2');
    expect(ws.listing()).toEqual(['10 PRINT 2']);
  });

  test('a bare number deletes the line', () => {
    const ws = new BasicWorkspace();
    ws.enter('10 PRINT 1');
    ws.enter('20 PRINT 2');
    ws.enter('10');
    expect(ws.listing()).toEqual(['20 PRINT 2']);
  });

  test('unnumbered text is not stored', () => {
    const ws = new BasicWorkspace();
    expect(ws.enter('PRINT 1')).toBe(false);
    expect(ws.size).toBe(0);
  });

  test('clear empties the program', () => {
    const ws = new BasicWorkspace();
    ws.enter('10 END');
    ws.clear();
    expect(ws.source()).toBe('');
  });

  test('immediate lines share their variables', () => {
    const ws = new BasicWorkspace();
    expect(runLine(ws, 'A = 5').output).toEqual([]);
    expect(runLine(ws, 'PRINT A * 2').output).toEqual(['10']);
  });

  test('resetting the variables forgets earlier lines', () => {
    const ws = new BasicWorkspace();
    runLine(ws, 'A = 5');
    ws.resetVariables();
    expect(runLine(ws, 'PRINT A').final).toMatchObject({ kind: 'runtime-error', category: 'undefined-variable' });
  });

  test('the stored source runs as a program', () => {
    const ws = new BasicWorkspace();
    ws.enter('20 PRINT X * 2');
    ws.enter('10 X = 21');
    const loaded = load('basic', ws.source());
    if (!loaded.ok) throw loaded.error;
    expect(runScripted(start(loaded.program)).output).toEqual(['42']);
  });
});
