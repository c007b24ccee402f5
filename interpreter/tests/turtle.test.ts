import { INITIAL_TURTLE, TurtleState, applyCommand, describePrimitive, normalizeHeading } from '../src/turtle';

describe('applyCommand', () => {
  test('forward from the origin moves up and draws a line', () => {
    const { state, primitives } = applyCommand(INITIAL_TURTLE, { kind: 'forward', distance: 10 });
    expect(state.x).toBe(0);
    expect(state.y).toBe(10);
    expect(primitives).toEqual([
      { kind: 'line', from: { x: 0, y: 0 }, to: { x: 0, y: 10 }, color: 'black', width: 1 },
    ]);
  });

  test('right turns are clockwise', () => {
    const turned = applyCommand(INITIAL_TURTLE, { kind: 'right', degrees: 90 }).state;
    const moved = applyCommand(turned, { kind: 'forward', distance: 5 }).state;
    expect(moved.heading).toBe(90);
    expect(moved.x).toBe(5);
    expect(moved.y).toBe(0);
  });

  test('left turns wrap below zero', () => {
    expect(applyCommand(INITIAL_TURTLE, { kind: 'left', degrees: 90 }).state.heading).toBe(270);
  });

  test('forward then back returns to the start for any heading', () => {
    for (const heading of [0, 30, 45, 90, 137, 200, 315]) {
      const start: TurtleState = { ...INITIAL_TURTLE, x: 3, y: -2, heading };
      const there = applyCommand(start, { kind: 'forward', distance: 17 }).state;
      const back = applyCommand(there, { kind: 'back', distance: 17 }).state;
      expect(back.x).toBeCloseTo(3, 9);
      expect(back.y).toBeCloseTo(-2, 9);
      expect(back.heading).toBe(heading);
    }
  });

  test('pen up moves without drawing', () => {
    const up = applyCommand(INITIAL_TURTLE, { kind: 'pen', down: false }).state;
    const { state, primitives } = applyCommand(up, { kind: 'forward', distance: 10 });
    expect(primitives).toEqual([]);
    expect(state.y).toBe(10);
  });

  test('setxy draws with the current color and width', () => {
    const colored = applyCommand(INITIAL_TURTLE, { kind: 'color', color: 'red' }).state;
    const wide = applyCommand(colored, { kind: 'width', width: 3 }).state;
    expect(applyCommand(wide, { kind: 'setxy', x: 4, y: 4 }).primitives).toEqual([
      { kind: 'line', from: { x: 0, y: 0 }, to: { x: 4, y: 4 }, color: 'red', width: 3 },
    ]);
  });

  test('home returns to the origin facing up', () => {
    const away: TurtleState = { ...INITIAL_TURTLE, x: 10, y: 10, heading: 45, penDown: false };
    const { state, primitives } = applyCommand(away, { kind: 'home' });
    expect(state).toEqual({ ...away, x: 0, y: 0, heading: 0 });
    expect(primitives).toEqual([]);
  });

  test('circle and clear keep the position', () => {
    const circle = applyCommand(INITIAL_TURTLE, { kind: 'circle', radius: 5 });
    expect(circle.state).toBe(INITIAL_TURTLE);
    expect(circle.primitives).toEqual([
      { kind: 'circle', center: { x: 0, y: 0 }, radius: 5, color: 'black', width: 1 },
    ]);
    expect(applyCommand(INITIAL_TURTLE, { kind: 'clear' }).primitives).toEqual([{ kind: 'clear' }]);
  });
});

test('normalizeHeading keeps headings in [0, 360)', () => {
  expect(normalizeHeading(360)).toBe(0);
  expect(normalizeHeading(-30)).toBe(330);
  expect(normalizeHeading(725)).toBe(5);
});

test('describePrimitive', () => {
  expect(describePrimitive({ kind: 'line', from: { x: 0, y: 0 }, to: { x: 0, y: 10 }, color: 'black', width: 1 }))
    .toBe('line (0, 0) -> (0, 10) black 1');
  expect(describePrimitive({ kind: 'clear' })).toBe('clear');
});
