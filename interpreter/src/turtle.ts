/**
 * Turtle graphics state machine.
 *
 * `applyCommand` is pure: it returns the next state and the draw primitives the
 * command produced. Coordinates are unbounded logical units with the y axis
 * pointing up; heading is in degrees, 0 facing up, increasing clockwise.
 * Mapping to a canvas (flipping, clamping, wrapping) is left to the host.
 */

export interface Point {
  x: number;
  y: number;
}

export interface TurtleState {
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly penDown: boolean;
  readonly color: string;
  readonly width: number;
  readonly visible: boolean;
}

export type DrawPrimitive =
  | { kind: 'line'; from: Point; to: Point; color: string; width: number }
  | { kind: 'circle'; center: Point; radius: number; color: string; width: number }
  | { kind: 'clear' };

export type TurtleCommand =
  | { kind: 'forward'; distance: number }
  | { kind: 'back'; distance: number }
  | { kind: 'right'; degrees: number }
  | { kind: 'left'; degrees: number }
  | { kind: 'pen'; down: boolean }
  | { kind: 'home' }
  | { kind: 'setxy'; x: number; y: number }
  | { kind: 'setheading'; degrees: number }
  | { kind: 'color'; color: string }
  | { kind: 'width'; width: number }
  | { kind: 'circle'; radius: number }
  | { kind: 'clear' }
  | { kind: 'visibility'; visible: boolean };

export interface TurtleStep {
  state: TurtleState;
  primitives: DrawPrimitive[];
}

export const INITIAL_TURTLE: TurtleState = Object.freeze({
  x: 0,
  y: 0,
  heading: 0,
  penDown: true,
  color: 'black',
  width: 1,
  visible: true,
});

// Axis-aligned moves should land on exact integers despite sin/cos noise.
function snap(n: number): number {
  const rounded = Math.round(n * 1e10) / 1e10;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function normalizeHeading(degrees: number): number {
  const h = degrees % 360;
  return snap(h < 0 ? h + 360 : h);
}

function moveTo(state: TurtleState, x: number, y: number): TurtleStep {
  const next: TurtleState = { ...state, x: snap(x), y: snap(y) };
  if (!state.penDown) return { state: next, primitives: [] };
  return {
    state: next,
    primitives: [{
      kind: 'line',
      from: { x: state.x, y: state.y },
      to: { x: next.x, y: next.y },
      color: state.color,
      width: state.width,
    }],
  };
}

function advance(state: TurtleState, distance: number): TurtleStep {
  const radians = (state.heading * Math.PI) / 180;
  return moveTo(state, state.x + distance * Math.sin(radians), state.y + distance * Math.cos(radians));
}

export function applyCommand(state: TurtleState, command: TurtleCommand): TurtleStep {
  switch (command.kind) {
    case 'forward':
      return advance(state, command.distance);
    case 'back':
      return advance(state, -command.distance);
    case 'right':
      return { state: { ...state, heading: normalizeHeading(state.heading + command.degrees) }, primitives: [] };
    case 'left':
      return { state: { ...state, heading: normalizeHeading(state.heading - command.degrees) }, primitives: [] };
    case 'pen':
      return { state: { ...state, penDown: command.down }, primitives: [] };
    case 'home': {
      const moved = moveTo(state, 0, 0);
      return { state: { ...moved.state, heading: 0 }, primitives: moved.primitives };
    }
    case 'setxy':
      return moveTo(state, command.x, command.y);
    case 'setheading':
      return { state: { ...state, heading: normalizeHeading(command.degrees) }, primitives: [] };
    case 'color':
      return { state: { ...state, color: command.color }, primitives: [] };
    case 'width':
      return { state: { ...state, width: command.width }, primitives: [] };
    case 'circle':
      return {
        state,
        primitives: [{
          kind: 'circle',
          center: { x: state.x, y: state.y },
          radius: command.radius,
          color: state.color,
          width: state.width,
        }],
      };
    case 'clear':
      return { state, primitives: [{ kind: 'clear' }] };
    case 'visibility':
      return { state: { ...state, visible: command.visible }, primitives: [] };
  }
}

export function describePrimitive(p: DrawPrimitive): string {
  switch (p.kind) {
    case 'line':
      return `line (${p.from.x}, ${p.from.y}) -> (${p.to.x}, ${p.to.y}) ${p.color} ${p.width}`;
    case 'circle':
      return `circle (${p.center.x}, ${p.center.y}) r=${p.radius} ${p.color} ${p.width}`;
    case 'clear':
      return 'clear';
  }
}
