/**
 * Program representation for TW BASIC, including its PILOT and Logo commands.
 */

import { SourceLocation } from '../errors';

export type Expr =
  | { kind: 'number'; value: number; loc: SourceLocation }
  | { kind: 'string'; value: string; loc: SourceLocation }
  | { kind: 'variable'; name: string; loc: SourceLocation }
  | { kind: 'element'; name: string; index: Expr; loc: SourceLocation }
  | { kind: 'call'; name: string; args: Expr[]; loc: SourceLocation }
  | { kind: 'unary'; operator: '-' | 'NOT'; operand: Expr; loc: SourceLocation }
  | { kind: 'binary'; operator: string; left: Expr; right: Expr; loc: SourceLocation };

export interface Target {
  name: string;
  index?: Expr;
  loc: SourceLocation;
}

export interface PrintItem {
  expr: Expr;
  separator: ';' | ',' | null;
}

export type TurtleOp =
  | 'FORWARD' | 'BACK' | 'RIGHT' | 'LEFT' | 'PENUP' | 'PENDOWN' | 'HOME' | 'CLEARSCREEN'
  | 'SETXY' | 'SETHEADING' | 'SETCOLOR' | 'SETPENSIZE' | 'CIRCLE' | 'HIDETURTLE' | 'SHOWTURTLE';

export type Statement =
  | { kind: 'let'; target: Target; value: Expr; loc: SourceLocation }
  | { kind: 'print'; items: PrintItem[]; loc: SourceLocation }
  | { kind: 'input'; prompt?: string; target: Target; loc: SourceLocation }
  | { kind: 'goto'; line: number; loc: SourceLocation }
  | { kind: 'gosub'; line: number; loc: SourceLocation }
  | { kind: 'return'; loc: SourceLocation }
  | { kind: 'end'; loc: SourceLocation }
  | { kind: 'if'; condition: Expr; then: Statement[]; else: Statement[]; loc: SourceLocation }
  | { kind: 'for'; variable: string; start: Expr; limit: Expr; step?: Expr; loc: SourceLocation }
  | { kind: 'next'; variable?: string; loc: SourceLocation }
  | { kind: 'dim'; name: string; size: Expr; loc: SourceLocation }
  | { kind: 'repeat'; count: Expr; body: Statement[]; loc: SourceLocation }
  | { kind: 'turtle'; op: TurtleOp; args: Expr[]; loc: SourceLocation }
  // PILOT
  | { kind: 'tell'; text: string; loc: SourceLocation }
  | { kind: 'accept'; target?: Target; loc: SourceLocation }
  | { kind: 'match'; patterns: string[]; loc: SourceLocation }
  | { kind: 'jump'; label: string; loc: SourceLocation }
  | { kind: 'use'; label: string; loc: SourceLocation }
  | { kind: 'endsub'; loc: SourceLocation }
  | { kind: 'guard'; when: boolean; body: Statement; loc: SourceLocation };

export interface BasicLine {
  /** `null` for free-form lines. */
  number: number | null;
  statements: Statement[];
  loc: SourceLocation;
}

export interface BasicProgram {
  readonly language: 'basic';
  readonly lines: readonly BasicLine[];
  /** Line number to position in `lines`. */
  readonly lineIndex: ReadonlyMap<number, number>;
  /** PILOT label (upper case, without `*`) to position in `lines`. */
  readonly labels: ReadonlyMap<string, number>;
}

export function isTextName(name: string): boolean {
  return name.endsWith('$');
}
