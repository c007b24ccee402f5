/**
 * Syntax tree for TW Pascal. The compiler turns it into per-routine
 * instruction lists before anything runs.
 */

import { SourceLocation } from '../errors';

export type ScalarType = 'integer' | 'real' | 'boolean' | 'string' | 'char';

export type TypeSpec =
  | { kind: ScalarType }
  | { kind: 'array'; size: number; element: TypeSpec };

export type Expr =
  | { kind: 'number'; value: number; loc: SourceLocation }
  | { kind: 'string'; value: string; loc: SourceLocation }
  | { kind: 'boolean'; value: boolean; loc: SourceLocation }
  | { kind: 'name'; name: string; loc: SourceLocation }
  | { kind: 'index'; name: string; index: Expr; loc: SourceLocation }
  | { kind: 'call'; name: string; args: Expr[]; loc: SourceLocation }
  | { kind: 'unary'; operator: '-' | 'not'; operand: Expr; loc: SourceLocation }
  | { kind: 'binary'; operator: string; left: Expr; right: Expr; loc: SourceLocation };

export interface Designator {
  name: string;
  index?: Expr;
  loc: SourceLocation;
}

export interface WriteArg {
  value: Expr;
  width?: Expr;
  decimals?: Expr;
}

export interface CaseArm {
  labels: Expr[];
  body: Statement;
}

export type Statement =
  | { kind: 'assign'; target: Designator; value: Expr; loc: SourceLocation }
  | { kind: 'call'; name: string; args: Expr[]; loc: SourceLocation }
  | { kind: 'compound'; body: Statement[]; loc: SourceLocation }
  | { kind: 'if'; condition: Expr; then: Statement; else?: Statement; loc: SourceLocation }
  | { kind: 'while'; condition: Expr; body: Statement; loc: SourceLocation }
  | { kind: 'repeat'; body: Statement[]; condition: Expr; loc: SourceLocation }
  | { kind: 'for'; variable: string; from: Expr; to: Expr; down: boolean; body: Statement; loc: SourceLocation }
  | { kind: 'case'; selector: Expr; arms: CaseArm[]; else?: Statement[]; loc: SourceLocation }
  | { kind: 'write'; newline: boolean; args: WriteArg[]; loc: SourceLocation }
  | { kind: 'read'; newline: boolean; targets: Designator[]; loc: SourceLocation }
  | { kind: 'exit'; loc: SourceLocation }
  | { kind: 'empty'; loc: SourceLocation };

export interface ConstDecl {
  name: string;
  value: Expr;
  loc: SourceLocation;
}

export interface VarDecl {
  name: string;
  type: TypeSpec;
  loc: SourceLocation;
}

export interface ParamDecl {
  name: string;
  type: TypeSpec;
  mode: 'value' | 'var';
  loc: SourceLocation;
}

export interface RoutineDecl {
  kind: 'procedure' | 'function';
  name: string;
  params: ParamDecl[];
  resultType?: TypeSpec;
  consts: ConstDecl[];
  vars: VarDecl[];
  body: Statement;
  loc: SourceLocation;
}

export interface ProgramDecl {
  name?: string;
  consts: ConstDecl[];
  vars: VarDecl[];
  routines: RoutineDecl[];
  main: Statement;
}

export function describeType(type: TypeSpec): string {
  return type.kind === 'array' ? `array[0..${type.size - 1}] of ${describeType(type.element)}` : type.kind;
}
