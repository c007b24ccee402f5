/**
 * Error types for the Time Warp engine.
 *
 * Syntax errors (LexError, ParseError) are returned by `load` and never reach
 * execution. RuntimeError is thrown inside the interpreters and turned into a
 * single terminal `runtime-error` event at the step boundary.
 */

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column */
  column: number;
}

export type RuntimeErrorCategory =
  | 'undefined-variable'
  | 'undefined-line'
  | 'undefined-routine'
  | 'undefined-predicate'
  | 'type-mismatch'
  | 'division-by-zero'
  | 'index-out-of-range'
  | 'missing-result'
  | 'invalid-control'
  | 'stack-overflow'
  | 'arithmetic'
  | 'invalid-argument'
  | 'step-limit';

function formatLocation(loc: SourceLocation | undefined): string {
  return loc !== undefined ? ` [line ${loc.line}, col ${loc.column}]` : '';
}

export class TimeWarpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeWarpError';
  }
}

/**
 * Base class of LexError and ParseError. Both share the
 * `{line, column, message}` shape the host renders against the editor buffer.
 */
export abstract class SourceError extends TimeWarpError {
  public readonly line: number;
  public readonly column: number;
  public readonly detail: string;

  protected constructor(kind: string, detail: string, line: number, column: number) {
    super(`${kind}${formatLocation({ line, column })}: ${detail}`);
    this.line = line;
    this.column = column;
    this.detail = detail;
  }
}

export class LexError extends SourceError {
  constructor(detail: string, line: number, column: number) {
    super('LexError', detail, line, column);
    this.name = 'LexError';
  }
}

export class ParseError extends SourceError {
  constructor(detail: string, line: number, column: number) {
    super('ParseError', detail, line, column);
    this.name = 'ParseError';
  }
}

export class RuntimeError extends TimeWarpError {
  public readonly category: RuntimeErrorCategory;
  public readonly detail: string;
  public readonly location: SourceLocation | undefined;

  constructor(category: RuntimeErrorCategory, detail: string, location?: SourceLocation) {
    super(`RuntimeError${formatLocation(location)}: ${detail}`);
    this.name = 'RuntimeError';
    this.category = category;
    this.detail = detail;
    this.location = location;
  }

  /** Attach a location if the error was raised without one. */
  at(location: SourceLocation | undefined): RuntimeError {
    if (this.location !== undefined || location === undefined) return this;
    return new RuntimeError(this.category, this.detail, location);
  }
}

export class UndefinedVariableError extends RuntimeError {
  constructor(name: string, location?: SourceLocation) {
    super('undefined-variable', `undefined variable '${name}'`, location);
    this.name = 'UndefinedVariableError';
  }
}

export class TypeMismatchError extends RuntimeError {
  constructor(detail: string, location?: SourceLocation) {
    super('type-mismatch', detail, location);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Raised when the host breaks the step/resume protocol, e.g. calling `resume`
 * when no input request is outstanding. Not a program error.
 */
export class EngineUsageError extends TimeWarpError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineUsageError';
  }
}
