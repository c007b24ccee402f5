/**
 * Time Warp engine: TW BASIC (with PILOT and Logo), TW Pascal and TW Prolog
 * behind one step/resume protocol.
 */

export {
  ExecutionState,
  LANGUAGES,
  abort,
  detectLanguage,
  load,
  resume,
  start,
  step,
} from './engine';
export type { ExecutionStatus, LanguageKind, LoadResult, Program, StartOptions } from './engine';
export { Environment } from './environment';
export { runScripted } from './host';
export type { ScriptedOptions, ScriptedRun } from './host';
export { DEFAULT_CONFIG, EngineConfigSchema, resolveConfig } from './config';
export type { EngineConfig, EngineConfigInput } from './config';
export {
  EngineUsageError,
  LexError,
  ParseError,
  RuntimeError,
  SourceError,
  TimeWarpError,
} from './errors';
export type { RuntimeErrorCategory, SourceLocation } from './errors';
export type { CompletionReason, ExecutionEvent } from './io';
export { INITIAL_TURTLE, applyCommand, describePrimitive } from './turtle';
export type { DrawPrimitive, TurtleCommand, TurtleState } from './turtle';
