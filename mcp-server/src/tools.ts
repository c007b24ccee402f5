/**
 * Tool handlers for the Time Warp MCP server.
 *
 * Handlers are plain functions over the engine so they can be exercised
 * without a transport; index.ts registers them with the server.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import {
  ExecutionEvent,
  LanguageKind,
  detectLanguage,
  load,
  runScripted,
  start,
} from "time-warp-interpreter";

export const languageSchema = z.enum(["basic", "pascal", "prolog"]);

export const checkInputSchema = {
  source: z.string().describe("Program source text"),
  language: languageSchema.optional().describe("Language; detected from the source when omitted"),
};

export const runInputSchema = {
  ...checkInputSchema,
  inputs: z.array(z.string()).optional().describe("Answers to input requests, in order"),
  maxSteps: z.number().int().positive().max(10_000_000).optional()
    .describe("Step budget before the run stops with a step-limit error (default 1000000)"),
};

export const detectInputSchema = {
  source: z.string().describe("Program source text"),
  fileName: z.string().optional().describe("File name; its extension decides when known"),
};

const checkArgs = z.object(checkInputSchema);
const runArgs = z.object(runInputSchema);
const detectArgs = z.object(detectInputSchema);

export type CheckArgs = z.infer<typeof checkArgs>;
export type RunArgs = z.infer<typeof runArgs>;
export type DetectArgs = z.infer<typeof detectArgs>;

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/** Runs from the MCP server get a smaller budget than the engine default. */
const DEFAULT_MAX_STEPS = 1_000_000;
const MAX_EVENTS = 10_000;

interface Diagnostic {
  line: number;
  column: number;
  message: string;
}

export interface CheckReport {
  language: LanguageKind;
  valid: boolean;
  errors: Diagnostic[];
}

export interface RunReport {
  language: LanguageKind;
  success: boolean;
  output: string[];
  drawCount: number;
  final?: ExecutionEvent;
  awaitingInput?: boolean;
  errors?: Diagnostic[];
}

export function checkSource(args: CheckArgs): CheckReport {
  const language = args.language ?? detectLanguage(args.source);
  const loaded = load(language, args.source);
  if (loaded.ok) return { language, valid: true, errors: [] };
  const { line, column, detail } = loaded.error;
  return { language, valid: false, errors: [{ line, column, message: detail }] };
}

export function runSource(args: RunArgs): RunReport {
  const language = args.language ?? detectLanguage(args.source);
  const loaded = load(language, args.source);
  if (!loaded.ok) {
    const { line, column, detail } = loaded.error;
    return { language, success: false, output: [], drawCount: 0, errors: [{ line, column, message: detail }] };
  }
  const state = start(loaded.program, { config: { maxSteps: args.maxSteps ?? DEFAULT_MAX_STEPS } });
  const run = runScripted(state, args.inputs ?? [], { maxEvents: MAX_EVENTS });
  const report: RunReport = {
    language,
    success: run.final.kind === "completed",
    output: run.output,
    drawCount: run.drawing.length,
    final: run.final,
  };
  if (run.final.kind === "input-requested") report.awaitingInput = true;
  return report;
}

export function detectSource(args: DetectArgs): { language: LanguageKind } {
  return { language: detectLanguage(args.source, args.fileName) };
}

export function toToolResult(value: object, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

export function handleCheck(args: CheckArgs): ToolResult {
  return toToolResult(checkSource(args));
}

export function handleRun(args: RunArgs): ToolResult {
  const report = runSource(args);
  return toToolResult(report, report.errors !== undefined || report.final?.kind === "runtime-error");
}

export function handleDetect(args: DetectArgs): ToolResult {
  return toToolResult(detectSource(args));
}

/** Markdown reference of the three languages, shipped beside the sources. */
export function readLanguageReference(): string {
  const referencePath = path.resolve(__dirname, "../languages.md");
  try {
    return fs.readFileSync(referencePath, "utf-8");
  } catch (e) {
    console.error(`Could not read ${referencePath}:`, e);
    return "# Time Warp languages\n\nLanguage reference not found. Expected at: mcp-server/languages.md";
  }
}
