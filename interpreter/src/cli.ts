#!/usr/bin/env node
/**
 * Time Warp CLI entry point.
 *
 * Usage: timewarp <file>
 *        timewarp run <file> [--lang basic|pascal|prolog] [--draw] [--trace] [--config file.json]
 *        timewarp check <file> [...]
 *        timewarp repl
 *        timewarp --eval "<code>" [--lang basic|pascal|prolog]
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { ZodError } from 'zod';
import { EngineConfig, resolveConfig } from './config';
import { LANGUAGES, LanguageKind, detectLanguage, load, resume, start, step } from './engine';
import { ExecutionEvent } from './io';
import { startRepl } from './repl';
import { describePrimitive } from './turtle';

interface RunOptions {
  language?: LanguageKind;
  draw: boolean;
  trace: boolean;
  config?: EngineConfig;
}

function isLanguage(name: string): name is LanguageKind {
  return LANGUAGES.some((l) => l === name);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      console.error('Error: check requires at least one file argument');
      process.exit(1);
    }
    process.exit(runCheck(files));
  }

  if (args[0] === 'repl') {
    startRepl();
    return;
  }

  const rest = args[0] === 'run' ? args.slice(1) : args;
  let source: string | undefined;
  let filename = '<eval>';
  const options: RunOptions = { draw: false, trace: false };

  for (let i = 0; i < rest.length; i++) {
    switch (rest[i]) {
      case '--eval':
      case '-e':
        if (i + 1 >= rest.length) fatal('--eval requires a code argument');
        source = rest[++i];
        break;
      case '--lang': {
        const name = rest[++i] ?? '';
        if (!isLanguage(name)) fatal(`unknown language '${name}' (expected ${LANGUAGES.join(', ')})`);
        options.language = name;
        break;
      }
      case '--draw': options.draw = true; break;
      case '--trace': options.trace = true; break;
      case '--config':
        options.config = readConfig(rest[++i] ?? '');
        break;
      default:
        if (rest[i].startsWith('-')) fatal(`unknown option: ${rest[i]}`);
        filename = rest[i];
        source = readFile(filename);
    }
  }

  if (source === undefined) fatal('no program given');
  process.exit(await runProgram(source, filename, options));
}

function fatal(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function readConfig(file: string): EngineConfig {
  const text = readFile(file);
  try {
    return resolveConfig(JSON.parse(text));
  } catch (e) {
    if (e instanceof SyntaxError) fatal(`${file}: ${e.message}`);
    if (e instanceof ZodError) {
      console.error(`Error: invalid configuration in ${file}:`);
      for (const issue of e.issues) console.error(`  ${issue.path.join('.')}: ${issue.message}`);
      process.exit(1);
    }
    throw e;
  }
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) fatal(`File not found: ${resolved}`);
  return fs.readFileSync(resolved, 'utf-8');
}

/**
 * Run one program against the terminal. Returns the process exit code.
 */
async function runProgram(source: string, filename: string, options: RunOptions): Promise<number> {
  const language = options.language ?? detectLanguage(source, filename === '<eval>' ? undefined : filename);
  const loaded = load(language, source);
  if (!loaded.ok) {
    console.error(`${filename}: ${loaded.error.message}`);
    return 1;
  }

  const state = start(loaded.program, { config: options.config });

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let event: ExecutionEvent = step(state);
  try {
    for (;;) {
      if (options.trace) console.error(`[trace] ${JSON.stringify(event)}`);
      switch (event.kind) {
        case 'output':
          process.stdout.write(`${event.text}\n`);
          break;
        case 'draw':
          if (options.draw) process.stdout.write(`${describePrimitive(event.primitive)}\n`);
          break;
        case 'input-requested': {
          process.stdout.write(event.prompt === undefined ? '? ' : `${event.prompt} `);
          const answer = await lines.next();
          if (answer.done === true) {
            console.error('Error: input ended while the program was waiting for input');
            return 1;
          }
          event = resume(state, answer.value);
          continue;
        }
        case 'runtime-error': {
          const where = event.location === undefined ? '' : ` [line ${event.location.line}, col ${event.location.column}]`;
          console.error(`RuntimeError (${event.category})${where}: ${event.message}`);
          return 1;
        }
        case 'completed':
          return 0;
      }
      event = step(state);
    }
  } finally {
    rl.close();
  }
}

/**
 * Parse every file. Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[]): number {
  let hasAnyErrors = false;

  for (const filepath of files) {
    const resolved = path.resolve(filepath);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      hasAnyErrors = true;
      continue;
    }

    const source = fs.readFileSync(resolved, 'utf-8');
    const language = detectLanguage(source, filepath);
    const result = load(language, source);
    if (result.ok) {
      console.log(`✓ ${filepath} (${language}) — no errors`);
    } else {
      hasAnyErrors = true;
      console.log(`✗ ${filepath} (${language})`);
      console.log(`  Line ${result.error.line}, Col ${result.error.column}: ${result.error.detail}`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function printUsage(): void {
  console.log('Time Warp v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  timewarp <file>                                Run a program');
  console.log('  timewarp run <file> [options]                  Run a program');
  console.log('  timewarp check <file> [...]                    Check files for syntax errors');
  console.log('  timewarp repl                                  Start the TW BASIC immediate mode');
  console.log('  timewarp --eval "<code>" [--lang <language>]   Run inline code');
  console.log('  timewarp --help                                Show this help');
  console.log('');
  console.log('Options:');
  console.log('  --lang basic|pascal|prolog   Language (default: detected from extension and content)');
  console.log('  --draw                       Print turtle drawing primitives');
  console.log('  --trace                      Log every execution event to stderr');
  console.log('  --config <file.json>         Engine configuration');
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
