/**
 * TW BASIC immediate mode.
 *
 * Usage: timewarp repl
 *
 *   - Lines starting with a number are stored in the program (a bare number
 *     deletes that line)
 *   - RUN, LIST, NEW and BYE act on the stored program
 *   - Anything else runs at once as a one-line program; variables it sets
 *     stay visible to later lines until the next RUN or NEW
 */

import * as readline from 'readline';
import { Environment } from './environment';
import { load, resume, start, step } from './engine';
import { ExecutionEvent } from './io';

const VERSION = '0.1.0';

const NUMBERED = /^\s*(\d+)\s*(.*)$/;

/**
 * The numbered program being edited in immediate mode.
 */
export class BasicWorkspace {
  private readonly lines = new Map<number, string>();
  private env = new Environment();

  /** Variables shared by every run started from this workspace. */
  get variables(): Environment {
    return this.env;
  }

  resetVariables(): void {
    this.env = new Environment();
  }

  /**
   * Store or delete a numbered line. Returns false when `text` has no line
   * number.
   */
  enter(text: string): boolean {
    const match = NUMBERED.exec(text);
    if (match === null) return false;
    const number = Number(match[1]);
    if (match[2].trim() === '') this.lines.delete(number);
    else this.lines.set(number, match[2]);
    return true;
  }

  listing(): string[] {
    return [...this.lines.entries()]
      .sort(([a], [b]) => a - b)
      .map(([number, text]) => `${number} ${text}`);
  }

  source(): string {
    return this.listing().join('\n');
  }

  clear(): void {
    this.lines.clear();
    this.resetVariables();
  }

  get size(): number {
    return this.lines.size;
  }
}

/**
 * Start immediate mode on the terminal.
 */
export function startRepl(): void {
  const workspace = new BasicWorkspace();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'READY> ',
    terminal: true,
  });

  console.log(`Time Warp BASIC v${VERSION}`);
  console.log('Type RUN, LIST, NEW or BYE.\n');

  // Answers to INPUT go to the running program instead of the command loop.
  let answer: ((text: string) => void) | null = null;

  const execute = (source: string, done: () => void): void => {
    const loaded = load('basic', source);
    if (!loaded.ok) {
      console.error(loaded.error.message);
      done();
      return;
    }
    const state = start(loaded.program, { variables: workspace.variables });
    const handle = (event: ExecutionEvent): void => {
      let current = event;
      for (;;) {
        switch (current.kind) {
          case 'output':
            console.log(current.text);
            break;
          case 'draw':
            break;
          case 'input-requested':
            process.stdout.write(current.prompt === undefined ? '? ' : `${current.prompt} `);
            answer = (text) => {
              answer = null;
              handle(resume(state, text));
            };
            return;
          case 'runtime-error':
            console.error(`RuntimeError (${current.category}): ${current.message}`);
            done();
            return;
          case 'completed':
            done();
            return;
        }
        current = step(state);
      }
    };
    handle(step(state));
  };

  rl.prompt();

  rl.on('line', (line: string) => {
    if (answer !== null) {
      answer(line);
      return;
    }
    const command = line.trim().toUpperCase();
    switch (command) {
      case '':
        break;
      case 'BYE':
      case 'QUIT':
        rl.close();
        return;
      case 'NEW':
        workspace.clear();
        break;
      case 'LIST':
        for (const text of workspace.listing()) console.log(text);
        break;
      case 'RUN':
        workspace.resetVariables();
        execute(workspace.source(), () => rl.prompt());
        return;
      default:
        if (!workspace.enter(line)) {
          execute(line, () => rl.prompt());
          return;
        }
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}
