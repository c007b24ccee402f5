/**
 * Scoping environment shared by the BASIC and Pascal interpreters.
 *
 * Each environment maps names to cells and links to its parent scope. A cell
 * can be shared between scopes, which is how Pascal `var` parameters make a
 * callee's writes visible to the caller.
 */

import { Value } from './values';
import { RuntimeError, UndefinedVariableError } from './errors';

export interface Cell {
  /** `undefined` until first assignment (Pascal function results). */
  value: Value | undefined;
  readonly constant: boolean;
  /** Checks a value before it is stored; throws on mismatch. */
  readonly accept?: (value: Value) => Value;
}

export function mkCell(value: Value | undefined, accept?: (value: Value) => Value, constant = false): Cell {
  return { value, accept, constant };
}

export class Environment {
  private readonly cells: Map<string, Cell>;
  readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.cells = new Map();
    this.parent = parent;
  }

  /**
   * Find the cell for a name, traversing the parent chain.
   */
  lookup(name: string): Cell | undefined {
    const cell = this.cells.get(name);
    if (cell !== undefined) return cell;
    return this.parent?.lookup(name);
  }

  /**
   * Read a variable. Unknown names and unassigned cells are both reported as
   * undefined variables.
   */
  get(name: string): Value {
    const value = this.lookup(name)?.value;
    if (value === undefined) throw new UndefinedVariableError(name);
    return value;
  }

  hasOwn(name: string): boolean {
    return this.cells.has(name);
  }

  /**
   * Assign to an existing variable anywhere in the chain.
   */
  set(name: string, value: Value): void {
    const cell = this.lookup(name);
    if (cell === undefined) throw new UndefinedVariableError(name);
    assign(cell, name, value);
  }

  /**
   * Define a new variable in the current scope.
   */
  define(name: string, cell: Cell): void {
    if (this.cells.has(name)) {
      throw new RuntimeError('invalid-argument', `'${name}' is already defined in this scope`);
    }
    this.cells.set(name, cell);
  }

  /**
   * Assign in the current scope, creating the cell on first use. BASIC
   * variables spring into existence this way.
   */
  assignOrDefine(name: string, value: Value, accept?: (value: Value) => Value): void {
    const cell = this.cells.get(name);
    if (cell !== undefined) {
      assign(cell, name, value);
      return;
    }
    this.cells.set(name, mkCell(accept ? accept(value) : value, accept));
  }

  remove(name: string): void {
    this.cells.delete(name);
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }
}

function assign(cell: Cell, name: string, value: Value): void {
  if (cell.constant) {
    throw new RuntimeError('invalid-argument', `cannot assign to constant '${name}'`);
  }
  cell.value = cell.accept ? cell.accept(value) : value;
}
