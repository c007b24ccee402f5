/**
 * Runtime value representations shared by the BASIC and Pascal interpreters.
 *
 * Values are immutable. Numbers are IEEE-754 doubles; when printed they are
 * rounded to 12 significant digits so that `0.1 + 0.2` prints as `0.3`.
 */

import { TypeMismatchError } from './errors';

export type Value =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'list'; readonly elements: readonly Value[] };

export type ValueKind = Value['kind'];

// ---- Value constructors ----

export function mkNumber(value: number): Value {
  return { kind: 'number', value };
}

export function mkText(value: string): Value {
  return { kind: 'text', value };
}

export function mkBoolean(value: boolean): Value {
  return { kind: 'boolean', value };
}

export function mkList(elements: readonly Value[]): Value {
  return { kind: 'list', elements };
}

// ---- Value utilities ----

const DISPLAY_PRECISION = 12;

export function formatNumber(n: number): string {
  if (Number.isInteger(n)) return String(n);
  if (!Number.isFinite(n)) return n > 0 ? 'Infinity' : n < 0 ? '-Infinity' : 'NaN';
  return String(Number(n.toPrecision(DISPLAY_PRECISION)));
}

export function valueToString(v: Value): string {
  switch (v.kind) {
    case 'number': return formatNumber(v.value);
    case 'text': return v.value;
    case 'boolean': return v.value ? 'TRUE' : 'FALSE';
    case 'list': return `[${v.elements.map(valueToString).join(', ')}]`;
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'number':
    case 'text':
    case 'boolean':
      return b.kind === a.kind && b.value === a.value;
    case 'list':
      return b.kind === 'list'
        && a.elements.length === b.elements.length
        && a.elements.every((el, i) => valuesEqual(el, b.elements[i]));
  }
}

/**
 * Truth value of a condition. Booleans are used as-is and numbers are true when
 * non-zero; anything else is a type mismatch.
 */
export function isTruthy(v: Value): boolean {
  switch (v.kind) {
    case 'boolean': return v.value;
    case 'number': return v.value !== 0;
    default: throw new TypeMismatchError(`expected a condition, got ${describeKind(v.kind)}`);
  }
}

export function asNumber(v: Value, context = 'operand'): number {
  if (v.kind === 'number') return v.value;
  throw new TypeMismatchError(`${context} must be a number, got ${describeKind(v.kind)}`);
}

export function asText(v: Value, context = 'operand'): string {
  if (v.kind === 'text') return v.value;
  throw new TypeMismatchError(`${context} must be text, got ${describeKind(v.kind)}`);
}

export function asBoolean(v: Value, context = 'operand'): boolean {
  if (v.kind === 'boolean') return v.value;
  throw new TypeMismatchError(`${context} must be a boolean, got ${describeKind(v.kind)}`);
}

export function describeKind(kind: ValueKind): string {
  switch (kind) {
    case 'number': return 'a number';
    case 'text': return 'text';
    case 'boolean': return 'a boolean';
    case 'list': return 'a list';
  }
}

/**
 * Compare two scalar values of the same kind. Returns a negative number, zero
 * or a positive number like `Array.prototype.sort` comparators.
 */
export function compareValues(a: Value, b: Value): number {
  if (a.kind === 'number' && b.kind === 'number') return a.value - b.value;
  if (a.kind === 'text' && b.kind === 'text') return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  if (a.kind === 'boolean' && b.kind === 'boolean') return Number(a.value) - Number(b.value);
  throw new TypeMismatchError(`cannot compare ${describeKind(a.kind)} with ${describeKind(b.kind)}`);
}

/**
 * Replace one element of a list, producing a new list.
 */
export function withElement(list: readonly Value[], index: number, value: Value): Value {
  const copy = list.slice();
  copy[index] = value;
  return mkList(copy);
}
