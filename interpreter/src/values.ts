/**
 * Runtime value representations for the Schemelet interpreter.
 *
 * Source code and data share one representation: the reader produces
 * LispValues and the evaluator interprets them.
 */

import type { Environment } from './environment';
import type { LispError } from './errors';
import type { Result } from './result';

export type LispValue =
  | { kind: 'atom'; name: string }
  | { kind: 'number'; value: bigint }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'char'; value: string }
  | { kind: 'list'; elements: readonly LispValue[] }
  | { kind: 'dotted'; head: readonly LispValue[]; tail: LispValue }
  | { kind: 'primitive'; name: string; fn: PrimitiveFn }
  | { kind: 'closure'; params: readonly string[]; vararg: string | null; body: readonly LispValue[]; closure: Environment };

export type PrimitiveFn = (args: LispValue[]) => Result<LispValue, LispError>;

/** Name-to-procedure bindings installed in a global environment. */
export type PrimitiveTable = Readonly<Record<string, PrimitiveFn>>;

export type Closure = Extract<LispValue, { kind: 'closure' }>;

/**
 * Named character literals, `#\name`. Lookup is case-insensitive.
 */
export const CHARACTER_NAMES: ReadonlyMap<string, string> = new Map([
  ['altmode', '\x1b'],
  ['backnext', '\x1f'],
  ['backspace', '\x08'],
  ['call', '\x1a'],
  ['linefeed', '\n'],
  ['newline', '\n'],
  ['page', '\x0c'],
  ['return', '\r'],
  ['rubout', '\x7f'],
  ['tab', '\t'],
  ['space', ' '],
]);

// ---- Value constructors ----

export function mkAtom(name: string): LispValue {
  return { kind: 'atom', name };
}

export function mkNumber(value: bigint | number): LispValue {
  return { kind: 'number', value: BigInt(value) };
}

export function mkString(value: string): LispValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): LispValue {
  return { kind: 'bool', value };
}

export function mkChar(value: string): LispValue {
  return { kind: 'char', value };
}

export function mkList(elements: readonly LispValue[]): LispValue {
  return { kind: 'list', elements };
}

export function mkDottedList(head: readonly LispValue[], tail: LispValue): LispValue {
  return { kind: 'dotted', head, tail };
}

export function mkPrimitive(name: string, fn: PrimitiveFn): LispValue {
  return { kind: 'primitive', name, fn };
}

export function mkClosure(
  params: readonly string[],
  vararg: string | null,
  body: readonly LispValue[],
  closure: Environment,
): LispValue {
  return { kind: 'closure', params, vararg, body, closure };
}

export const NIL: LispValue = mkList([]);

// ---- Value utilities ----

/**
 * Everything except the boolean #f counts as true.
 */
export function isTruthy(v: LispValue): boolean {
  return !(v.kind === 'bool' && !v.value);
}

export function kindName(v: LispValue): string {
  switch (v.kind) {
    case 'atom': return 'symbol';
    case 'dotted': return 'dotted list';
    case 'char': return 'character';
    case 'bool': return 'boolean';
    default: return v.kind;
  }
}

function escapeString(s: string): string {
  let out = '';
  for (const ch of s) {
    switch (ch) {
      case '"': out += '\\"'; break;
      case '\\': out += '\\\\'; break;
      case '\t': out += '\\t'; break;
      case '\n': out += '\\n'; break;
      case '\r': out += '\\r'; break;
      default: out += ch;
    }
  }
  return out;
}

function charToString(c: string): string {
  for (const [name, value] of CHARACTER_NAMES) {
    // linefeed and newline share LF; print the more familiar name
    if (value === c && name !== 'linefeed') return `#\\${name}`;
  }
  return `#\\${c}`;
}

/**
 * Canonical printer. Reading the output back yields an equal value
 * for every kind except procedures.
 */
export function valueToString(v: LispValue): string {
  switch (v.kind) {
    case 'atom': return v.name;
    case 'number': return v.value.toString();
    case 'string': return `"${escapeString(v.value)}"`;
    case 'bool': return v.value ? '#t' : '#f';
    case 'char': return charToString(v.value);
    case 'list': return `(${v.elements.map(valueToString).join(' ')})`;
    case 'dotted': return `(${v.head.map(valueToString).join(' ')} . ${valueToString(v.tail)})`;
    case 'primitive': return `#<primitive ${v.name}>`;
    case 'closure': {
      if (v.vararg !== null && v.params.length === 0) return `(lambda ${v.vararg} ...)`;
      const params = v.vararg === null ? v.params.join(' ') : [...v.params, '.', v.vararg].join(' ');
      return `(lambda (${params}) ...)`;
    }
  }
}

/**
 * Like valueToString, but strings and characters print as their raw text.
 */
export function displayString(v: LispValue): string {
  if (v.kind === 'string' || v.kind === 'char') return v.value;
  return valueToString(v);
}

/**
 * Structural equivalence used by eqv? and eq?. Procedures compare by identity.
 */
export function valuesEqual(a: LispValue, b: LispValue): boolean {
  switch (a.kind) {
    case 'atom':
      return b.kind === 'atom' && a.name === b.name;
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'char':
      return b.kind === 'char' && a.value === b.value;
    case 'list':
      return b.kind === 'list' && listsEqual(a.elements, b.elements, valuesEqual);
    case 'dotted':
      return b.kind === 'dotted'
        && listsEqual(a.head, b.head, valuesEqual)
        && valuesEqual(a.tail, b.tail);
    case 'primitive':
    case 'closure':
      return a === b;
  }
}

export function listsEqual(
  xs: readonly LispValue[],
  ys: readonly LispValue[],
  eq: (a: LispValue, b: LispValue) => boolean,
): boolean {
  return xs.length === ys.length && xs.every((x, i) => eq(x, ys[i]));
}
