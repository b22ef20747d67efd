/**
 * Error taxonomy shared by the reader, the evaluator and the primitives.
 *
 * Errors are plain data returned inside a Result; nothing in the core
 * throws them.
 */

import { LispValue, valueToString } from './values';

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export type LispError =
  | { kind: 'num_args'; expected: number; received: readonly LispValue[] }
  | { kind: 'type_mismatch'; expected: string; value: LispValue }
  | { kind: 'parse'; message: string; position: SourcePosition }
  | { kind: 'bad_special_form'; message: string; form: LispValue }
  | { kind: 'unbound_variable'; message: string; name: string }
  | { kind: 'default'; message: string };

export function numArgs(expected: number, received: readonly LispValue[]): LispError {
  return { kind: 'num_args', expected, received };
}

export function typeMismatch(expected: string, value: LispValue): LispError {
  return { kind: 'type_mismatch', expected, value };
}

export function parseError(message: string, position: SourcePosition): LispError {
  return { kind: 'parse', message, position };
}

export function badSpecialForm(message: string, form: LispValue): LispError {
  return { kind: 'bad_special_form', message, form };
}

export function unboundVariable(message: string, name: string): LispError {
  return { kind: 'unbound_variable', message, name };
}

export function defaultError(message: string): LispError {
  return { kind: 'default', message };
}

export function errorToString(e: LispError): string {
  switch (e.kind) {
    case 'num_args': {
      const found = e.received.length === 0 ? 'none' : `values ${e.received.map(valueToString).join(' ')}`;
      return `Expected ${e.expected} args; found ${found}`;
    }
    case 'type_mismatch':
      return `Invalid type: expected ${e.expected}, found ${valueToString(e.value)}`;
    case 'parse':
      return `Parse error at line ${e.position.line}, column ${e.position.column}: ${e.message}`;
    case 'bad_special_form':
      return `${e.message}: ${valueToString(e.form)}`;
    case 'unbound_variable':
      return `${e.message}: ${e.name}`;
    case 'default':
      return e.message;
  }
}
