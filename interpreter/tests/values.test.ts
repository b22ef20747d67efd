/**
 * Printer, truthiness, equality and error rendering.
 */

import { Environment } from '../src/environment';
import {
  mkAtom,
  mkNumber,
  mkString,
  mkBool,
  mkChar,
  mkList,
  mkDottedList,
  mkPrimitive,
  mkClosure,
  NIL,
  isTruthy,
  kindName,
  valueToString,
  displayString,
  valuesEqual,
} from '../src/values';
import {
  numArgs,
  typeMismatch,
  parseError,
  badSpecialForm,
  unboundVariable,
  defaultError,
  errorToString,
} from '../src/errors';
import { ok } from '../src/result';

describe('valueToString', () => {
  test('atoms, numbers and booleans', () => {
    expect(valueToString(mkAtom('foo'))).toBe('foo');
    expect(valueToString(mkNumber(-12))).toBe('-12');
    expect(valueToString(mkBool(true))).toBe('#t');
    expect(valueToString(mkBool(false))).toBe('#f');
  });

  test('strings are quoted and escaped', () => {
    expect(valueToString(mkString('a"b\\c\n\t\r'))).toBe('"a\\"b\\\\c\\n\\t\\r"');
  });

  test('characters print by name where one exists', () => {
    expect(valueToString(mkChar('a'))).toBe('#\\a');
    expect(valueToString(mkChar(' '))).toBe('#\\space');
    expect(valueToString(mkChar('\n'))).toBe('#\\newline');
    expect(valueToString(mkChar('\t'))).toBe('#\\tab');
  });

  test('lists and dotted lists', () => {
    expect(valueToString(NIL)).toBe('()');
    expect(valueToString(mkList([mkNumber(1), mkList([mkAtom('a')])]))).toBe('(1 (a))');
    expect(valueToString(mkDottedList([mkNumber(1), mkNumber(2)], mkNumber(3)))).toBe('(1 2 . 3)');
  });

  test('procedures', () => {
    expect(valueToString(mkPrimitive('car', () => ok(NIL)))).toBe('#<primitive car>');
    const env = new Environment();
    expect(valueToString(mkClosure(['a', 'b'], null, [mkAtom('a')], env))).toBe('(lambda (a b) ...)');
    expect(valueToString(mkClosure(['a'], 'rest', [mkAtom('a')], env))).toBe('(lambda (a . rest) ...)');
    expect(valueToString(mkClosure([], 'args', [mkAtom('args')], env))).toBe('(lambda args ...)');
  });
});

describe('displayString', () => {
  test('strings and characters print raw, everything else canonically', () => {
    expect(displayString(mkString('a "b"'))).toBe('a "b"');
    expect(displayString(mkChar('x'))).toBe('x');
    expect(displayString(mkList([mkString('s')]))).toBe('("s")');
  });
});

describe('value predicates', () => {
  test('only #f is false', () => {
    expect(isTruthy(mkBool(false))).toBe(false);
    expect(isTruthy(mkBool(true))).toBe(true);
    expect(isTruthy(NIL)).toBe(true);
    expect(isTruthy(mkNumber(0))).toBe(true);
    expect(isTruthy(mkString(''))).toBe(true);
  });

  test('kindName', () => {
    expect(kindName(mkAtom('a'))).toBe('symbol');
    expect(kindName(mkChar('a'))).toBe('character');
    expect(kindName(mkBool(true))).toBe('boolean');
    expect(kindName(mkDottedList([NIL], NIL))).toBe('dotted list');
    expect(kindName(mkNumber(1))).toBe('number');
  });

  test('valuesEqual is structural for data and by identity for procedures', () => {
    expect(valuesEqual(mkList([mkNumber(1), mkString('a')]), mkList([mkNumber(1), mkString('a')]))).toBe(true);
    expect(valuesEqual(mkList([mkNumber(1)]), mkList([mkNumber(1), mkNumber(2)]))).toBe(false);
    expect(valuesEqual(mkNumber(1), mkString('1'))).toBe(false);
    const prim = mkPrimitive('p', () => ok(NIL));
    expect(valuesEqual(prim, prim)).toBe(true);
    expect(valuesEqual(prim, mkPrimitive('p', () => ok(NIL)))).toBe(false);
  });
});

describe('errorToString', () => {
  test('renders every error kind', () => {
    expect(errorToString(numArgs(2, [mkNumber(1)]))).toBe('Expected 2 args; found values 1');
    expect(errorToString(numArgs(1, []))).toBe('Expected 1 args; found none');
    expect(errorToString(typeMismatch('number', mkString('x')))).toBe('Invalid type: expected number, found "x"');
    expect(errorToString(parseError('unexpected ")"', { offset: 7, line: 2, column: 3 }))).toBe(
      'Parse error at line 2, column 3: unexpected ")"',
    );
    expect(errorToString(badSpecialForm('Not a procedure', mkNumber(1)))).toBe('Not a procedure: 1');
    expect(errorToString(unboundVariable('Getting an unbound variable', 'x'))).toBe(
      'Getting an unbound variable: x',
    );
    expect(errorToString(defaultError('Division by zero'))).toBe('Division by zero');
  });
});
