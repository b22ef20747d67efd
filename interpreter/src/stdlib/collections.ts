/**
 * Standard library: pairs, lists and equivalence predicates.
 *
 * Proper lists and dotted lists behave as chains of pairs: `cdr` of a
 * one-element dotted list is its tail, and `cons` onto a non-list
 * builds a dotted list.
 */

import {
  LispValue,
  PrimitiveTable,
  mkList,
  mkDottedList,
  mkBool,
  valuesEqual,
} from '../values';
import { typeMismatch } from '../errors';
import { ok, err } from '../result';
import { unaryOp, binaryOp } from '../builtins';

/**
 * Loose coercions used by equal?: values that read as the same number,
 * string or boolean compare equal even across kinds.
 */
function looseNumber(v: LispValue): bigint | null {
  switch (v.kind) {
    case 'number': return v.value;
    case 'string': return /^\s*-?\d+\s*$/.test(v.value) ? BigInt(v.value.trim()) : null;
    case 'list': return v.elements.length === 1 ? looseNumber(v.elements[0]) : null;
    default: return null;
  }
}

function looseString(v: LispValue): string | null {
  switch (v.kind) {
    case 'string': return v.value;
    case 'number': return v.value.toString();
    case 'bool': return v.value ? '#t' : '#f';
    default: return null;
  }
}

function looseBool(v: LispValue): boolean | null {
  return v.kind === 'bool' ? v.value : null;
}

function looselyEqual(a: LispValue, b: LispValue): boolean {
  const unpackers: Array<(v: LispValue) => bigint | string | boolean | null> = [looseNumber, looseString, looseBool];
  return unpackers.some(unpack => {
    const x = unpack(a);
    return x !== null && x === unpack(b);
  });
}

export const collectionPrimitives: PrimitiveTable = {
  car: unaryOp(v => {
    if (v.kind === 'list' && v.elements.length > 0) return ok(v.elements[0]);
    if (v.kind === 'dotted') return ok(v.head[0]);
    return err(typeMismatch('pair', v));
  }),

  cdr: unaryOp(v => {
    if (v.kind === 'list' && v.elements.length > 0) return ok(mkList(v.elements.slice(1)));
    if (v.kind === 'dotted') {
      return ok(v.head.length === 1 ? v.tail : mkDottedList(v.head.slice(1), v.tail));
    }
    return err(typeMismatch('pair', v));
  }),

  cons: binaryOp((x, rest) => {
    if (rest.kind === 'list') return ok(mkList([x, ...rest.elements]));
    if (rest.kind === 'dotted') return ok(mkDottedList([x, ...rest.head], rest.tail));
    return ok(mkDottedList([x], rest));
  }),

  list: args => ok(mkList(args)),

  'null?': unaryOp(v => ok(mkBool(v.kind === 'list' && v.elements.length === 0))),

  'eq?': binaryOp((a, b) => ok(mkBool(valuesEqual(a, b)))),
  'eqv?': binaryOp((a, b) => ok(mkBool(valuesEqual(a, b)))),
  'equal?': binaryOp((a, b) => ok(mkBool(looselyEqual(a, b) || valuesEqual(a, b)))),
};
