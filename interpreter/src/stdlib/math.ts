/**
 * Standard library: integer arithmetic, numeric comparison and boolean
 * connectives.
 *
 * Numbers are bigints, so there is no overflow. Division primitives
 * follow the usual integer conventions: `/` and `mod` round toward
 * negative infinity, `quotient` and `remainder` toward zero.
 */

import { PrimitiveTable } from '../values';
import { LispError, defaultError } from '../errors';
import { Result, ok, err } from '../result';
import { numericBinop, boolBinop, unpackNum, unpackBool } from '../builtins';

function checked(op: (a: bigint, b: bigint) => bigint): (a: bigint, b: bigint) => Result<bigint, LispError> {
  return (a, b) => (b === 0n ? err(defaultError('Division by zero')) : ok(op(a, b)));
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? q - 1n : q;
}

function floorMod(a: bigint, b: bigint): bigint {
  const r = a % b;
  return r !== 0n && ((r < 0n) !== (b < 0n)) ? r + b : r;
}

export const mathPrimitives: PrimitiveTable = {
  '+': numericBinop((a, b) => ok(a + b)),
  '-': numericBinop((a, b) => ok(a - b)),
  '*': numericBinop((a, b) => ok(a * b)),
  '/': numericBinop(checked(floorDiv)),
  mod: numericBinop(checked(floorMod)),
  quotient: numericBinop(checked((a, b) => a / b)),
  remainder: numericBinop(checked((a, b) => a % b)),

  '=': boolBinop(unpackNum, (a, b) => a === b),
  '<': boolBinop(unpackNum, (a, b) => a < b),
  '>': boolBinop(unpackNum, (a, b) => a > b),
  '/=': boolBinop(unpackNum, (a, b) => a !== b),
  '>=': boolBinop(unpackNum, (a, b) => a >= b),
  '<=': boolBinop(unpackNum, (a, b) => a <= b),

  '&&': boolBinop(unpackBool, (a, b) => a && b),
  '||': boolBinop(unpackBool, (a, b) => a || b),
};
