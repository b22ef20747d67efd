/**
 * Helpers for building primitive procedures.
 *
 * Each helper lifts a plain TypeScript operation over unpacked values
 * into a PrimitiveFn that checks arity and argument types.
 */

import { LispValue, PrimitiveFn, mkNumber, mkBool } from './values';
import { LispError, numArgs, typeMismatch } from './errors';
import { Result, ok, err, mapAll } from './result';

export type Unpacker<T> = (v: LispValue) => Result<T, LispError>;

export const unpackNum: Unpacker<bigint> = v =>
  v.kind === 'number' ? ok(v.value) : err(typeMismatch('number', v));

export const unpackStr: Unpacker<string> = v =>
  v.kind === 'string' ? ok(v.value) : err(typeMismatch('string', v));

export const unpackBool: Unpacker<boolean> = v =>
  v.kind === 'bool' ? ok(v.value) : err(typeMismatch('boolean', v));

/**
 * Fold a binary integer operation left to right over two or more arguments.
 */
export function numericBinop(op: (a: bigint, b: bigint) => Result<bigint, LispError>): PrimitiveFn {
  return args => {
    if (args.length < 2) return err(numArgs(2, args));
    const nums = mapAll(args, unpackNum);
    if (!nums.ok) return nums;
    let acc = nums.value[0];
    for (const n of nums.value.slice(1)) {
      const next = op(acc, n);
      if (!next.ok) return next;
      acc = next.value;
    }
    return ok(mkNumber(acc));
  };
}

/**
 * Compare exactly two arguments after unpacking them.
 */
export function boolBinop<T>(unpack: Unpacker<T>, op: (a: T, b: T) => boolean): PrimitiveFn {
  return args => {
    if (args.length !== 2) return err(numArgs(2, args));
    const left = unpack(args[0]);
    if (!left.ok) return left;
    const right = unpack(args[1]);
    if (!right.ok) return right;
    return ok(mkBool(op(left.value, right.value)));
  };
}

export function unaryOp(op: (arg: LispValue) => Result<LispValue, LispError>): PrimitiveFn {
  return args => (args.length === 1 ? op(args[0]) : err(numArgs(1, args)));
}

export function binaryOp(op: (a: LispValue, b: LispValue) => Result<LispValue, LispError>): PrimitiveFn {
  return args => (args.length === 2 ? op(args[0], args[1]) : err(numArgs(2, args)));
}
