/**
 * Standard library: I/O and meta procedures.
 *
 * These close over a running interpreter (to load files and apply
 * procedures) and over an output sink, so they are defined into the
 * global environment after it has been built from the primitive table.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Environment } from '../environment';
import type { Interpreter } from '../interpreter';
import {
  LispValue,
  PrimitiveFn,
  NIL,
  mkPrimitive,
  mkString,
  mkList,
  valueToString,
  displayString,
} from '../values';
import { LispError, defaultError, numArgs, typeMismatch } from '../errors';
import { Result, ok, err, map, andThen } from '../result';
import { parse, parseAll } from '../parser';
import { unpackStr } from '../builtins';

export type OutputSink = (text: string) => void;

export function readSourceFile(filePath: string): Result<string, LispError> {
  try {
    return ok(fs.readFileSync(path.resolve(filePath), 'utf-8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(defaultError(`Cannot read file '${filePath}': ${reason}`));
  }
}

/** A primitive taking a single string argument: a file path or source text. */
function withString(op: (text: string) => Result<LispValue, LispError>): PrimitiveFn {
  return args => {
    if (args.length !== 1) return err(numArgs(1, args));
    const text = unpackStr(args[0]);
    return text.ok ? op(text.value) : text;
  };
}

/**
 * Register all I/O builtins into the given environment.
 */
export function registerIOBuiltins(env: Environment, interpreter: Interpreter, output: OutputSink): void {
  const define = (name: string, fn: PrimitiveFn): void => {
    env.defineVar(name, mkPrimitive(name, fn));
  };

  // ---- Application ----

  // (apply proc arg... lst): the last argument is spread into the call
  define('apply', args => {
    if (args.length < 2) return err(numArgs(2, args));
    const [fn, ...rest] = args;
    const last = rest[rest.length - 1];
    if (last.kind !== 'list') return err(typeMismatch('list', last));
    return interpreter.apply(fn, [...rest.slice(0, -1), ...last.elements]);
  });

  // ---- Files ----

  define('load', withString(filePath => interpreter.loadFile(filePath)));

  define('read-contents', withString(filePath => map(readSourceFile(filePath), mkString)));

  define('read-all', withString(filePath =>
    andThen(readSourceFile(filePath), source => map(parseAll(source), mkList))));

  define('read', withString(text => parse(text)));

  // ---- Output ----

  define('display', args => {
    if (args.length !== 1) return err(numArgs(1, args));
    output(displayString(args[0]));
    return ok(NIL);
  });

  define('write', args => {
    if (args.length !== 1) return err(numArgs(1, args));
    output(valueToString(args[0]));
    return ok(NIL);
  });

  define('newline', args => {
    if (args.length !== 0) return err(numArgs(0, args));
    output('\n');
    return ok(NIL);
  });
}
