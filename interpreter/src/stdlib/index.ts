/**
 * Schemelet standard library barrel.
 *
 * `standardPrimitives` is the pure primitive table handed to
 * makeGlobalEnvironment; `registerStdlib` adds the procedures that need
 * a live interpreter.
 */

import type { Environment } from '../environment';
import type { Interpreter } from '../interpreter';
import { PrimitiveTable } from '../values';
import { mathPrimitives } from './math';
import { stringPrimitives } from './string';
import { collectionPrimitives } from './collections';
import { registerIOBuiltins, OutputSink } from './io';

export { mathPrimitives } from './math';
export { stringPrimitives } from './string';
export { collectionPrimitives } from './collections';
export { registerIOBuiltins, readSourceFile } from './io';
export type { OutputSink } from './io';

export const standardPrimitives: PrimitiveTable = {
  ...mathPrimitives,
  ...stringPrimitives,
  ...collectionPrimitives,
};

/**
 * Register the interpreter-bound part of the standard library.
 */
export function registerStdlib(env: Environment, interpreter: Interpreter, output: OutputSink): void {
  registerIOBuiltins(env, interpreter, output);
}
