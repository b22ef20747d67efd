#!/usr/bin/env node
/**
 * Schemelet interpreter CLI entry point.
 *
 * Usage: schemelet                      start the REPL
 *        schemelet "(+ 1 2)"            evaluate one expression
 *        schemelet --eval "<code>"      evaluate one expression
 *        schemelet <file.scm> [args...] load a file with `args` bound
 */

import { Interpreter } from './interpreter';
import { errorToString, LispError } from './errors';
import { LispValue, mkAtom, mkList, mkString, valueToString } from './values';
import { parse } from './parser';
import { Result } from './result';
import { startRepl } from './repl';

function main(): void {
  const args = process.argv.slice(2);

  if (args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  if (args.length === 0) {
    startRepl();
    return;
  }

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      console.error('Error: --eval requires a code argument');
      process.exit(1);
    }
    report(() => evalExpression(args[1]));
    return;
  }

  // A first argument that opens a form is an expression, not a file name
  if (args[0].startsWith('(')) {
    report(() => evalExpression(args[0]));
    return;
  }

  report(() => runFile(args[0], args.slice(1)));
}

function evalExpression(source: string): Result<LispValue, LispError> {
  const interpreter = new Interpreter();
  const expr = parse(source);
  return expr.ok ? interpreter.evaluate(expr.value) : expr;
}

function runFile(filePath: string, rest: string[]): Result<LispValue, LispError> {
  const interpreter = new Interpreter();
  interpreter.getGlobalEnv().defineVar('args', mkList(rest.map(mkString)));
  return interpreter.evaluate(mkList([mkAtom('load'), mkString(filePath)]));
}

function report(run: () => Result<LispValue, LispError>): void {
  try {
    const result = run();
    if (!result.ok) {
      console.error(errorToString(result.error));
      process.exit(1);
    }
    console.log(valueToString(result.value));
  } catch (e) {
    if (e instanceof RangeError) {
      console.error(`Error: ${e.message} (recursion too deep)`);
      process.exit(1);
    }
    throw e;
  }
}

function printUsage(): void {
  console.log('Schemelet v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  schemelet                          Start interactive REPL');
  console.log('  schemelet "(expr)"                 Evaluate one expression');
  console.log('  schemelet --eval "<code>"          Evaluate one expression');
  console.log('  schemelet <file.scm> [args...]     Load a file, binding `args`');
  console.log('  schemelet --help                   Show this help');
}

main();
