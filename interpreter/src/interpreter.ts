/**
 * Tree-walking evaluator for Schemelet.
 *
 * `evaluate` dispatches on the shape of a list form: quote, if, set!,
 * define and lambda are matched structurally on their head atom before
 * falling back to procedure application. Body and argument evaluation
 * recurse on the host stack; there is no tail-call elimination.
 */

import { Environment } from './environment';
import {
  LispValue,
  Closure,
  PrimitiveTable,
  NIL,
  mkList,
  mkClosure,
  mkPrimitive,
  isTruthy,
} from './values';
import { LispError, numArgs, badSpecialForm } from './errors';
import { Result, ok, err, mapAll, andThen } from './result';
import { parseAll, parseOptional } from './parser';
import { standardPrimitives, registerStdlib, readSourceFile, OutputSink } from './stdlib';

/**
 * Build a global environment holding one primitive binding per table entry.
 */
export function makeGlobalEnvironment(primitives: PrimitiveTable): Environment {
  const bindings = Object.entries(primitives).map(
    ([name, fn]): [string, LispValue] => [name, mkPrimitive(name, fn)],
  );
  return new Environment().bindVars(bindings);
}

export function evaluate(env: Environment, expr: LispValue): Result<LispValue, LispError> {
  switch (expr.kind) {
    case 'string':
    case 'number':
    case 'bool':
    case 'char':
    case 'dotted':
      return ok(expr);
    case 'atom':
      return env.getVar(expr.name);
    case 'list':
      if (expr.elements.length === 0) return ok(expr);
      return evalForm(env, expr, expr.elements[0], expr.elements.slice(1));
    default:
      return err(badSpecialForm('Unrecognized special form', expr));
  }
}

function evalForm(
  env: Environment,
  form: LispValue,
  head: LispValue,
  rest: LispValue[],
): Result<LispValue, LispError> {
  if (head.kind === 'atom') {
    switch (head.name) {
      case 'quote':
        if (rest.length === 1) return ok(rest[0]);
        break;

      case 'if':
        return evalIf(env, rest);

      case 'set!': {
        const [target, valueForm] = rest;
        if (rest.length === 2 && target.kind === 'atom') {
          const value = evaluate(env, valueForm);
          return value.ok ? env.setVar(target.name, value.value) : value;
        }
        break;
      }

      case 'define': {
        const defined = evalDefine(env, form, rest);
        if (defined !== null) return defined;
        break;
      }

      case 'lambda': {
        const lambda = evalLambda(env, form, rest);
        if (lambda !== null) return lambda;
        break;
      }
    }
  }
  return evalApplication(env, head, rest);
}

function evalIf(env: Environment, args: LispValue[]): Result<LispValue, LispError> {
  if (args.length !== 3) return err(numArgs(3, args));
  const [pred, conseq, alt] = args;
  const result = evaluate(env, pred);
  if (!result.ok) return result;
  return evaluate(env, isTruthy(result.value) ? conseq : alt);
}

/**
 * Returns null when the form is not shaped like any define, so the
 * caller treats it as an ordinary application.
 */
function evalDefine(
  env: Environment,
  form: LispValue,
  rest: LispValue[],
): Result<LispValue, LispError> | null {
  const [target, ...body] = rest;
  if (target === undefined) return null;

  if (target.kind === 'atom' && rest.length === 2) {
    const value = evaluate(env, rest[1]);
    return value.ok ? ok(env.defineVar(target.name, value.value)) : value;
  }

  const signature = functionSignature(target);
  if (signature === null) return null;
  const fn = makeFunction(env, form, signature.params, signature.vararg, body);
  return fn.ok ? ok(env.defineVar(signature.name, fn.value)) : fn;
}

interface FunctionSignature {
  name: string;
  params: readonly LispValue[];
  vararg: LispValue | null;
}

/** `(name params...)` or `(name params... . rest)` */
function functionSignature(target: LispValue): FunctionSignature | null {
  if (target.kind === 'list' && target.elements.length > 0) {
    const [name, ...params] = target.elements;
    return name.kind === 'atom' ? { name: name.name, params, vararg: null } : null;
  }
  if (target.kind === 'dotted' && target.head.length > 0) {
    const [name, ...params] = target.head;
    return name.kind === 'atom' ? { name: name.name, params, vararg: target.tail } : null;
  }
  return null;
}

function evalLambda(
  env: Environment,
  form: LispValue,
  rest: LispValue[],
): Result<LispValue, LispError> | null {
  const [params, ...body] = rest;
  if (params === undefined) return null;
  switch (params.kind) {
    case 'list': return makeFunction(env, form, params.elements, null, body);
    case 'dotted': return makeFunction(env, form, params.head, params.tail, body);
    case 'atom': return makeFunction(env, form, [], params, body);
    default: return null;
  }
}

function makeFunction(
  env: Environment,
  form: LispValue,
  params: readonly LispValue[],
  vararg: LispValue | null,
  body: LispValue[],
): Result<LispValue, LispError> {
  const names: string[] = [];
  for (const param of params) {
    if (param.kind !== 'atom') return err(badSpecialForm('Parameter must be a symbol', param));
    names.push(param.name);
  }
  if (vararg !== null && vararg.kind !== 'atom') {
    return err(badSpecialForm('Rest parameter must be a symbol', vararg));
  }
  if (body.length === 0) return err(badSpecialForm('Procedure body must not be empty', form));
  return ok(mkClosure(names, vararg === null ? null : vararg.name, body, env));
}

function evalApplication(
  env: Environment,
  head: LispValue,
  rest: LispValue[],
): Result<LispValue, LispError> {
  const fn = evaluate(env, head);
  if (!fn.ok) return fn;
  const args = mapAll(rest, arg => evaluate(env, arg));
  if (!args.ok) return args;
  return apply(fn.value, args.value);
}

/**
 * Call a procedure value with already-evaluated arguments.
 */
export function apply(fn: LispValue, args: LispValue[]): Result<LispValue, LispError> {
  switch (fn.kind) {
    case 'primitive':
      return fn.fn(args);
    case 'closure':
      return applyClosure(fn, args);
    default:
      return err(badSpecialForm('Not a procedure', fn));
  }
}

function applyClosure(fn: Closure, args: LispValue[]): Result<LispValue, LispError> {
  const arity = fn.params.length;
  const arityOk = fn.vararg !== null ? args.length >= arity : args.length === arity;
  if (!arityOk) return err(numArgs(arity, args));

  // Fixed parameters come first so they win over a rest parameter of the same name
  const bindings = fn.params.map((name, i): [string, LispValue] => [name, args[i]]);
  if (fn.vararg !== null) {
    bindings.push([fn.vararg, mkList(args.slice(arity))]);
  }
  const frame = fn.closure.bindVars(bindings);

  let result: LispValue = NIL;
  for (const expr of fn.body) {
    const value = evaluate(frame, expr);
    if (!value.ok) return value;
    result = value.value;
  }
  return ok(result);
}

// ==================================================================
// Interpreter session
// ==================================================================

export interface InterpreterOptions {
  /** Primitive table for the global environment (defaults to the standard library). */
  primitives?: PrimitiveTable;
  /** Where display/write/newline send their text. */
  output?: OutputSink;
}

/**
 * One global environment plus the entry points the REPL, the CLI and
 * the `load` primitive share.
 */
export class Interpreter {
  private globalEnv: Environment;

  constructor(options: InterpreterOptions = {}) {
    this.globalEnv = makeGlobalEnvironment(options.primitives ?? standardPrimitives);
    registerStdlib(this.globalEnv, this, options.output ?? (text => process.stdout.write(text)));
  }

  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  evaluate(expr: LispValue, env: Environment = this.globalEnv): Result<LispValue, LispError> {
    return evaluate(env, expr);
  }

  apply(fn: LispValue, args: LispValue[]): Result<LispValue, LispError> {
    return apply(fn, args);
  }

  /**
   * Evaluate one line of REPL input.
   *
   * @returns null for blank input
   */
  evalInput(source: string): Result<LispValue | null, LispError> {
    const parsed = parseOptional(source);
    if (!parsed.ok || parsed.value === null) return parsed;
    return this.evaluate(parsed.value);
  }

  /**
   * Evaluate every top-level form in order. The last value is the result;
   * an empty program yields the empty list.
   */
  run(source: string): Result<LispValue, LispError> {
    const forms = parseAll(source);
    if (!forms.ok) return forms;
    let result: LispValue = NIL;
    for (const form of forms.value) {
      const value = this.evaluate(form);
      if (!value.ok) return value;
      result = value.value;
    }
    return ok(result);
  }

  loadFile(filePath: string): Result<LispValue, LispError> {
    return andThen(readSourceFile(filePath), source => this.run(source));
  }
}
