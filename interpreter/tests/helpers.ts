import { Interpreter } from '../src/interpreter';
import { LispValue, valueToString } from '../src/values';
import { LispError, errorToString } from '../src/errors';
import { Result } from '../src/result';

/** Render a result the way the REPL prints it. */
export function show(result: Result<LispValue | null, LispError>): string {
  if (!result.ok) return errorToString(result.error);
  return result.value === null ? '' : valueToString(result.value);
}

/** An interpreter whose display/write/newline text is collected. */
export function quietInterpreter(): { interpreter: Interpreter; output: () => string } {
  const chunks: string[] = [];
  const interpreter = new Interpreter({ output: text => chunks.push(text) });
  return { interpreter, output: () => chunks.join('') };
}

/** Evaluate each source string in one fresh interpreter; return the rendered results. */
export function runAll(...sources: string[]): string[] {
  const { interpreter } = quietInterpreter();
  return sources.map(source => show(interpreter.run(source)));
}

export function runOne(source: string): string {
  return runAll(source)[0];
}
