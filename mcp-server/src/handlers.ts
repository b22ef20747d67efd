/**
 * Tool and resource handlers for the Schemelet MCP server.
 *
 * Kept apart from the server wiring so they can be called directly.
 */

import * as fs from "fs";
import * as path from "path";
import { Interpreter } from "../../interpreter/src/interpreter";
import { parseAll } from "../../interpreter/src/parser";
import { errorToString } from "../../interpreter/src/errors";
import { mkList, mkString, valueToString } from "../../interpreter/src/values";

export interface ToolResponse {
  content: Array<{ type: "text"; text: string }>;
}

export interface ParseReport {
  valid: boolean;
  forms?: string[];
  error?: string;
}

export interface EvaluateReport {
  success: boolean;
  results: string[];
  output: string;
  error?: string;
}

function respond(body: object): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(body, null, 2) }],
  };
}

export function parseCode(code: string): ParseReport {
  const forms = parseAll(code);
  if (!forms.ok) {
    return { valid: false, error: errorToString(forms.error) };
  }
  return { valid: true, forms: forms.value.map(valueToString) };
}

/**
 * Evaluate every top-level form in a fresh global environment. Output of
 * display/write/newline is collected rather than written to stdout, which
 * carries the MCP protocol.
 */
export function evaluateCode(code: string, args: string[] = []): EvaluateReport {
  const outputChunks: string[] = [];
  const interpreter = new Interpreter({ output: (text) => outputChunks.push(text) });
  interpreter.getGlobalEnv().defineVar("args", mkList(args.map(mkString)));

  const results: string[] = [];
  const report = (error?: string): EvaluateReport => {
    const body: EvaluateReport = { success: error === undefined, results, output: outputChunks.join("") };
    if (error !== undefined) body.error = error;
    return body;
  };

  const forms = parseAll(code);
  if (!forms.ok) return report(errorToString(forms.error));

  try {
    for (const form of forms.value) {
      const result = interpreter.evaluate(form);
      if (!result.ok) return report(errorToString(result.error));
      results.push(valueToString(result.value));
    }
  } catch (e) {
    if (e instanceof RangeError) return report(`${e.message} (recursion too deep)`);
    throw e;
  }

  return report();
}

export async function handleParse(args: { code: string }): Promise<ToolResponse> {
  return respond(parseCode(args.code));
}

export async function handleEvaluate(args: { code: string; args?: string[] }): Promise<ToolResponse> {
  return respond(evaluateCode(args.code, args.args));
}

// Source tree layout first, then the layout under dist/.
const GRAMMAR_CANDIDATES = [
  path.resolve(__dirname, "../../grammar/schemelet.ebnf"),
  path.resolve(__dirname, "../../../grammar/schemelet.ebnf"),
];

export function readGrammar(candidates: readonly string[] = GRAMMAR_CANDIDATES): string {
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return fs.readFileSync(candidate, "utf-8");
    }
  }
  return "(grammar reference not found -- expected at grammar/schemelet.ebnf)";
}
