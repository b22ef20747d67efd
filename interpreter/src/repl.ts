/**
 * Schemelet REPL: interactive read-eval-print loop.
 *
 * Features:
 *   - Persistent global environment across inputs
 *   - Multi-line input (detects unclosed parentheses)
 *   - Special commands: :help, :env, :quit (or plain `quit`)
 *   - Errors are printed and the loop continues
 */

import * as readline from 'readline';
import { Interpreter } from './interpreter';
import { errorToString } from './errors';
import { valueToString, kindName } from './values';

const VERSION = '0.1.0';

export interface ReplOptions {
  prompt?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export interface ReplReply {
  /** Lines to print, in order. */
  lines: string[];
  /** True while a multi-line form is still open. */
  continued: boolean;
  /** True once the user asked to leave. */
  quit: boolean;
}

/**
 * Line-at-a-time REPL state, independent of any terminal.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private buffer = '';

  constructor(interpreter: Interpreter = new Interpreter()) {
    this.interpreter = interpreter;
  }

  handleLine(line: string): ReplReply {
    const trimmed = line.trim();

    if (this.buffer === '') {
      if (trimmed === 'quit' || trimmed === ':quit' || trimmed === ':q') {
        return { lines: [], continued: false, quit: true };
      }
      if (trimmed.startsWith(':')) {
        return { lines: this.handleCommand(trimmed), continued: false, quit: false };
      }
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedParens(this.buffer)) {
      return { lines: [], continued: true, quit: false };
    }

    const input = this.buffer;
    this.buffer = '';
    return { lines: this.evaluate(input), continued: false, quit: false };
  }

  private evaluate(input: string): string[] {
    try {
      const result = this.interpreter.evalInput(input);
      if (!result.ok) return [errorToString(result.error)];
      return result.value === null ? [] : [valueToString(result.value)];
    } catch (e) {
      if (e instanceof RangeError) {
        return [`Error: ${e.message} (recursion too deep)`];
      }
      throw e;
    }
  }

  private handleCommand(cmd: string): string[] {
    const command = cmd.split(/\s+/)[0];
    switch (command) {
      case ':help':
      case ':h':
        return [
          'REPL Commands:',
          '  :help, :h       Show this help message',
          '  :env            Show user-defined bindings',
          '  :quit, :q, quit Exit the REPL',
          '',
          'Multi-line input: leave parentheses unclosed.',
        ];

      case ':env': {
        const lines = this.interpreter
          .getGlobalEnv()
          .entries()
          .filter(([, value]) => value.kind !== 'primitive')
          .map(([name, value]) => {
            const preview = valueToString(value);
            const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
            return `  ${name}: ${kindName(value)} = ${truncated}`;
          });
        return lines.length > 0 ? lines : ['  (no user-defined bindings)'];
      }

      default:
        return [`Unknown command: ${command}. Type :help for available commands.`];
    }
  }
}

/**
 * Check whether the input has unclosed parentheses, ignoring those in
 * strings, comments and character literals.
 */
export function hasUnclosedParens(input: string): boolean {
  let depth = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === ';') {
      while (i < input.length && input[i] !== '\n') i++;
    } else if (ch === '#' && input[i + 1] === '\\') {
      i += 2;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
    }
  }

  return depth > 0 || inString;
}

/**
 * Start the Schemelet REPL on the terminal.
 */
export function startRepl(options: ReplOptions = {}): void {
  const output = options.output ?? process.stdout;
  const prompt = options.prompt ?? 'lisp> ';
  const session = new ReplSession(new Interpreter({ output: text => output.write(text) }));

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    prompt,
    terminal: options.input === undefined,
  });

  console.log(`Schemelet REPL v${VERSION}`);
  console.log('Type :help for commands, quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    const reply = session.handleLine(line);
    for (const text of reply.lines) {
      output.write(text + '\n');
    }
    if (reply.quit) {
      rl.close();
      return;
    }
    if (reply.continued) {
      output.write('  ... ');
      return;
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}
