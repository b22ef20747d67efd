/**
 * Parser module: reads s-expression source text into LispValues.
 *
 * Recursive descent over the source string. A radix number that fails
 * after consuming input runs inside `attempt`, which rewinds on failure.
 * The furthest failure seen is what gets reported.
 */

import {
  LispValue,
  CHARACTER_NAMES,
  mkAtom,
  mkNumber,
  mkString,
  mkBool,
  mkChar,
  mkList,
  mkDottedList,
} from './values';
import { LispError, SourcePosition, parseError } from './errors';
import { Result, ok, err } from './result';

const SYMBOL_CHARS = '!#$%&|*+-/:<=>?@^_~';

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  t: '\t',
  n: '\n',
  r: '\r',
};

interface Radix {
  name: string;
  prefix: string;
  digit: RegExp;
}

const RADIXES: Record<string, Radix> = {
  x: { name: 'hexadecimal', prefix: '0x', digit: /[0-9a-fA-F]/ },
  o: { name: 'octal', prefix: '0o', digit: /[0-7]/ },
  d: { name: 'decimal', prefix: '', digit: /[0-9]/ },
  b: { name: 'binary', prefix: '0b', digit: /[01]/ },
};

function isLetter(ch: string): boolean {
  return /\p{L}/u.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isSymbolChar(ch: string): boolean {
  return ch.length === 1 && SYMBOL_CHARS.includes(ch);
}

function isSpace(ch: string): boolean {
  return /\s/u.test(ch);
}

function describe(ch: string | undefined): string {
  return ch === undefined ? 'end of input' : JSON.stringify(ch);
}

interface Failure {
  offset: number;
  message: string;
}

class Reader {
  private pos = 0;
  private source: string;
  private furthest: Failure | null = null;

  constructor(source: string) {
    this.source = source;
  }

  // ---- Entry points ----

  readSingle(): Result<LispValue, LispError> {
    this.skipSpace();
    const value = this.readExpr();
    if (value === null) return this.error();
    this.skipSpace();
    if (!this.isAtEnd()) {
      this.fail(`expected end of input, found ${describe(this.peek())}`);
      return this.error();
    }
    return ok(value);
  }

  readOptional(): Result<LispValue | null, LispError> {
    this.skipSpace();
    if (this.isAtEnd()) return ok(null);
    return this.readSingle();
  }

  readAll(): Result<LispValue[], LispError> {
    const exprs: LispValue[] = [];
    this.skipSpace();
    while (!this.isAtEnd()) {
      const value = this.readExpr();
      if (value === null) return this.error();
      exprs.push(value);
      if (!this.skipSpace() && !this.isAtEnd()) {
        this.fail(`expected whitespace between expressions, found ${describe(this.peek())}`);
        return this.error();
      }
    }
    return ok(exprs);
  }

  // ---- Expressions ----

  private readExpr(): LispValue | null {
    const ch = this.peek();
    if (ch === undefined) return this.fail('unexpected end of input');
    if (ch === '"') return this.readString();
    if (this.source.startsWith('#\\', this.pos)) return this.readCharacter();
    if (isDigit(ch) || ch === '#') {
      const number = this.attempt(() => this.readNumber());
      if (number !== null) return number;
    }
    if (isLetter(ch) || isSymbolChar(ch)) return this.readAtom();
    if (ch === "'") return this.readQuoted();
    if (ch === '(') return this.readParenthesized();
    return this.fail(`unexpected ${describe(ch)}`);
  }

  private readString(): LispValue | null {
    this.advance(); // consume opening "
    let value = '';
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) return this.fail('unterminated string literal');
      if (ch === '"') break;
      if (ch === '\\') {
        const escapeStart = this.pos;
        this.advance();
        const code = this.peek();
        if (code === undefined) return this.fail('unterminated string literal');
        const replacement: string | undefined = ESCAPES[code];
        if (replacement === undefined) {
          return this.fail(`unknown escape sequence '\\${code}'`, escapeStart);
        }
        this.advance();
        value += replacement;
        continue;
      }
      value += this.advance();
    }
    this.advance(); // consume closing "
    return mkString(value);
  }

  private readCharacter(): LispValue | null {
    this.pos += 2; // consume #\
    const nameStart = this.pos;
    let name = '';
    for (let ch = this.peek(); ch !== undefined && isLetter(ch); ch = this.peek()) {
      name += this.advance();
    }
    if ([...name].length >= 2) {
      const named = CHARACTER_NAMES.get(name.toLowerCase());
      if (named === undefined) {
        return this.fail(`unknown character name '${name}'`, nameStart);
      }
      return mkChar(named);
    }
    this.pos = nameStart;
    const ch = this.peek();
    if (ch === undefined) return this.fail('expected a character after #\\');
    this.advance();
    return mkChar(ch);
  }

  private readNumber(): LispValue | null {
    const ch = this.peek();
    if (ch === '#') {
      this.advance();
      const marker = this.peek();
      const radix = marker === undefined ? undefined : RADIXES[marker.toLowerCase()];
      if (radix === undefined) return this.fail('expected a radix marker (x, o, d or b)');
      this.advance();
      const digits = this.takeWhile(c => radix.digit.test(c));
      if (digits === '') return this.fail(`expected a ${radix.name} digit`);
      return mkNumber(BigInt(radix.prefix + digits));
    }
    const digits = this.takeWhile(isDigit);
    if (digits === '') return this.fail('expected a digit');
    return mkNumber(BigInt(digits));
  }

  private readAtom(): LispValue {
    const name = this.advance() + this.takeWhile(c => isLetter(c) || isDigit(c) || isSymbolChar(c));
    if (name === '#t') return mkBool(true);
    if (name === '#f') return mkBool(false);
    return mkAtom(name);
  }

  private readQuoted(): LispValue | null {
    this.advance(); // consume '
    const quoted = this.readExpr();
    if (quoted === null) return null;
    return mkList([mkAtom('quote'), quoted]);
  }

  /**
   * Elements separated by whitespace, closed by `)`, or by `.`, whitespace,
   * one tail expression and `)`. Each element is read exactly once.
   */
  private readParenthesized(): LispValue | null {
    this.advance(); // consume (
    const elements: LispValue[] = [];
    this.skipSpace();
    while (this.peek() !== ')') {
      const value = this.readExpr();
      if (value === null) return null;
      elements.push(value);
      const separated = this.skipSpace();
      if (this.peek() === ')') break;
      if (!separated) return this.fail(`expected whitespace or ')', found ${describe(this.peek())}`);
      if (this.peek() === '.') return this.readDottedTail(elements);
    }
    this.advance(); // consume )
    return mkList(elements);
  }

  private readDottedTail(head: LispValue[]): LispValue | null {
    this.advance(); // consume .
    if (!this.skipSpace()) return this.fail("expected whitespace after '.'");
    const tail = this.readExpr();
    if (tail === null) return null;
    this.skipSpace();
    if (this.peek() !== ')') return this.fail(`expected ')' after dotted list tail, found ${describe(this.peek())}`);
    this.advance(); // consume )
    return mkDottedList(head, tail);
  }

  // ---- Low-level scanning ----

  /**
   * Skip one or more whitespace characters or `;` comments.
   * Returns false if nothing was skipped.
   */
  private skipSpace(): boolean {
    const start = this.pos;
    for (let ch = this.peek(); ch !== undefined; ch = this.peek()) {
      if (isSpace(ch)) {
        this.advance();
      } else if (ch === ';') {
        while (!this.isAtEnd() && this.peek() !== '\n') this.advance();
      } else {
        break;
      }
    }
    return this.pos > start;
  }

  private attempt(read: () => LispValue | null): LispValue | null {
    const saved = this.pos;
    const value = read();
    if (value === null) this.pos = saved;
    return value;
  }

  private takeWhile(pred: (ch: string) => boolean): string {
    let out = '';
    for (let ch = this.peek(); ch !== undefined && pred(ch); ch = this.peek()) {
      out += this.advance();
    }
    return out;
  }

  private fail(message: string, offset: number = this.pos): null {
    if (this.furthest === null || offset > this.furthest.offset) {
      this.furthest = { offset, message };
    }
    return null;
  }

  private error(): Result<never, LispError> {
    const failure = this.furthest ?? { offset: this.pos, message: 'invalid input' };
    return err(parseError(failure.message, this.positionAt(failure.offset)));
  }

  private positionAt(offset: number): SourcePosition {
    const before = this.source.slice(0, offset);
    const lineStart = before.lastIndexOf('\n') + 1;
    return {
      offset,
      line: before.split('\n').length,
      column: offset - lineStart + 1,
    };
  }

  private peek(): string | undefined {
    const cp = this.source.codePointAt(this.pos);
    return cp === undefined ? undefined : String.fromCodePoint(cp);
  }

  private advance(): string {
    const ch = this.peek() ?? '';
    this.pos += ch.length;
    return ch;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }
}

/**
 * Parse exactly one expression. Surrounding whitespace and comments
 * are allowed; anything else after the expression is an error.
 */
export function parse(source: string): Result<LispValue, LispError> {
  return new Reader(source).readSingle();
}

/**
 * Parse zero or more whitespace-separated expressions, e.g. a whole file.
 */
export function parseAll(source: string): Result<LispValue[], LispError> {
  return new Reader(source).readAll();
}

/**
 * Parse REPL input, which may be blank.
 *
 * @returns null when the input holds only whitespace and comments
 */
export function parseOptional(source: string): Result<LispValue | null, LispError> {
  return new Reader(source).readOptional();
}
