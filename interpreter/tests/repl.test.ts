import { ReplSession, hasUnclosedParens } from '../src/repl';
import { Interpreter } from '../src/interpreter';

function session(): { repl: ReplSession; output: () => string } {
  const chunks: string[] = [];
  const repl = new ReplSession(new Interpreter({ output: text => chunks.push(text) }));
  return { repl, output: () => chunks.join('') };
}

describe('ReplSession', () => {
  test('prints the value of each expression', () => {
    const { repl } = session();
    expect(repl.handleLine('(+ 1 2)')).toEqual({ lines: ['3'], continued: false, quit: false });
  });

  test('blank and comment-only lines print nothing', () => {
    const { repl } = session();
    expect(repl.handleLine('')).toEqual({ lines: [], continued: false, quit: false });
    expect(repl.handleLine('   ; nothing')).toEqual({ lines: [], continued: false, quit: false });
  });

  test('keeps definitions between lines', () => {
    const { repl } = session();
    expect(repl.handleLine('(define x 42)').lines).toEqual(['42']);
    expect(repl.handleLine('(* x 2)').lines).toEqual(['84']);
  });

  test('errors are printed and the session continues', () => {
    const { repl } = session();
    expect(repl.handleLine('foo').lines).toEqual(['Getting an unbound variable: foo']);
    expect(repl.handleLine(')').lines).toEqual(['Parse error at line 1, column 1: unexpected ")"']);
    expect(repl.handleLine('(+ 1 1)').lines).toEqual(['2']);
  });

  test('accumulates lines while parentheses are open', () => {
    const { repl } = session();
    expect(repl.handleLine('(define (sq x)')).toEqual({ lines: [], continued: true, quit: false });
    expect(repl.handleLine('  (* x x))')).toEqual({
      lines: ['(lambda (x) ...)'],
      continued: false,
      quit: false,
    });
    expect(repl.handleLine('(sq 4)').lines).toEqual(['16']);
  });

  test('program output goes to the interpreter sink', () => {
    const { repl, output } = session();
    expect(repl.handleLine('(display "hello")').lines).toEqual(['()']);
    expect(output()).toBe('hello');
  });

  test('quit commands end the session', () => {
    for (const command of ['quit', ':quit', ':q', '  quit  ']) {
      const { repl } = session();
      expect(repl.handleLine(command)).toEqual({ lines: [], continued: false, quit: true });
    }
  });

  test(':help lists the commands', () => {
    const { repl } = session();
    const reply = repl.handleLine(':help');
    expect(reply.lines[0]).toBe('REPL Commands:');
    expect(reply.quit).toBe(false);
  });

  test(':env lists user bindings, newest first', () => {
    const { repl } = session();
    expect(repl.handleLine(':env').lines).toEqual(['  (no user-defined bindings)']);
    repl.handleLine('(define x 42)');
    repl.handleLine('(define y "s")');
    expect(repl.handleLine(':env').lines).toEqual(['  y: string = "s"', '  x: number = 42']);
  });

  test(':env shows the kind of each binding', () => {
    const { repl } = session();
    repl.handleLine('(define (f a) a)');
    repl.handleLine("(define p '(1 . 2))");
    expect(repl.handleLine(':env').lines).toEqual([
      '  p: dotted list = (1 . 2)',
      '  f: closure = (lambda (a) ...)',
    ]);
  });

  test('unknown commands', () => {
    const { repl } = session();
    expect(repl.handleLine(':foo').lines).toEqual([
      'Unknown command: :foo. Type :help for available commands.',
    ]);
  });

  test('unbounded recursion is reported, not thrown', () => {
    const { repl } = session();
    repl.handleLine('(define (loop n) (+ 1 (loop n)))');
    const reply = repl.handleLine('(loop 1)');
    expect(reply.lines).toHaveLength(1);
    expect(reply.lines[0].endsWith('(recursion too deep)')).toBe(true);
    expect(repl.handleLine('(+ 2 2)').lines).toEqual(['4']);
  });
});

describe('hasUnclosedParens', () => {
  test('counts parentheses', () => {
    expect(hasUnclosedParens('(a (b)')).toBe(true);
    expect(hasUnclosedParens('(a (b))')).toBe(false);
    expect(hasUnclosedParens(')')).toBe(false);
  });

  test('ignores parentheses in strings, comments and characters', () => {
    expect(hasUnclosedParens('(display "(")')).toBe(false);
    expect(hasUnclosedParens('(a ; )')).toBe(true);
    expect(hasUnclosedParens('#\\(')).toBe(false);
    expect(hasUnclosedParens('(list #\\)')).toBe(true);
  });

  test('an open string keeps the input open', () => {
    expect(hasUnclosedParens('"abc')).toBe(true);
    expect(hasUnclosedParens('"a\\"b"')).toBe(false);
  });
});
