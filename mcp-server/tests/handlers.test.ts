import { parseCode, evaluateCode, handleParse, handleEvaluate, readGrammar } from '../src/handlers';

describe('parseCode', () => {
  test('renders every top-level form', () => {
    expect(parseCode("(+ 1 2) 'a ; done")).toEqual({ valid: true, forms: ['(+ 1 2)', '(quote a)'] });
  });

  test('reports the parse error', () => {
    expect(parseCode('(1')).toEqual({
      valid: false,
      error: "Parse error at line 1, column 3: expected whitespace or ')', found end of input",
    });
  });
});

describe('evaluateCode', () => {
  test('collects results and output', () => {
    expect(evaluateCode('(display "hi") (+ 1 2)')).toEqual({
      success: true,
      results: ['()', '3'],
      output: 'hi',
    });
  });

  test('binds args', () => {
    expect(evaluateCode('(car args)', ['x', 'y']).results).toEqual(['"x"']);
    expect(evaluateCode('args').results).toEqual(['()']);
  });

  test('stops at the first error', () => {
    expect(evaluateCode('(define a 1) b (display "no")')).toEqual({
      success: false,
      results: ['1'],
      output: '',
      error: 'Getting an unbound variable: b',
    });
  });

  test('parse errors evaluate nothing', () => {
    expect(evaluateCode('(display "x") )')).toEqual({
      success: false,
      results: [],
      output: '',
      error: 'Parse error at line 1, column 15: unexpected ")"',
    });
  });

  test('every call starts from a fresh environment', () => {
    evaluateCode('(define z 1)');
    expect(evaluateCode('z').error).toBe('Getting an unbound variable: z');
  });
});

describe('tool handlers', () => {
  test('parse responds with JSON text', async () => {
    const response = await handleParse({ code: '(a . b)' });
    expect(response.content).toHaveLength(1);
    expect(JSON.parse(response.content[0].text)).toEqual({ valid: true, forms: ['(a . b)'] });
  });

  test('evaluate responds with JSON text', async () => {
    const response = await handleEvaluate({ code: '(apply + args)', args: [] });
    expect(JSON.parse(response.content[0].text)).toEqual({
      success: false,
      results: [],
      output: '',
      error: 'Expected 2 args; found none',
    });
  });
});

describe('readGrammar', () => {
  test('reads the grammar file from the repository', () => {
    expect(readGrammar().startsWith('(* Schemelet grammar')).toBe(true);
  });

  test('falls back to a notice when the file is missing', () => {
    expect(readGrammar(['/nonexistent/schemelet.ebnf'])).toBe(
      '(grammar reference not found -- expected at grammar/schemelet.ebnf)',
    );
  });
});
