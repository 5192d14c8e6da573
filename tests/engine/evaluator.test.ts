import { TransformExecutionError } from '../../src/api/errors';
import { ColumnKind, CompiledColumn, CompiledField, CompiledTemplate, FieldKind, TransformFn } from '../../src/engine/ast';
import { evaluateExpression, evaluateRow } from '../../src/engine/evaluator';
import { parseExpression } from '../../src/engine/expression/parser';
import { builtInFunctions } from '../../src/engine/functions/builtins';

describe('evaluateExpression', () => {
  const functions = new Map<string, TransformFn>(Object.entries(builtInFunctions));
  const run = (source: string, ...args: unknown[]) => evaluateExpression(parseExpression(source), args, functions);

  test('should index into split results', () => {
    expect(run('split($, ", ")[2]', '742, Evergreen Terrace, Springfield')).toBe('Springfield');
    expect(run('split($, ", ")[-1]', '742, Evergreen Terrace, Springfield')).toBe('Springfield');
    expect(run('$[0]', 'abc')).toBe('a');
  });

  test('should give undefined outside the value or on missing values', () => {
    expect(run('split($, " ")[5]', 'foo bar')).toBeUndefined();
    expect(run('$[-3]', 'ab')).toBeUndefined();
    expect(run('$[0]', null)).toBeUndefined();
    expect(run('$2')).toBeUndefined();
  });

  test('should refuse to index other values', () => {
    expect(() => run('$[0]', 42)).toThrow('Cannot index into a value of type number');
    expect(() => run('$["a"]', 'abc')).toThrow("Index must be an integer, got 'a'");
  });

  test('should add numbers and concatenate everything else', () => {
    expect(run('$1 + $2', 2, 3)).toBe(5);
    expect(run('$1 + $2', '2', 3)).toBe('23');
    expect(run('$1 + $2', undefined, 'x')).toBe('x');
    expect(run('split($1, " ")[0] + $2', 'foo bar', 'baz')).toBe('foobaz');
  });

  test('should pass every argument to a bare function reference', () => {
    expect(run('concat', 'a', 'b', 'c')).toBe('abc');
    expect(run('upper', 'baz')).toBe('BAZ');
  });

  test('should pipe values into functions', () => {
    expect(run('$ | trim | upper', '  x ')).toBe('X');
    expect(run('$ | split("-") | join("+")', 'a-b-c')).toBe('a+b+c');
  });

  test('should return literals as they are', () => {
    expect(run('"N/A"')).toBe('N/A');
    expect(run('false')).toBe(false);
  });

  test('should fail on functions it was not given', () => {
    expect(() => evaluateExpression(parseExpression('shout($)'), ['x'], new Map())).toThrow(
      'Unknown function "shout"'
    );
  });
});

describe('evaluateRow', () => {
  const upper: TransformFn = (v: string) => v.toUpperCase();
  const rename = (target: string): CompiledColumn => ({ kind: ColumnKind.RENAME, target });
  const fields = (entries: [string, CompiledField][]): CompiledColumn => ({
    kind: ColumnKind.FIELDS,
    fields: new Map(entries),
  });
  const compiled = (entries: [string, CompiledColumn][]): CompiledTemplate => new Map(entries);

  test('should rename, explode, combine and emit literals', () => {
    const template = compiled([
      ['first', rename('given')],
      [
        'last',
        fields([
          ['family', { kind: FieldKind.EXPLODE, fn: upper }],
          ['full', { kind: FieldKind.COMBINE, args: ['first', 'last'], fn: (a: string, b: string) => `${a} ${b}` }],
          ['source', { kind: FieldKind.LITERAL, value: 'import' }],
        ]),
      ],
    ]);
    const input = new Map([['first', 'Ada'], ['last', 'Lovelace']]);

    const output = evaluateRow(input, ['first', 'last'], template);

    expect([...output.entries()]).toEqual([
      ['given', 'Ada'],
      ['family', 'LOVELACE'],
      ['full', 'Ada Lovelace'],
      ['source', 'import'],
    ]);
  });

  test('should drop input columns the template does not mention', () => {
    const template = compiled([['a', rename('x')]]);
    const output = evaluateRow(new Map([['a', '1'], ['b', '2']]), ['a', 'b'], template);
    expect([...output.entries()]).toEqual([['x', '1']]);
  });

  test('should let the later input column win a collision', () => {
    const template = compiled([
      ['a', rename('x')],
      ['b', rename('x')],
    ]);
    const input = new Map([['a', '1'], ['b', '2']]);

    expect(evaluateRow(input, ['a', 'b'], template).get('x')).toBe('2');
    expect(evaluateRow(input, ['b', 'a'], template).get('x')).toBe('1');
  });

  test('should let a rename overwrite a field written by an earlier column', () => {
    const template = compiled([
      ['a', fields([['x', { kind: FieldKind.LITERAL, value: 'literal' }]])],
      ['b', rename('x')],
    ]);
    const output = evaluateRow(new Map([['a', '1'], ['b', '2']]), ['a', 'b'], template);
    expect(output.get('x')).toBe('2');
  });

  test('should pass undefined for combine args missing from the row', () => {
    const template = compiled([
      ['a', fields([['x', { kind: FieldKind.COMBINE, args: ['a', 'nope'], fn: (_a: unknown, b: unknown) => b === undefined }]])],
    ]);
    expect(evaluateRow(new Map([['a', '1']]), ['a'], template).get('x')).toBe(true);
  });

  test('should wrap failures in TransformExecutionError', () => {
    const boom = new Error('boom');
    const template = compiled([['a', fields([['x', { kind: FieldKind.EXPLODE, fn: () => { throw boom; } }]])]]);

    let caught: unknown;
    try {
      evaluateRow(new Map([['a', '1']]), ['a'], template, 3);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransformExecutionError);
    expect(caught).toMatchObject({
      inputColumn: 'a',
      outputColumn: 'x',
      rowNumber: 3,
      cause: boom,
      message: 'Transform for "a" -> "x" failed in row 3: boom',
    });
  });
});
