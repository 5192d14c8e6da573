import { TransformConfig } from '../../src/api/config';
import { dataset } from '../../src/api/dataset';
import { TemplateCompileError, TransformExecutionError } from '../../src/api/errors';
import { runCascade, runTransform } from '../../src/api/run-transform';
import { RawTemplate } from '../../src/api/template';
import { createDefaultRegistry } from '../../src/engine/functions/registry';

const addresses = dataset(['address'], [['742, Evergreen Terrace, Springfield, IL, USA']]);

const splitAddress: RawTemplate = {
  address: {
    door: 'split($, ", ")[0]',
    street: 'split($, ", ")[1]',
    city: 'split($, ", ")[2]',
    state: 'split($, ", ")[3]',
    country: 'split($, ", ")[4]',
  },
};

const normalize: RawTemplate = {
  city: { city: 'upper' },
  country: 'nation',
  door: { number: 'toNumber' },
};

describe('runTransform', () => {
  test('should rename columns and sort the header', () => {
    const source = dataset(['b', 'a'], [['2', '1'], ['4', '3']]);
    const result = runTransform(source, { b: 'y', a: 'x' });
    expect(result.columns).toEqual(['x', 'y']);
    expect(result.rows).toEqual([['1', '2'], ['3', '4']]);
  });

  test('should explode a column into several', () => {
    const result = runTransform(addresses, splitAddress);
    expect(result.columns).toEqual(['city', 'country', 'door', 'state', 'street']);
    expect(result.rows).toEqual([['Springfield', 'USA', '742', 'IL', 'Evergreen Terrace']]);
  });

  test('should drop columns the template does not mention', () => {
    const source = dataset(['keep', 'skip'], [['1', '2']]);
    const result = runTransform(source, { keep: 'kept' });
    expect(result.columns).toEqual(['kept']);
    expect(result.rows).toEqual([['1']]);
  });

  test('should emit literals on every row', () => {
    const source = dataset(['a'], [['1'], ['2']]);
    const result = runTransform(source, { a: { a: 'toNumber', batch: 7, origin: '"import"' } });
    expect(result.columns).toEqual(['a', 'batch', 'origin']);
    expect(result.rows).toEqual([[1, 7, 'import'], [2, 7, 'import']]);
  });

  test('should leave the source alone', () => {
    runTransform(addresses, splitAddress);
    expect(addresses.columns).toEqual(['address']);
    expect(addresses.rows).toEqual([['742, Evergreen Terrace, Springfield, IL, USA']]);
  });

  test('should use functions registered on TransformConfig', () => {
    TransformConfig.registerFunction('initial', (v: string) => v.charAt(0));
    const result = runTransform(dataset(['name'], [['ada']]), { name: { initial: 'initial' } });
    expect(result.rows).toEqual([['a']]);
  });

  test('should prefer the registry passed in the options', () => {
    TransformConfig.registerFunction('mark', () => 'global');
    const functions = createDefaultRegistry().register('mark', () => 'local');
    const result = runTransform(dataset(['a'], [['x']]), { a: { b: 'mark' } }, { functions });
    expect(result.rows).toEqual([['local']]);
  });

  test('should fail before evaluating any row when a literal does not compile', () => {
    const calls: string[] = [];
    TransformConfig.registerFunction('record', (v: string) => calls.push(v));
    expect(() => runTransform(dataset(['a'], [['x']]), { a: { b: 'record', c: 'nope($)' } })).toThrow(
      TemplateCompileError
    );
    expect(calls).toEqual([]);
  });

  test('should report the row of a failing transform', () => {
    const source = dataset(['n'], [['1'], ['two']]);
    expect(() => runTransform(source, { n: { n: 'toNumber' } })).toThrow(TransformExecutionError);
    expect(() => runTransform(source, { n: { n: 'toNumber' } })).toThrow(
      `Transform for "n" -> "n" failed in row 2: toNumber: NaN for value 'two'`
    );
  });
});

describe('runCascade', () => {
  test('should feed each result into the next template', () => {
    const result = runCascade(addresses, [splitAddress, normalize]);
    expect(result.columns).toEqual(['city', 'nation', 'number']);
    expect(result.rows).toEqual([['SPRINGFIELD', 'USA', 742]]);
  });

  test('should match applying the templates one after another', () => {
    const stepwise = runTransform(runTransform(addresses, splitAddress), normalize);
    expect(runCascade(addresses, [splitAddress, normalize])).toEqual(stepwise);
  });

  test('should return the source for no templates', () => {
    expect(runCascade(addresses, [])).toBe(addresses);
  });
});
