import { writeFileSync } from 'node:fs';
import { FunctionRegistry } from '../engine/functions/registry';
import { parseDataset, readDataset, serializeDataset } from '../io/csv';
import { parseTemplate, readTemplate } from '../io/template-loader';
import { Dataset } from './dataset';
import { NoInputDataError, NoPriorOutputError } from './errors';
import { runTransform } from './run-transform';
import { RawTemplate } from './template';

export interface ApplyOptions {
  /**
   * Read from the previous apply's output instead of the loaded input.
   */
  cascade?: boolean;
}

/**
 * Stateful front end: holds the loaded input and the latest output.
 *
 * An instance has a single owner. Every method is synchronous; a failed apply leaves the
 * previous output in place.
 *
 * @example
 * ```typescript
 * const transform = new CsvTransform();
 * transform.loadData('input.csv');
 * transform.apply('split-address.yaml');
 * transform.apply('normalize.yaml', { cascade: true });
 * transform.saveData('output.csv');
 * ```
 */
export class CsvTransform {
  private input: Dataset | null = null;
  private result: Dataset | null = null;

  constructor(private readonly options: { functions?: FunctionRegistry } = {}) { }

  get inputDataset(): Dataset | null {
    return this.input;
  }

  get outputDataset(): Dataset | null {
    return this.result;
  }

  loadData(path: string): void {
    this.input = readDataset(path);
  }

  loadDataFromString(csv: string): void {
    this.input = parseDataset(csv);
  }

  loadDataset(dataset: Dataset): void {
    this.input = dataset;
  }

  apply(templatePath: string, options: ApplyOptions = {}): Dataset {
    return this.applyTemplate(readTemplate(templatePath), options);
  }

  applyString(template: string, options: ApplyOptions = {}): Dataset {
    return this.applyTemplate(parseTemplate(template), options);
  }

  applyTemplate(template: RawTemplate, options: ApplyOptions = {}): Dataset {
    const source = this.source(options.cascade ?? false);
    const output = runTransform(source, template, { functions: this.options.functions });
    this.result = output;
    return output;
  }

  output(): string {
    if (!this.result) {
      throw new NoPriorOutputError();
    }
    return serializeDataset(this.result);
  }

  saveData(path: string): void {
    writeFileSync(path, this.output());
  }

  private source(cascade: boolean): Dataset {
    if (cascade) {
      if (!this.result) {
        throw new NoPriorOutputError('Cannot cascade: no previous transform output is available.');
      }
      return this.result;
    }
    if (!this.input) {
      throw new NoInputDataError();
    }
    return this.input;
  }
}
