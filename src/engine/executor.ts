import { Dataset } from '../api/dataset';
import { InconsistentRowShapeError } from '../api/errors';
import { CompiledTemplate } from './ast';
import { evaluateRow, OutputRow } from './evaluator';
import { sortColumnNames } from './utils/string-utils';

export class Executor {
  execute(source: Dataset, template: CompiledTemplate): Dataset {
    return assembleDataset(this.evaluateRows(source, template));
  }

  private *evaluateRows(source: Dataset, template: CompiledTemplate): Generator<OutputRow> {
    let rowNumber = 0;
    for (const values of source.rows) {
      rowNumber++;
      const input = new Map<string, unknown>();
      source.columns.forEach((column, i) => input.set(column, values[i]));
      yield evaluateRow(input, source.columns, template, rowNumber);
    }
  }
}

/**
 * Builds a dataset from evaluated rows. The header is the sorted key set of the first row and
 * stays fixed: later rows missing one of its columns are rejected, extra columns are dropped.
 */
export function assembleDataset(outputRows: Iterable<OutputRow>): Dataset {
  let columns: string[] | null = null;
  const rows: unknown[][] = [];
  const dropped = new Set<string>();

  for (const output of outputRows) {
    if (!columns) {
      columns = sortColumnNames(output.keys());
    }
    const header: string[] = columns;

    const missing = header.filter(column => !output.has(column));
    if (missing.length > 0) {
      throw new InconsistentRowShapeError(rows.length + 1, missing);
    }
    for (const key of output.keys()) {
      if (!header.includes(key)) dropped.add(key);
    }
    rows.push(header.map(column => output.get(column)));
  }

  if (dropped.size > 0) {
    console.warn(
      `csvshift: dropped column(s) not produced by the first row: ${sortColumnNames(dropped).join(', ')}`
    );
  }

  return new Dataset(columns ?? [], rows);
}
