import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { readFileSync, writeFileSync } from 'node:fs';
import { Dataset } from '../api/dataset';
import { describeCause, RowParseError, RowSerializeError } from '../api/errors';

function parseRecords(text: string): string[][] {
  try {
    return parse(text, { skip_empty_lines: true });
  } catch (err) {
    throw new RowParseError(`Cannot parse CSV: ${describeCause(err)}`, { cause: err });
  }
}

/**
 * Parses a single CSV line into its field values.
 */
export function parseRow(line: string): string[] {
  const records = parseRecords(line);
  if (records.length !== 1) {
    throw new RowParseError(`Expected exactly one row, found ${records.length} in ${JSON.stringify(line)}`);
  }
  return records[0];
}

function toCell(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(value);
    case 'undefined':
      return '';
    case 'function':
    case 'symbol':
      throw new RowSerializeError(`Cannot write a ${typeof value} value to CSV`);
    case 'object':
      if (value === null) return '';
      if (value instanceof Date) return value.toISOString();
      try {
        return JSON.stringify(value);
      } catch (err) {
        throw new RowSerializeError(`Cannot write value to CSV: ${describeCause(err)}`, { cause: err });
      }
    default:
      throw new RowSerializeError('Unsupported value');
  }
}

/**
 * Serializes one row without a line terminator. Every field is quoted.
 */
export function serializeRow(values: readonly unknown[]): string {
  const cells = values.map(toCell);
  try {
    return stringify([cells], { quoted: true, quoted_empty: true, eof: false });
  } catch (err) {
    throw new RowSerializeError(`Cannot serialize row: ${describeCause(err)}`, { cause: err });
  }
}

/**
 * First record is the header. Blank lines are skipped; every row must match the header's width.
 */
export function parseDataset(text: string): Dataset {
  const [header, ...rows] = parseRecords(text);
  if (!header) {
    return new Dataset([], []);
  }
  rows.forEach((row, i) => {
    if (row.length !== header.length) {
      throw new RowParseError(`Row ${i + 1} has ${row.length} field(s) but the header has ${header.length}`);
    }
  });
  return new Dataset(header, rows);
}

export function serializeDataset(dataset: Dataset): string {
  return [dataset.columns, ...dataset.rows].map(row => `${serializeRow(row)}\n`).join('');
}

export function readDataset(path: string): Dataset {
  return parseDataset(readFileSync(path, 'utf8'));
}

export function writeDataset(path: string, dataset: Dataset): void {
  writeFileSync(path, serializeDataset(dataset));
}
