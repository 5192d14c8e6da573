import { z } from 'zod';

export const datasetSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
  })
  .superRefine((dataset, ctx) => {
    dataset.rows.forEach((row, i) => {
      if (row.length !== dataset.columns.length) {
        ctx.addIssue({
          code: 'custom',
          message: `Row ${i + 1} has ${row.length} value(s) but the header has ${dataset.columns.length}.`,
          path: ['rows', i],
        });
      }
    });
  });

type DatasetInput = z.infer<typeof datasetSchema>;

/**
 * A header plus rows aligned to it. Instances are frozen; transforms always produce a new one.
 */
export class Dataset {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly unknown[])[];

  constructor(columns: readonly string[], rows: readonly (readonly unknown[])[]) {
    const parsed: DatasetInput = datasetSchema.parse({ columns, rows });
    this.columns = Object.freeze(parsed.columns);
    this.rows = Object.freeze(parsed.rows.map(row => Object.freeze(row)));
    Object.freeze(this);
  }
}

export function dataset(columns: readonly string[], rows: readonly (readonly unknown[])[]): Dataset {
  return new Dataset(columns, rows);
}
