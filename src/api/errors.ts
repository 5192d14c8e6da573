/**
 * Base class for every error csvshift raises on purpose.
 * The underlying error, when there is one, is available as `cause`.
 */
export class CsvShiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExpressionSyntaxError extends CsvShiftError {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
  }
}

export class TemplateCompileError extends CsvShiftError {
  constructor(
    readonly path: string[],
    readonly source: string,
    cause: unknown
  ) {
    super(`Cannot compile "${source}" at ${path.join('.')}: ${describeCause(cause)}`, { cause });
  }
}

export class TemplateFormatError extends CsvShiftError { }

export class TemplateSourceError extends CsvShiftError { }

export class TransformExecutionError extends CsvShiftError {
  constructor(
    readonly inputColumn: string,
    readonly outputColumn: string,
    readonly rowNumber: number | undefined,
    cause: unknown
  ) {
    super(
      `Transform for "${inputColumn}" -> "${outputColumn}" failed` +
      `${rowNumber === undefined ? '' : ` in row ${rowNumber}`}: ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class NoPriorOutputError extends CsvShiftError {
  constructor(message = 'No transform output is available; apply a template first.') {
    super(message);
  }
}

export class NoInputDataError extends CsvShiftError {
  constructor() {
    super('No input data is loaded; call loadData() first.');
  }
}

export class RowParseError extends CsvShiftError { }

export class RowSerializeError extends CsvShiftError { }

export class InconsistentRowShapeError extends CsvShiftError {
  constructor(readonly rowNumber: number, readonly missingColumns: string[]) {
    super(
      `Row ${rowNumber} does not produce column(s) ${missingColumns.map(c => `"${c}"`).join(', ')} ` +
      'fixed by the first row.'
    );
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
