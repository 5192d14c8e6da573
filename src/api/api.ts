export { TransformConfig } from './config';
export { Dataset, dataset } from './dataset';
export {
  CsvShiftError,
  ExpressionSyntaxError,
  InconsistentRowShapeError,
  NoInputDataError,
  NoPriorOutputError,
  RowParseError,
  RowSerializeError,
  TemplateCompileError,
  TemplateFormatError,
  TemplateSourceError,
  TransformExecutionError,
} from './errors';
export { runCascade, runTransform } from './run-transform';
export type { RunTransformOptions } from './run-transform';
export { combine, validateTemplate } from './template';
export type { ColumnDescription, CombineSpec, FieldSpec, RawTemplate } from './template';
export { CsvTransform } from './transformer';
export type { ApplyOptions } from './transformer';
export { compileTemplate } from '../engine/compiler';
export type { CompiledTemplate, TransformFn } from '../engine/ast';
export { createDefaultRegistry, FunctionRegistry } from '../engine/functions/registry';
export { parseDataset, parseRow, readDataset, serializeDataset, serializeRow, writeDataset } from '../io/csv';
export { parseTemplate, readTemplate } from '../io/template-loader';
