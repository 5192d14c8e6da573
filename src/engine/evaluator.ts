import { TransformExecutionError } from '../api/errors';
import { ColumnKind, CompiledField, CompiledTemplate, ExprNode, ExprType, FieldKind, TransformFn } from './ast';
import { toText } from './utils/value-utils';

export type InputRow = ReadonlyMap<string, unknown>;
export type OutputRow = Map<string, unknown>;

/**
 * Evaluates an expression tree against the positional arguments a function literal was called with.
 * `functions` must hold every name the tree references; the compiler guarantees that.
 */
export function evaluateExpression(
  node: ExprNode,
  args: readonly unknown[],
  functions: ReadonlyMap<string, TransformFn>
): unknown {
  switch (node.type) {
    case ExprType.LITERAL:
      return node.value;
    case ExprType.ARG:
      return args[node.index];
    case ExprType.CALL:
      return lookup(functions, node.name)(
        ...node.args.map(arg => evaluateExpression(arg, args, functions))
      );
    case ExprType.REF:
      return lookup(functions, node.name)(...args);
    case ExprType.INDEX:
      return indexValue(
        evaluateExpression(node.target, args, functions),
        evaluateExpression(node.index, args, functions)
      );
    case ExprType.CONCAT: {
      const left = evaluateExpression(node.left, args, functions);
      const right = evaluateExpression(node.right, args, functions);
      if (typeof left === 'number' && typeof right === 'number') {
        return left + right;
      }
      return toText(left) + toText(right);
    }
    default:
      node satisfies never;
      throw new Error('Unexpected expression node');
  }
}

function lookup(functions: ReadonlyMap<string, TransformFn>, name: string): TransformFn {
  const fn = functions.get(name);
  if (!fn) {
    throw new Error(`Unknown function "${name}"`);
  }
  return fn;
}

function indexValue(target: unknown, index: unknown): unknown {
  if (target === null || target === undefined) return undefined;
  if (typeof index !== 'number' || !Number.isInteger(index)) {
    throw new Error(`Index must be an integer, got '${toText(index)}'`);
  }
  if (typeof target === 'string' || Array.isArray(target)) {
    const position = index < 0 ? target.length + index : index;
    return position >= 0 && position < target.length ? target[position] : undefined;
  }
  throw new Error(`Cannot index into a value of type ${typeof target}`);
}

/**
 * Produces one output row from one input row.
 *
 * Columns are visited in `inputColumns` order and, within a column, fields in template order;
 * a later write to an output column replaces an earlier one. Input columns the template does
 * not mention produce nothing.
 */
export function evaluateRow(
  inputRow: InputRow,
  inputColumns: readonly string[],
  template: CompiledTemplate,
  rowNumber?: number
): OutputRow {
  const output: OutputRow = new Map();

  for (const column of inputColumns) {
    const description = template.get(column);
    if (!description) continue;

    switch (description.kind) {
      case ColumnKind.RENAME:
        output.set(description.target, inputRow.get(column));
        break;
      case ColumnKind.FIELDS:
        for (const [outputColumn, field] of description.fields) {
          output.set(outputColumn, evaluateField(field, inputRow, column, outputColumn, rowNumber));
        }
        break;
      default:
        description satisfies never;
    }
  }

  return output;
}

function evaluateField(
  field: CompiledField,
  inputRow: InputRow,
  column: string,
  outputColumn: string,
  rowNumber: number | undefined
): unknown {
  switch (field.kind) {
    case FieldKind.LITERAL:
      return field.value;
    case FieldKind.EXPLODE:
      return invoke(field.fn, [inputRow.get(column)], column, outputColumn, rowNumber);
    case FieldKind.COMBINE:
      return invoke(field.fn, field.args.map(arg => inputRow.get(arg)), column, outputColumn, rowNumber);
    default:
      field satisfies never;
      throw new Error('Unexpected field kind');
  }
}

function invoke(
  fn: TransformFn,
  args: unknown[],
  column: string,
  outputColumn: string,
  rowNumber: number | undefined
): unknown {
  try {
    return fn(...args);
  } catch (err) {
    throw new TransformExecutionError(column, outputColumn, rowNumber, err);
  }
}
