/**
 * A transform function: receives the input value(s) positionally and returns the output value.
 * User supplied callbacks may declare any parameter types, hence `any`.
 */
export type TransformFn = (...args: any[]) => unknown;

export enum ColumnKind {
  RENAME = 'RENAME',
  FIELDS = 'FIELDS',
}

export enum FieldKind {
  EXPLODE = 'EXPLODE',
  COMBINE = 'COMBINE',
  LITERAL = 'LITERAL',
}

export interface ExplodeField {
  kind: FieldKind.EXPLODE;
  fn: TransformFn;
}

export interface CombineField {
  kind: FieldKind.COMBINE;
  args: readonly string[];
  fn: TransformFn;
}

export interface LiteralField {
  kind: FieldKind.LITERAL;
  value: unknown;
}

export type CompiledField = ExplodeField | CombineField | LiteralField;

export interface RenameColumn {
  kind: ColumnKind.RENAME;
  target: string;
}

export interface FieldsColumn {
  kind: ColumnKind.FIELDS;
  /** Output column name -> field, in template order. */
  fields: ReadonlyMap<string, CompiledField>;
}

export type CompiledColumn = RenameColumn | FieldsColumn;

/** Input column name -> compiled output description. */
export type CompiledTemplate = ReadonlyMap<string, CompiledColumn>;

export enum ExprType {
  LITERAL = 'LITERAL',
  ARG = 'ARG',
  CALL = 'CALL',
  REF = 'REF',
  INDEX = 'INDEX',
  CONCAT = 'CONCAT',
}

export interface LiteralExpr {
  type: ExprType.LITERAL;
  value: string | number | boolean | null;
}

export interface ArgExpr {
  type: ExprType.ARG;
  /** Zero based position of the argument. */
  index: number;
}

export interface CallExpr {
  type: ExprType.CALL;
  name: string;
  args: ExprNode[];
}

/**
 * A bare function name; called with every positional argument the literal receives.
 */
export interface RefExpr {
  type: ExprType.REF;
  name: string;
}

export interface IndexExpr {
  type: ExprType.INDEX;
  target: ExprNode;
  index: ExprNode;
}

export interface ConcatExpr {
  type: ExprType.CONCAT;
  left: ExprNode;
  right: ExprNode;
}

export type ExprNode = LiteralExpr | ArgExpr | CallExpr | RefExpr | IndexExpr | ConcatExpr;
