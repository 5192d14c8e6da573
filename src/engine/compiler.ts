import { TemplateCompileError } from '../api/errors';
import { FieldSpec, RawTemplate, validateTemplate } from '../api/template';
import { ColumnKind, CompiledColumn, CompiledField, CompiledTemplate, FieldKind, TransformFn } from './ast';
import { evaluateExpression } from './evaluator';
import { collectFunctionNames, parseExpression } from './expression/parser';
import { createDefaultRegistry, FunctionRegistry } from './functions/registry';

export interface CompileOptions {
  /**
   * Functions that function literals may call. Defaults to the built-ins.
   */
  functions?: FunctionRegistry;
}

/**
 * Compiles a raw template into its executable form. The raw template is left untouched;
 * every string leaf under an output field becomes a function bound to the registry as it is now.
 */
export function compileTemplate(raw: RawTemplate, options: CompileOptions = {}): CompiledTemplate {
  const template = validateTemplate(raw);
  const functions = options.functions ?? createDefaultRegistry();
  const compiled = new Map<string, CompiledColumn>();

  for (const [column, description] of Object.entries(template)) {
    if (typeof description !== 'object') {
      compiled.set(column, { kind: ColumnKind.RENAME, target: String(description) });
      continue;
    }

    const fields = new Map<string, CompiledField>();
    for (const [outputColumn, spec] of Object.entries(description)) {
      fields.set(outputColumn, compileField(spec, [column, outputColumn], functions));
    }
    compiled.set(column, { kind: ColumnKind.FIELDS, fields });
  }

  return compiled;
}

function compileField(spec: FieldSpec, path: string[], functions: FunctionRegistry): CompiledField {
  if (typeof spec === 'string' || typeof spec === 'function') {
    return { kind: FieldKind.EXPLODE, fn: toFunction(spec, path, functions) };
  }
  if (spec !== null && !Array.isArray(spec) && typeof spec === 'object') {
    return {
      kind: FieldKind.COMBINE,
      args: [...(spec.args ?? [])],
      fn: toFunction(spec.func, [...path, 'func'], functions),
    };
  }
  return { kind: FieldKind.LITERAL, value: spec };
}

function toFunction(value: string | TransformFn, path: string[], functions: FunctionRegistry): TransformFn {
  return typeof value === 'function' ? value : compileFunctionLiteral(value, path, functions);
}

/**
 * Turns function-literal text into a callable. Syntax errors and unknown function names
 * surface here, not when rows are evaluated.
 */
export function compileFunctionLiteral(
  source: string,
  path: string[],
  functions: FunctionRegistry
): TransformFn {
  try {
    const tree = parseExpression(source);
    const bound = new Map<string, TransformFn>();
    for (const name of collectFunctionNames(tree)) {
      const fn = functions.get(name);
      if (!fn) {
        throw new Error(`Unknown function "${name}"`);
      }
      bound.set(name, fn);
    }
    return (...args: unknown[]) => evaluateExpression(tree, args, bound);
  } catch (err) {
    throw new TemplateCompileError(path, source, err);
  }
}
