import { compileTemplate } from '../engine/compiler';
import { Executor } from '../engine/executor';
import { FunctionRegistry } from '../engine/functions/registry';
import { TransformConfig } from './config';
import { Dataset } from './dataset';
import { RawTemplate } from './template';

export interface RunTransformOptions {
  /**
   * Functions that function literals may call.
   * If omitted, uses TransformConfig.functions.
   */
  functions?: FunctionRegistry;
}

/**
 * High-level API to apply one template to a dataset.
 * Compiles the template and evaluates every row in one call; the source is not modified.
 *
 * @example
 * ```typescript
 * const result = runTransform(dataset(['name'], [['ada']]), {
 *   name: { upper_name: 'upper' },
 * });
 * ```
 */
export function runTransform(
  source: Dataset,
  template: RawTemplate,
  options: RunTransformOptions = {}
): Dataset {
  const compiled = compileTemplate(template, { functions: options.functions ?? TransformConfig.functions });
  return new Executor().execute(source, compiled);
}

/**
 * Applies each template to the result of the previous one.
 */
export function runCascade(
  source: Dataset,
  templates: readonly RawTemplate[],
  options: RunTransformOptions = {}
): Dataset {
  return templates.reduce<Dataset>((current, template) => runTransform(current, template, options), source);
}
