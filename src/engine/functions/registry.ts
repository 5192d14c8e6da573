import { z } from 'zod';
import { TransformFn } from '../ast';
import { builtInFunctions } from './builtins';

export const RESERVED_WORDS = ['true', 'false', 'null'] as const;

export const functionNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Function names must be identifiers.')
  .refine(name => !(RESERVED_WORDS as readonly string[]).includes(name), {
    message: 'Function names cannot be true, false or null.',
  });

const transformFnSchema = z.custom<TransformFn>(value => typeof value === 'function', {
  message: 'Expected a function.',
});

/**
 * Named transform functions that template expressions may call.
 */
export class FunctionRegistry {
  private functions = new Map<string, TransformFn>();

  constructor(entries: Record<string, TransformFn> = {}) {
    for (const [name, fn] of Object.entries(entries)) {
      this.register(name, fn);
    }
  }

  register(name: string, fn: TransformFn): this {
    this.functions.set(functionNameSchema.parse(name), transformFnSchema.parse(fn));
    return this;
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): TransformFn | undefined {
    return this.functions.get(name);
  }

  names(): string[] {
    return [...this.functions.keys()].sort();
  }

  clone(): FunctionRegistry {
    const copy = new FunctionRegistry();
    for (const [name, fn] of this.functions) {
      copy.functions.set(name, fn);
    }
    return copy;
  }
}

export function createDefaultRegistry(): FunctionRegistry {
  return new FunctionRegistry(builtInFunctions);
}
