import { TransformFn } from '../engine/ast';
import { createDefaultRegistry, FunctionRegistry } from '../engine/functions/registry';

class TransformConfigInstance {
  private _functions: FunctionRegistry = createDefaultRegistry();

  /**
   * Registry used by every call that does not pass its own.
   */
  get functions(): FunctionRegistry {
    return this._functions;
  }

  registerFunction(name: string, fn: TransformFn): void {
    this._functions.register(name, fn);
  }

  setFunctions(functions: FunctionRegistry): void {
    this._functions = functions;
  }

  initialize(options: {
    functions?: FunctionRegistry | Record<string, TransformFn>;
  }): void {
    if (options.functions instanceof FunctionRegistry) {
      this.setFunctions(options.functions);
    } else if (options.functions) {
      for (const [name, fn] of Object.entries(options.functions)) {
        this.registerFunction(name, fn);
      }
    }
  }

  /**
   * Resets the configuration. Useful for testing.
   */
  reset(): void {
    this._functions = createDefaultRegistry();
  }
}

export const TransformConfig = new TransformConfigInstance();
