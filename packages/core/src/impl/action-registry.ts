import type { ValidateFunction } from 'ajv';
import type { ActionHandler, HandlerMetadata, JSONSchema } from '../interfaces/action-handler';
import type { ActionRegistry } from '../interfaces/action-registry';
import { FatalActionError } from '../types/errors';
import { getAjv } from './property-validation';

const validators = new WeakMap<JSONSchema, ValidateFunction>();

function validatorFor(schema: JSONSchema): ValidateFunction {
  const cached = validators.get(schema);
  if (cached) return cached;
  const compiled = getAjv().compile(schema);
  validators.set(schema, compiled);
  return compiled;
}

/**
 * Check params against a handler's schema.
 * Returns a message describing the first problem, or undefined.
 */
export function checkParams(schema: JSONSchema, params: unknown): string | undefined {
  const validate = validatorFor(schema);
  if (validate(params)) return undefined;
  const err = validate.errors?.[0];
  if (!err) return 'invalid params';
  const where = err.instancePath ? err.instancePath.slice(1).replace(/\//g, '.') : 'params';
  return `${where} ${err.message ?? 'is invalid'}`;
}

/**
 * Build a typed reader for handler params.
 *
 * ```typescript
 * const read = paramsReader<{ key: string; value: unknown }>(schema);
 * const { key, value } = read(params.params);
 * ```
 *
 * Throws FatalActionError when the params do not match the schema.
 */
export function paramsReader<T>(schema: JSONSchema): (params: unknown) => T {
  let validate: ValidateFunction<T> | undefined;
  return (params: unknown): T => {
    if (!validate) validate = getAjv().compile<T>(schema);
    if (validate(params)) return params;
    throw new FatalActionError(checkParams(schema, params) ?? 'invalid params', 'INVALID_PARAMS');
  };
}

export class DefaultActionRegistry implements ActionRegistry {
  private handlers = new Map<string, ActionHandler>();

  register(handler: ActionHandler): void {
    if (this.handlers.has(handler.type)) {
      throw new Error(`Handler "${handler.type}" already registered`);
    }
    if (handler.metadata.type !== handler.type) {
      throw new Error(`Handler "${handler.type}" has metadata for "${handler.metadata.type}"`);
    }
    this.handlers.set(handler.type, handler);
  }

  registerAll(handlers: ActionHandler[]): void {
    handlers.forEach(h => this.register(h));
  }

  get(type: string): ActionHandler | undefined {
    return this.handlers.get(type);
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  types(): string[] {
    return [...this.handlers.keys()];
  }

  unregister(type: string): boolean {
    return this.handlers.delete(type);
  }

  getMetadata(type: string): HandlerMetadata | undefined {
    return this.handlers.get(type)?.metadata;
  }

  getAllMetadata(): HandlerMetadata[] {
    return [...this.handlers.values()].map(h => h.metadata);
  }
}
