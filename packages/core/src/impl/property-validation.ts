/**
 * Property schema validation.
 *
 * Each PropertyDefinition compiles to a JSON Schema checked with ajv.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { PropertyDefinition, PropertySchema } from '../types/contact';
import type { JSONSchema } from '../interfaces/action-handler';

// Singleton AJV instance
let ajvInstance: Ajv | null = null;

export function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({ allErrors: true });
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

const compiled = new WeakMap<PropertyDefinition, ValidateFunction>();

/**
 * Build JSON Schema for one property definition.
 */
export function buildPropertySchema(def: PropertyDefinition): JSONSchema {
  const allowBlank = def.allowBlank !== false;
  const schema: JSONSchema = {};

  switch (def.type) {
    case 'string':
      schema.type = 'string';
      if (!allowBlank) schema.pattern = '\\S';
      break;
    case 'number':
      schema.type = 'number';
      break;
    case 'boolean':
      schema.type = 'boolean';
      break;
    case 'datetime':
      schema.type = 'string';
      schema.format = 'date-time';
      break;
    case 'json':
      if (!allowBlank) schema.not = { type: 'null' };
      break;
  }

  if (def.format !== undefined) schema.format = def.format;
  if (def.minimum !== undefined) schema.minimum = def.minimum;
  if (def.maximum !== undefined) schema.maximum = def.maximum;
  if (def.enum !== undefined) {
    schema.enum = allowBlank && def.type !== 'json' ? [...def.enum, null] : [...def.enum];
  }
  // null clears a property unless blanks are refused
  if (allowBlank && def.type !== 'json') schema.nullable = true;

  return schema;
}

function describe(err: ErrorObject): string {
  switch (err.keyword) {
    case 'type':
      return `must be a ${String(err.params.type)}`;
    case 'format':
      return `must be a valid ${String(err.params.format)}`;
    case 'minimum':
      return `must be at least ${String(err.params.limit)}`;
    case 'maximum':
      return `must be at most ${String(err.params.limit)}`;
    case 'pattern':
    case 'not':
      return 'must not be blank';
    case 'enum': {
      const allowed: unknown = err.params.allowedValues;
      return Array.isArray(allowed)
        ? `must be one of: ${allowed.map(v => String(v)).join(', ')}`
        : 'must be one of the allowed values';
    }
    default:
      return err.message ?? 'is invalid';
  }
}

/**
 * Check a write against the schema.
 * Returns the rejection reason, or undefined when the value is accepted.
 */
export function checkProperty(schema: PropertySchema, key: string, value: unknown): string | undefined {
  const def = schema.properties[key];
  if (!def) {
    return schema.additionalProperties ? undefined : 'unknown property';
  }
  if (def.readOnly) return 'property is read-only';
  if (value === undefined) return 'value is required';

  let validate = compiled.get(def);
  if (!validate) {
    validate = getAjv().compile(buildPropertySchema(def));
    compiled.set(def, validate);
  }

  if (validate(value)) return undefined;

  const errors = validate.errors ?? [];
  // Blank strings fail both `type`-compatible and `pattern`; report the pattern
  const primary = errors.find(e => e.keyword === 'pattern' || e.keyword === 'not') ?? errors[0];
  return primary ? describe(primary) : 'is invalid';
}
