import { describe, it, expect } from 'vitest';
import { buildPropertySchema, checkProperty } from '../impl/property-validation';
import type { PropertySchema } from '../types/contact';

const schema: PropertySchema = {
  properties: {
    email: { type: 'string', format: 'email' },
    name: { type: 'string', allowBlank: false },
    score: { type: 'number', minimum: 0, maximum: 100 },
    plan: { type: 'string', enum: ['free', 'pro'] },
    seen_at: { type: 'datetime' },
    meta: { type: 'json', allowBlank: false },
    active: { type: 'boolean' },
    external_id: { type: 'string', readOnly: true },
  },
};

describe('checkProperty', () => {
  it('accepts valid values', () => {
    expect(checkProperty(schema, 'email', 'ada@example.com')).toBeUndefined();
    expect(checkProperty(schema, 'score', 42)).toBeUndefined();
    expect(checkProperty(schema, 'plan', 'pro')).toBeUndefined();
    expect(checkProperty(schema, 'seen_at', '2024-01-01T00:00:00Z')).toBeUndefined();
    expect(checkProperty(schema, 'meta', { source: 'import' })).toBeUndefined();
    expect(checkProperty(schema, 'active', false)).toBeUndefined();
  });

  it('lets null clear blank-tolerant properties', () => {
    expect(checkProperty(schema, 'email', null)).toBeUndefined();
    expect(checkProperty(schema, 'plan', null)).toBeUndefined();
  });

  it('describes type, format and range failures', () => {
    expect(checkProperty(schema, 'score', 'ten')).toBe('must be a number');
    expect(checkProperty(schema, 'score', -1)).toBe('must be at least 0');
    expect(checkProperty(schema, 'score', 101)).toBe('must be at most 100');
    expect(checkProperty(schema, 'email', 'nope')).toBe('must be a valid email');
    expect(checkProperty(schema, 'seen_at', 'yesterday')).toBe('must be a valid date-time');
    expect(checkProperty(schema, 'active', 'yes')).toBe('must be a boolean');
  });

  it('refuses blanks where they are not allowed', () => {
    expect(checkProperty(schema, 'name', '   ')).toBe('must not be blank');
    expect(checkProperty(schema, 'name', null)).toBe('must be a string');
    expect(checkProperty(schema, 'meta', null)).toBe('must not be blank');
  });

  it('rejects unknown, read-only and missing writes', () => {
    expect(checkProperty(schema, 'favourite_color', 'teal')).toBe('unknown property');
    expect(checkProperty({ ...schema, additionalProperties: true }, 'favourite_color', 'teal')).toBeUndefined();
    expect(checkProperty(schema, 'external_id', 'x-1')).toBe('property is read-only');
    expect(checkProperty(schema, 'active', undefined)).toBe('value is required');
  });
});

describe('buildPropertySchema', () => {
  it('adds null to enums of blank-tolerant properties', () => {
    expect(buildPropertySchema({ type: 'string', enum: ['free', 'pro'] })).toEqual({
      type: 'string',
      enum: ['free', 'pro', null],
      nullable: true,
    });
  });

  it('maps datetime to a date-time string', () => {
    expect(buildPropertySchema({ type: 'datetime', allowBlank: false })).toEqual({
      type: 'string',
      format: 'date-time',
    });
  });
});
