/**
 * Action Registry Tests
 *
 * Tests for DefaultActionRegistry and param checking covering:
 * - Handler registration and retrieval
 * - Metadata management
 * - checkParams / paramsReader error messages
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { DefaultActionRegistry, checkParams, paramsReader } from '../impl/action-registry';
import type { ActionHandler, HandlerMetadata } from '../interfaces/action-handler';
import { FatalActionError } from '../types/errors';
import { Result } from '../types/result';
import { builtinActions } from '../actions';

/**
 * Helper to create test handlers with configurable metadata.
 */
function createHandler(type: string, metadata?: Partial<HandlerMetadata>): ActionHandler {
  return {
    type,
    metadata: {
      type,
      name: metadata?.name ?? type,
      category: metadata?.category,
      paramsSchema: metadata?.paramsSchema ?? { type: 'object' },
    },
    async execute() {
      return Result.success(null);
    },
  };
}

describe('DefaultActionRegistry', () => {
  let registry: DefaultActionRegistry;

  beforeEach(() => {
    registry = new DefaultActionRegistry();
  });

  describe('registration', () => {
    it('registers a handler', () => {
      const handler = createHandler('test');
      registry.register(handler);

      expect(registry.has('test')).toBe(true);
      expect(registry.get('test')).toBe(handler);
    });

    it('rejects duplicate types', () => {
      registry.register(createHandler('test'));
      expect(() => registry.register(createHandler('test'))).toThrow('Handler "test" already registered');
    });

    it('rejects metadata for another type', () => {
      const handler: ActionHandler = { ...createHandler('a'), metadata: { type: 'b', name: 'B', paramsSchema: {} } };
      expect(() => registry.register(handler)).toThrow('Handler "a" has metadata for "b"');
    });

    it('registers the built-in actions', () => {
      registry.registerAll([...builtinActions]);
      expect(registry.types().sort()).toEqual(['fire_event', 'increment_property', 'set_property', 'set_variable']);
    });

    it('unregisters handlers', () => {
      registry.register(createHandler('gone'));

      expect(registry.unregister('gone')).toBe(true);
      expect(registry.has('gone')).toBe(false);
      expect(registry.unregister('gone')).toBe(false);
    });
  });

  describe('metadata', () => {
    it('returns metadata for one or all handlers', () => {
      registry.register(createHandler('email', { name: 'Send Email', category: 'messaging' }));
      registry.register(createHandler('sms'));

      expect(registry.getMetadata('email')?.category).toBe('messaging');
      expect(registry.getMetadata('missing')).toBeUndefined();
      expect(registry.getAllMetadata().map(m => m.name)).toEqual(['Send Email', 'sms']);
    });
  });
});

describe('checkParams()', () => {
  const schema = {
    type: 'object',
    required: ['key'],
    properties: { key: { type: 'string' }, by: { type: 'number' } },
  };

  it('accepts valid params', () => {
    expect(checkParams(schema, { key: 'score', by: 2 })).toBeUndefined();
  });

  it('describes a missing property', () => {
    expect(checkParams(schema, {})).toBe("params must have required property 'key'");
  });

  it('names the offending field', () => {
    expect(checkParams(schema, { key: 'score', by: 'two' })).toBe('by must be number');
  });
});

describe('paramsReader()', () => {
  const read = paramsReader<{ key: string }>({
    type: 'object',
    required: ['key'],
    properties: { key: { type: 'string' } },
  });

  it('returns typed params', () => {
    expect(read({ key: 'plan' }).key).toBe('plan');
  });

  it('throws FatalActionError with INVALID_PARAMS', () => {
    expect(() => read({ key: 3 })).toThrow(FatalActionError);
    expect(() => read({ key: 3 })).toThrow('key must be string');
  });
});
