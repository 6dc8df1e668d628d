/**
 * Flow Registry Tests
 *
 * Tests for DefaultFlowRegistry covering:
 * - Flow registration with validation
 * - Invalid flow rejection (triggers, steps, predicates, delays)
 * - Multi-version support per flow ID
 * - Unregister keeps versions readable for running instances
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { DefaultFlowRegistry } from '../impl/flow-registry';
import { FlowValidationError } from '../types/errors';
import type { FlowDefinition } from '../types/flow';

function createFlow(id: string, version = '1.0.0', overrides: Partial<FlowDefinition> = {}): FlowDefinition {
  return {
    id,
    version,
    trigger: { type: 'event', eventType: 'signed_up' },
    steps: [{ type: 'action', handler: 'set_property', params: { key: 'welcomed', value: true } }],
    ...overrides,
  };
}

describe('DefaultFlowRegistry', () => {
  let registry: DefaultFlowRegistry;

  beforeEach(() => {
    registry = new DefaultFlowRegistry(type => type === 'set_property');
  });

  describe('registration', () => {
    it('registers a valid flow', () => {
      const flow = createFlow('test-flow');
      registry.register(flow);

      expect(registry.has('test-flow')).toBe(true);
      expect(registry.get('test-flow')).toEqual(flow);
      expect(registry.list()).toEqual([flow]);
    });

    it('throws on a flow without steps', () => {
      expect(() => registry.register(createFlow('empty', '1.0.0', { steps: [] }))).toThrow(FlowValidationError);
    });

    it('throws on an unknown handler', () => {
      const flow = createFlow('bad-handler', '1.0.0', {
        steps: [{ type: 'action', handler: 'send_fax' }],
      });

      expect(() => registry.register(flow)).toThrow('Unknown handler "send_fax"');
    });

    it('reports the path of the first issue', () => {
      const flow = createFlow('bad-delay', '1.0.0', {
        steps: [{ type: 'delay', delay: { kind: 'local', at: 'teatime' } }],
      });

      try {
        registry.register(flow);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(FlowValidationError);
        if (err instanceof FlowValidationError) {
          expect(err.issues[0].path).toBe('steps.0.delay.at');
          expect(err.message).toBe('Flow "bad-delay" is invalid: Unrecognized wall-clock time "teatime"');
        }
      }
    });

    it('validates predicates inside branches', () => {
      const flow = createFlow('bad-branch', '1.0.0', {
        steps: [
          {
            type: 'decision',
            branches: [
              {
                when: { path: 'contact.plan', op: 'in', value: 'pro' },
                steps: [{ type: 'action', handler: 'set_property' }],
              },
            ],
          },
        ],
      });

      const issues = registry.validate(flow);
      expect(issues).toEqual([
        { path: 'steps.0.branches.0.when.value', message: '"in" needs an array', severity: 'error' },
      ]);
    });

    it('rejects a negative relative delay', () => {
      const flow = createFlow('negative', '1.0.0', {
        steps: [{ type: 'delay', delay: { kind: 'relative', ms: -1 } }],
      });
      expect(() => registry.register(flow)).toThrow(FlowValidationError);
    });

    it('requires a segment for scheduled triggers', () => {
      const flow = createFlow('no-segment', '1.0.0', { trigger: { type: 'now', segmentId: '' } });
      expect(registry.validate(flow)[0]).toMatchObject({ path: 'trigger.segmentId', severity: 'error' });
    });

    it('only warns on a decision without branches', () => {
      const flow = createFlow('empty-decision', '1.0.0', {
        steps: [{ type: 'decision', branches: [] }],
      });

      registry.register(flow);
      expect(registry.validate(flow)).toEqual([
        { path: 'steps.0.branches', message: 'Decision has no branches', severity: 'warning' },
      ]);
    });

    it('rejects re-registering an active version', () => {
      registry.register(createFlow('dup'));
      expect(() => registry.register(createFlow('dup'))).toThrow('already registered');
    });
  });

  describe('versioning', () => {
    it('registers multiple versions of same flow', () => {
      const v1 = createFlow('my-flow', '1.0.0');
      const v2 = createFlow('my-flow', '2.0.0');

      registry.register(v1);
      registry.register(v2);

      expect(registry.get('my-flow', '1.0.0')).toEqual(v1);
      expect(registry.get('my-flow', '2.0.0')).toEqual(v2);
      expect(registry.versions('my-flow')).toEqual(['2.0.0', '1.0.0']);
    });

    it('get without version returns the highest version', () => {
      registry.register(createFlow('my-flow', '1.10.0'));
      registry.register(createFlow('my-flow', '1.9.0'));

      expect(registry.get('my-flow')?.version).toBe('1.10.0');
    });

    it('returns undefined for non-existent version', () => {
      registry.register(createFlow('my-flow', '1.0.0'));
      expect(registry.get('my-flow', '3.0.0')).toBeUndefined();
    });
  });

  describe('unregister()', () => {
    it('stops listing the flow but keeps versions readable', () => {
      registry.register(createFlow('gone'));

      expect(registry.unregister('gone')).toBe(true);
      expect(registry.has('gone')).toBe(false);
      expect(registry.list()).toEqual([]);
      expect(registry.get('gone')).toBeUndefined();
      expect(registry.get('gone', '1.0.0')?.id).toBe('gone');
    });

    it('returns false for unknown flows', () => {
      expect(registry.unregister('never')).toBe(false);
    });

    it('allows a flow to be defined again', () => {
      registry.register(createFlow('back'));
      registry.unregister('back');
      registry.register(createFlow('back'));

      expect(registry.flowIds()).toEqual(['back']);
    });
  });
});
