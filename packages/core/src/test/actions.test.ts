/**
 * Built-in Action Tests
 *
 * Each action runs against an ActionContext backed by memory adapters.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { ActionContext, ActionHandler } from '../interfaces/action-handler';
import type { ContactEvent } from '../types/contact';
import type { ContinuationTarget } from '../types/completion';
import { MemoryPropertyStore } from '../impl/memory-property-store';
import { MemoryEventLog } from '../impl/memory-event-log';
import { ManualClock } from '../impl/clock';
import { setPropertyAction } from '../actions/set-property';
import { incrementPropertyAction } from '../actions/increment-property';
import { fireEventAction } from '../actions/fire-event';
import { setVariableAction } from '../actions/set-variable';
import { testSchema } from './flows';

describe('built-in actions', () => {
  let properties: MemoryPropertyStore;
  let eventLog: MemoryEventLog;
  let variables: Record<string, unknown>;
  let continuations: Array<{ eventId: string; continuation: ContinuationTarget }>;
  let ctx: ActionContext;

  beforeEach(() => {
    const clock = new ManualClock(100);
    properties = new MemoryPropertyStore(testSchema, clock);
    eventLog = new MemoryEventLog(clock);
    variables = {};
    continuations = [];
    ctx = {
      contactId: 'c1',
      causeId: 'cause-1',
      now: clock.now(),
      getProperty: key => properties.get('c1', key),
      setProperty: (key, value) => properties.set('c1', key, value, { parentCauseId: 'cause-1' }),
      appendEvent: async (type, payload, options): Promise<ContactEvent> => {
        const event = await eventLog.append('c1', type, payload, { parentCauseId: 'cause-1' });
        if (options?.continuation) continuations.push({ eventId: event.id, continuation: options.continuation });
        return event;
      },
      setVariable: (path, value) => {
        variables[path] = value;
      },
    };
  });

  async function run(handler: ActionHandler, params: Record<string, unknown>) {
    return handler.execute({ params, ctx, contact: await properties.getAll('c1') });
  }

  describe('set_property', () => {
    it('writes the property and reports the change', async () => {
      const result = await run(setPropertyAction, { key: 'plan', value: 'pro' });

      expect(result.outcome).toBe('success');
      expect(await properties.get('c1', 'plan')).toBe('pro');
    });

    it('reports an unchanged write', async () => {
      await properties.set('c1', 'plan', 'pro');
      const result = await run(setPropertyAction, { key: 'plan', value: 'pro' });

      expect(result).toEqual({ outcome: 'success', output: { changed: false, changeId: undefined } });
    });

    it('fails fatally on a rejected write', async () => {
      const result = await run(setPropertyAction, { key: 'score', value: 'lots' });

      expect(result).toEqual({
        outcome: 'failure',
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Property "score" rejected for contact "c1": must be a number',
          retryable: false,
          details: { key: 'score', reason: 'must be a number' },
        },
      });
    });
  });

  describe('increment_property', () => {
    it('treats a missing value as zero', async () => {
      const result = await run(incrementPropertyAction, { key: 'score' });

      expect(result).toEqual({ outcome: 'success', output: 1 });
      expect(await properties.get('c1', 'score')).toBe(1);
    });

    it('adds the given amount', async () => {
      await properties.set('c1', 'score', 10);
      await run(incrementPropertyAction, { key: 'score', by: 5 });

      expect(await properties.get('c1', 'score')).toBe(15);
    });

    it('refuses non-numeric properties', async () => {
      await properties.set('c1', 'plan', 'pro');
      const result = await run(incrementPropertyAction, { key: 'plan' });

      expect(result.outcome === 'failure' && result.error.code).toBe('NOT_A_NUMBER');
    });

    it('fails when the result breaks the schema', async () => {
      const result = await run(incrementPropertyAction, { key: 'score', by: -1 });

      expect(result.outcome === 'failure' && result.error.code).toBe('VALIDATION_ERROR');
      expect(await properties.get('c1', 'score')).toBeUndefined();
    });
  });

  describe('fire_event', () => {
    it('appends the event under the current cause', async () => {
      const result = await run(fireEventAction, { eventType: 'start_pitch', payload: { source: 'cap' } });
      const [event] = await eventLog.list('c1');

      expect(result).toEqual({ outcome: 'success', output: { eventId: event.id } });
      expect(event).toMatchObject({ type: 'start_pitch', payload: { source: 'cap' }, parentCauseId: 'cause-1' });
      expect(continuations).toEqual([]);
    });

    it('passes the continuation along', async () => {
      const continuation = { kind: 'action', handler: 'set_property', params: { key: 'pitched', value: false } };
      await run(fireEventAction, { eventType: 'start_pitch', continuation });

      expect(continuations.map(c => c.continuation)).toEqual([continuation]);
    });

    it('rejects a malformed continuation', async () => {
      await expect(
        run(fireEventAction, { eventType: 'start_pitch', continuation: { kind: 'action' } })
      ).rejects.toMatchObject({ code: 'INVALID_PARAMS' });
    });
  });

  describe('set_variable', () => {
    it('stores the value in the instance variables', async () => {
      const result = await run(setVariableAction, { path: 'order.total', value: 42 });

      expect(result).toEqual({ outcome: 'success', output: 42 });
      expect(variables).toEqual({ 'order.total': 42 });
    });
  });
});
