import type { ActionHandler, ActionParams } from '../interfaces/action-handler';
import type { ContinuationTarget } from '../types/completion';
import { Result } from '../types/result';
import { paramsReader } from '../impl/action-registry';

interface FireEventParams {
  eventType: string;
  payload?: Record<string, unknown>;
  continuation?: ContinuationTarget;
}

const continuationSchema = {
  oneOf: [
    {
      type: 'object',
      required: ['kind', 'handler'],
      properties: {
        kind: { const: 'action' },
        handler: { type: 'string', minLength: 1 },
        params: { type: 'object' },
      },
      additionalProperties: false,
    },
    {
      type: 'object',
      required: ['kind', 'eventType'],
      properties: {
        kind: { const: 'event' },
        eventType: { type: 'string', minLength: 1 },
        payload: { type: 'object' },
      },
      additionalProperties: false,
    },
  ],
};

const paramsSchema = {
  type: 'object',
  required: ['eventType'],
  properties: {
    eventType: { type: 'string', minLength: 1 },
    payload: { type: 'object' },
    continuation: continuationSchema,
  },
  additionalProperties: false,
};

const readParams = paramsReader<FireEventParams>(paramsSchema);

/**
 * Append an event to the contact's log.
 *
 * With a `continuation`, the continuation runs once every instance the
 * event spawns, and everything those instances cause in turn, has
 * finished:
 *
 * ```typescript
 * {
 *   type: 'action',
 *   handler: 'fire_event',
 *   params: {
 *     eventType: 'start_pitch',
 *     continuation: {
 *       kind: 'action',
 *       handler: 'set_property',
 *       params: { key: 'should_get_newsletters', value: true },
 *     },
 *   },
 * }
 * ```
 */
export const fireEventAction: ActionHandler = {
  type: 'fire_event',

  metadata: {
    type: 'fire_event',
    name: 'Fire Event',
    description: 'Append an event, optionally running a continuation when its fan-out completes',
    category: 'contact',
    retryable: true,
    paramsSchema,
    outputSchema: {
      type: 'object',
      properties: { eventId: { type: 'string' } },
    },
  },

  async execute({ params, ctx }: ActionParams) {
    const { eventType, payload, continuation } = readParams(params);
    const event = await ctx.appendEvent(eventType, payload ?? {}, { continuation });
    return Result.success({ eventId: event.id });
  },
};
