/**
 * Test Flows
 *
 * Property schema and flow definitions shared by the engine tests.
 *
 * Flows:
 * - welcomeFlow: event-triggered, single action
 * - newsletterCapFlow / pitchFlow: the AutoPitcher pair (nested completion)
 * - reminderFlow: relative delay with a conversion goal
 * - morningFlow: local wall-clock delay
 * - routingFlow: decision with branches and otherwise
 * - waitForClickFlow: event-awaited delay
 * - broadcastFlow: `now` trigger over a segment
 */
import type { PropertySchema } from '../types/contact';
import type { FlowDefinition } from '../types/flow';

export const DAY = 24 * 60 * 60 * 1000;
export const HOUR = 60 * 60 * 1000;

export const testSchema: PropertySchema = {
  properties: {
    email: { type: 'string', format: 'email', allowBlank: false },
    plan: { type: 'string', enum: ['free', 'pro', 'enterprise'] },
    score: { type: 'number', minimum: 0 },
    newsletters_sent: { type: 'number', minimum: 0 },
    should_get_newsletters: { type: 'boolean' },
    pitched: { type: 'boolean' },
    pitch_done: { type: 'boolean' },
    welcomed: { type: 'boolean' },
    reminded: { type: 'boolean' },
    converted: { type: 'boolean' },
    route: { type: 'string' },
    timezone: { type: 'string' },
    last_seen: { type: 'datetime' },
    preferences: { type: 'json' },
    external_id: { type: 'string', readOnly: true },
  },
};

export const welcomeFlow: FlowDefinition = {
  id: 'welcome',
  version: '1.0.0',
  name: 'Welcome',
  trigger: { type: 'event', eventType: 'signed_up' },
  steps: [{ type: 'action', handler: 'set_property', params: { key: 'welcomed', value: true } }],
};

/** Caps newsletters at 10 and hands the contact to the pitch flow for three days later */
export const newsletterCapFlow: FlowDefinition = {
  id: 'newsletter-cap',
  version: '1.0.0',
  trigger: {
    type: 'property',
    key: 'newsletters_sent',
    where: { path: 'change.newValue', op: 'gte', value: 10 },
  },
  steps: [
    { type: 'action', handler: 'set_property', params: { key: 'should_get_newsletters', value: false } },
    { type: 'delay', delay: { kind: 'relative', ms: 3 * DAY } },
    {
      type: 'action',
      handler: 'fire_event',
      params: {
        eventType: 'start_pitch',
        continuation: {
          kind: 'action',
          handler: 'set_property',
          params: { key: 'should_get_newsletters', value: true },
        },
      },
    },
  ],
};

export const pitchFlow: FlowDefinition = {
  id: 'pitch',
  version: '1.0.0',
  trigger: { type: 'event', eventType: 'start_pitch' },
  steps: [
    { type: 'action', handler: 'set_property', params: { key: 'pitched', value: true } },
    { type: 'delay', delay: { kind: 'relative', ms: DAY } },
    { type: 'action', handler: 'set_property', params: { key: 'pitch_done', value: true } },
  ],
};

export const reminderFlow: FlowDefinition = {
  id: 'reminder',
  version: '1.0.0',
  trigger: { type: 'event', eventType: 'cart_abandoned' },
  goal: { on: 'property', key: 'converted', where: { path: 'change.newValue', op: 'eq', value: true } },
  steps: [
    { type: 'delay', delay: { kind: 'relative', ms: 3 * DAY } },
    { type: 'action', handler: 'set_property', params: { key: 'reminded', value: true } },
  ],
};

export const morningFlow: FlowDefinition = {
  id: 'morning',
  version: '1.0.0',
  trigger: { type: 'event', eventType: 'subscribed' },
  localTime: true,
  steps: [
    { type: 'delay', delay: { kind: 'local', at: '09:00' } },
    { type: 'action', handler: 'set_property', params: { key: 'welcomed', value: true } },
  ],
};

export const routingFlow: FlowDefinition = {
  id: 'routing',
  version: '1.0.0',
  trigger: { type: 'event', eventType: 'route_me' },
  steps: [
    {
      type: 'decision',
      branches: [
        {
          when: { path: 'contact.plan', op: 'eq', value: 'pro' },
          steps: [{ type: 'action', handler: 'set_property', params: { key: 'route', value: 'pro' } }],
        },
        {
          when: { path: 'event.payload.total', op: 'gt', value: 100 },
          steps: [{ type: 'action', handler: 'set_property', params: { key: 'route', value: 'big-spender' } }],
        },
      ],
      otherwise: [{ type: 'action', handler: 'set_property', params: { key: 'route', value: 'default' } }],
    },
    { type: 'action', handler: 'increment_property', params: { key: 'score', by: 5 } },
  ],
};

export const waitForClickFlow: FlowDefinition = {
  id: 'wait-for-click',
  version: '1.0.0',
  trigger: { type: 'event', eventType: 'email_sent' },
  steps: [
    { type: 'delay', delay: { kind: 'event', until: { on: 'event', eventType: 'clicked' } } },
    { type: 'action', handler: 'increment_property', params: { key: 'score' } },
  ],
};

export const broadcastFlow: FlowDefinition = {
  id: 'broadcast',
  version: '1.0.0',
  trigger: { type: 'now', segmentId: 'everyone' },
  steps: [{ type: 'action', handler: 'increment_property', params: { key: 'newsletters_sent' } }],
};
