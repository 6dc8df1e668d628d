/**
 * Predicate Tests
 *
 * Operators, combinators, condition matching and validation.
 */
import { describe, it, expect } from 'vitest';
import { conditionMatches, evaluatePredicate, validatePredicate, type PredicateScope } from '../engine/predicates';
import type { Predicate } from '../types/predicate';
import type { ContactSnapshot } from '../types/contact';

const scope: PredicateScope = {
  contact: { plan: 'pro', score: 12, tags: ['vip', 'beta'], email: 'ada@example.com', nickname: '  ', last_seen: '2024-03-01T10:00:00Z' },
  event: { type: 'purchase', payload: { total: 120, items: [{ sku: 'A-1' }] } },
  change: { key: 'plan', oldValue: 'free', newValue: 'pro' },
  vars: { attempts: 2 },
};

const check = (predicate: Predicate) => evaluatePredicate(predicate, scope);

describe('evaluatePredicate', () => {
  it('compares for equality, including structured values', () => {
    expect(check({ path: 'contact.plan', op: 'eq', value: 'pro' })).toBe(true);
    expect(check({ path: 'contact.tags', op: 'eq', value: ['vip', 'beta'] })).toBe(true);
    expect(check({ path: 'contact.plan', op: 'neq', value: 'free' })).toBe(true);
  });

  it('orders numbers and ISO timestamps', () => {
    expect(check({ path: 'event.payload.total', op: 'gt', value: 100 })).toBe(true);
    expect(check({ path: 'contact.score', op: 'lte', value: 12 })).toBe(true);
    expect(check({ path: 'contact.last_seen', op: 'lt', value: '2024-04-01T00:00:00Z' })).toBe(true);
  });

  it('never orders mismatched types', () => {
    expect(check({ path: 'contact.plan', op: 'gt', value: 1 })).toBe(false);
    expect(check({ path: 'contact.missing', op: 'lt', value: 1 })).toBe(false);
  });

  it('checks membership', () => {
    expect(check({ path: 'contact.plan', op: 'in', value: ['pro', 'enterprise'] })).toBe(true);
    expect(check({ path: 'contact.plan', op: 'nin', value: ['free'] })).toBe(true);
    expect(check({ path: 'contact.tags', op: 'contains', value: 'vip' })).toBe(true);
    expect(check({ path: 'contact.email', op: 'contains', value: '@example' })).toBe(true);
  });

  it('matches string affixes and patterns', () => {
    expect(check({ path: 'contact.email', op: 'startsWith', value: 'ada' })).toBe(true);
    expect(check({ path: 'contact.email', op: 'endsWith', value: '.com' })).toBe(true);
    expect(check({ path: 'contact.email', op: 'matches', value: '^[a-z]+@' })).toBe(true);
    expect(check({ path: 'contact.email', op: 'matches', value: '(' })).toBe(false);
  });

  it('distinguishes missing from blank', () => {
    expect(check({ path: 'contact.missing', op: 'notExists' })).toBe(true);
    expect(check({ path: 'contact.nickname', op: 'exists' })).toBe(true);
    expect(check({ path: 'contact.nickname', op: 'blank' })).toBe(true);
    expect(check({ path: 'contact.plan', op: 'present' })).toBe(true);
  });

  it('reads nested paths through arrays', () => {
    expect(check({ path: 'event.payload.items.0.sku', op: 'eq', value: 'A-1' })).toBe(true);
    expect(check({ path: 'vars.attempts', op: 'gte', value: 2 })).toBe(true);
  });

  it('detects a change to the named property', () => {
    expect(check({ path: 'contact.plan', op: 'changed' })).toBe(true);
    expect(check({ path: 'contact.score', op: 'changed' })).toBe(false);
    expect(evaluatePredicate({ path: 'contact.plan', op: 'changed' }, { contact: {} })).toBe(false);
  });

  it('combines predicates', () => {
    const pro = { path: 'contact.plan', op: 'eq', value: 'pro' } as const;
    const free = { path: 'contact.plan', op: 'eq', value: 'free' } as const;

    expect(check({ all: [pro, { path: 'contact.score', op: 'gt', value: 10 }] })).toBe(true);
    expect(check({ any: [free, pro] })).toBe(true);
    expect(check({ not: free })).toBe(true);
    expect(check({ all: [] })).toBe(true);
    expect(check({ any: [] })).toBe(false);
  });
});

describe('conditionMatches', () => {
  const contact: ContactSnapshot = { contactId: 'c1', properties: { plan: 'pro' }, readAt: 0 };
  const event = { id: 'e1', contactId: 'c1', type: 'clicked', payload: { link: 'pricing' }, timestamp: 0 };
  const change = { id: 'p1', contactId: 'c1', key: 'converted', oldValue: false, newValue: true, timestamp: 0 };

  it('matches events by type and payload', () => {
    const condition = { on: 'event', eventType: 'clicked', where: { path: 'event.payload.link', op: 'eq', value: 'pricing' } } as const;

    expect(conditionMatches(condition, { kind: 'event', event }, contact)).toBe(true);
    expect(conditionMatches({ on: 'event', eventType: 'opened' }, { kind: 'event', event }, contact)).toBe(false);
  });

  it('matches property changes by key', () => {
    const stimulus = { kind: 'property_change', change } as const;

    expect(conditionMatches({ on: 'property', key: 'converted' }, stimulus, contact)).toBe(true);
    expect(conditionMatches({ on: 'property' }, stimulus, contact)).toBe(true);
    expect(conditionMatches({ on: 'property', key: 'plan' }, stimulus, contact)).toBe(false);
  });

  it('never matches the other kind of stimulus', () => {
    expect(conditionMatches({ on: 'property' }, { kind: 'event', event }, contact)).toBe(false);
    expect(conditionMatches({ on: 'event', eventType: 'clicked' }, { kind: 'property_change', change }, contact)).toBe(false);
  });

  it('exposes instance variables', () => {
    const condition = { on: 'event', eventType: 'clicked', where: { path: 'vars.round', op: 'eq', value: 2 } } as const;
    expect(conditionMatches(condition, { kind: 'event', event }, contact, { round: 2 })).toBe(true);
  });
});

describe('validatePredicate', () => {
  it('accepts well-formed predicates', () => {
    expect(validatePredicate({ any: [{ path: 'contact.plan', op: 'in', value: ['pro'] }] }, 'when')).toEqual([]);
  });

  it('reports unknown operators and bad values', () => {
    expect(validatePredicate({ path: 'contact.plan', op: 'like', value: 'p%' }, 'when')).toEqual([
      { path: 'when.op', message: 'Unknown operator "like"', severity: 'error' },
    ]);
    expect(validatePredicate({ path: 'contact.email', op: 'matches', value: '(' }, 'when')).toEqual([
      { path: 'when.value', message: 'Invalid regular expression', severity: 'error' },
    ]);
    expect(validatePredicate({ path: 'event.type', op: 'changed' }, 'when')).toEqual([
      { path: 'when.path', message: '"changed" applies to contact.<key> paths', severity: 'error' },
    ]);
  });

  it('walks combinators', () => {
    expect(validatePredicate({ not: { all: [{ op: 'eq' }] } }, 'goal')).toEqual([
      { path: 'goal.not.all.0.path', message: 'Required', severity: 'error' },
    ]);
    expect(validatePredicate('plan = pro', 'when')).toEqual([
      { path: 'when', message: 'Predicate must be an object', severity: 'error' },
    ]);
  });
});
