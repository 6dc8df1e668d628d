/**
 * Predicate evaluation.
 *
 * Predicates are pure functions of a read-only scope:
 *
 * ```typescript
 * {
 *   contact: { plan: 'pro', newsletters_sent: 10 },
 *   event:   { type: 'purchase', payload: { total: 120 } },
 *   change:  { key: 'plan', oldValue: 'free', newValue: 'pro' },
 *   vars:    { score: 3 },
 * }
 * ```
 */

import type { Condition, ComparisonPredicate, Predicate, PredicateOp } from '../types/predicate';
import type { ContactEvent, ContactSnapshot, PropertyChange } from '../types/contact';
import type { ValidationIssue } from '../types/errors';
import { getPath, isRecord } from '../utils';

// ── Scope ───────────────────────────────────────────────────────

export interface PredicateScope {
  readonly contact: Readonly<Record<string, unknown>>;
  readonly event?: {
    readonly id?: string;
    readonly type: string;
    readonly payload: Readonly<Record<string, unknown>>;
    readonly timestamp?: number;
  };
  readonly change?: {
    readonly key: string;
    readonly oldValue: unknown;
    readonly newValue: unknown;
  };
  readonly vars?: Readonly<Record<string, unknown>>;
}

/** Something that happened to a contact */
export type Stimulus =
  | { readonly kind: 'event'; readonly event: ContactEvent }
  | { readonly kind: 'property_change'; readonly change: PropertyChange };

export function scopeFor(
  stimulus: Stimulus,
  contact: ContactSnapshot,
  vars?: Record<string, unknown>
): PredicateScope {
  if (stimulus.kind === 'event') {
    return { contact: contact.properties, event: stimulus.event, vars };
  }
  const { key, oldValue, newValue } = stimulus.change;
  return { contact: contact.properties, change: { key, oldValue, newValue }, vars };
}

// ── Operators ───────────────────────────────────────────────────

export const PREDICATE_OPS: readonly PredicateOp[] = [
  'eq', 'neq',
  'gt', 'gte', 'lt', 'lte',
  'in', 'nin',
  'contains', 'startsWith', 'endsWith',
  'exists', 'notExists',
  'blank', 'present',
  'matches',
  'changed',
];

function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;
  return JSON.stringify(a) === JSON.stringify(b);
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function compare(actual: unknown, expected: unknown): number | undefined {
  if (typeof actual === 'number' && typeof expected === 'number') return actual - expected;
  // ISO timestamps compare correctly as strings
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
}

function evaluateComparison(p: ComparisonPredicate, scope: PredicateScope): boolean {
  const actual = getPath(scope, p.path);
  const expected = p.value;

  switch (p.op) {
    case 'eq': return isEqual(actual, expected);
    case 'neq': return !isEqual(actual, expected);
    case 'gt': { const c = compare(actual, expected); return c !== undefined && c > 0; }
    case 'gte': { const c = compare(actual, expected); return c !== undefined && c >= 0; }
    case 'lt': { const c = compare(actual, expected); return c !== undefined && c < 0; }
    case 'lte': { const c = compare(actual, expected); return c !== undefined && c <= 0; }
    case 'in': return Array.isArray(expected) && expected.some(v => isEqual(v, actual));
    case 'nin': return Array.isArray(expected) && !expected.some(v => isEqual(v, actual));
    case 'contains':
      if (Array.isArray(actual)) return actual.some(v => isEqual(v, expected));
      return typeof actual === 'string' && typeof expected === 'string' && actual.includes(expected);
    case 'startsWith':
      return typeof actual === 'string' && typeof expected === 'string' && actual.startsWith(expected);
    case 'endsWith':
      return typeof actual === 'string' && typeof expected === 'string' && actual.endsWith(expected);
    case 'exists': return actual !== undefined && actual !== null;
    case 'notExists': return actual === undefined || actual === null;
    case 'blank': return isBlank(actual);
    case 'present': return !isBlank(actual);
    case 'matches':
      if (typeof actual !== 'string' || typeof expected !== 'string') return false;
      try {
        return new RegExp(expected).test(actual);
      } catch {
        return false;
      }
    case 'changed': {
      // `contact.<key>` changed in this stimulus
      const change = scope.change;
      return change !== undefined
        && p.path === `contact.${change.key}`
        && !isEqual(change.oldValue, change.newValue);
    }
  }
}

// ── Evaluation ──────────────────────────────────────────────────

export function evaluatePredicate(predicate: Predicate, scope: PredicateScope): boolean {
  if ('all' in predicate) return predicate.all.every(p => evaluatePredicate(p, scope));
  if ('any' in predicate) return predicate.any.some(p => evaluatePredicate(p, scope));
  if ('not' in predicate) return !evaluatePredicate(predicate.not, scope);
  return evaluateComparison(predicate, scope);
}

/**
 * Goal and event-wait check. A condition only matches the kind of
 * stimulus it names.
 */
export function conditionMatches(
  condition: Condition,
  stimulus: Stimulus,
  contact: ContactSnapshot,
  vars?: Record<string, unknown>
): boolean {
  if (condition.on === 'event') {
    if (stimulus.kind !== 'event' || stimulus.event.type !== condition.eventType) return false;
  } else {
    if (stimulus.kind !== 'property_change') return false;
    if (condition.key !== undefined && stimulus.change.key !== condition.key) return false;
  }
  return condition.where ? evaluatePredicate(condition.where, scopeFor(stimulus, contact, vars)) : true;
}

// ── Validation ──────────────────────────────────────────────────

export function validatePredicate(predicate: unknown, path: string): ValidationIssue[] {
  if (!isRecord(predicate)) {
    return [{ path, message: 'Predicate must be an object', severity: 'error' }];
  }

  const issues: ValidationIssue[] = [];
  if ('all' in predicate || 'any' in predicate) {
    const key = 'all' in predicate ? 'all' : 'any';
    const list = predicate[key];
    if (!Array.isArray(list)) {
      return [{ path: `${path}.${key}`, message: 'Must be an array', severity: 'error' }];
    }
    list.forEach((p, i) => issues.push(...validatePredicate(p, `${path}.${key}.${i}`)));
    return issues;
  }
  if ('not' in predicate) {
    return validatePredicate(predicate.not, `${path}.not`);
  }

  const { path: target, op, value } = predicate;
  if (typeof target !== 'string' || target === '') {
    issues.push({ path: `${path}.path`, message: 'Required', severity: 'error' });
  }
  if (!PREDICATE_OPS.some(known => known === op)) {
    issues.push({ path: `${path}.op`, message: `Unknown operator "${String(op)}"`, severity: 'error' });
  }
  if ((op === 'in' || op === 'nin') && !Array.isArray(value)) {
    issues.push({ path: `${path}.value`, message: `"${op}" needs an array`, severity: 'error' });
  }
  if (op === 'matches') {
    try {
      new RegExp(String(value));
    } catch {
      issues.push({ path: `${path}.value`, message: 'Invalid regular expression', severity: 'error' });
    }
  }
  if (op === 'changed' && typeof target === 'string' && !target.startsWith('contact.')) {
    issues.push({ path: `${path}.path`, message: '"changed" applies to contact.<key> paths', severity: 'error' });
  }
  return issues;
}
