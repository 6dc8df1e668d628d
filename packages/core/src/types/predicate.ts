/**
 * Declarative predicates.
 *
 * Predicates are plain data so flow definitions can be stored, diffed and
 * replayed. They are evaluated against a PredicateScope by
 * `evaluatePredicate` in engine/predicates.ts.
 */

export type PredicateOp =
  | 'eq' | 'neq'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'in' | 'nin'
  | 'contains' | 'startsWith' | 'endsWith'
  | 'exists' | 'notExists'
  | 'blank' | 'present'
  | 'matches'
  | 'changed';

export interface ComparisonPredicate {
  /** Dot path into the scope: contact.*, event.*, change.*, vars.* */
  readonly path: string;
  readonly op: PredicateOp;
  /** Ignored by exists/notExists/blank/present/changed */
  readonly value?: unknown;
}

export type Predicate =
  | ComparisonPredicate
  | { readonly all: readonly Predicate[] }
  | { readonly any: readonly Predicate[] }
  | { readonly not: Predicate };

/** Condition over an incoming event */
export interface EventCondition {
  readonly on: 'event';
  readonly eventType: string;
  readonly where?: Predicate;
}

/** Condition over a committed property change */
export interface PropertyCondition {
  readonly on: 'property';
  /** Only changes to this key (any key if omitted) */
  readonly key?: string;
  readonly where?: Predicate;
}

/** Used by goals and event-awaited delays */
export type Condition = EventCondition | PropertyCondition;
