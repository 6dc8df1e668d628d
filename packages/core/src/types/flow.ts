import type { Condition, Predicate } from './predicate';

/**
 * Retry policy for an action step.
 * Backoff for attempt n (1-based) is `backoffMs * backoffMultiplier^(n-1)`,
 * capped at `maxBackoffMs`.
 */
export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  readonly maxAttempts?: number;
  /** Base backoff in ms (default: 1000) */
  readonly backoffMs?: number;
  /** Multiplier per attempt (default: 2) */
  readonly backoffMultiplier?: number;
  /** Upper bound on a single backoff (default: 1h) */
  readonly maxBackoffMs?: number;
}

// ── Triggers ────────────────────────────────────────────────────

/** Fires once, when the flow is defined, for every contact in the segment */
export interface NowTrigger {
  readonly type: 'now';
  readonly segmentId: string;
}

/** Fires once, when the scheduler clock crosses `at` */
export interface AtTrigger {
  readonly type: 'at';
  /** Epoch ms */
  readonly at: number;
  readonly segmentId: string;
}

/** Fires for every matching event */
export interface EventTrigger {
  readonly type: 'event';
  readonly eventType: string;
  readonly where?: Predicate;
}

/** Fires for every matching change to `key` */
export interface PropertyTrigger {
  readonly type: 'property';
  readonly key: string;
  readonly where?: Predicate;
}

export type TriggerSpec = NowTrigger | AtTrigger | EventTrigger | PropertyTrigger;

// ── Steps ───────────────────────────────────────────────────────

interface StepBase {
  /** Optional stable id for display and history */
  readonly id?: string;
  readonly name?: string;
}

/** Side-effecting step run by an ActionHandler */
export interface ActionStep extends StepBase {
  readonly type: 'action';
  /** Registered handler type, e.g. "set_property" */
  readonly handler: string;
  /** Handler params; strings support ${contact.x}, ${vars.x}, ${event.x} */
  readonly params?: Record<string, unknown>;
  /** Store the handler output at vars[outputKey] (dot notation ok) */
  readonly outputKey?: string;
  readonly retry?: RetryPolicy;
}

export interface DecisionBranch {
  readonly when: Predicate;
  readonly steps: readonly Step[];
}

/** Branching step; first matching branch wins */
export interface DecisionStep extends StepBase {
  readonly type: 'decision';
  readonly branches: readonly DecisionBranch[];
  readonly otherwise?: readonly Step[];
}

export type DelaySpec =
  | { readonly kind: 'relative'; readonly ms: number }
  | { readonly kind: 'local'; readonly at: string }
  | { readonly kind: 'event'; readonly until: Condition };

/** Suspending step */
export interface DelayStep extends StepBase {
  readonly type: 'delay';
  readonly delay: DelaySpec;
}

export type Step = ActionStep | DecisionStep | DelayStep;

// ── Flow ────────────────────────────────────────────────────────

/**
 * A flow definition. Immutable once registered.
 */
export interface FlowDefinition {
  /** Unique identifier (kebab-case) */
  readonly id: string;

  /** Semantic version */
  readonly version: string;

  /** Human-readable name */
  readonly name?: string;

  /** What spawns instances */
  readonly trigger: TriggerSpec;

  /** Short-circuits running instances to goal_reached */
  readonly goal?: Condition;

  /** Ordered top-level steps */
  readonly steps: readonly Step[];

  /** Interpret wall-clock delays in the contact's timezone */
  readonly localTime?: boolean;

  readonly description?: string;

  readonly tags?: readonly string[];
}
