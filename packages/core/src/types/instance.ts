import type { Condition } from './predicate';

/**
 * Path into a flow's step tree.
 *
 * `[i0]` addresses top-level step i0. Entering branch b of a decision at
 * position i appends `b, 0`: `[i0, b, 0]`. The `otherwise` branch uses
 * `OTHERWISE_BRANCH`.
 */
export type StepPointer = readonly number[];

/** Branch index used for a decision's `otherwise` steps */
export const OTHERWISE_BRANCH = -1;

export type InstanceStatus =
  | 'running'        // Executing or retrying an action
  | 'waiting_delay'  // Suspended until wakeAt
  | 'waiting_event'  // Suspended until waitingFor matches
  | 'completed'      // Terminal: ran off the end of the steps
  | 'goal_reached'   // Terminal: goal satisfied
  | 'failed';        // Terminal: fatal action failure or retries exhausted

/** Terminal statuses (instance cannot continue) */
export const TERMINAL_STATUSES = ['completed', 'goal_reached', 'failed'] as const;

/** Statuses that hold the (contact, flow) slot */
export const ACTIVE_STATUSES = ['running', 'waiting_delay', 'waiting_event'] as const;

export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];

export function isTerminal(status: InstanceStatus): status is TerminalStatus {
  return status === 'completed' || status === 'goal_reached' || status === 'failed';
}

export interface InstanceFailure {
  readonly code: string;
  readonly message: string;
  readonly pointer: StepPointer;
  readonly details?: unknown;
  readonly timestamp: number;
}

/** Retry bookkeeping while an action is backing off */
export interface RetryState {
  /** Attempts made so far */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly nextAttemptAt: number;
  readonly lastError: { readonly code: string; readonly message: string };
}

export interface StepHistory {
  readonly pointer: StepPointer;
  readonly kind: 'action' | 'decision' | 'delay';
  readonly label?: string;
  readonly outcome: 'success' | 'branch' | 'wait' | 'retry' | 'failure';
  readonly startedAt: number;
  readonly completedAt: number;
  readonly detail?: unknown;
}

/**
 * What spawned an instance. Kept on the instance so `${event.*}` and
 * `${change.*}` still resolve after a delay.
 */
export type CauseRecord =
  | { readonly kind: 'event'; readonly type: string; readonly payload: Readonly<Record<string, unknown>> }
  | { readonly kind: 'property_change'; readonly key: string; readonly oldValue: unknown; readonly newValue: unknown }
  | { readonly kind: 'schedule'; readonly trigger: 'now' | 'at' };

/**
 * One execution of a flow for one contact, spawned by one cause.
 */
export interface FlowInstance {
  /** Unique ID (UUID) */
  readonly id: string;

  readonly flowId: string;

  /** Flow version at creation time */
  readonly flowVersion: string;

  readonly contactId: string;

  /** Event or change id that spawned this instance */
  readonly causeId: string;

  readonly cause: CauseRecord;

  /** Next step to run */
  pointer: StepPointer;

  status: InstanceStatus;

  /** When to resume (waiting_delay, or running with a pending retry) */
  wakeAt?: number;

  /** What a waiting_event instance waits for */
  waitingFor?: Condition;

  /** When the current delay was entered */
  delayEnteredAt?: number;

  failure?: InstanceFailure;

  retry?: RetryState;

  /** Values written by steps (outputKey, set_variable) */
  variables: Record<string, unknown>;

  /** Steps executed so far */
  stepCount: number;

  history?: StepHistory[];

  /** When the contact entered the flow */
  readonly enteredAt: number;

  readonly createdAt: number;

  updatedAt: number;

  /** When a terminal status was reached */
  endedAt?: number;
}
