/**
 * Deferred work that runs once a completion group resolves.
 * Stored as data so it survives restarts.
 */
export type Continuation =
  | {
      readonly kind: 'action';
      readonly contactId: string;
      /** Registered action handler type */
      readonly handler: string;
      readonly params: Record<string, unknown>;
    }
  | {
      readonly kind: 'event';
      readonly contactId: string;
      readonly eventType: string;
      readonly payload: Record<string, unknown>;
    };

/** Continuation as declared by a caller; the contact is filled in by the engine */
export type ContinuationTarget =
  | { readonly kind: 'action'; readonly handler: string; readonly params?: Record<string, unknown> }
  | { readonly kind: 'event'; readonly eventType: string; readonly payload?: Record<string, unknown> };

/**
 * Instances spawned by one cause (event or property change), tracked until
 * all of them and every nested cause they produced have finished.
 */
export interface CompletionGroup {
  /** Event or change id */
  readonly causeId: string;

  /** Cause of the instance that produced this one */
  readonly parentCauseId?: string;

  readonly contactId: string;

  /** Every instance the fan-out spawned */
  spawned: string[];

  /** Spawned instances not yet terminal */
  members: string[];

  /** Child cause ids not yet resolved */
  children: string[];

  /** Reserved but fan-out not yet dispatched */
  pending: boolean;

  continuation?: Continuation;

  /** Set once the continuation has been run */
  continuationRan?: boolean;

  resolved: boolean;

  readonly createdAt: number;

  resolvedAt?: number;
}
