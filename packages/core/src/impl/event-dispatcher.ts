/**
 * Lifecycle event fan-out to any number of listeners.
 *
 * Implements the LifecycleEvents interface so it drops into Engine and
 * anywhere else that accepts LifecycleEvents.
 *
 * Features:
 * - Multiple listeners per event type via `.on(type, listener)`
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch on a microtask by default; sync mode for tests
 * - A throwing listener is logged and skipped
 * - Every dispatched event has `type` and `timestamp` fields
 * - `.on()` returns unsubscribe function for easy cleanup
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * const unsub = dispatcher.on('instance.failed', (e) => {
 *   pager.notify(`${e.instanceId}: ${JSON.stringify(e.error)}`);
 * });
 *
 * // Wildcard: every event
 * dispatcher.on('*', (e) => auditLog.append(e));
 *
 * const engine = new Engine(adapters, { events: dispatcher });
 *
 * unsub();
 * ```
 */

import type { LifecycleEvents } from '../interfaces/lifecycle-events';
import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';
import { SystemClock } from './clock';
import { createLogger } from './console-logger';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the engine. */
export type EventType =
  // Instance lifecycle
  | 'instance.created'
  | 'instance.started'
  | 'instance.waiting'
  | 'instance.resumed'
  | 'instance.completed'
  | 'instance.goal_reached'
  | 'instance.failed'
  // Steps
  | 'step.completed'
  | 'action.retry'
  // Triggers
  | 'trigger.dropped'
  // Flow registry
  | 'flow.defined'
  | 'flow.undefined'
  // Completion
  | 'completion.resolved'
  // Scheduler
  | 'scheduler.halted'
  // Properties
  | 'property.rejected'
  // Bus
  | 'bus.message';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

type Hook<K extends keyof LifecycleEvents> = NonNullable<LifecycleEvents[K]>;

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on the next microtask.
   * - `'sync'`: listeners fire inline, so tests can assert right after
   *   an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Defaults to logging the error.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;

  /** Timestamp source (default: system clock) */
  clock?: Clock;

  logger?: Logger;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements LifecycleEvents {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError: (error: unknown, event: DispatchedEvent) => void;
  private readonly _clock: Clock;

  readonly onInstanceCreated: Hook<'onInstanceCreated'> = e => this._dispatch('instance.created', e);
  readonly onInstanceStarted: Hook<'onInstanceStarted'> = e => this._dispatch('instance.started', e);
  readonly onInstanceWaiting: Hook<'onInstanceWaiting'> = e => this._dispatch('instance.waiting', e);
  readonly onInstanceResumed: Hook<'onInstanceResumed'> = e => this._dispatch('instance.resumed', e);
  readonly onInstanceCompleted: Hook<'onInstanceCompleted'> = e => this._dispatch('instance.completed', e);
  readonly onGoalReached: Hook<'onGoalReached'> = e => this._dispatch('instance.goal_reached', e);
  readonly onInstanceFailed: Hook<'onInstanceFailed'> = e => this._dispatch('instance.failed', e);
  readonly onStepCompleted: Hook<'onStepCompleted'> = e => this._dispatch('step.completed', e);
  readonly onActionRetry: Hook<'onActionRetry'> = e => this._dispatch('action.retry', e);
  readonly onTriggerDropped: Hook<'onTriggerDropped'> = e => this._dispatch('trigger.dropped', e);
  readonly onFlowDefined: Hook<'onFlowDefined'> = e => this._dispatch('flow.defined', e);
  readonly onFlowUndefined: Hook<'onFlowUndefined'> = e => this._dispatch('flow.undefined', e);
  readonly onCompletionResolved: Hook<'onCompletionResolved'> = e => this._dispatch('completion.resolved', e);
  readonly onSchedulerHalted: Hook<'onSchedulerHalted'> = e => this._dispatch('scheduler.halted', e);
  readonly onPropertyRejected: Hook<'onPropertyRejected'> = e => this._dispatch('property.rejected', e);
  readonly onBusMessage: Hook<'onBusMessage'> = e => this._dispatch('bus.message', e);

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._clock = options.clock ?? new SystemClock();
    const logger = options.logger ?? createLogger('EventDispatcher');
    this._onError = options.onError ?? ((error, event) => logger.error(`Listener for "${event.type}" threw`, error));
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type. Use `'*'` to receive all events.
   * Returns an unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    let set = this._listeners.get(type);
    if (!set) {
      set = new Set();
      this._listeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => { listeners.delete(listener); };
  }

  /**
   * Remove a specific listener.
   */
  off(type: EventType | '*', listener: EventListener): void {
    this._listeners.get(type)?.delete(listener);
  }

  /**
   * Remove all listeners for a type, or all listeners if no type specified.
   */
  removeAll(type?: EventType | '*'): void {
    if (type) {
      this._listeners.delete(type);
    } else {
      this._listeners.clear();
    }
  }

  /**
   * Count listeners for a type, or total listeners if no type specified.
   */
  listenerCount(type?: EventType | '*'): number {
    if (type) {
      return this._listeners.get(type)?.size ?? 0;
    }
    let total = 0;
    for (const set of this._listeners.values()) {
      total += set.size;
    }
    return total;
  }

  /**
   * Wait for pending async dispatches. Resolves immediately in sync mode.
   */
  async flush(): Promise<void> {
    await new Promise<void>(resolve => queueMicrotask(resolve));
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    const specific = this._listeners.get(type);
    const wildcard = this._listeners.get('*');

    // Fast exit: no one is listening
    if (!specific?.size && !wildcard?.size) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: this._clock.now() });

    if (this._mode === 'sync') {
      this._callListeners(specific, event);
      this._callListeners(wildcard, event);
    } else {
      queueMicrotask(() => {
        this._callListeners(specific, event);
        this._callListeners(wildcard, event);
      });
    }
  }

  private _callListeners(listeners: Set<EventListener> | undefined, event: DispatchedEvent): void {
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        this._onError(err, event);
      }
    }
  }
}
