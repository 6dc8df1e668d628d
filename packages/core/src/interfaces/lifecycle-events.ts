import type { StepPointer, InstanceStatus } from '../types/instance';
import type { BusMessageKind } from '../types/messages';

/**
 * Optional lifecycle hooks.
 * Every transition the engine makes is reported here. All methods are
 * optional; implement only what you need.
 *
 * Categories:
 * - Instance lifecycle: create, start, wait, resume, complete, goal, fail
 * - Steps: complete, retry
 * - Triggers: dropped duplicates
 * - Flow registry: define, undefine
 * - Completion groups: resolve
 * - Scheduler: halt
 * - Properties: rejected writes
 * - Bus: message delivered
 */
export interface LifecycleEvents {
  // ── Instance Lifecycle ────────────────────────────────────────────
  onInstanceCreated?(e: { instanceId: string; flowId: string; contactId: string; causeId: string }): void;
  onInstanceStarted?(e: { instanceId: string; flowId: string; contactId: string }): void;
  onInstanceWaiting?(e: {
    instanceId: string;
    contactId: string;
    status: Extract<InstanceStatus, 'waiting_delay' | 'waiting_event'>;
    wakeAt?: number;
  }): void;
  onInstanceResumed?(e: { instanceId: string; contactId: string; reason: 'wake' | 'event' | 'retry' }): void;
  onInstanceCompleted?(e: { instanceId: string; flowId: string; contactId: string; totalSteps: number }): void;

  /**
   * Emitted when a goal condition short-circuits an instance.
   * `cancelledWakeAt` is the wake that will never fire.
   */
  onGoalReached?(e: { instanceId: string; flowId: string; contactId: string; cancelledWakeAt?: number }): void;

  onInstanceFailed?(e: {
    instanceId: string;
    flowId: string;
    contactId: string;
    error: { code: string; message: string };
  }): void;

  // ── Steps ─────────────────────────────────────────────────────────
  onStepCompleted?(e: {
    instanceId: string;
    pointer: StepPointer;
    kind: 'action' | 'decision' | 'delay';
    outcome: string;
    durationMs: number;
  }): void;

  /**
   * Emitted when an action is scheduled for another attempt.
   */
  onActionRetry?(e: {
    instanceId: string;
    handler: string;
    attempt: number;
    maxAttempts: number;
    backoffMs: number;
    error: { code: string; message: string };
  }): void;

  // ── Triggers ──────────────────────────────────────────────────────
  onTriggerDropped?(e: { flowId: string; contactId: string; causeId: string; existingInstanceId: string }): void;

  // ── Flow Registry ─────────────────────────────────────────────────
  onFlowDefined?(e: { flowId: string; version: string }): void;
  onFlowUndefined?(e: { flowId: string }): void;

  // ── Completion ────────────────────────────────────────────────────
  onCompletionResolved?(e: { causeId: string; contactId: string; spawned: number }): void;

  // ── Scheduler ─────────────────────────────────────────────────────
  onSchedulerHalted?(e: { instanceId: string; reason: string }): void;

  // ── Properties ────────────────────────────────────────────────────
  onPropertyRejected?(e: { contactId: string; key: string; reason: string }): void;

  // ── Bus ───────────────────────────────────────────────────────────
  onBusMessage?(e: { kind: BusMessageKind; contactId: string }): void;
}
