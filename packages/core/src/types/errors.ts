/**
 * Base error for all Tidewater errors.
 */
export class TidewaterError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'TidewaterError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

/**
 * Flow definition is invalid.
 */
export class FlowValidationError extends TidewaterError {
  constructor(
    public readonly flowId: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('FLOW_INVALID', `Flow "${flowId}" is invalid: ${issues[0]?.message}`);
    this.name = 'FlowValidationError';
  }
}

/**
 * Flow is not registered.
 */
export class FlowNotFoundError extends TidewaterError {
  constructor(public readonly flowId: string) {
    super('FLOW_NOT_FOUND', `Flow "${flowId}" not found`);
    this.name = 'FlowNotFoundError';
  }
}

/**
 * Instance was not found.
 */
export class InstanceNotFoundError extends TidewaterError {
  constructor(public readonly instanceId: string) {
    super('INSTANCE_NOT_FOUND', `Instance "${instanceId}" not found`);
    this.name = 'InstanceNotFoundError';
  }
}

/**
 * Property write rejected by the schema. No state changed.
 */
export class PropertyValidationError extends TidewaterError {
  constructor(
    public readonly contactId: string,
    public readonly key: string,
    public readonly reason: string
  ) {
    super('VALIDATION_ERROR', `Property "${key}" rejected for contact "${contactId}": ${reason}`);
    this.name = 'PropertyValidationError';
  }
}

/**
 * Trigger matched a (contact, flow) pair that already has a live instance.
 * Logged and dropped, never surfaced as a failure.
 */
export class DuplicateInstanceError extends TidewaterError {
  constructor(
    public readonly flowId: string,
    public readonly contactId: string,
    public readonly existingInstanceId: string
  ) {
    super(
      'DUPLICATE_INSTANCE',
      `Contact "${contactId}" already has instance "${existingInstanceId}" of flow "${flowId}"`
    );
    this.name = 'DuplicateInstanceError';
  }
}

/**
 * Transient action failure. Handlers may throw it instead of returning
 * Result.retryable().
 */
export class RetryableActionError extends TidewaterError {
  constructor(message: string, code = 'ACTION_RETRYABLE', public readonly details?: unknown) {
    super(code, message);
    this.name = 'RetryableActionError';
  }
}

/**
 * Non-retryable action failure. The instance becomes failed.
 */
export class FatalActionError extends TidewaterError {
  constructor(message: string, code = 'ACTION_FATAL', public readonly details?: unknown) {
    super(code, message);
    this.name = 'FatalActionError';
  }
}

/**
 * Wake queue and persisted instances disagree. Fatal to the scheduler.
 */
export class SchedulerDurabilityError extends TidewaterError {
  constructor(
    public readonly instanceId: string,
    reason: string
  ) {
    super('SCHEDULER_DURABILITY', `Wake for instance "${instanceId}" is unrecoverable: ${reason}`);
    this.name = 'SchedulerDurabilityError';
  }
}

/**
 * The scheduler halted after a durability failure and refuses further work.
 */
export class SchedulerHaltedError extends TidewaterError {
  constructor(public override readonly cause?: SchedulerDurabilityError) {
    super('SCHEDULER_HALTED', `Delay scheduler is halted${cause ? `: ${cause.message}` : ''}`);
    this.name = 'SchedulerHaltedError';
  }
}
