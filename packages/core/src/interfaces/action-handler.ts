import type { SchemaObject } from 'ajv';
import type { ActionStep } from '../types/flow';
import type { ActionResult } from '../types/result';
import type { FlowInstance } from '../types/instance';
import type { ContactEvent, ContactSnapshot, PropertyChange } from '../types/contact';
import type { ContinuationTarget } from '../types/completion';

/**
 * JSON Schema as accepted by ajv.
 */
export type JSONSchema = SchemaObject;

export interface HandlerMetadata {
  type: string;
  name: string;
  description?: string;
  category?: 'contact' | 'messaging' | 'external' | 'utility';
  /** Resolved params are checked against this before execute() */
  paramsSchema: JSONSchema;
  outputSchema?: JSONSchema;
  retryable?: boolean;
}

/**
 * Writes available to an action. Every write carries the instance's cause
 * so the resulting fan-out joins the same completion chain.
 */
export interface ActionContext {
  readonly contactId: string;
  /** Cause writes are attributed to; absent for continuations at the root of a chain */
  readonly causeId?: string;
  /** Clock time the action started at */
  readonly now: number;

  getProperty(key: string): Promise<unknown>;

  /** Throws PropertyValidationError when the schema rejects the value */
  setProperty(key: string, value: unknown): Promise<PropertyChange | null>;

  /**
   * Append an event. With a continuation, the continuation runs once every
   * instance the event spawns (transitively) has finished.
   */
  appendEvent(
    type: string,
    payload?: Record<string, unknown>,
    options?: { continuation?: ContinuationTarget }
  ): Promise<ContactEvent>;

  /** Write to the instance's variables (dot notation ok) */
  setVariable(path: string, value: unknown): void;
}

export interface ActionParams {
  /** Step params after ${...} interpolation */
  params: Record<string, unknown>;
  /** Step being executed (absent for continuations) */
  step?: ActionStep;
  /** Instance being advanced (absent for continuations) */
  instance?: Readonly<FlowInstance>;
  contact: ContactSnapshot;
  ctx: ActionContext;
  signal?: AbortSignal;
}

/**
 * Executor for side-effecting steps.
 */
export interface ActionHandler {
  readonly type: string;
  readonly metadata: HandlerMetadata;
  execute(params: ActionParams): Promise<ActionResult>;
}
