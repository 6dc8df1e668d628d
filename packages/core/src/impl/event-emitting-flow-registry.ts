/**
 * Wraps a FlowRegistry and emits onFlowDefined / onFlowUndefined on
 * mutations.
 */

import type { FlowDefinition } from '../types/flow';
import type { ValidationIssue } from '../types/errors';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { LifecycleEvents } from '../interfaces/lifecycle-events';

export class EventEmittingFlowRegistry implements FlowRegistry {
  constructor(
    private readonly inner: FlowRegistry,
    private readonly events: LifecycleEvents
  ) {}

  register(flow: FlowDefinition): void {
    this.inner.register(flow);
    this.events.onFlowDefined?.({ flowId: flow.id, version: flow.version });
  }

  unregister(id: string): boolean {
    const removed = this.inner.unregister(id);
    if (removed) this.events.onFlowUndefined?.({ flowId: id });
    return removed;
  }

  get(id: string, version?: string): FlowDefinition | undefined {
    return this.inner.get(id, version);
  }

  has(id: string): boolean {
    return this.inner.has(id);
  }

  flowIds(): string[] {
    return this.inner.flowIds();
  }

  list(): FlowDefinition[] {
    return this.inner.list();
  }

  versions(id: string): string[] {
    return this.inner.versions(id);
  }

  validate(flow: FlowDefinition): ValidationIssue[] {
    return this.inner.validate(flow);
  }
}
