import type { FlowInstance, InstanceStatus } from '../types/instance';
import { isTerminal } from '../types/instance';
import type { InstanceStore } from '../interfaces/instance-store';
import { DuplicateInstanceError } from '../types/errors';

/**
 * In-memory instance store. For testing and single-instance use.
 */
export class MemoryInstanceStore implements InstanceStore {
  private data = new Map<string, FlowInstance>();

  async load(id: string): Promise<FlowInstance | null> {
    const i = this.data.get(id);
    return i ? structuredClone(i) : null;
  }

  async insert(instance: FlowInstance): Promise<void> {
    const existing = this.activeFor(instance.contactId, instance.flowId);
    if (existing) {
      throw new DuplicateInstanceError(instance.flowId, instance.contactId, existing.id);
    }
    this.data.set(instance.id, structuredClone(instance));
  }

  async save(instance: FlowInstance): Promise<void> {
    this.data.set(instance.id, structuredClone(instance));
  }

  async findActive(contactId: string, flowId: string): Promise<FlowInstance | null> {
    const i = this.activeFor(contactId, flowId);
    return i ? structuredClone(i) : null;
  }

  async listActiveByContact(contactId: string): Promise<FlowInstance[]> {
    const results: FlowInstance[] = [];
    for (const i of this.data.values()) {
      if (i.contactId === contactId && !isTerminal(i.status)) {
        results.push(structuredClone(i));
      }
    }
    return results.sort((a, b) => a.createdAt - b.createdAt);
  }

  async listWakeReady(now: number, limit = 100): Promise<FlowInstance[]> {
    const results: FlowInstance[] = [];
    for (const i of this.data.values()) {
      if (!isTerminal(i.status) && i.wakeAt !== undefined && i.wakeAt <= now) {
        results.push(structuredClone(i));
        if (results.length >= limit) break;
      }
    }
    return results;
  }

  async listScheduled(): Promise<FlowInstance[]> {
    const results: FlowInstance[] = [];
    for (const i of this.data.values()) {
      if (!isTerminal(i.status) && (i.wakeAt !== undefined || i.status === 'waiting_delay')) {
        results.push(structuredClone(i));
      }
    }
    return results;
  }

  async listByStatus(status: InstanceStatus, limit = 100, offset = 0): Promise<FlowInstance[]> {
    const results: FlowInstance[] = [];
    let skipped = 0;
    for (const i of this.data.values()) {
      if (i.status === status) {
        if (skipped < offset) {
          skipped++;
          continue;
        }
        results.push(structuredClone(i));
        if (results.length >= limit) break;
      }
    }
    return results;
  }

  private activeFor(contactId: string, flowId: string): FlowInstance | undefined {
    for (const i of this.data.values()) {
      if (i.contactId === contactId && i.flowId === flowId && !isTerminal(i.status)) return i;
    }
    return undefined;
  }

  // Test helpers
  /** Every instance, oldest first */
  all(): FlowInstance[] {
    return [...this.data.values()].map(i => structuredClone(i)).sort((a, b) => a.createdAt - b.createdAt);
  }
  /** Remove an instance without touching the scheduler */
  delete(id: string): boolean { return this.data.delete(id); }
  clear() { this.data.clear(); }
  count() { return this.data.size; }
}
