import type { FlowDefinition } from '../types/flow';
import type { FlowStore, StoredFlow } from '../interfaces/flow-registry';

/**
 * In-memory flow store. Lets tests exercise Engine.recover().
 */
export class MemoryFlowStore implements FlowStore {
  private data = new Map<string, StoredFlow>();

  async save(flow: FlowDefinition): Promise<void> {
    this.data.set(`${flow.id}@${flow.version}`, { flow: structuredClone(flow), active: true });
    // Redefining reactivates older versions too
    for (const [key, stored] of this.data) {
      if (stored.flow.id === flow.id && !stored.active) this.data.set(key, { ...stored, active: true });
    }
  }

  async deactivate(id: string): Promise<boolean> {
    let found = false;
    for (const [key, stored] of this.data) {
      if (stored.flow.id === id && stored.active) {
        this.data.set(key, { ...stored, active: false });
        found = true;
      }
    }
    return found;
  }

  async list(): Promise<StoredFlow[]> {
    return [...this.data.values()].map(s => structuredClone(s));
  }

  clear() { this.data.clear(); }
  count() { return this.data.size; }
}
