import type { CompletionGroup } from '../types/completion';
import type { CompletionStore } from '../interfaces/completion-store';

/**
 * In-memory completion group store.
 */
export class MemoryCompletionStore implements CompletionStore {
  private data = new Map<string, CompletionGroup>();

  async load(causeId: string): Promise<CompletionGroup | null> {
    const g = this.data.get(causeId);
    return g ? structuredClone(g) : null;
  }

  async save(group: CompletionGroup): Promise<void> {
    this.data.set(group.causeId, structuredClone(group));
  }

  async listUnresolved(): Promise<CompletionGroup[]> {
    return [...this.data.values()].filter(g => !g.resolved).map(g => structuredClone(g));
  }

  // Test helpers
  clear() { this.data.clear(); }
  count() { return this.data.size; }
}
