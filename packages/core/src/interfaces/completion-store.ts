import type { CompletionGroup } from '../types/completion';

/**
 * Persistence for completion groups.
 */
export interface CompletionStore {
  load(causeId: string): Promise<CompletionGroup | null>;
  save(group: CompletionGroup): Promise<void>;
  listUnresolved(): Promise<CompletionGroup[]>;
}
