import type { EventLog, ContactEventListener } from '../interfaces/event-log';
import type { Clock } from '../interfaces/clock';
import type { ContactEvent, WriteOptions } from '../types/contact';
import { SystemClock } from './clock';
import { generateId } from '../utils';

/**
 * In-memory event log. For testing and single-instance use.
 */
export class MemoryEventLog implements EventLog {
  private events = new Map<string, ContactEvent[]>();
  private listeners = new Set<ContactEventListener>();

  constructor(private readonly clock: Clock = new SystemClock()) {}

  async append(
    contactId: string,
    type: string,
    payload: Record<string, unknown> = {},
    options?: WriteOptions
  ): Promise<ContactEvent> {
    const event: ContactEvent = {
      id: generateId(),
      contactId,
      type,
      payload: structuredClone(payload),
      timestamp: this.clock.now(),
      parentCauseId: options?.parentCauseId,
    };

    const list = this.events.get(contactId) ?? [];
    list.push(event);
    this.events.set(contactId, list);

    for (const listener of this.listeners) listener(event);
    return event;
  }

  async list(contactId: string, options?: { type?: string; limit?: number }): Promise<ContactEvent[]> {
    let list = this.events.get(contactId) ?? [];
    if (options?.type) list = list.filter(e => e.type === options.type);
    if (options?.limit !== undefined) list = list.slice(-options.limit);
    return structuredClone(list);
  }

  subscribe(listener: ContactEventListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  // Test helpers
  clear() { this.events.clear(); }
  count() {
    let total = 0;
    for (const list of this.events.values()) total += list.length;
    return total;
  }
}
