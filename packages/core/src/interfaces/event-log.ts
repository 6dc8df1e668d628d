import type { ContactEvent, WriteOptions } from '../types/contact';

export type ContactEventListener = (event: ContactEvent) => void;

/**
 * Append-only per-contact event records.
 */
export interface EventLog {
  /** Append and notify subscribers */
  append(
    contactId: string,
    type: string,
    payload?: Record<string, unknown>,
    options?: WriteOptions
  ): Promise<ContactEvent>;

  /** Events for a contact, oldest first */
  list(contactId: string, options?: { type?: string; limit?: number }): Promise<ContactEvent[]>;

  /** Feed of new events. Returns an unsubscribe function. */
  subscribe(listener: ContactEventListener): () => void;
}
