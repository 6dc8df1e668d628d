import type { ContactSnapshot, PropertyChange, PropertySchema, WriteOptions } from '../types/contact';

export type PropertyChangeListener = (change: PropertyChange) => void;

/**
 * Typed, schema-validated contact properties.
 * Implement this for your contact datastore.
 */
export interface PropertyStore {
  /** Schema applied to writes */
  readonly schema: PropertySchema;

  get(contactId: string, key: string): Promise<unknown>;

  /** Fresh snapshot of all properties */
  getAll(contactId: string): Promise<ContactSnapshot>;

  /**
   * Validate and commit a write, then notify subscribers.
   * Throws PropertyValidationError without committing or notifying.
   * Returns null when the value is unchanged.
   */
  set(contactId: string, key: string, value: unknown, options?: WriteOptions): Promise<PropertyChange | null>;

  /** Feed of committed changes. Returns an unsubscribe function. */
  subscribe(listener: PropertyChangeListener): () => void;
}
