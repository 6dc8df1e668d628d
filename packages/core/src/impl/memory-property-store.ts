import type { PropertyStore, PropertyChangeListener } from '../interfaces/property-store';
import type { Clock } from '../interfaces/clock';
import type { ContactSnapshot, PropertyChange, PropertySchema, WriteOptions } from '../types/contact';
import { PropertyValidationError } from '../types/errors';
import { checkProperty } from './property-validation';
import { SystemClock } from './clock';
import { generateId } from '../utils';

function sameValue(a: unknown, b: unknown): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}

/**
 * In-memory property store. For testing and single-instance use.
 */
export class MemoryPropertyStore implements PropertyStore {
  private contacts = new Map<string, Record<string, unknown>>();
  private listeners = new Set<PropertyChangeListener>();

  constructor(
    readonly schema: PropertySchema,
    private readonly clock: Clock = new SystemClock()
  ) {}

  async get(contactId: string, key: string): Promise<unknown> {
    return structuredClone(this.contacts.get(contactId)?.[key]);
  }

  async getAll(contactId: string): Promise<ContactSnapshot> {
    return {
      contactId,
      properties: structuredClone(this.contacts.get(contactId) ?? {}),
      readAt: this.clock.now(),
    };
  }

  async set(contactId: string, key: string, value: unknown, options?: WriteOptions): Promise<PropertyChange | null> {
    const reason = checkProperty(this.schema, key, value);
    if (reason !== undefined) {
      throw new PropertyValidationError(contactId, key, reason);
    }

    const properties = this.contacts.get(contactId) ?? {};
    const oldValue = properties[key];
    if (sameValue(oldValue, value)) return null;

    properties[key] = structuredClone(value);
    this.contacts.set(contactId, properties);

    const change: PropertyChange = {
      id: generateId(),
      contactId,
      key,
      oldValue: structuredClone(oldValue),
      newValue: structuredClone(value),
      timestamp: this.clock.now(),
      parentCauseId: options?.parentCauseId,
    };
    for (const listener of this.listeners) listener(change);
    return change;
  }

  subscribe(listener: PropertyChangeListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  // Test helpers
  /** Write without validation or notification */
  seed(contactId: string, properties: Record<string, unknown>): void {
    this.contacts.set(contactId, { ...this.contacts.get(contactId), ...structuredClone(properties) });
  }
  clear() { this.contacts.clear(); }
  count() { return this.contacts.size; }
}
