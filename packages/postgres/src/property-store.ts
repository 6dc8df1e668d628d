import { PropertyValidationError, SystemClock, checkProperty, generateId } from '@tidewater/core';
import type {
  Clock,
  ContactSnapshot,
  PropertyChange,
  PropertyChangeListener,
  PropertySchema,
  PropertyStore,
  WriteOptions,
} from '@tidewater/core';
import { type ConnectionPool, text, withTransaction } from './queryable';

function sameValue(a: unknown, b: unknown): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Contact properties in tw_contact_properties. The value, the
 * tw_property_changes record and the old-value read share one transaction
 * holding the contact row lock; subscribers hear about a write after COMMIT.
 */
export class PgPropertyStore implements PropertyStore {
  private listeners = new Set<PropertyChangeListener>();

  constructor(
    private db: ConnectionPool,
    readonly schema: PropertySchema,
    private clock: Clock = new SystemClock()
  ) {}

  async get(contactId: string, key: string): Promise<unknown> {
    const { rows } = await this.db.query(
      `SELECT value FROM tw_contact_properties WHERE contact_id = $1 AND key = $2`,
      [contactId, key]
    );
    return rows[0] ? rows[0].value : undefined;
  }

  async getAll(contactId: string): Promise<ContactSnapshot> {
    const { rows } = await this.db.query(
      `SELECT key, value FROM tw_contact_properties WHERE contact_id = $1`,
      [contactId]
    );
    const properties: Record<string, unknown> = {};
    for (const row of rows) properties[text(row, 'key')] = row.value;
    return { contactId, properties, readAt: this.clock.now() };
  }

  async set(contactId: string, key: string, value: unknown, options?: WriteOptions): Promise<PropertyChange | null> {
    const reason = checkProperty(this.schema, key, value);
    if (reason !== undefined) {
      throw new PropertyValidationError(contactId, key, reason);
    }

    const change = await withTransaction(this.db, async tx => {
      const timestamp = this.clock.now();
      // Lock the contact row so concurrent writers see each other's values
      await tx.query(
        `INSERT INTO tw_contacts (id, created_at) VALUES ($1, $2) ON CONFLICT (id) DO NOTHING`,
        [contactId, timestamp]
      );
      await tx.query(`SELECT id FROM tw_contacts WHERE id = $1 FOR UPDATE`, [contactId]);

      const { rows } = await tx.query(
        `SELECT value FROM tw_contact_properties WHERE contact_id = $1 AND key = $2`,
        [contactId, key]
      );
      const oldValue: unknown = rows[0] ? rows[0].value : undefined;
      if (sameValue(oldValue, value)) return null;

      const written: PropertyChange = {
        id: generateId(),
        contactId,
        key,
        oldValue,
        newValue: value,
        timestamp,
        parentCauseId: options?.parentCauseId,
      };

      await tx.query(
        `INSERT INTO tw_contact_properties (contact_id, key, value, updated_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (contact_id, key) DO UPDATE SET
           value = EXCLUDED.value,
           updated_at = EXCLUDED.updated_at`,
        [contactId, key, JSON.stringify(value), timestamp]
      );
      await tx.query(
        `INSERT INTO tw_property_changes (id, contact_id, key, old_value, new_value, parent_cause_id, timestamp)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          written.id,
          contactId,
          key,
          oldValue === undefined ? null : JSON.stringify(oldValue),
          JSON.stringify(value),
          written.parentCauseId ?? null,
          timestamp,
        ]
      );
      return written;
    });
    if (!change) return null;

    // Subscribers only hear about committed writes
    for (const listener of this.listeners) listener(change);
    return change;
  }

  subscribe(listener: PropertyChangeListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }
}
