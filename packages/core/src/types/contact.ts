/**
 * Contact-side records: properties, events and property changes.
 *
 * The engine never owns contact state. Everything here is produced by a
 * PropertyStore or EventLog adapter and handed to the engine read-only.
 */

// ── Properties ──────────────────────────────────────────────────

/** Supported property types */
export type PropertyType = 'string' | 'number' | 'boolean' | 'datetime' | 'json';

/** Definition of one contact property */
export interface PropertyDefinition {
  readonly type: PropertyType;
  /** Allowed values */
  readonly enum?: readonly unknown[];
  /** Accept '', whitespace-only strings and null (default: true) */
  readonly allowBlank?: boolean;
  /** String format checked by ajv-formats */
  readonly format?: 'email' | 'uri' | 'date-time';
  readonly minimum?: number;
  readonly maximum?: number;
  /** Rejects writes through the engine */
  readonly readOnly?: boolean;
  readonly description?: string;
}

/** Schema applied to every property write */
export interface PropertySchema {
  readonly properties: Record<string, PropertyDefinition>;
  /** Accept keys missing from `properties` (default: false) */
  readonly additionalProperties?: boolean;
}

/** Read-only view of a contact's properties for one request */
export interface ContactSnapshot {
  readonly contactId: string;
  readonly properties: Readonly<Record<string, unknown>>;
  /** When the snapshot was read (ms) */
  readonly readAt: number;
}

// ── Events ──────────────────────────────────────────────────────

/** Append-only contact event */
export interface ContactEvent {
  readonly id: string;
  readonly contactId: string;
  readonly type: string;
  readonly payload: Record<string, unknown>;
  readonly timestamp: number;
  /** Cause of the instance whose action wrote this event */
  readonly parentCauseId?: string;
}

/** Committed property change */
export interface PropertyChange {
  readonly id: string;
  readonly contactId: string;
  readonly key: string;
  readonly oldValue: unknown;
  readonly newValue: unknown;
  readonly timestamp: number;
  readonly parentCauseId?: string;
}

/** Causal metadata carried by writes made from inside an instance */
export interface WriteOptions {
  parentCauseId?: string;
}
