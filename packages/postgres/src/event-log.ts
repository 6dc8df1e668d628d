import { SystemClock, generateId } from '@tidewater/core';
import type { Clock, ContactEvent, ContactEventListener, EventLog, WriteOptions } from '@tidewater/core';
import { type Queryable, type Row, isObject, json, millis, optionalText, text } from './queryable';

export class PgEventLog implements EventLog {
  private listeners = new Set<ContactEventListener>();

  constructor(
    private db: Queryable,
    private clock: Clock = new SystemClock()
  ) {}

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
      payload,
      timestamp: this.clock.now(),
      parentCauseId: options?.parentCauseId,
    };

    await this.db.query(
      `INSERT INTO tw_events (id, contact_id, type, payload, parent_cause_id, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [event.id, contactId, type, JSON.stringify(payload), event.parentCauseId ?? null, event.timestamp]
    );

    for (const listener of this.listeners) listener(event);
    return event;
  }

  async list(contactId: string, options?: { type?: string; limit?: number }): Promise<ContactEvent[]> {
    const conditions = ['contact_id = $1'];
    const params: unknown[] = [contactId];

    if (options?.type) {
      params.push(options.type);
      conditions.push(`type = $${params.length}`);
    }

    let sql = `SELECT id, seq, contact_id, type, payload, parent_cause_id, timestamp
      FROM tw_events WHERE ${conditions.join(' AND ')}`;
    if (options?.limit !== undefined) {
      // Newest N, returned oldest first
      params.push(options.limit);
      sql = `SELECT * FROM (${sql} ORDER BY seq DESC LIMIT $${params.length}) recent`;
    }

    const { rows } = await this.db.query(`${sql} ORDER BY seq ASC`, params);
    return rows.map(r => this.toEvent(r));
  }

  subscribe(listener: ContactEventListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private toEvent(row: Row): ContactEvent {
    return {
      id: text(row, 'id'),
      contactId: text(row, 'contact_id'),
      type: text(row, 'type'),
      payload: json(row, 'payload', isObject),
      timestamp: millis(row, 'timestamp'),
      parentCauseId: optionalText(row, 'parent_cause_id'),
    };
  }
}
