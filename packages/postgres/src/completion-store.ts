import { isRecord } from '@tidewater/core';
import type { CompletionGroup, CompletionStore } from '@tidewater/core';
import { type Queryable, type Row, json } from './queryable';

function isGroup(value: unknown): value is CompletionGroup {
  return isRecord(value)
    && typeof value.causeId === 'string'
    && Array.isArray(value.members)
    && Array.isArray(value.children);
}

export class PgCompletionStore implements CompletionStore {
  constructor(private db: Queryable) {}

  async load(causeId: string): Promise<CompletionGroup | null> {
    const { rows } = await this.db.query(
      `SELECT state FROM tw_completion_groups WHERE cause_id = $1`,
      [causeId]
    );
    return rows[0] ? this.toGroup(rows[0]) : null;
  }

  async save(group: CompletionGroup): Promise<void> {
    await this.db.query(
      `INSERT INTO tw_completion_groups (cause_id, parent_cause_id, contact_id, resolved, state, created_at, resolved_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (cause_id) DO UPDATE SET
         resolved = EXCLUDED.resolved,
         state = EXCLUDED.state,
         resolved_at = EXCLUDED.resolved_at`,
      [
        group.causeId,
        group.parentCauseId ?? null,
        group.contactId,
        group.resolved,
        JSON.stringify(group),
        group.createdAt,
        group.resolvedAt ?? null,
      ]
    );
  }

  async listUnresolved(): Promise<CompletionGroup[]> {
    const { rows } = await this.db.query(
      `SELECT state FROM tw_completion_groups WHERE NOT resolved ORDER BY created_at ASC`
    );
    return rows.map(r => this.toGroup(r));
  }

  private toGroup(row: Row): CompletionGroup {
    return json(row, 'state', isGroup);
  }
}
