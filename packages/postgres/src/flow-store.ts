import { SystemClock, isRecord } from '@tidewater/core';
import type { Clock, FlowDefinition, FlowStore, StoredFlow } from '@tidewater/core';
import { type Queryable, json } from './queryable';

function isFlowDefinition(value: unknown): value is FlowDefinition {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.version === 'string'
    && isRecord(value.trigger)
    && Array.isArray(value.steps);
}

/**
 * Durable copy of defined flows. The engine's registry stays authoritative
 * for reads; this store only feeds Engine.recover().
 */
export class PgFlowStore implements FlowStore {
  constructor(
    private db: Queryable,
    private clock: Clock = new SystemClock()
  ) {}

  async save(flow: FlowDefinition): Promise<void> {
    await this.db.query(
      `INSERT INTO tw_flows (id, version, name, definition, active, created_at)
       VALUES ($1, $2, $3, $4, TRUE, $5)
       ON CONFLICT (id, version) DO UPDATE SET
         name = EXCLUDED.name,
         definition = EXCLUDED.definition,
         active = TRUE`,
      [flow.id, flow.version, flow.name ?? null, JSON.stringify(flow), this.clock.now()]
    );
    // Redefining reactivates older versions too
    await this.db.query(`UPDATE tw_flows SET active = TRUE WHERE id = $1 AND NOT active`, [flow.id]);
  }

  async deactivate(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE tw_flows SET active = FALSE WHERE id = $1 AND active`,
      [id]
    );
    return (rowCount ?? 0) > 0;
  }

  async list(): Promise<StoredFlow[]> {
    const { rows } = await this.db.query(
      `SELECT definition, active FROM tw_flows ORDER BY id, created_at`
    );
    return rows.map(row => ({
      flow: json(row, 'definition', isFlowDefinition),
      active: row.active === true,
    }));
  }
}
