import type { TriggerLedger } from '@tidewater/core';
import type { Queryable } from './queryable';

export class PgTriggerLedger implements TriggerLedger {
  constructor(private db: Queryable) {}

  async hasFired(flowId: string, version: string): Promise<boolean> {
    const { rows } = await this.db.query(
      `SELECT 1 FROM tw_trigger_ledger WHERE flow_id = $1 AND version = $2`,
      [flowId, version]
    );
    return rows.length > 0;
  }

  async record(flowId: string, version: string, firedAt: number): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `INSERT INTO tw_trigger_ledger (flow_id, version, fired_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (flow_id, version) DO NOTHING`,
      [flowId, version, firedAt]
    );
    return (rowCount ?? 0) > 0;
  }
}
