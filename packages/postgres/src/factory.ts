import pg, { type PoolConfig } from 'pg';
import { SystemClock, createLogger } from '@tidewater/core';
import type { Clock, Logger, PropertySchema } from '@tidewater/core';
import type { ConnectionPool } from './queryable';
import { applySchema } from './schema';
import { PgInstanceStore } from './instance-store';
import { PgFlowStore } from './flow-store';
import { PgCompletionStore } from './completion-store';
import { PgPropertyStore } from './property-store';
import { PgEventLog } from './event-log';
import { PgTriggerLedger } from './trigger-ledger';

export interface PgStores {
  instances: PgInstanceStore;
  flows: PgFlowStore;
  completions: PgCompletionStore;
  properties: PgPropertyStore;
  events: PgEventLog;
  ledger: PgTriggerLedger;
}

export interface PgStoreOptions {
  /** Schema applied to property writes */
  propertySchema: PropertySchema;
  /** Timestamps for writes (default: system clock) */
  clock?: Clock;
  /** Run CREATE TABLE IF NOT EXISTS before returning (default: false) */
  migrate?: boolean;
}

/**
 * Create all Postgres stores from a single pool.
 */
export async function createPgStores(pool: ConnectionPool, options: PgStoreOptions): Promise<PgStores> {
  if (options.migrate) await applySchema(pool);
  const clock = options.clock ?? new SystemClock();

  return {
    instances: new PgInstanceStore(pool),
    flows: new PgFlowStore(pool, clock),
    completions: new PgCompletionStore(pool),
    properties: new PgPropertyStore(pool, options.propertySchema, clock),
    events: new PgEventLog(pool, clock),
    ledger: new PgTriggerLedger(pool),
  };
}

export interface PgConnection extends PgStores {
  pool: pg.Pool;
  close(): Promise<void>;
}

/**
 * Open a pool and create the stores on it.
 *
 * ```typescript
 * const db = await connectPgStores(
 *   { connectionString: process.env.DATABASE_URL },
 *   { propertySchema, migrate: true }
 * );
 * ```
 */
export async function connectPgStores(
  config: PoolConfig,
  options: PgStoreOptions & { logger?: Logger }
): Promise<PgConnection> {
  const logger = createLogger('Postgres', options.logger);
  const pool = new pg.Pool(config);
  // Idle clients emit errors on the pool; unhandled they crash the process
  pool.on('error', err => logger.error('Idle client error', err));

  try {
    const stores = await createPgStores(pool, options);
    return { ...stores, pool, close: () => pool.end() };
  } catch (err) {
    await pool.end();
    throw err;
  }
}
