import { ACTIVE_STATUSES, TERMINAL_STATUSES, isRecord } from '@tidewater/core';
import type { InstanceStatus } from '@tidewater/core';

export type Row = Record<string, unknown>;

/**
 * The part of pg's Pool the stores use. A Pool or a checked-out
 * PoolClient both satisfy it.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
}

/** A connection checked out of the pool */
export interface PooledConnection extends Queryable {
  release(err?: Error | boolean): void;
}

/** A Queryable that can also hand out a dedicated connection (pg's Pool) */
export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledConnection>;
}

/**
 * Run `fn` inside BEGIN/COMMIT on one pooled connection. Rolls back and
 * rethrows if `fn` or the commit fails; a connection whose rollback also
 * failed is released as broken.
 */
export async function withTransaction<T>(pool: ConnectionPool, fn: (tx: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
      client.release();
    } catch (rollbackErr) {
      client.release(rollbackErr instanceof Error ? rollbackErr : true);
    }
    throw err;
  }
}

/** Postgres unique_violation */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}

// ── Column readers ──────────────────────────────────────────────

export function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new TypeError(`Column "${column}" is not text`);
  return value;
}

export function optionalText(row: Row, column: string): string | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : text(row, column);
}

/** BIGINT columns arrive as strings */
export function millis(row: Row, column: string): number {
  const value = Number(row[column]);
  if (row[column] === null || !Number.isFinite(value)) throw new TypeError(`Column "${column}" is not a number`);
  return value;
}

export function optionalMillis(row: Row, column: string): number | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : millis(row, column);
}

export function json<T>(row: Row, column: string, guard: (value: unknown) => value is T): T {
  const value = row[column];
  if (!guard(value)) throw new TypeError(`Column "${column}" has an unexpected shape`);
  return value;
}

export function optionalJson<T>(row: Row, column: string, guard: (value: unknown) => value is T): T | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : json(row, column, guard);
}

/** JSONB parameter; undefined is stored as SQL NULL */
export function toJson(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

// ── Shape guards ────────────────────────────────────────────────

export function isObject(value: unknown): value is Record<string, unknown> {
  return isRecord(value);
}

export function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number');
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function isInstanceStatus(value: unknown): value is InstanceStatus {
  return [...ACTIVE_STATUSES, ...TERMINAL_STATUSES].some(s => s === value);
}

export const ACTIVE_SQL = ACTIVE_STATUSES.map(s => `'${s}'`).join(', ');
