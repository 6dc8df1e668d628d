import { DuplicateInstanceError, isRecord } from '@tidewater/core';
import type {
  CauseRecord,
  Condition,
  FlowInstance,
  InstanceFailure,
  InstanceStatus,
  InstanceStore,
  RetryState,
  StepHistory,
} from '@tidewater/core';
import {
  ACTIVE_SQL,
  type Queryable,
  type Row,
  isInstanceStatus,
  isList,
  isNumberList,
  isObject,
  isUniqueViolation,
  json,
  millis,
  optionalJson,
  optionalMillis,
  text,
  toJson,
} from './queryable';

function isCause(value: unknown): value is CauseRecord {
  return isRecord(value)
    && (value.kind === 'event' || value.kind === 'property_change' || value.kind === 'schedule');
}

function isCondition(value: unknown): value is Condition {
  return isRecord(value) && (value.on === 'event' || value.on === 'property');
}

function isFailure(value: unknown): value is InstanceFailure {
  return isRecord(value) && typeof value.code === 'string' && typeof value.message === 'string';
}

function isRetry(value: unknown): value is RetryState {
  return isRecord(value) && typeof value.attempt === 'number' && typeof value.maxAttempts === 'number';
}

function isHistory(value: unknown): value is StepHistory[] {
  return isList(value) && value.every(h => isRecord(h) && isNumberList(h.pointer));
}

const COLUMNS = `id, flow_id, flow_version, contact_id, cause_id, cause, status, pointer,
  wake_at, waiting_for, delay_entered_at, failure, retry, variables, step_count,
  history, entered_at, created_at, updated_at, ended_at`;

export class PgInstanceStore implements InstanceStore {
  constructor(private db: Queryable) {}

  async load(id: string): Promise<FlowInstance | null> {
    const { rows } = await this.db.query(`SELECT ${COLUMNS} FROM tw_instances WHERE id = $1`, [id]);
    return rows[0] ? this.toInstance(rows[0]) : null;
  }

  async insert(instance: FlowInstance): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO tw_instances (${COLUMNS})
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20)`,
        this.toInsertParams(instance)
      );
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      const existing = await this.findActive(instance.contactId, instance.flowId);
      throw new DuplicateInstanceError(instance.flowId, instance.contactId, existing?.id ?? 'unknown');
    }
  }

  async save(instance: FlowInstance): Promise<void> {
    await this.db.query(
      `UPDATE tw_instances SET
        status = $2,
        pointer = $3,
        wake_at = $4,
        waiting_for = $5,
        delay_entered_at = $6,
        failure = $7,
        retry = $8,
        variables = $9,
        step_count = $10,
        history = $11,
        updated_at = $12,
        ended_at = $13
      WHERE id = $1`,
      [
        instance.id,
        instance.status,
        toJson(instance.pointer),
        instance.wakeAt ?? null,
        toJson(instance.waitingFor),
        instance.delayEnteredAt ?? null,
        toJson(instance.failure),
        toJson(instance.retry),
        toJson(instance.variables),
        instance.stepCount,
        toJson(instance.history),
        instance.updatedAt,
        instance.endedAt ?? null,
      ]
    );
  }

  async findActive(contactId: string, flowId: string): Promise<FlowInstance | null> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM tw_instances
       WHERE contact_id = $1 AND flow_id = $2 AND status IN (${ACTIVE_SQL})
       LIMIT 1`,
      [contactId, flowId]
    );
    return rows[0] ? this.toInstance(rows[0]) : null;
  }

  async listActiveByContact(contactId: string): Promise<FlowInstance[]> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM tw_instances
       WHERE contact_id = $1 AND status IN (${ACTIVE_SQL})
       ORDER BY created_at ASC`,
      [contactId]
    );
    return rows.map(r => this.toInstance(r));
  }

  async listWakeReady(now: number, limit = 100): Promise<FlowInstance[]> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM tw_instances
       WHERE status IN (${ACTIVE_SQL}) AND wake_at <= $1
       ORDER BY wake_at ASC LIMIT $2`,
      [now, limit]
    );
    return rows.map(r => this.toInstance(r));
  }

  async listScheduled(): Promise<FlowInstance[]> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM tw_instances
       WHERE status IN (${ACTIVE_SQL}) AND (wake_at IS NOT NULL OR status = 'waiting_delay')
       ORDER BY wake_at ASC`
    );
    return rows.map(r => this.toInstance(r));
  }

  async listByStatus(status: InstanceStatus, limit = 100, offset = 0): Promise<FlowInstance[]> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM tw_instances
       WHERE status = $1
       ORDER BY created_at DESC, id
       LIMIT $2 OFFSET $3`,
      [status, limit, offset]
    );
    return rows.map(r => this.toInstance(r));
  }

  private toInsertParams(i: FlowInstance): unknown[] {
    return [
      i.id,
      i.flowId,
      i.flowVersion,
      i.contactId,
      i.causeId,
      toJson(i.cause),
      i.status,
      toJson(i.pointer),
      i.wakeAt ?? null,
      toJson(i.waitingFor),
      i.delayEnteredAt ?? null,
      toJson(i.failure),
      toJson(i.retry),
      toJson(i.variables),
      i.stepCount,
      toJson(i.history),
      i.enteredAt,
      i.createdAt,
      i.updatedAt,
      i.endedAt ?? null,
    ];
  }

  private toInstance(row: Row): FlowInstance {
    return {
      id: text(row, 'id'),
      flowId: text(row, 'flow_id'),
      flowVersion: text(row, 'flow_version'),
      contactId: text(row, 'contact_id'),
      causeId: text(row, 'cause_id'),
      cause: json(row, 'cause', isCause),
      status: json(row, 'status', isInstanceStatus),
      pointer: json(row, 'pointer', isNumberList),
      wakeAt: optionalMillis(row, 'wake_at'),
      waitingFor: optionalJson(row, 'waiting_for', isCondition),
      delayEnteredAt: optionalMillis(row, 'delay_entered_at'),
      failure: optionalJson(row, 'failure', isFailure),
      retry: optionalJson(row, 'retry', isRetry),
      variables: optionalJson(row, 'variables', isObject) ?? {},
      stepCount: millis(row, 'step_count'),
      history: optionalJson(row, 'history', isHistory),
      enteredAt: millis(row, 'entered_at'),
      createdAt: millis(row, 'created_at'),
      updatedAt: millis(row, 'updated_at'),
      endedAt: optionalMillis(row, 'ended_at'),
    };
  }
}
