import type { FlowInstance, InstanceStatus } from '../types/instance';

/**
 * Persistence layer for flow instances.
 * Implement this for Postgres, etc.
 */
export interface InstanceStore {
  load(id: string): Promise<FlowInstance | null>;

  /**
   * Insert a new instance.
   * Throws DuplicateInstanceError when the contact already has a
   * non-terminal instance of the flow.
   */
  insert(instance: FlowInstance): Promise<void>;

  /** Update an existing instance */
  save(instance: FlowInstance): Promise<void>;

  /** Non-terminal instance of a flow for a contact */
  findActive(contactId: string, flowId: string): Promise<FlowInstance | null>;

  /** All non-terminal instances for a contact */
  listActiveByContact(contactId: string): Promise<FlowInstance[]>;

  /** Instances with a wakeAt <= now (delays and pending retries) */
  listWakeReady(now: number, limit?: number): Promise<FlowInstance[]>;

  /** Every instance holding a wakeAt, for rebuilding the wake queue */
  listScheduled(): Promise<FlowInstance[]>;

  /** One page of instances in a status, in a stable order */
  listByStatus(status: InstanceStatus, limit?: number, offset?: number): Promise<FlowInstance[]>;
}
