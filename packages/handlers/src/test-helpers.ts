import {
  setPath,
  type ActionContext,
  type ActionHandler,
  type ActionParams,
  type ActionResult,
  type ActionError,
  type ContactEvent,
  type FlowInstance,
  type PropertyChange,
} from '@tidewater/core';

/** Writes a mock context received */
export interface RecordedWrites {
  properties: Record<string, unknown>;
  events: Array<{ type: string; payload: Record<string, unknown> }>;
  variables: Record<string, unknown>;
}

export interface MockParamsOptions {
  contactId?: string;
  /** Contact properties at snapshot time */
  properties?: Record<string, unknown>;
  instance?: FlowInstance;
  signal?: AbortSignal;
  now?: number;
}

/**
 * Create a test instance in the middle of an action step.
 */
export function createTestInstance(overrides: Partial<FlowInstance> = {}): FlowInstance {
  return {
    id: 'inst-test',
    flowId: 'test-flow',
    flowVersion: '1.0.0',
    contactId: 'c1',
    causeId: 'cause-test',
    cause: { kind: 'event', type: 'signed_up', payload: {} },
    pointer: [0],
    status: 'running',
    variables: {},
    stepCount: 0,
    enteredAt: 0,
    createdAt: 0,
    updatedAt: 0,
    ...overrides,
  };
}

/**
 * Create action params backed by an in-memory contact. Writes land in
 * `writes` instead of any store.
 */
export function createMockParams(
  params: Record<string, unknown>,
  options: MockParamsOptions = {}
): { params: ActionParams; writes: RecordedWrites } {
  const contactId = options.contactId ?? 'c1';
  const now = options.now ?? 0;
  const properties: Record<string, unknown> = { ...options.properties };
  const writes: RecordedWrites = { properties: {}, events: [], variables: {} };
  let seq = 0;

  const ctx: ActionContext = {
    contactId,
    causeId: options.instance?.causeId,
    now,
    async getProperty(key) {
      return properties[key];
    },
    async setProperty(key, value): Promise<PropertyChange | null> {
      const oldValue = properties[key];
      if (oldValue === value) return null;
      properties[key] = value;
      writes.properties[key] = value;
      return { id: `change-${++seq}`, contactId, key, oldValue, newValue: value, timestamp: now };
    },
    async appendEvent(type, payload = {}): Promise<ContactEvent> {
      writes.events.push({ type, payload });
      return { id: `event-${++seq}`, contactId, type, payload, timestamp: now };
    },
    setVariable(path, value) {
      setPath(writes.variables, path, value);
    },
  };

  return {
    params: {
      params,
      instance: options.instance,
      contact: { contactId, properties: { ...options.properties }, readAt: now },
      ctx,
      signal: options.signal,
    },
    writes,
  };
}

/**
 * Run a handler against a mock contact.
 */
export async function testAction(
  handler: ActionHandler,
  params: Record<string, unknown>,
  options: MockParamsOptions = {}
): Promise<{ result: ActionResult; writes: RecordedWrites }> {
  const mock = createMockParams(params, options);
  const result = await handler.execute(mock.params);
  return { result, writes: mock.writes };
}

export function assertSuccess(result: ActionResult): asserts result is Extract<ActionResult, { outcome: 'success' }> {
  if (result.outcome !== 'success') {
    throw new Error(`Expected success, got failure ${result.error.code}: ${result.error.message}`);
  }
}

export function assertFailure(
  result: ActionResult,
  expected?: Partial<Pick<ActionError, 'code' | 'retryable'>>
): asserts result is Extract<ActionResult, { outcome: 'failure' }> {
  if (result.outcome !== 'failure') {
    throw new Error('Expected failure, got success');
  }
  if (expected?.code !== undefined && result.error.code !== expected.code) {
    throw new Error(`Expected error code ${expected.code}, got ${result.error.code}`);
  }
  if (expected?.retryable !== undefined && result.error.retryable !== expected.retryable) {
    throw new Error(`Expected retryable=${expected.retryable}, got ${result.error.retryable}`);
  }
}
