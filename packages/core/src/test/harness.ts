/**
 * Test Harness
 *
 * Memory engine on a ManualClock with lifecycle event capture and
 * assertions. Events are dispatched synchronously so they can be
 * asserted right after an operation.
 *
 * Usage:
 * ```typescript
 * const t = new TestHarness({ flows: [welcomeFlow] });
 * await t.ready();
 *
 * await t.track('c1', 'signed_up');
 * await t.assertProperty('c1', 'welcomed', true);
 *
 * await t.advance(3 * DAY);
 * const [instance] = t.instancesOf('c1', 'reminder');
 * await t.assertStatus(instance.id, 'completed');
 * ```
 */
import type { PropertyChange, PropertySchema, ContactEvent } from '../types/contact';
import type { FlowDefinition, RetryPolicy } from '../types/flow';
import type { FlowInstance, InstanceStatus } from '../types/instance';
import type { ActionHandler } from '../interfaces/action-handler';
import type { Logger } from '../interfaces/logger';
import { createMemoryEngine } from '../engine/memory-engine';
import type { Engine } from '../engine/engine';
import { ManualClock } from '../impl/clock';
import { MemoryAlertSink } from '../impl/console-logger';
import { EventDispatcher, type DispatchedEvent, type EventType } from '../impl/event-dispatcher';
import { StaticSegmentResolver, StaticTimezoneProvider } from '../impl/static-providers';
import type { MemoryPropertyStore } from '../impl/memory-property-store';
import type { MemoryEventLog } from '../impl/memory-event-log';
import type { MemoryInstanceStore } from '../impl/memory-instance-store';
import type { MemoryCompletionStore } from '../impl/memory-completion-store';
import type { MemoryFlowStore } from '../impl/memory-flow-store';
import type { MemoryTriggerLedger } from '../impl/memory-trigger-ledger';
import { testSchema } from './flows';

/** 2024-01-01T00:00:00Z, a Monday */
export const HARNESS_EPOCH = Date.UTC(2024, 0, 1);

/** Options for creating a TestHarness instance. */
export interface TestHarnessOptions {
  /** Property schema (default: testSchema) */
  schema?: PropertySchema;
  /** Flows defined by ready() */
  flows?: FlowDefinition[];
  /** Actions registered alongside the built-ins */
  actions?: ActionHandler[];
  segments?: Record<string, string[]>;
  timezones?: Record<string, string>;
  /** Clock start (default: HARNESS_EPOCH) */
  start?: number;
  /** Whether to record step history (default: true) */
  recordHistory?: boolean;
  /** Maximum steps before failing (default: 100) */
  maxSteps?: number;
  defaultRetry?: RetryPolicy;
  referenceTimezone?: string;
}

/**
 * Test harness for easy engine testing.
 */
export class TestHarness {
  readonly clock: ManualClock;
  readonly engine: Engine;
  readonly properties: MemoryPropertyStore;
  readonly eventLog: MemoryEventLog;
  readonly instances: MemoryInstanceStore;
  readonly completions: MemoryCompletionStore;
  readonly flowStore: MemoryFlowStore;
  readonly ledger: MemoryTriggerLedger;
  readonly segments: StaticSegmentResolver;
  readonly timezones: StaticTimezoneProvider;
  readonly alerts = new MemoryAlertSink();
  /** Use .on() for typed subscriptions in tests */
  readonly dispatcher: EventDispatcher;
  readonly events: DispatchedEvent[] = [];
  /** Captured log lines, e.g. "warn [DelayScheduler] Dropping wake ..." */
  readonly logs: string[] = [];

  private readonly flows: FlowDefinition[];

  constructor(options: TestHarnessOptions = {}) {
    this.clock = new ManualClock(options.start ?? HARNESS_EPOCH);
    this.segments = new StaticSegmentResolver(options.segments);
    this.timezones = new StaticTimezoneProvider(options.timezones);
    this.flows = options.flows ?? [];

    this.dispatcher = new EventDispatcher({ mode: 'sync', clock: this.clock });
    this.dispatcher.on('*', e => {
      this.events.push(e);
    });

    const logger: Logger = {
      info: message => this.logs.push(`info ${message}`),
      warn: message => this.logs.push(`warn ${message}`),
      error: message => this.logs.push(`error ${message}`),
    };

    const memory = createMemoryEngine({
      schema: options.schema ?? testSchema,
      segments: this.segments,
      timezones: this.timezones,
      actions: options.actions,
      clock: this.clock,
      events: this.dispatcher,
      alerts: this.alerts,
      logger,
      recordHistory: options.recordHistory ?? true,
      maxSteps: options.maxSteps ?? 100,
      defaultRetry: options.defaultRetry,
      referenceTimezone: options.referenceTimezone,
    });

    this.engine = memory.engine;
    this.properties = memory.properties;
    this.eventLog = memory.eventLog;
    this.instances = memory.instances;
    this.completions = memory.completions;
    this.flowStore = memory.flowStore;
    this.ledger = memory.ledger;
  }

  /** Define the configured flows */
  async ready(): Promise<this> {
    for (const flow of this.flows) await this.engine.defineFlow(flow);
    await this.engine.settle();
    return this;
  }

  /** Write a property and wait for everything it triggers to settle */
  async set(contactId: string, key: string, value: unknown): Promise<PropertyChange | null> {
    const change = await this.engine.setProperty(contactId, key, value);
    await this.engine.settle();
    return change;
  }

  /** Append an event and wait for everything it triggers to settle */
  async track(contactId: string, type: string, payload?: Record<string, unknown>): Promise<ContactEvent> {
    const event = await this.engine.track(contactId, type, payload);
    await this.engine.settle();
    return event;
  }

  advance(ms: number): Promise<void> {
    return this.engine.advanceClock(ms);
  }

  /** Instances of a contact, oldest first */
  instancesOf(contactId: string, flowId?: string): FlowInstance[] {
    return this.instances
      .all()
      .filter(i => i.contactId === contactId && (flowId === undefined || i.flowId === flowId));
  }

  eventsOf(type: EventType): DispatchedEvent[] {
    return this.events.filter(e => e.type === type);
  }

  /** Reset captured events and logs */
  clearCaptured() {
    this.events.length = 0;
    this.logs.length = 0;
    this.alerts.alerts.length = 0;
  }

  // Assertions
  async assertStatus(instanceId: string, expected: InstanceStatus) {
    const instance = await this.instances.load(instanceId);
    if (!instance) throw new Error(`Instance ${instanceId} not found`);
    if (instance.status !== expected) {
      throw new Error(`Expected ${expected}, got ${instance.status}${instance.failure ? `: ${instance.failure.message}` : ''}`);
    }
  }

  async assertProperty(contactId: string, key: string, expected: unknown) {
    const actual = await this.properties.get(contactId, key);
    if (JSON.stringify(actual) !== JSON.stringify(expected)) {
      throw new Error(`${contactId}.${key}: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
    }
  }
}
