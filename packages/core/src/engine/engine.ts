import type { FlowDefinition, RetryPolicy } from '../types/flow';
import type { CauseRecord, FlowInstance, InstanceFailure, InstanceStatus, RetryState, StepPointer } from '../types/instance';
import { isTerminal } from '../types/instance';
import type { ContactEvent, PropertyChange } from '../types/contact';
import type { BusMessage } from '../types/messages';
import { messageContact } from '../types/messages';
import { FlowNotFoundError, InstanceNotFoundError, PropertyValidationError } from '../types/errors';
import type { PropertyStore } from '../interfaces/property-store';
import type { EventLog } from '../interfaces/event-log';
import type { InstanceStore } from '../interfaces/instance-store';
import type { CompletionStore } from '../interfaces/completion-store';
import type { FlowRegistry, FlowStore } from '../interfaces/flow-registry';
import type { ActionRegistry } from '../interfaces/action-registry';
import type { EventBus } from '../interfaces/event-bus';
import type { ContactSerializer } from '../interfaces/contact-serializer';
import type { SegmentResolver, TimezoneProvider } from '../interfaces/collaborators';
import type { TriggerLedger } from '../interfaces/trigger-ledger';
import type { Clock, ControllableClock } from '../interfaces/clock';
import type { AlertSink, Logger } from '../interfaces/logger';
import type { LifecycleEvents } from '../interfaces/lifecycle-events';
import { DefaultActionRegistry } from '../impl/action-registry';
import { DefaultFlowRegistry } from '../impl/flow-registry';
import { EventEmittingFlowRegistry } from '../impl/event-emitting-flow-registry';
import { LocalEventBus } from '../impl/local-event-bus';
import { KeyedSerializer } from '../impl/keyed-serializer';
import { MemoryTriggerLedger } from '../impl/memory-trigger-ledger';
import { SystemClock, isControllable } from '../impl/clock';
import { LoggerAlertSink, createLogger } from '../impl/console-logger';
import { builtinActions } from '../actions';
import { generateId, mapConcurrent } from '../utils';
import type { Stimulus } from './predicates';
import { TriggerMatcher } from './trigger-matcher';
import { DelayScheduler } from './delay-scheduler';
import { CompletionAggregator } from './completion-aggregator';
import { InstanceManager } from './instance-manager';

export interface EngineAdapters {
  properties: PropertyStore;
  eventLog: EventLog;
  instances: InstanceStore;
  completions: CompletionStore;
  /** Defaults to a DefaultActionRegistry holding the built-in actions */
  actions?: ActionRegistry;
  /** Defaults to a DefaultFlowRegistry that checks handlers against `actions` */
  flows?: FlowRegistry;
  /** Defaults to LocalEventBus */
  bus?: EventBus;
  /** Defaults to KeyedSerializer */
  serializer?: ContactSerializer;
  /** Required for `now` and `at` triggers */
  segments?: SegmentResolver;
  /** Contact timezones for flows with localTime */
  timezones?: TimezoneProvider;
  /** Defaults to MemoryTriggerLedger */
  ledger?: TriggerLedger;
  /** Persists defined flows for recover() */
  flowStore?: FlowStore;
}

export interface EngineOptions {
  /** Max steps per instance (default: 1000) */
  maxSteps?: number;
  /** Retry policy for action steps without one */
  defaultRetry?: RetryPolicy;
  /** Timezone for wall-clock delays when the contact's is unknown (default: 'UTC') */
  referenceTimezone?: string;
  /** Record step history on instances (default: false) */
  recordHistory?: boolean;
  /** Scheduler polling interval for start() (default: 1000) */
  tickIntervalMs?: number;
  /** Parallel resumes and segment fan-out (default: 10) */
  concurrency?: number;
  /** Aborts an action's signal after this long (default: 30000) */
  actionTimeoutMs?: number;
  logger?: Logger;
  alerts?: AlertSink;
  clock?: Clock;
  events?: LifecycleEvents;
}

/** One contact reached by a `now` or `at` trigger */
export interface TriggerFiring {
  readonly contactId: string;
  readonly causeId: string;
  readonly created: boolean;
  /** New instance, or the live one that caused the firing to drop */
  readonly instanceId: string;
}

export interface InstanceStatusReport {
  readonly instanceId: string;
  readonly flowId: string;
  readonly flowVersion: string;
  readonly contactId: string;
  readonly causeId: string;
  readonly status: InstanceStatus;
  readonly pointer: StepPointer;
  readonly wakeAt?: number;
  readonly retry?: RetryState;
  readonly failure?: InstanceFailure;
  readonly updatedAt: number;
}

export interface RecoveryReport {
  readonly flows: number;
  readonly wakes: number;
  readonly completionGroups: number;
  readonly resumed: number;
}

export interface EngineHealth {
  readonly running: boolean;
  readonly schedulerHalted: boolean;
  readonly pendingWakes: number;
  readonly pendingDeliveries: number;
}

/** Interrupted instances read per query during recover() */
export const RECOVERY_PAGE_SIZE = 500;

const DEFAULT_RETRY: Required<RetryPolicy> = {
  maxAttempts: 3,
  backoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 60 * 60 * 1000,
};

/** Upper bound on scheduler passes in one advanceClock() */
const MAX_CLOCK_PASSES = 10_000;

/**
 * Flow execution engine.
 *
 * Writes committed by the PropertyStore and EventLog are picked up from
 * their feeds and published on the bus; each message is then handled
 * inside the contact's critical section.
 *
 * ```typescript
 * const engine = new Engine({ properties, eventLog, instances, completions });
 * await engine.defineFlow(welcomeFlow);
 * const change = await engine.setProperty('c1', 'plan', 'pro');
 * await engine.awaitCompletion(change.id);
 * ```
 */
export class Engine {
  readonly flows: FlowRegistry;
  readonly actions: ActionRegistry;
  readonly scheduler: DelayScheduler;
  readonly aggregator: CompletionAggregator;
  readonly manager: InstanceManager;
  readonly matcher = new TriggerMatcher();
  readonly clock: Clock;

  private readonly bus: EventBus;
  private readonly serializer: ContactSerializer;
  private readonly ledger: TriggerLedger;
  private readonly logger: Logger;
  private readonly events?: LifecycleEvents;
  private readonly concurrency: number;
  private readonly deliveries = new Set<Promise<void>>();
  private readonly unsubscribe: Array<() => void>;
  private running = false;

  constructor(
    private readonly adapters: EngineAdapters,
    options: EngineOptions = {}
  ) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = createLogger('Engine', options.logger);
    this.events = options.events;
    this.concurrency = options.concurrency ?? 10;
    const alerts = options.alerts ?? new LoggerAlertSink();

    if (adapters.actions) {
      this.actions = adapters.actions;
    } else {
      this.actions = new DefaultActionRegistry();
      this.actions.registerAll([...builtinActions]);
    }
    const flows = adapters.flows ?? new DefaultFlowRegistry(type => this.actions.has(type));
    this.flows = this.events ? new EventEmittingFlowRegistry(flows, this.events) : flows;
    this.bus = adapters.bus ?? new LocalEventBus();
    this.serializer = adapters.serializer ?? new KeyedSerializer();
    this.ledger = adapters.ledger ?? new MemoryTriggerLedger();

    this.scheduler = new DelayScheduler({
      instances: adapters.instances,
      bus: this.bus,
      clock: this.clock,
      logger: createLogger('DelayScheduler', options.logger),
      alerts,
      events: this.events,
      concurrency: this.concurrency,
      tickIntervalMs: options.tickIntervalMs,
      onTick: now => this.fireDueAtTriggers(now),
    });

    this.aggregator = new CompletionAggregator({
      store: adapters.completions,
      clock: this.clock,
      logger: createLogger('CompletionAggregator', options.logger),
      events: this.events,
      runContinuation: (continuation, parentCauseId) => this.manager.runContinuation(continuation, parentCauseId),
    });

    this.manager = new InstanceManager({
      instances: adapters.instances,
      flows: this.flows,
      actions: this.actions,
      properties: adapters.properties,
      eventLog: adapters.eventLog,
      scheduler: this.scheduler,
      aggregator: this.aggregator,
      timezones: adapters.timezones,
      clock: this.clock,
      logger: this.logger,
      alerts,
      events: this.events,
      maxSteps: options.maxSteps ?? 1000,
      defaultRetry: { ...DEFAULT_RETRY, ...options.defaultRetry },
      referenceTimezone: options.referenceTimezone ?? 'UTC',
      recordHistory: options.recordHistory ?? false,
      actionTimeoutMs: options.actionTimeoutMs ?? 30_000,
    });

    this.unsubscribe = [
      adapters.properties.subscribe(change =>
        this.deliver(change.id, change.contactId, change.parentCauseId, { kind: 'property_change', change })
      ),
      adapters.eventLog.subscribe(event =>
        this.deliver(event.id, event.contactId, event.parentCauseId, { kind: 'event', event })
      ),
      this.bus.subscribe(message => this.dispatch(message)),
    ];
  }

  // ── Flows ─────────────────────────────────────────────────────

  /**
   * Register a flow. `now` flows fire here, once per (flow, version).
   * Throws FlowValidationError.
   */
  async defineFlow(flow: FlowDefinition): Promise<TriggerFiring[]> {
    this.flows.register(flow);
    await this.adapters.flowStore?.save(flow);
    this.logger.info(`Defined flow ${flow.id}@${flow.version} (${flow.trigger.type} trigger)`);
    if (flow.trigger.type === 'now') return this.fireScheduled(flow);
    return [];
  }

  /**
   * Stop a flow from matching triggers. Running instances finish on the
   * version they started with.
   */
  async undefineFlow(flowId: string): Promise<void> {
    if (!this.flows.unregister(flowId)) throw new FlowNotFoundError(flowId);
    await this.adapters.flowStore?.deactivate(flowId);
    this.logger.info(`Undefined flow ${flowId}`);
  }

  // ── Inputs ────────────────────────────────────────────────────

  /**
   * Dispatch an event recorded outside the EventLog adapter.
   * Resolves once it has been handled.
   */
  async publishEvent(event: ContactEvent): Promise<void> {
    this.aggregator.reserve(event.id, { contactId: event.contactId, parentCauseId: event.parentCauseId });
    await this.bus.publish({ kind: 'event', event });
  }

  /**
   * Dispatch a change committed outside the PropertyStore adapter.
   */
  async publishPropertyChange(change: PropertyChange): Promise<void> {
    this.aggregator.reserve(change.id, { contactId: change.contactId, parentCauseId: change.parentCauseId });
    await this.bus.publish({ kind: 'property_change', change });
  }

  /** Append an event through the EventLog */
  track(contactId: string, type: string, payload?: Record<string, unknown>): Promise<ContactEvent> {
    return this.adapters.eventLog.append(contactId, type, payload);
  }

  /**
   * Write a property through the PropertyStore. Returns null when the
   * value did not change. Throws PropertyValidationError.
   */
  async setProperty(contactId: string, key: string, value: unknown): Promise<PropertyChange | null> {
    try {
      return await this.adapters.properties.set(contactId, key, value);
    } catch (err) {
      if (err instanceof PropertyValidationError) {
        this.logger.warn(`Rejected write of ${key} for ${contactId}: ${err.reason}`);
        this.events?.onPropertyRejected?.({ contactId, key, reason: err.reason });
      }
      throw err;
    }
  }

  // ── Queries ───────────────────────────────────────────────────

  async getInstance(instanceId: string): Promise<FlowInstance | null> {
    return this.adapters.instances.load(instanceId);
  }

  /** Throws InstanceNotFoundError */
  async queryInstanceStatus(instanceId: string): Promise<InstanceStatusReport> {
    const instance = await this.adapters.instances.load(instanceId);
    if (!instance) throw new InstanceNotFoundError(instanceId);
    return {
      instanceId: instance.id,
      flowId: instance.flowId,
      flowVersion: instance.flowVersion,
      contactId: instance.contactId,
      causeId: instance.causeId,
      status: instance.status,
      pointer: instance.pointer,
      wakeAt: instance.wakeAt,
      retry: instance.retry,
      failure: instance.failure,
      updatedAt: instance.updatedAt,
    };
  }

  /**
   * Wait until every instance a cause spawned, and everything they caused,
   * has finished. Returns false if `timeoutMs` passes first.
   */
  async awaitCompletion(causeId: string, options: { timeoutMs?: number } = {}): Promise<boolean> {
    // The lookup is not timed; only an outstanding group can run out of time
    const watch = await this.aggregator.watch(causeId);
    if (!watch) return true;
    const done = watch.resolved.then(() => true);
    if (options.timeoutMs === undefined) return done;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), options.timeoutMs);
    });
    try {
      return await Promise.race([done, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  health(): EngineHealth {
    return {
      running: this.running,
      schedulerHalted: this.scheduler.halted,
      pendingWakes: this.scheduler.pending,
      pendingDeliveries: this.deliveries.size,
    };
  }

  // ── Time ──────────────────────────────────────────────────────

  /**
   * Move a ManualClock forward, firing every wake and `at` trigger on the
   * way at its own time.
   */
  async advanceClock(ms: number): Promise<void> {
    const clock = this.controllableClock();
    await this.runClockTo(clock, clock.now() + ms);
  }

  async setClock(timestamp: number): Promise<void> {
    await this.runClockTo(this.controllableClock(), timestamp);
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /** Rejects, leaving the engine stopped, if the bus cannot start */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.bus.start?.();
    } catch (err) {
      this.running = false;
      throw err;
    }
    this.scheduler.start();
    this.logger.info('Started');
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.scheduler.stop();
    await this.settle();
    this.logger.info('Stopped');
  }

  /** Stop and release subscriptions and the bus */
  async close(): Promise<void> {
    await this.stop();
    for (const unsubscribe of this.unsubscribe) unsubscribe();
    await this.bus.close?.();
  }

  /**
   * Rebuild in-memory state after a restart: stored flows, the wake
   * queue and unresolved completion groups. Instances interrupted
   * mid-advance are run again.
   */
  async recover(): Promise<RecoveryReport> {
    let flows = 0;
    if (this.adapters.flowStore) {
      const stored = await this.adapters.flowStore.list();
      for (const { flow } of stored) {
        if (this.flows.get(flow.id, flow.version)) continue;
        this.flows.register(flow);
        flows++;
      }
      const inactive = new Set(stored.filter(s => !s.active).map(s => s.flow.id));
      for (const id of inactive) this.flows.unregister(id);
    }

    const wakes = await this.scheduler.recover();

    const groups = await this.aggregator.recover();
    for (const group of groups) {
      await this.serializer.run(group.contactId, () =>
        this.aggregator.reconcile(group.causeId, async id => {
          const instance = await this.adapters.instances.load(id);
          return !instance || isTerminal(instance.status);
        })
      );
    }

    // Collect every page first; resuming changes statuses and would shift the offsets
    const interrupted: FlowInstance[] = [];
    for (let offset = 0; ; offset += RECOVERY_PAGE_SIZE) {
      const page = await this.adapters.instances.listByStatus('running', RECOVERY_PAGE_SIZE, offset);
      interrupted.push(...page);
      if (page.length < RECOVERY_PAGE_SIZE) break;
    }

    let resumed = 0;
    for (const instance of interrupted) {
      if (instance.wakeAt !== undefined) continue;
      await this.serializer.run(instance.contactId, () => this.manager.advance(instance.id));
      resumed++;
    }

    this.logger.info(
      `Recovered ${flows} flow(s), ${wakes} wake(s), ${groups.length} completion group(s), ${resumed} interrupted instance(s)`
    );
    return { flows, wakes, completionGroups: groups.length, resumed };
  }

  /** Wait until no bus delivery is in flight */
  async settle(): Promise<void> {
    while (this.deliveries.size > 0) {
      await Promise.all([...this.deliveries]);
    }
    await this.aggregator.flush();
  }

  // ── Private ───────────────────────────────────────────────────

  /**
   * Feed listener. Runs synchronously inside the writer's call so the
   * cause is linked to its parent before the writer can finish; delivery
   * happens after the writer's critical section.
   */
  private deliver(causeId: string, contactId: string, parentCauseId: string | undefined, message: BusMessage): void {
    this.aggregator.reserve(causeId, { contactId, parentCauseId });
    const delivery: Promise<void> = this.bus
      .publish(message)
      .catch(err => this.logger.error(`Delivery of ${message.kind} ${causeId} failed`, err))
      .finally(() => this.deliveries.delete(delivery));
    this.deliveries.add(delivery);
  }

  private async dispatch(message: BusMessage): Promise<void> {
    const contactId = messageContact(message);
    this.events?.onBusMessage?.({ kind: message.kind, contactId });

    switch (message.kind) {
      case 'resume':
        await this.serializer.run(contactId, () => this.manager.resume(message.instanceId, message.wakeAt));
        return;
      case 'event': {
        const { event } = message;
        await this.serializer.run(contactId, () =>
          this.handleStimulus({ kind: 'event', event }, event.id, contactId, {
            kind: 'event',
            type: event.type,
            payload: event.payload,
          })
        );
        return;
      }
      case 'property_change': {
        const { change } = message;
        await this.serializer.run(contactId, () =>
          this.handleStimulus({ kind: 'property_change', change }, change.id, contactId, {
            kind: 'property_change',
            key: change.key,
            oldValue: change.oldValue,
            newValue: change.newValue,
          })
        );
        return;
      }
    }
  }

  /**
   * Goals and waits of live instances first, then new instances for
   * matching triggers.
   */
  private async handleStimulus(stimulus: Stimulus, causeId: string, contactId: string, cause: CauseRecord): Promise<void> {
    const active = await this.adapters.instances.listActiveByContact(contactId);
    for (const instance of active) {
      if (stimulus.kind === 'event') {
        await this.manager.handleEvent(instance, stimulus.event);
      } else {
        await this.manager.handlePropertyChange(instance, stimulus.change);
      }
    }

    const snapshot = await this.adapters.properties.getAll(contactId);
    const flows = this.flows.list();
    const matches =
      stimulus.kind === 'event'
        ? this.matcher.matchEvent(stimulus.event, snapshot, flows)
        : this.matcher.matchChange(stimulus.change, snapshot, flows);

    const created: FlowInstance[] = [];
    for (const flow of matches) {
      const result = await this.manager.create(flow, contactId, causeId, cause);
      if (result.created) created.push(result.instance);
    }

    // Members are recorded before they run so their terminal notices count
    await this.aggregator.open(causeId, created.map(i => i.id), contactId);
    for (const instance of created) {
      await this.manager.advance(instance.id);
    }
  }

  private async fireScheduled(flow: FlowDefinition): Promise<TriggerFiring[]> {
    const trigger = flow.trigger;
    if (trigger.type !== 'now' && trigger.type !== 'at') return [];
    const kind = trigger.type;
    // Must precede the ledger entry: an unfired flow stays unrecorded
    if (!this.adapters.segments) {
      this.logger.warn(`Flow ${flow.id} has a ${kind} trigger but no SegmentResolver is configured`);
      return [];
    }
    if (!(await this.ledger.record(flow.id, flow.version, this.clock.now()))) return [];

    const contacts = await this.adapters.segments.resolve(trigger.segmentId);
    this.logger.info(`Firing ${flow.id}@${flow.version} for ${contacts.length} contact(s) in ${trigger.segmentId}`);

    return mapConcurrent(contacts, this.concurrency, contactId =>
      this.serializer.run(contactId, async (): Promise<TriggerFiring> => {
        const causeId = generateId();
        this.aggregator.reserve(causeId, { contactId });
        const result = await this.manager.create(flow, contactId, causeId, { kind: 'schedule', trigger: kind });
        await this.aggregator.open(causeId, result.created ? [result.instance.id] : [], contactId);
        if (!result.created) return { contactId, causeId, created: false, instanceId: result.existing };
        await this.manager.advance(result.instance.id);
        return { contactId, causeId, created: true, instanceId: result.instance.id };
      })
    );
  }

  private async fireDueAtTriggers(now: number): Promise<void> {
    for (const flow of this.matcher.dueAt(now, this.flows.list())) {
      if (await this.ledger.hasFired(flow.id, flow.version)) continue;
      await this.fireScheduled(flow);
    }
  }

  /** Earliest `at` trigger that has not fired yet */
  private async nextAtTrigger(): Promise<number | undefined> {
    let next: number | undefined;
    for (const flow of this.flows.list()) {
      if (flow.trigger.type !== 'at') continue;
      if (await this.ledger.hasFired(flow.id, flow.version)) continue;
      if (next === undefined || flow.trigger.at < next) next = flow.trigger.at;
    }
    return next;
  }

  private async runClockTo(clock: ControllableClock, target: number): Promise<void> {
    await this.settle();
    for (let pass = 0; ; pass++) {
      if (pass >= MAX_CLOCK_PASSES) {
        throw new Error(`Clock did not settle after ${MAX_CLOCK_PASSES} scheduler passes`);
      }
      const candidates = [this.scheduler.nextWakeAt(), await this.nextAtTrigger()].filter(
        (t): t is number => t !== undefined && t <= target
      );
      if (candidates.length === 0) break;
      const next = Math.max(Math.min(...candidates), clock.now());
      if (next > clock.now()) clock.set(next);
      await this.scheduler.tick(next);
      await this.settle();
    }
    if (target > clock.now()) clock.set(target);
  }

  private controllableClock(): ControllableClock {
    if (!isControllable(this.clock)) {
      throw new Error('advanceClock() and setClock() need a ManualClock');
    }
    return this.clock;
  }
}
