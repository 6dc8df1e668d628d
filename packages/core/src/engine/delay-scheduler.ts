import type { FlowInstance } from '../types/instance';
import { isTerminal } from '../types/instance';
import type { DelaySpec } from '../types/flow';
import type { InstanceStore } from '../interfaces/instance-store';
import type { EventBus } from '../interfaces/event-bus';
import type { Clock } from '../interfaces/clock';
import type { AlertSink, Logger } from '../interfaces/logger';
import type { LifecycleEvents } from '../interfaces/lifecycle-events';
import { SchedulerDurabilityError, SchedulerHaltedError } from '../types/errors';
import { mapConcurrent } from '../utils';
import { nextLocalOccurrence, parseWallClock } from './wall-clock';

export interface DelaySchedulerOptions {
  instances: InstanceStore;
  bus: EventBus;
  clock: Clock;
  logger: Logger;
  alerts: AlertSink;
  events?: LifecycleEvents;
  /** Resumes published in parallel (default: 10) */
  concurrency?: number;
  /** Polling interval for start() (default: 1000) */
  tickIntervalMs?: number;
  /** Runs after each tick's resumes are published */
  onTick?: (now: number) => Promise<void>;
}

/** Delays that register a wake */
export type TimedDelay = Exclude<DelaySpec, { kind: 'event' }>;

interface WakeEntry {
  readonly instanceId: string;
  readonly wakeAt: number;
}

/**
 * Binary min-heap on wakeAt.
 */
class WakeQueue {
  private heap: WakeEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): WakeEntry | undefined {
    return this.heap[0];
  }

  push(entry: WakeEntry): void {
    this.heap.push(entry);
    let i = this.heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.heap[parent].wakeAt <= this.heap[i].wakeAt) break;
      [this.heap[parent], this.heap[i]] = [this.heap[i], this.heap[parent]];
      i = parent;
    }
  }

  pop(): WakeEntry | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (this.heap.length > 0 && last) {
      this.heap[0] = last;
      let i = 0;
      for (;;) {
        const l = 2 * i + 1;
        const r = l + 1;
        let smallest = i;
        if (l < this.heap.length && this.heap[l].wakeAt < this.heap[smallest].wakeAt) smallest = l;
        if (r < this.heap.length && this.heap[r].wakeAt < this.heap[smallest].wakeAt) smallest = r;
        if (smallest === i) break;
        [this.heap[smallest], this.heap[i]] = [this.heap[i], this.heap[smallest]];
        i = smallest;
      }
    }
    return top;
  }

  clear(): void {
    this.heap = [];
  }
}

/**
 * Computes wake times, keeps the wake queue and publishes `resume`
 * messages when wakes come due.
 *
 * The queue is an in-memory index over `wakeAt` values persisted on
 * instances; recover() rebuilds it from the InstanceStore.
 */
export class DelayScheduler {
  private readonly queue = new WakeQueue();
  /** Live wake per instance; queue entries that disagree are stale */
  private readonly live = new Map<string, number>();
  private timer?: ReturnType<typeof setTimeout>;
  private running = false;
  private ticking?: Promise<number>;
  private haltedBy?: SchedulerDurabilityError;

  private readonly concurrency: number;
  private readonly tickIntervalMs: number;

  constructor(private readonly opts: DelaySchedulerOptions) {
    this.concurrency = opts.concurrency ?? 10;
    this.tickIntervalMs = opts.tickIntervalMs ?? 1000;
  }

  /**
   * Wake time for a delay entered at `enteredAt`.
   * Wall-clock delays resolve in `timezone`.
   */
  wakeTimeFor(delay: TimedDelay, enteredAt: number, timezone: string): number {
    if (delay.kind === 'relative') return enteredAt + delay.ms;
    const time = parseWallClock(delay.at);
    if (!time) throw new Error(`Invalid wall-clock time "${delay.at}"`);
    return nextLocalOccurrence(time, enteredAt, timezone);
  }

  /**
   * Suspend an instance on a timed delay. The instance is saved with its
   * wakeAt before the wake is queued.
   */
  async schedule(instance: FlowInstance, delay: TimedDelay, timezone: string): Promise<number> {
    const enteredAt = this.opts.clock.now();
    const wakeAt = this.wakeTimeFor(delay, enteredAt, timezone);
    instance.status = 'waiting_delay';
    instance.delayEnteredAt = enteredAt;
    instance.wakeAt = wakeAt;
    instance.updatedAt = enteredAt;
    await this.opts.instances.save(instance);
    this.enqueue(instance.id, wakeAt);
    return wakeAt;
  }

  /** Queue a wake already persisted on the instance (retries, re-checks) */
  enqueue(instanceId: string, wakeAt: number): void {
    this.live.set(instanceId, wakeAt);
    this.queue.push({ instanceId, wakeAt });
  }

  cancel(instanceId: string): boolean {
    return this.live.delete(instanceId);
  }

  /** Wake queued for an instance */
  wakeOf(instanceId: string): number | undefined {
    return this.live.get(instanceId);
  }

  /** Earliest queued wake */
  nextWakeAt(): number | undefined {
    this.dropStale();
    return this.queue.peek()?.wakeAt;
  }

  get pending(): number {
    return this.live.size;
  }

  get halted(): boolean {
    return this.haltedBy !== undefined;
  }

  /**
   * Publish `resume` for every wake <= now. Returns the number published.
   * Throws SchedulerHaltedError once a durability failure has halted the
   * scheduler.
   */
  async tick(now: number = this.opts.clock.now()): Promise<number> {
    // One tick at a time; a concurrent caller waits for the one in flight
    while (this.ticking) await this.ticking.catch(() => 0);
    this.ticking = this.runTick(now);
    try {
      return await this.ticking;
    } finally {
      this.ticking = undefined;
    }
  }

  /** Start polling */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.opts.logger.info(`Started (interval ${this.tickIntervalMs}ms)`);
    this.scheduleNext();
  }

  /** Stop polling and wait for the current tick */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.ticking) await this.ticking.catch(() => 0);
    this.opts.logger.info('Stopped');
  }

  /**
   * Rebuild the queue from persisted instances and clear a halt.
   * Returns the number of wakes queued.
   */
  async recover(): Promise<number> {
    this.queue.clear();
    this.live.clear();
    this.haltedBy = undefined;

    const scheduled = await this.opts.instances.listScheduled();
    for (const instance of scheduled) {
      if (instance.wakeAt === undefined) {
        this.halt(new SchedulerDurabilityError(instance.id, 'waiting on a delay without a persisted wakeAt'));
        throw new SchedulerHaltedError(this.haltedBy);
      }
      this.enqueue(instance.id, instance.wakeAt);
    }
    this.opts.logger.info(`Recovered ${scheduled.length} wake(s)`);
    return scheduled.length;
  }

  // --- Private ---

  private async runTick(now: number): Promise<number> {
    if (this.haltedBy) throw new SchedulerHaltedError(this.haltedBy);

    const due: WakeEntry[] = [];
    for (let entry = this.queue.peek(); entry && entry.wakeAt <= now; entry = this.queue.peek()) {
      this.queue.pop();
      if (this.live.get(entry.instanceId) !== entry.wakeAt) continue;
      this.live.delete(entry.instanceId);
      due.push(entry);
    }

    const ready: WakeEntry[] = [];
    for (let i = 0; i < due.length; i++) {
      const entry = due[i];
      const problem = await this.verify(entry);
      if (problem === 'ok') {
        ready.push(entry);
      } else if (problem instanceof SchedulerDurabilityError) {
        // Put back what was not published so recover() can rebuild
        for (const rest of due.slice(i)) this.enqueue(rest.instanceId, rest.wakeAt);
        this.halt(problem);
        throw problem;
      }
    }

    await this.publishAll(ready);
    await this.opts.onTick?.(now);
    return ready.length;
  }

  /** Match a due wake against the persisted instance */
  private async verify(entry: WakeEntry): Promise<'ok' | 'skip' | SchedulerDurabilityError> {
    const instance = await this.opts.instances.load(entry.instanceId);
    if (!instance) {
      return new SchedulerDurabilityError(entry.instanceId, 'instance missing from the store');
    }
    if (isTerminal(instance.status) || instance.status === 'waiting_event' || instance.wakeAt === undefined) {
      this.opts.logger.warn(`Dropping wake for ${entry.instanceId}: instance is ${instance.status}`);
      return 'skip';
    }
    if (instance.wakeAt !== entry.wakeAt) {
      return new SchedulerDurabilityError(
        entry.instanceId,
        `queued wakeAt ${entry.wakeAt} disagrees with persisted ${instance.wakeAt}`
      );
    }
    return 'ok';
  }

  private async publishAll(entries: WakeEntry[]): Promise<void> {
    await mapConcurrent(entries, this.concurrency, async entry => {
      const instance = await this.opts.instances.load(entry.instanceId);
      if (!instance) return;
      try {
        await this.opts.bus.publish({
          kind: 'resume',
          instanceId: entry.instanceId,
          contactId: instance.contactId,
          wakeAt: entry.wakeAt,
        });
      } catch (err) {
        // Keep the wake so the next tick retries it
        this.opts.logger.error(`Resume for ${entry.instanceId} failed`, err);
        this.enqueue(entry.instanceId, entry.wakeAt);
      }
    });
  }

  private halt(error: SchedulerDurabilityError): void {
    this.haltedBy = error;
    this.opts.logger.error(`Halted: ${error.message}`);
    this.opts.alerts.alert({
      severity: 'critical',
      code: error.code,
      message: error.message,
      instanceId: error.instanceId,
    });
    this.opts.events?.onSchedulerHalted?.({ instanceId: error.instanceId, reason: error.message });
  }

  private dropStale(): void {
    for (let entry = this.queue.peek(); entry; entry = this.queue.peek()) {
      if (this.live.get(entry.instanceId) === entry.wakeAt) return;
      this.queue.pop();
    }
  }

  private scheduleNext(): void {
    if (!this.running || this.halted) return;
    this.timer = setTimeout(() => {
      this.tick()
        .catch(err => this.opts.logger.error('Tick failed', err))
        .finally(() => this.scheduleNext());
    }, this.tickIntervalMs);
    this.timer.unref?.();
  }
}
