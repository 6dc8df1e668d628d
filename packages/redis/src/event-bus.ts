import { TidewaterError, createLogger, generateId, isRecord, sleep } from '@tidewater/core';
import type { BusMessage, BusSubscriber, EventBus, Logger } from '@tidewater/core';
import type { RedisCommands } from './commands';

export interface RedisEventBusOptions {
  /** Connection used to enqueue and to hold the queue lease */
  client: Pick<RedisCommands, 'lPush' | 'set' | 'get' | 'del' | 'pExpire'>;
  /** Dedicated connection; BRPOP blocks it */
  consumer: Pick<RedisCommands, 'brPop'>;
  /** List key (default: "tw:bus") */
  queue?: string;
  /** BRPOP timeout in seconds; bounds how long close() waits (default: 1) */
  blockSeconds?: number;
  /** Pause after a failed BRPOP (default: 1000ms) */
  reconnectDelayMs?: number;
  /** Messages handled at once; the loop stops popping at this limit (default: 16) */
  concurrency?: number;
  /** Lifetime of the queue lease; renewed at half this interval (default: 30s) */
  leaseMs?: number;
  logger?: Logger;
}

export function isBusMessage(value: unknown): value is BusMessage {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case 'event':
      return isRecord(value.event) && typeof value.event.contactId === 'string' && typeof value.event.type === 'string';
    case 'property_change':
      return isRecord(value.change) && typeof value.change.contactId === 'string' && typeof value.change.key === 'string';
    case 'resume':
      return typeof value.instanceId === 'string' && typeof value.contactId === 'string' && typeof value.wakeAt === 'number';
    default:
      return false;
  }
}

function parse(element: string): unknown {
  try {
    return JSON.parse(element);
  } catch {
    return undefined;
  }
}

/**
 * Another bus holds the lease on the queue.
 */
export class QueueLeaseError extends TidewaterError {
  constructor(public readonly queue: string) {
    super('QUEUE_LEASED', `Queue "${queue}" is held by another engine`);
    this.name = 'QueueLeaseError';
  }
}

/**
 * Bus backed by a Redis list.
 *
 * Completion groups are tracked by the engine that reserved them, so a
 * queue has exactly one engine: the first publish() or start() takes a
 * lease on `<queue>:lease`, and a second bus on the same queue is refused
 * with QueueLeaseError until the holder closes or its lease expires.
 * Queued messages outlive the holder and are consumed by the next one.
 *
 * publish() resolves once the message is enqueued, not once it has been
 * handled. Popped messages are handled concurrently up to `concurrency`;
 * ordering within a contact is left to the engine's contact serializer.
 */
export class RedisEventBus implements EventBus {
  private subscribers = new Set<BusSubscriber>();
  private queue: string;
  private blockSeconds: number;
  private reconnectDelayMs: number;
  private concurrency: number;
  private logger: Logger;
  private inFlight = new Set<Promise<void>>();
  private running = false;
  private loop?: Promise<void>;
  private readonly owner = generateId();
  private readonly leaseKey: string;
  private leaseMs: number;
  private lease?: Promise<void>;
  private renewal?: ReturnType<typeof setInterval>;

  constructor(private options: RedisEventBusOptions) {
    this.queue = options.queue ?? 'tw:bus';
    this.blockSeconds = options.blockSeconds ?? 1;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1000;
    this.concurrency = Math.max(1, options.concurrency ?? 16);
    this.leaseMs = options.leaseMs ?? 30_000;
    this.leaseKey = `${this.queue}:lease`;
    this.logger = createLogger('RedisEventBus', options.logger);
  }

  /** Throws QueueLeaseError when another engine holds the queue */
  async publish(message: BusMessage): Promise<void> {
    await this.claim();
    await this.options.client.lPush(this.queue, JSON.stringify(message));
  }

  subscribe(subscriber: BusSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => { this.subscribers.delete(subscriber); };
  }

  /**
   * Start popping messages for local subscribers.
   * Throws QueueLeaseError when another engine holds the queue.
   */
  async start(): Promise<void> {
    await this.claim();
    if (this.running) return;
    // A loop stopped by a lost lease may still be inside BRPOP
    await this.loop;
    if (this.running) return;
    this.running = true;
    this.loop = this.consume();
  }

  /** Stop popping, wait for messages in flight, then give up the lease */
  async close(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = undefined;
    await Promise.all(this.inFlight);
    await this.releaseLease();
  }

  get holdsLease(): boolean {
    return this.renewal !== undefined;
  }

  get isRunning(): boolean {
    return this.running;
  }

  private async consume(): Promise<void> {
    while (this.running) {
      if (this.inFlight.size >= this.concurrency) {
        await Promise.race(this.inFlight);
        continue;
      }

      let reply: unknown;
      try {
        reply = await this.options.consumer.brPop(this.queue, this.blockSeconds);
      } catch (err) {
        this.logger.error('BRPOP failed', err);
        await sleep(this.reconnectDelayMs);
        continue;
      }
      if (reply === null || reply === undefined) continue;

      const element = isRecord(reply) ? reply.element : undefined;
      const message = typeof element === 'string' ? parse(element) : undefined;
      if (!isBusMessage(message)) {
        this.logger.warn(`Dropping malformed message from ${this.queue}`);
        continue;
      }
      const delivery: Promise<void> = this.deliver(message).finally(() => {
        this.inFlight.delete(delivery);
      });
      this.inFlight.add(delivery);
    }
  }

  private async claim(): Promise<void> {
    if (!this.lease) this.lease = this.acquireLease();
    try {
      await this.lease;
    } catch (err) {
      // A refused claim may be retried later
      this.lease = undefined;
      throw err;
    }
  }

  private async acquireLease(): Promise<void> {
    const acquired = await this.options.client.set(this.leaseKey, this.owner, { NX: true, PX: this.leaseMs });
    if (acquired === null) throw new QueueLeaseError(this.queue);
    this.renewal = setInterval(() => {
      this.renewLease().catch((err: unknown) => this.logger.error(`Renewing the lease on ${this.queue} failed`, err));
    }, Math.max(1, Math.floor(this.leaseMs / 2)));
  }

  private async renewLease(): Promise<void> {
    if ((await this.options.client.get(this.leaseKey)) === this.owner) {
      await this.options.client.pExpire(this.leaseKey, this.leaseMs);
      return;
    }
    this.logger.error(`Lost the lease on ${this.queue}; stopping`);
    this.dropLease();
    this.running = false;
  }

  private async releaseLease(): Promise<void> {
    if (!this.renewal) return;
    this.dropLease();
    if ((await this.options.client.get(this.leaseKey)) === this.owner) {
      await this.options.client.del(this.leaseKey);
    }
  }

  private dropLease(): void {
    clearInterval(this.renewal);
    this.renewal = undefined;
    this.lease = undefined;
  }

  /** Never rejects; subscriber failures are logged */
  private async deliver(message: BusMessage): Promise<void> {
    const results = await Promise.allSettled([...this.subscribers].map(s => s(message)));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(`Subscriber failed on ${message.kind} message`, result.reason);
      }
    }
  }
}
