import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  Engine,
  MemoryCompletionStore,
  MemoryEventLog,
  MemoryInstanceStore,
  MemoryPropertyStore,
  type BusMessage,
  type Logger,
} from '@tidewater/core';
import { QueueLeaseError, RedisEventBus, isBusMessage } from '../src/event-bus';
import { RedisContactSerializer } from '../src/contact-lock';
import { FakeRedis } from './fake-redis';

function recordingLogger(lines: string[]): Logger {
  return {
    info: m => lines.push(`info ${m}`),
    warn: m => lines.push(`warn ${m}`),
    error: m => lines.push(`error ${m}`),
  };
}

const resume = (instanceId: string): BusMessage => ({ kind: 'resume', instanceId, contactId: 'c1', wakeAt: 100 });

describe('RedisEventBus', () => {
  let redis: FakeRedis;
  let lines: string[];
  let bus: RedisEventBus;

  beforeEach(() => {
    redis = new FakeRedis();
    lines = [];
    bus = new RedisEventBus({
      client: redis,
      consumer: redis,
      blockSeconds: 0.01,
      reconnectDelayMs: 1,
      logger: recordingLogger(lines),
    });
  });

  afterEach(async () => {
    await bus.close();
  });

  it('enqueues published messages as JSON', async () => {
    await bus.publish(resume('i1'));

    expect(redis.list('tw:bus')).toEqual([JSON.stringify(resume('i1'))]);
  });

  it('delivers queued messages to subscribers in publish order', async () => {
    const seen: string[] = [];
    bus.subscribe(async m => { if (m.kind === 'resume') seen.push(m.instanceId); });

    await bus.publish(resume('i1'));
    await bus.publish(resume('i2'));
    await bus.start();

    await vi.waitFor(() => expect(seen).toEqual(['i1', 'i2']));
    expect(bus.isRunning).toBe(true);
  });

  it('drops malformed messages with a warning', async () => {
    const seen: BusMessage[] = [];
    bus.subscribe(async m => { seen.push(m); });

    await redis.lPush('tw:bus', 'not json');
    await redis.lPush('tw:bus', JSON.stringify({ kind: 'resume', instanceId: 'i1' }));
    await bus.publish(resume('i3'));
    await bus.start();

    await vi.waitFor(() => expect(seen).toEqual([resume('i3')]));
    expect(lines).toEqual([
      'warn [RedisEventBus] Dropping malformed message from tw:bus',
      'warn [RedisEventBus] Dropping malformed message from tw:bus',
    ]);
  });

  it('logs subscriber failures and keeps consuming', async () => {
    const seen: string[] = [];
    bus.subscribe(async m => {
      if (m.kind === 'resume' && m.instanceId === 'bad') throw new Error('handler broke');
      if (m.kind === 'resume') seen.push(m.instanceId);
    });

    await bus.publish(resume('bad'));
    await bus.publish(resume('good'));
    await bus.start();

    await vi.waitFor(() => expect(seen).toEqual(['good']));
    expect(lines).toEqual(['error [RedisEventBus] Subscriber failed on resume message']);
  });

  it('retries after BRPOP fails', async () => {
    let calls = 0;
    const flaky = new RedisEventBus({
      client: redis,
      consumer: {
        brPop: (key, timeout) => {
          calls++;
          return calls === 1 ? Promise.reject(new Error('socket closed')) : redis.brPop(key, timeout);
        },
      },
      blockSeconds: 0.01,
      reconnectDelayMs: 1,
      logger: recordingLogger(lines),
    });
    const seen: BusMessage[] = [];
    flaky.subscribe(async m => { seen.push(m); });

    await flaky.publish(resume('i1'));
    await flaky.start();

    await vi.waitFor(() => expect(seen).toEqual([resume('i1')]));
    await flaky.close();
    expect(lines[0]).toBe('error [RedisEventBus] BRPOP failed');
  });

  it('keeps delivering while another contact is still being handled', async () => {
    let release = () => {};
    const gate = new Promise<void>(resolve => { release = resolve; });
    const seen: string[] = [];
    const done: string[] = [];
    bus.subscribe(async m => {
      if (m.kind !== 'resume') return;
      seen.push(m.contactId);
      if (m.contactId === 'slow') await gate;
      done.push(m.contactId);
    });

    await bus.publish({ kind: 'resume', instanceId: 'i1', contactId: 'slow', wakeAt: 100 });
    await bus.publish({ kind: 'resume', instanceId: 'i2', contactId: 'fast', wakeAt: 100 });
    await bus.start();

    await vi.waitFor(() => expect(done).toEqual(['fast']));
    expect(seen).toEqual(['slow', 'fast']);

    release();
    await bus.close();
    expect(done).toEqual(['fast', 'slow']);
  });

  it('stops popping at the concurrency limit', async () => {
    const serial = new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, concurrency: 1 });
    let release = () => {};
    const gate = new Promise<void>(resolve => { release = resolve; });
    const seen: string[] = [];
    serial.subscribe(async m => {
      if (m.kind !== 'resume') return;
      seen.push(m.contactId);
      if (m.contactId === 'slow') await gate;
    });
    const fast: BusMessage = { kind: 'resume', instanceId: 'i2', contactId: 'fast', wakeAt: 100 };

    await serial.publish({ kind: 'resume', instanceId: 'i1', contactId: 'slow', wakeAt: 100 });
    await serial.publish(fast);
    await serial.start();

    await vi.waitFor(() => expect(seen).toEqual(['slow']));
    expect(redis.list('tw:bus')).toEqual([JSON.stringify(fast)]);

    release();
    await vi.waitFor(() => expect(seen).toEqual(['slow', 'fast']));
    await serial.close();
  });

  it('stops consuming on close', async () => {
    await bus.start();
    await bus.close();
    await bus.publish(resume('late'));

    expect(bus.isRunning).toBe(false);
    expect(redis.list('tw:bus')).toHaveLength(1);
  });
});

describe('queue lease', () => {
  let redis: FakeRedis;
  let lines: string[];
  let first: RedisEventBus;
  let second: RedisEventBus;

  beforeEach(() => {
    redis = new FakeRedis();
    lines = [];
    first = new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, logger: recordingLogger(lines) });
    second = new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, logger: recordingLogger(lines) });
  });

  afterEach(async () => {
    await first.close();
    await second.close();
  });

  it('refuses a second bus on the same queue', async () => {
    await first.start();

    await expect(second.start()).rejects.toBeInstanceOf(QueueLeaseError);
    await expect(second.publish(resume('i1'))).rejects.toThrow('Queue "tw:bus" is held by another engine');
    expect(second.isRunning).toBe(false);
    expect(redis.list('tw:bus')).toEqual([]);
  });

  it('hands the queue over once the holder closes', async () => {
    const seen: BusMessage[] = [];
    second.subscribe(async m => { seen.push(m); });

    await first.publish(resume('i1'));
    await first.close();
    expect(first.holdsLease).toBe(false);

    await second.start();
    await vi.waitFor(() => expect(seen).toEqual([resume('i1')]));
    expect(second.holdsLease).toBe(true);
  });

  it('stops consuming when the lease is taken over', async () => {
    const renewing = new RedisEventBus({
      client: redis,
      consumer: redis,
      blockSeconds: 0.01,
      leaseMs: 20,
      logger: recordingLogger(lines),
    });
    await renewing.start();
    redis.put('tw:bus:lease', 'someone-else');

    await vi.waitFor(() => expect(renewing.isRunning).toBe(false));
    expect(renewing.holdsLease).toBe(false);
    expect(lines).toEqual(['error [RedisEventBus] Lost the lease on tw:bus; stopping']);
    await renewing.close();
    expect(redis.raw('tw:bus:lease')).toBe('someone-else');
  });
});

describe('isBusMessage', () => {
  it('accepts each message kind', () => {
    expect(isBusMessage(resume('i1'))).toBe(true);
    expect(isBusMessage({ kind: 'event', event: { id: 'e1', contactId: 'c1', type: 'clicked', payload: {}, timestamp: 0 } })).toBe(true);
    expect(isBusMessage({ kind: 'property_change', change: { id: 'p1', contactId: 'c1', key: 'plan', oldValue: null, newValue: 'pro', timestamp: 0 } })).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isBusMessage({ kind: 'resume', instanceId: 'i1', contactId: 'c1' })).toBe(false);
    expect(isBusMessage({ kind: 'tick' })).toBe(false);
    expect(isBusMessage('resume')).toBe(false);
  });
});

describe('Engine on Redis', () => {
  it('runs triggered flows through the queue and the contact lock', async () => {
    const redis = new FakeRedis();
    const quiet = recordingLogger([]);
    const bus = new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, logger: quiet });
    const properties = new MemoryPropertyStore({ properties: { welcomed: { type: 'boolean' } } });
    const engine = new Engine(
      {
        properties,
        eventLog: new MemoryEventLog(),
        instances: new MemoryInstanceStore(),
        completions: new MemoryCompletionStore(),
        bus,
        serializer: new RedisContactSerializer(redis, { retryDelayMs: 1, logger: quiet }),
      },
      { logger: quiet }
    );

    await engine.defineFlow({
      id: 'welcome',
      version: '1.0.0',
      trigger: { type: 'event', eventType: 'signed_up' },
      steps: [{ type: 'action', handler: 'set_property', params: { key: 'welcomed', value: true } }],
    });
    await engine.start();

    await engine.track('c1', 'signed_up');

    await vi.waitFor(async () => expect(await properties.get('c1', 'welcomed')).toBe(true));
    await engine.close();
    expect(bus.isRunning).toBe(false);
  });

  it('refuses to start a second engine on the same queue', async () => {
    const redis = new FakeRedis();
    const quiet = recordingLogger([]);
    const engineOn = (bus: RedisEventBus) =>
      new Engine(
        {
          properties: new MemoryPropertyStore({ properties: { welcomed: { type: 'boolean' } } }),
          eventLog: new MemoryEventLog(),
          instances: new MemoryInstanceStore(),
          completions: new MemoryCompletionStore(),
          bus,
          serializer: new RedisContactSerializer(redis, { retryDelayMs: 1, logger: quiet }),
        },
        { logger: quiet }
      );
    const first = engineOn(new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, logger: quiet }));
    const second = engineOn(new RedisEventBus({ client: redis, consumer: redis, blockSeconds: 0.01, logger: quiet }));

    await first.start();
    await expect(second.start()).rejects.toBeInstanceOf(QueueLeaseError);
    expect(second.health().running).toBe(false);

    await first.close();
    await second.start();
    expect(second.health().running).toBe(true);
    await second.close();
  });
});
