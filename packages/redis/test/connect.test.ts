import { describe, it, expect, vi } from 'vitest';
import type { BusMessage, Logger } from '@tidewater/core';
import { connectRedisAdapters } from '../src/connect';

const state = vi.hoisted(() => {
  const options: unknown[] = [];
  return { connected: 0, quit: 0, options };
});

vi.mock('redis', async () => {
  const { FakeRedis } = await import('./fake-redis');

  class FakeClient extends FakeRedis {
    duplicate(): FakeClient {
      return this;
    }
    on(): this {
      return this;
    }
    async connect(): Promise<void> {
      state.connected++;
    }
    async quit(): Promise<void> {
      state.quit++;
    }
  }

  return {
    createClient: (options: unknown) => {
      state.options.push(options);
      return new FakeClient();
    },
  };
});

describe('connectRedisAdapters', () => {
  it('opens two connections and wires the bus and lock to them', async () => {
    const lines: string[] = [];
    const logger: Logger = {
      info: m => lines.push(`info ${m}`),
      warn: m => lines.push(`warn ${m}`),
      error: m => lines.push(`error ${m}`),
    };

    const redis = await connectRedisAdapters({
      client: { url: 'redis://localhost:6379' },
      bus: { blockSeconds: 0.01 },
      logger,
    });

    expect(state.options).toEqual([{ url: 'redis://localhost:6379' }]);
    expect(state.connected).toBe(2);

    const received: BusMessage[] = [];
    redis.bus.subscribe(async message => {
      received.push(message);
    });
    await redis.bus.start();
    await redis.bus.publish({ kind: 'resume', instanceId: 'i1', contactId: 'c1', wakeAt: 5 });
    await vi.waitFor(() => expect(received).toHaveLength(1));

    const order: string[] = [];
    await redis.serializer.run('c1', async () => {
      order.push('locked');
    });
    expect(order).toEqual(['locked']);

    await redis.close();
    expect(redis.bus.isRunning).toBe(false);
    expect(state.quit).toBe(2);
    expect(lines).toEqual(['info [Redis] Connected', 'info [Redis] Disconnected']);
  });
});
