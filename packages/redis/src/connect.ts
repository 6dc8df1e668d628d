import { createClient, type RedisClientOptions } from 'redis';
import { createLogger, type Logger } from '@tidewater/core';
import { RedisEventBus, type RedisEventBusOptions } from './event-bus';
import { RedisContactSerializer, type RedisContactSerializerOptions } from './contact-lock';

export interface RedisAdaptersOptions {
  /** Passed to node-redis createClient() */
  client?: RedisClientOptions;
  bus?: Omit<RedisEventBusOptions, 'client' | 'consumer' | 'logger'>;
  lock?: Omit<RedisContactSerializerOptions, 'logger'>;
  logger?: Logger;
}

export interface RedisAdapters {
  bus: RedisEventBus;
  serializer: RedisContactSerializer;
  /** Stop consuming, then disconnect both connections */
  close(): Promise<void>;
}

/**
 * Connect the bus and contact lock for an Engine.
 *
 * Opens two connections: one for commands and one that the bus's BRPOP
 * blocks.
 *
 * ```typescript
 * const redis = await connectRedisAdapters({ client: { url: process.env.REDIS_URL } });
 * const engine = new Engine({ ...stores, bus: redis.bus, serializer: redis.serializer });
 * await engine.start();
 * ```
 */
export async function connectRedisAdapters(options: RedisAdaptersOptions = {}): Promise<RedisAdapters> {
  const logger = createLogger('Redis', options.logger);
  const client = createClient(options.client);
  const consumer = client.duplicate();
  client.on('error', err => logger.error('Command connection error', err));
  consumer.on('error', err => logger.error('Consumer connection error', err));
  await Promise.all([client.connect(), consumer.connect()]);
  logger.info('Connected');

  const bus = new RedisEventBus({ ...options.bus, client, consumer, logger: options.logger });
  const serializer = new RedisContactSerializer(client, { ...options.lock, logger: options.logger });

  return {
    bus,
    serializer,
    async close() {
      await bus.close();
      await Promise.all([client.quit(), consumer.quit()]);
      logger.info('Disconnected');
    },
  };
}
