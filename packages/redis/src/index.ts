export type { RedisCommands } from './commands';
export {
  RedisContactSerializer,
  ContactLockTimeoutError,
  type ContactLock,
  type RedisContactSerializerOptions,
} from './contact-lock';
export { RedisEventBus, QueueLeaseError, isBusMessage, type RedisEventBusOptions } from './event-bus';
export { connectRedisAdapters, type RedisAdapters, type RedisAdaptersOptions } from './connect';
