// Schema
export { schema, SCHEMA_VERSION, applySchema } from './schema';

// Stores
export { PgInstanceStore } from './instance-store';
export { PgFlowStore } from './flow-store';
export { PgCompletionStore } from './completion-store';
export { PgPropertyStore } from './property-store';
export { PgEventLog } from './event-log';
export { PgTriggerLedger } from './trigger-ledger';
export {
  type Queryable,
  type ConnectionPool,
  type PooledConnection,
  type Row,
  isUniqueViolation,
  withTransaction,
} from './queryable';

// Factory
export { createPgStores, connectPgStores, type PgStores, type PgStoreOptions, type PgConnection } from './factory';
