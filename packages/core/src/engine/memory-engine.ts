import type { PropertySchema } from '../types/contact';
import type { SegmentResolver, TimezoneProvider } from '../interfaces/collaborators';
import type { ActionHandler } from '../interfaces/action-handler';
import { MemoryPropertyStore } from '../impl/memory-property-store';
import { MemoryEventLog } from '../impl/memory-event-log';
import { MemoryInstanceStore } from '../impl/memory-instance-store';
import { MemoryCompletionStore } from '../impl/memory-completion-store';
import { MemoryTriggerLedger } from '../impl/memory-trigger-ledger';
import { MemoryFlowStore } from '../impl/memory-flow-store';
import { SystemClock } from '../impl/clock';
import { Engine, type EngineOptions } from './engine';

export interface MemoryEngineOptions extends EngineOptions {
  schema: PropertySchema;
  segments?: SegmentResolver;
  timezones?: TimezoneProvider;
  /** Registered alongside the built-in actions */
  actions?: ActionHandler[];
}

export interface MemoryEngine {
  engine: Engine;
  properties: MemoryPropertyStore;
  eventLog: MemoryEventLog;
  instances: MemoryInstanceStore;
  completions: MemoryCompletionStore;
  ledger: MemoryTriggerLedger;
  flowStore: MemoryFlowStore;
}

/**
 * Engine on in-memory adapters. Single process; state is lost on exit.
 */
export function createMemoryEngine(options: MemoryEngineOptions): MemoryEngine {
  const { schema, segments, timezones, actions = [], ...engineOptions } = options;
  const clock = engineOptions.clock ?? new SystemClock();

  const properties = new MemoryPropertyStore(schema, clock);
  const eventLog = new MemoryEventLog(clock);
  const instances = new MemoryInstanceStore();
  const completions = new MemoryCompletionStore();
  const ledger = new MemoryTriggerLedger();
  const flowStore = new MemoryFlowStore();

  const engine = new Engine(
    { properties, eventLog, instances, completions, ledger, flowStore, segments, timezones },
    { ...engineOptions, clock }
  );
  engine.actions.registerAll(actions);

  return { engine, properties, eventLog, instances, completions, ledger, flowStore };
}
