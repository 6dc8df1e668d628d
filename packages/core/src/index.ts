// Types
export type { PropertyType, PropertyDefinition, PropertySchema, ContactSnapshot, ContactEvent, PropertyChange, WriteOptions } from './types/contact';
export type { PredicateOp, ComparisonPredicate, Predicate, EventCondition, PropertyCondition, Condition } from './types/predicate';
export type {
  RetryPolicy,
  NowTrigger,
  AtTrigger,
  EventTrigger,
  PropertyTrigger,
  TriggerSpec,
  ActionStep,
  DecisionBranch,
  DecisionStep,
  DelaySpec,
  DelayStep,
  Step,
  FlowDefinition,
} from './types/flow';
export type {
  StepPointer,
  InstanceStatus,
  TerminalStatus,
  InstanceFailure,
  RetryState,
  StepHistory,
  CauseRecord,
  FlowInstance,
} from './types/instance';
export { OTHERWISE_BRANCH, TERMINAL_STATUSES, ACTIVE_STATUSES, isTerminal } from './types/instance';
export type { Continuation, ContinuationTarget, CompletionGroup } from './types/completion';
export type { BusMessage, BusMessageKind } from './types/messages';
export { messageContact } from './types/messages';
export type { ActionResult, ActionError } from './types/result';
export { Result } from './types/result';
export {
  TidewaterError,
  FlowValidationError,
  FlowNotFoundError,
  InstanceNotFoundError,
  PropertyValidationError,
  DuplicateInstanceError,
  RetryableActionError,
  FatalActionError,
  SchedulerDurabilityError,
  SchedulerHaltedError,
} from './types/errors';
export type { ValidationIssue } from './types/errors';

// Interfaces
export type { PropertyStore, PropertyChangeListener } from './interfaces/property-store';
export type { EventLog, ContactEventListener } from './interfaces/event-log';
export type { InstanceStore } from './interfaces/instance-store';
export type { CompletionStore } from './interfaces/completion-store';
export type { FlowRegistry, FlowStore, StoredFlow } from './interfaces/flow-registry';
export type { ActionHandler, ActionParams, ActionContext, HandlerMetadata, JSONSchema } from './interfaces/action-handler';
export type { ActionRegistry } from './interfaces/action-registry';
export type { EventBus, BusSubscriber } from './interfaces/event-bus';
export type { ContactSerializer } from './interfaces/contact-serializer';
export type { SegmentResolver, TimezoneProvider } from './interfaces/collaborators';
export type { TriggerLedger } from './interfaces/trigger-ledger';
export type { Clock, ControllableClock } from './interfaces/clock';
export type { Logger, AlertSink, OperatorAlert } from './interfaces/logger';
export type { LifecycleEvents } from './interfaces/lifecycle-events';

// Engine
export {
  Engine,
  type EngineAdapters,
  type EngineOptions,
  type TriggerFiring,
  type InstanceStatusReport,
  type RecoveryReport,
  type EngineHealth,
  RECOVERY_PAGE_SIZE,
} from './engine/engine';
export { createMemoryEngine, type MemoryEngine, type MemoryEngineOptions } from './engine/memory-engine';
export { InstanceManager, type CreateResult, type StimulusOutcome, resultFromError } from './engine/instance-manager';
export { DelayScheduler, type DelaySchedulerOptions, type TimedDelay } from './engine/delay-scheduler';
export { CompletionAggregator, type CompletionAggregatorOptions } from './engine/completion-aggregator';
export { TriggerMatcher, type DedupPolicy } from './engine/trigger-matcher';
export { evaluatePredicate, conditionMatches, validatePredicate, type PredicateScope, type Stimulus } from './engine/predicates';
export { interpolate, resolveParams } from './engine/template';
export { parseWallClock, nextLocalOccurrence, isValidTimezone, type WallClockTime } from './engine/wall-clock';
export { formatPointer } from './engine/step-cursor';

// Actions
export { builtinActions, setPropertyAction, incrementPropertyAction, fireEventAction, setVariableAction } from './actions';

// Implementations
export { MemoryPropertyStore } from './impl/memory-property-store';
export { MemoryEventLog } from './impl/memory-event-log';
export { MemoryInstanceStore } from './impl/memory-instance-store';
export { MemoryCompletionStore } from './impl/memory-completion-store';
export { MemoryTriggerLedger } from './impl/memory-trigger-ledger';
export { MemoryFlowStore } from './impl/memory-flow-store';
export { DefaultFlowRegistry } from './impl/flow-registry';
export { EventEmittingFlowRegistry } from './impl/event-emitting-flow-registry';
export { DefaultActionRegistry, checkParams, paramsReader } from './impl/action-registry';
export { KeyedSerializer } from './impl/keyed-serializer';
export { LocalEventBus } from './impl/local-event-bus';
export { SystemClock, ManualClock, isControllable } from './impl/clock';
export { StaticSegmentResolver, StaticTimezoneProvider, PropertyTimezoneProvider } from './impl/static-providers';
export { createLogger, LoggerAlertSink, MemoryAlertSink } from './impl/console-logger';
export { checkProperty, buildPropertySchema, getAjv } from './impl/property-validation';

// Event Dispatcher
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type EventType,
  type DispatchedEvent,
  type EventListener,
} from './impl/event-dispatcher';

// Utils
export { generateId, getPath, setPath, isRecord, sleep } from './utils';
export { validateFlow, type ValidateFlowOptions } from './utils/validation';
