import type { ActionStep, DecisionStep, DelayStep, FlowDefinition, RetryPolicy, Step } from '../types/flow';
import type { CauseRecord, FlowInstance, StepHistory, StepPointer } from '../types/instance';
import { OTHERWISE_BRANCH, isTerminal } from '../types/instance';
import type { ContactEvent, ContactSnapshot, PropertyChange } from '../types/contact';
import type { Continuation, ContinuationTarget } from '../types/completion';
import type { ActionError, ActionResult } from '../types/result';
import { Result } from '../types/result';
import {
  DuplicateInstanceError,
  FatalActionError,
  InstanceNotFoundError,
  RetryableActionError,
  TidewaterError,
} from '../types/errors';
import type { ActionContext, ActionHandler, ActionParams } from '../interfaces/action-handler';
import type { ActionRegistry } from '../interfaces/action-registry';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { InstanceStore } from '../interfaces/instance-store';
import type { PropertyStore } from '../interfaces/property-store';
import type { EventLog } from '../interfaces/event-log';
import type { TimezoneProvider } from '../interfaces/collaborators';
import type { Clock } from '../interfaces/clock';
import type { AlertSink, Logger } from '../interfaces/logger';
import type { LifecycleEvents } from '../interfaces/lifecycle-events';
import { checkParams } from '../impl/action-registry';
import { generateId, setPath } from '../utils';
import { conditionMatches, evaluatePredicate, type PredicateScope, type Stimulus } from './predicates';
import { resolveParams } from './template';
import { START, enterBranch, isEnd, nextPointer, normalize, stepAt } from './step-cursor';
import { isValidTimezone } from './wall-clock';
import type { DelayScheduler } from './delay-scheduler';
import type { CompletionAggregator } from './completion-aggregator';

export interface InstanceManagerOptions {
  instances: InstanceStore;
  flows: FlowRegistry;
  actions: ActionRegistry;
  properties: PropertyStore;
  eventLog: EventLog;
  scheduler: DelayScheduler;
  aggregator: CompletionAggregator;
  timezones?: TimezoneProvider;
  clock: Clock;
  logger: Logger;
  alerts: AlertSink;
  events?: LifecycleEvents;
  maxSteps: number;
  defaultRetry: Required<RetryPolicy>;
  referenceTimezone: string;
  recordHistory: boolean;
  /** Aborts the handler's signal after this long */
  actionTimeoutMs: number;
}

export type CreateResult =
  | { readonly created: true; readonly instance: FlowInstance }
  | { readonly created: false; readonly reason: 'duplicate'; readonly existing: string };

/** What a stimulus did to an active instance */
export type StimulusOutcome = 'goal_reached' | 'resumed' | 'ignored';

type StepOutcome = 'continue' | 'suspend';

interface FailureInput {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Map a handler exception to a result. Anything but FatalActionError and
 * rejected property writes is retried.
 */
export function resultFromError(err: unknown): ActionResult {
  if (err instanceof FatalActionError) return Result.fatal(err.code, err.message, err.details);
  if (err instanceof RetryableActionError) return Result.retryable(err.code, err.message, err.details);
  if (err instanceof TidewaterError && err.code === 'VALIDATION_ERROR') return Result.fatal(err.code, err.message);
  return Result.retryable('HANDLER_ERROR', err instanceof Error ? err.message : String(err));
}

export function toContinuation(target: ContinuationTarget, contactId: string): Continuation {
  return target.kind === 'action'
    ? { kind: 'action', contactId, handler: target.handler, params: target.params ?? {} }
    : { kind: 'event', contactId, eventType: target.eventType, payload: target.payload ?? {} };
}

/**
 * Scope for params and decisions: the contact, the instance's variables
 * and whatever spawned it.
 */
export function instanceScope(instance: FlowInstance, contact: ContactSnapshot): PredicateScope {
  const { cause } = instance;
  return {
    contact: contact.properties,
    vars: instance.variables,
    event: cause.kind === 'event' ? { id: instance.causeId, type: cause.type, payload: cause.payload } : undefined,
    change:
      cause.kind === 'property_change'
        ? { key: cause.key, oldValue: cause.oldValue, newValue: cause.newValue }
        : undefined,
  };
}

/**
 * Creates instances and interprets their step trees.
 *
 * Every method expects to run inside the contact's critical section.
 */
export class InstanceManager {
  constructor(private readonly opts: InstanceManagerOptions) {}

  // ── Creation ──────────────────────────────────────────────────

  async create(flow: FlowDefinition, contactId: string, causeId: string, cause: CauseRecord): Promise<CreateResult> {
    const now = this.opts.clock.now();
    const instance: FlowInstance = {
      id: generateId(),
      flowId: flow.id,
      flowVersion: flow.version,
      contactId,
      causeId,
      cause,
      pointer: normalize(flow.steps, START),
      status: 'running',
      variables: {},
      stepCount: 0,
      history: this.opts.recordHistory ? [] : undefined,
      enteredAt: now,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.opts.instances.insert(instance);
    } catch (err) {
      if (err instanceof DuplicateInstanceError) {
        this.opts.logger.info(
          `Dropped ${flow.id} trigger for ${contactId}: instance ${err.existingInstanceId} is still active`
        );
        this.opts.events?.onTriggerDropped?.({
          flowId: flow.id,
          contactId,
          causeId,
          existingInstanceId: err.existingInstanceId,
        });
        return { created: false, reason: 'duplicate', existing: err.existingInstanceId };
      }
      throw err;
    }

    this.opts.events?.onInstanceCreated?.({ instanceId: instance.id, flowId: flow.id, contactId, causeId });
    return { created: true, instance };
  }

  // ── Execution ─────────────────────────────────────────────────

  /**
   * Run a `running` instance until it suspends or ends.
   */
  async advance(instanceId: string): Promise<FlowInstance> {
    const instance = await this.opts.instances.load(instanceId);
    if (!instance) throw new InstanceNotFoundError(instanceId);
    if (instance.status !== 'running') return instance;
    return this.run(instance);
  }

  /**
   * Handle a due wake. Stale wakes (the instance moved on, or was
   * rescheduled) are ignored; early ones are queued again.
   */
  async resume(instanceId: string, wakeAt: number): Promise<FlowInstance | null> {
    const instance = await this.opts.instances.load(instanceId);
    if (!instance || isTerminal(instance.status)) return null;
    if (instance.wakeAt === undefined || instance.wakeAt !== wakeAt) {
      this.opts.logger.info(`Ignoring stale wake for ${instanceId}`);
      return null;
    }

    const now = this.opts.clock.now();
    if (instance.wakeAt > now) {
      this.opts.scheduler.enqueue(instance.id, instance.wakeAt);
      return instance;
    }

    const retrying = instance.status === 'running' && instance.retry !== undefined;
    if (instance.status !== 'waiting_delay' && !retrying) return null;

    instance.status = 'running';
    instance.wakeAt = undefined;
    instance.delayEnteredAt = undefined;
    instance.updatedAt = now;
    await this.opts.instances.save(instance);
    this.opts.events?.onInstanceResumed?.({
      instanceId,
      contactId: instance.contactId,
      reason: retrying ? 'retry' : 'wake',
    });
    return this.run(instance);
  }

  handleEvent(instance: FlowInstance, event: ContactEvent, contact?: ContactSnapshot): Promise<StimulusOutcome> {
    return this.handleStimulus(instance, { kind: 'event', event }, contact);
  }

  handlePropertyChange(
    instance: FlowInstance,
    change: PropertyChange,
    contact?: ContactSnapshot
  ): Promise<StimulusOutcome> {
    return this.handleStimulus(instance, { kind: 'property_change', change }, contact);
  }

  /**
   * Run a resolved group's continuation. Its writes carry `parentCauseId`.
   */
  async runContinuation(continuation: Continuation, parentCauseId: string | undefined): Promise<void> {
    const { contactId } = continuation;
    if (continuation.kind === 'event') {
      await this.opts.eventLog.append(contactId, continuation.eventType, continuation.payload, { parentCauseId });
      return;
    }

    const handler = this.opts.actions.get(continuation.handler);
    const contact = await this.opts.properties.getAll(contactId);
    let result: ActionResult;
    if (!handler) {
      result = Result.fatal('HANDLER_NOT_FOUND', `No handler for "${continuation.handler}"`);
    } else {
      const params = resolveParams(continuation.params, { contact: contact.properties });
      const invalid = checkParams(handler.metadata.paramsSchema, params);
      result = invalid
        ? Result.fatal('INVALID_PARAMS', `Invalid params for "${handler.type}": ${invalid}`)
        : await this.execute(handler, { params, contact, ctx: this.contextFor(contactId, parentCauseId, {}) });
    }

    if (result.outcome === 'failure') {
      const { code, message } = result.error;
      this.opts.logger.error(`Continuation ${continuation.handler} for ${contactId} failed: ${message}`);
      this.opts.alerts.alert({ severity: 'error', code, message, contactId, details: continuation });
    }
  }

  // ── Private ───────────────────────────────────────────────────

  private async handleStimulus(
    instance: FlowInstance,
    stimulus: Stimulus,
    snapshot?: ContactSnapshot
  ): Promise<StimulusOutcome> {
    if (isTerminal(instance.status)) return 'ignored';
    const flow = this.opts.flows.get(instance.flowId, instance.flowVersion);
    if (!flow) return 'ignored';
    const waiting = instance.status === 'waiting_event' && instance.waitingFor !== undefined;
    if (!flow.goal && !waiting) return 'ignored';
    const contact = snapshot ?? (await this.opts.properties.getAll(instance.contactId));

    if (flow.goal && conditionMatches(flow.goal, stimulus, contact, instance.variables)) {
      await this.reachGoal(instance);
      return 'goal_reached';
    }

    if (
      instance.status === 'waiting_event' &&
      instance.waitingFor &&
      conditionMatches(instance.waitingFor, stimulus, contact, instance.variables)
    ) {
      instance.status = 'running';
      instance.waitingFor = undefined;
      instance.delayEnteredAt = undefined;
      instance.updatedAt = this.opts.clock.now();
      await this.opts.instances.save(instance);
      this.opts.events?.onInstanceResumed?.({ instanceId: instance.id, contactId: instance.contactId, reason: 'event' });
      await this.run(instance);
      return 'resumed';
    }

    return 'ignored';
  }

  private async run(instance: FlowInstance): Promise<FlowInstance> {
    const flow = this.opts.flows.get(instance.flowId, instance.flowVersion);
    if (!flow) {
      await this.fail(instance, {
        code: 'FLOW_NOT_FOUND',
        message: `Flow "${instance.flowId}@${instance.flowVersion}" not found`,
      });
      return instance;
    }

    if (instance.stepCount === 0) {
      this.opts.events?.onInstanceStarted?.({ instanceId: instance.id, flowId: flow.id, contactId: instance.contactId });
    }

    while (instance.status === 'running') {
      if (isEnd(flow.steps, instance.pointer)) {
        await this.complete(instance);
        break;
      }
      if (instance.stepCount >= this.opts.maxSteps) {
        await this.fail(instance, { code: 'MAX_STEPS', message: `Exceeded ${this.opts.maxSteps} steps` });
        break;
      }
      const step = stepAt(flow.steps, instance.pointer);
      if (!step) {
        await this.fail(instance, { code: 'STEP_NOT_FOUND', message: `No step at [${instance.pointer.join(', ')}]` });
        break;
      }
      const outcome = await this.runStep(flow, instance, step);
      if (outcome === 'suspend') break;
    }

    return instance;
  }

  private runStep(flow: FlowDefinition, instance: FlowInstance, step: Step): Promise<StepOutcome> {
    const startedAt = this.opts.clock.now();
    instance.stepCount++;
    switch (step.type) {
      case 'action':
        return this.runAction(flow, instance, step, startedAt);
      case 'decision':
        return this.runDecision(flow, instance, step, startedAt);
      case 'delay':
        return this.runDelay(flow, instance, step, startedAt);
    }
  }

  private async runAction(
    flow: FlowDefinition,
    instance: FlowInstance,
    step: ActionStep,
    startedAt: number
  ): Promise<StepOutcome> {
    const pointer = instance.pointer;
    const handler = this.opts.actions.get(step.handler);
    let result: ActionResult;
    if (!handler) {
      result = Result.fatal('HANDLER_NOT_FOUND', `No handler for "${step.handler}"`);
    } else {
      const contact = await this.opts.properties.getAll(instance.contactId);
      const params = resolveParams(step.params, instanceScope(instance, contact));
      const invalid = checkParams(handler.metadata.paramsSchema, params);
      result = invalid
        ? Result.fatal('INVALID_PARAMS', `Invalid params for "${step.handler}": ${invalid}`)
        : await this.execute(handler, {
            params,
            step,
            instance,
            contact,
            ctx: this.contextFor(instance.contactId, instance.causeId, instance.variables),
          });
    }

    if (result.outcome === 'success') {
      if (step.outputKey && result.output !== undefined) {
        setPath(instance.variables, step.outputKey, result.output);
      }
      this.record(instance, pointer, step, 'success', startedAt);
      instance.retry = undefined;
      instance.pointer = nextPointer(flow.steps, pointer);
      instance.updatedAt = this.opts.clock.now();
      await this.opts.instances.save(instance);
      return 'continue';
    }

    if (result.error.retryable) {
      return this.retryOrFail(instance, step, result.error, startedAt);
    }
    this.record(instance, pointer, step, 'failure', startedAt, result.error);
    await this.fail(instance, result.error);
    return 'suspend';
  }

  private async retryOrFail(
    instance: FlowInstance,
    step: ActionStep,
    error: ActionError,
    startedAt: number
  ): Promise<StepOutcome> {
    const policy = { ...this.opts.defaultRetry, ...step.retry };
    const attempt = (instance.retry?.attempt ?? 0) + 1;

    if (attempt >= policy.maxAttempts) {
      this.record(instance, instance.pointer, step, 'failure', startedAt, error);
      await this.fail(instance, {
        code: error.code,
        message: error.message,
        details: { attempts: attempt, cause: error.details },
      });
      return 'suspend';
    }

    const backoffMs = Math.min(policy.backoffMs * policy.backoffMultiplier ** (attempt - 1), policy.maxBackoffMs);
    const now = this.opts.clock.now();
    const wakeAt = now + backoffMs;
    instance.retry = {
      attempt,
      maxAttempts: policy.maxAttempts,
      nextAttemptAt: wakeAt,
      lastError: { code: error.code, message: error.message },
    };
    instance.wakeAt = wakeAt;
    instance.updatedAt = now;
    this.record(instance, instance.pointer, step, 'retry', startedAt, error);
    await this.opts.instances.save(instance);
    this.opts.scheduler.enqueue(instance.id, wakeAt);

    this.opts.logger.warn(
      `Action ${step.handler} failed for ${instance.id} (attempt ${attempt}/${policy.maxAttempts}), retrying in ${backoffMs}ms: ${error.message}`
    );
    this.opts.events?.onActionRetry?.({
      instanceId: instance.id,
      handler: step.handler,
      attempt,
      maxAttempts: policy.maxAttempts,
      backoffMs,
      error: { code: error.code, message: error.message },
    });
    return 'suspend';
  }

  private async runDecision(
    flow: FlowDefinition,
    instance: FlowInstance,
    step: DecisionStep,
    startedAt: number
  ): Promise<StepOutcome> {
    const pointer = instance.pointer;
    const contact = await this.opts.properties.getAll(instance.contactId);
    const scope = instanceScope(instance, contact);
    const branch = step.branches.findIndex(b => evaluatePredicate(b.when, scope));

    if (branch >= 0) {
      instance.pointer = enterBranch(flow.steps, pointer, branch);
    } else if (step.otherwise) {
      instance.pointer = enterBranch(flow.steps, pointer, OTHERWISE_BRANCH);
    } else {
      instance.pointer = nextPointer(flow.steps, pointer);
    }

    this.record(instance, pointer, step, 'branch', startedAt, { branch: branch >= 0 ? branch : 'otherwise' });
    instance.updatedAt = this.opts.clock.now();
    await this.opts.instances.save(instance);
    return 'continue';
  }

  private async runDelay(
    flow: FlowDefinition,
    instance: FlowInstance,
    step: DelayStep,
    startedAt: number
  ): Promise<StepOutcome> {
    const pointer = instance.pointer;
    const { delay } = step;
    instance.pointer = nextPointer(flow.steps, pointer);

    if (delay.kind === 'event') {
      const now = this.opts.clock.now();
      instance.status = 'waiting_event';
      instance.waitingFor = delay.until;
      instance.delayEnteredAt = now;
      instance.updatedAt = now;
      this.record(instance, pointer, step, 'wait', startedAt);
      await this.opts.instances.save(instance);
      this.opts.events?.onInstanceWaiting?.({
        instanceId: instance.id,
        contactId: instance.contactId,
        status: 'waiting_event',
      });
      return 'suspend';
    }

    const timezone = await this.timezoneFor(flow, instance.contactId);
    let wakeAt: number;
    try {
      this.record(instance, pointer, step, 'wait', startedAt, { timezone });
      wakeAt = await this.opts.scheduler.schedule(instance, delay, timezone);
    } catch (err) {
      await this.fail(instance, {
        code: 'INVALID_DELAY',
        message: err instanceof Error ? err.message : String(err),
      });
      return 'suspend';
    }

    this.opts.events?.onInstanceWaiting?.({
      instanceId: instance.id,
      contactId: instance.contactId,
      status: 'waiting_delay',
      wakeAt,
    });
    return 'suspend';
  }

  private async complete(instance: FlowInstance): Promise<void> {
    const now = this.opts.clock.now();
    instance.status = 'completed';
    instance.wakeAt = undefined;
    instance.retry = undefined;
    instance.endedAt = now;
    instance.updatedAt = now;
    await this.opts.instances.save(instance);

    this.opts.logger.info(`Instance ${instance.id} of ${instance.flowId} completed (${instance.stepCount} steps)`);
    this.opts.events?.onInstanceCompleted?.({
      instanceId: instance.id,
      flowId: instance.flowId,
      contactId: instance.contactId,
      totalSteps: instance.stepCount,
    });
    await this.opts.aggregator.notifyTerminal(instance.id, instance.causeId);
  }

  private async reachGoal(instance: FlowInstance): Promise<void> {
    const now = this.opts.clock.now();
    const cancelledWakeAt = instance.wakeAt;
    instance.status = 'goal_reached';
    instance.wakeAt = undefined;
    instance.waitingFor = undefined;
    instance.retry = undefined;
    instance.endedAt = now;
    instance.updatedAt = now;
    this.opts.scheduler.cancel(instance.id);
    await this.opts.instances.save(instance);

    this.opts.logger.info(`Instance ${instance.id} of ${instance.flowId} reached its goal`);
    this.opts.events?.onGoalReached?.({
      instanceId: instance.id,
      flowId: instance.flowId,
      contactId: instance.contactId,
      cancelledWakeAt,
    });
    await this.opts.aggregator.notifyTerminal(instance.id, instance.causeId);
  }

  private async fail(instance: FlowInstance, failure: FailureInput): Promise<void> {
    const now = this.opts.clock.now();
    instance.status = 'failed';
    instance.failure = {
      code: failure.code,
      message: failure.message,
      pointer: instance.pointer,
      details: failure.details,
      timestamp: now,
    };
    instance.wakeAt = undefined;
    instance.waitingFor = undefined;
    instance.retry = undefined;
    instance.endedAt = now;
    instance.updatedAt = now;
    this.opts.scheduler.cancel(instance.id);
    await this.opts.instances.save(instance);

    this.opts.logger.error(`Instance ${instance.id} of ${instance.flowId} failed: ${failure.code} ${failure.message}`);
    this.opts.alerts.alert({
      severity: 'error',
      code: failure.code,
      message: failure.message,
      instanceId: instance.id,
      contactId: instance.contactId,
      details: failure.details,
    });
    this.opts.events?.onInstanceFailed?.({
      instanceId: instance.id,
      flowId: instance.flowId,
      contactId: instance.contactId,
      error: { code: failure.code, message: failure.message },
    });
    await this.opts.aggregator.notifyTerminal(instance.id, instance.causeId);
  }

  private async execute(handler: ActionHandler, params: Omit<ActionParams, 'signal'>): Promise<ActionResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.opts.actionTimeoutMs);
    try {
      return await handler.execute({ ...params, signal: controller.signal });
    } catch (err) {
      return resultFromError(err);
    } finally {
      clearTimeout(timeout);
    }
  }

  private contextFor(contactId: string, causeId: string | undefined, variables: Record<string, unknown>): ActionContext {
    const { properties, eventLog, aggregator } = this.opts;
    return {
      contactId,
      causeId,
      now: this.opts.clock.now(),
      getProperty: key => properties.get(contactId, key),
      setProperty: (key, value) => properties.set(contactId, key, value, { parentCauseId: causeId }),
      appendEvent: async (type, payload, options) => {
        const event = await eventLog.append(contactId, type, payload, { parentCauseId: causeId });
        if (options?.continuation) {
          aggregator.attachContinuation(event.id, toContinuation(options.continuation, contactId));
        }
        return event;
      },
      setVariable: (path, value) => setPath(variables, path, value),
    };
  }

  private async timezoneFor(flow: FlowDefinition, contactId: string): Promise<string> {
    const reference = this.opts.referenceTimezone;
    if (!flow.localTime || !this.opts.timezones) return reference;
    const zone = await this.opts.timezones.timezoneOf(contactId);
    if (zone === undefined) return reference;
    if (!isValidTimezone(zone)) {
      this.opts.logger.warn(`Contact ${contactId} has invalid timezone "${zone}"; using ${reference}`);
      return reference;
    }
    return zone;
  }

  private record(
    instance: FlowInstance,
    pointer: StepPointer,
    step: Step,
    outcome: StepHistory['outcome'],
    startedAt: number,
    detail?: unknown
  ): void {
    const completedAt = this.opts.clock.now();
    instance.history?.push({
      pointer,
      kind: step.type,
      label: step.name ?? step.id,
      outcome,
      startedAt,
      completedAt,
      detail,
    });
    this.opts.events?.onStepCompleted?.({
      instanceId: instance.id,
      pointer,
      kind: step.type,
      outcome,
      durationMs: completedAt - startedAt,
    });
  }
}
