import type { CompletionGroup, Continuation } from '../types/completion';
import type { CompletionStore } from '../interfaces/completion-store';
import type { LifecycleEvents } from '../interfaces/lifecycle-events';
import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';

export interface CompletionAggregatorOptions {
  store: CompletionStore;
  clock: Clock;
  logger: Logger;
  events?: LifecycleEvents;
  /**
   * Runs a group's continuation. Writes it makes must carry
   * `parentCauseId` so they join the parent chain.
   */
  runContinuation: (continuation: Continuation, parentCauseId: string | undefined) => Promise<void>;
}

/**
 * Tracks instances spawned by each cause until all of them, and every
 * cause they produced in turn, have finished.
 *
 * Groups live in memory while unresolved and are written through to the
 * CompletionStore. Mutations for one group happen inside the critical
 * section of its contact.
 */
export class CompletionAggregator {
  private readonly groups = new Map<string, CompletionGroup>();
  private readonly waiters = new Map<string, Array<() => void>>();
  private readonly pendingContinuations = new Map<string, Continuation>();
  private persisting: Promise<void> = Promise.resolve();

  constructor(private readonly opts: CompletionAggregatorOptions) {}

  /**
   * Register a cause before its fan-out is dispatched. Synchronous so a
   * write made inside an instance is linked to its parent before the
   * instance can finish.
   */
  reserve(causeId: string, meta: { contactId: string; parentCauseId?: string }): void {
    if (this.groups.has(causeId)) return;

    const parent = meta.parentCauseId ? this.groups.get(meta.parentCauseId) : undefined;
    const group: CompletionGroup = {
      causeId,
      parentCauseId: parent && !parent.resolved ? parent.causeId : undefined,
      contactId: meta.contactId,
      spawned: [],
      members: [],
      children: [],
      pending: true,
      resolved: false,
      createdAt: this.opts.clock.now(),
    };

    const continuation = this.pendingContinuations.get(causeId);
    if (continuation) {
      group.continuation = continuation;
      this.pendingContinuations.delete(causeId);
    }

    this.groups.set(causeId, group);
    if (parent && !parent.resolved) {
      parent.children.push(causeId);
      this.persist(parent);
    }
    this.persist(group);
  }

  /**
   * Record the instances a cause spawned. Resolves the group at once when
   * nothing is outstanding.
   */
  async open(causeId: string, memberIds: string[], contactId?: string): Promise<void> {
    let group = this.groups.get(causeId);
    if (!group) {
      // Causes dispatched without a reservation (e.g. published by another process)
      if (!contactId) return;
      this.reserve(causeId, { contactId });
      group = this.groups.get(causeId);
      if (!group) return;
    }
    group.spawned.push(...memberIds);
    group.members.push(...memberIds);
    group.pending = false;
    this.persist(group);
    await this.tryResolve(group);
    await this.persisting;
  }

  /**
   * Record that an instance reached a terminal status.
   */
  async notifyTerminal(instanceId: string, causeId: string): Promise<void> {
    const group = this.groups.get(causeId);
    if (!group) return;
    const before = group.members.length;
    group.members = group.members.filter(id => id !== instanceId);
    if (group.members.length === before) return;
    this.persist(group);
    await this.tryResolve(group);
    await this.persisting;
  }

  /**
   * Store a continuation to run when `causeId` resolves.
   */
  attachContinuation(causeId: string, continuation: Continuation): void {
    const group = this.groups.get(causeId);
    if (!group) {
      this.pendingContinuations.set(causeId, continuation);
      return;
    }
    if (group.resolved) {
      throw new Error(`Cause "${causeId}" already resolved`);
    }
    group.continuation = continuation;
    this.persist(group);
  }

  /**
   * Wait until a cause resolves. Unknown and already-resolved causes
   * return at once.
   */
  async await(causeId: string): Promise<void> {
    const watch = await this.watch(causeId);
    if (watch) await watch.resolved;
  }

  /**
   * Look a cause up, in the store if it has left memory. Resolves to null
   * when it is unknown or already resolved, otherwise to a handle whose
   * `resolved` settles when it resolves.
   */
  async watch(causeId: string): Promise<{ resolved: Promise<void> } | null> {
    let group = this.groups.get(causeId);
    if (!group) {
      // Resolved groups leave memory; let their final write land first
      await this.persisting;
      const stored = await this.opts.store.load(causeId);
      if (!stored || stored.resolved) return null;
      // Recheck: it may have been loaded meanwhile
      group = this.groups.get(causeId) ?? stored;
      this.groups.set(causeId, group);
    }
    if (group.resolved) return null;

    const resolved = new Promise<void>(resolve => {
      const list = this.waiters.get(causeId) ?? [];
      list.push(resolve);
      this.waiters.set(causeId, list);
    });
    return { resolved };
  }

  /** Current state of a group, if known */
  async get(causeId: string): Promise<CompletionGroup | null> {
    const group = this.groups.get(causeId);
    if (group) return structuredClone(group);
    return this.opts.store.load(causeId);
  }

  isResolved(causeId: string): boolean {
    return !this.groups.has(causeId) || this.groups.get(causeId)?.resolved === true;
  }

  /**
   * Load unresolved groups after a restart.
   * Returns the groups that should be reconciled.
   */
  async recover(): Promise<CompletionGroup[]> {
    const unresolved = await this.opts.store.listUnresolved();
    for (const group of unresolved) {
      if (!this.groups.has(group.causeId)) this.groups.set(group.causeId, group);
    }
    return unresolved.map(g => structuredClone(g));
  }

  /**
   * Re-evaluate a recovered group: drop members that have since finished,
   * close a fan-out that never ran, then resolve if possible.
   */
  async reconcile(causeId: string, isTerminal: (instanceId: string) => Promise<boolean>): Promise<void> {
    const group = this.groups.get(causeId);
    if (!group || group.resolved) return;

    const remaining: string[] = [];
    for (const id of group.members) {
      if (!(await isTerminal(id))) remaining.push(id);
    }
    group.members = remaining;
    group.children = group.children.filter(child => !this.isResolved(child));
    if (group.pending) {
      this.opts.logger.warn(`Cause ${causeId} was never dispatched; closing it with no members`);
      group.pending = false;
    }
    this.persist(group);
    await this.tryResolve(group);
    await this.persisting;
  }

  /** Wait for outstanding writes to the store */
  flush(): Promise<void> {
    return this.persisting;
  }

  // --- Private ---

  private async tryResolve(group: CompletionGroup): Promise<void> {
    if (group.resolved || group.pending || group.members.length > 0 || group.children.length > 0) return;

    if (group.continuation && !group.continuationRan) {
      // Flag first: writes made by the continuation must not re-enter here
      group.continuationRan = true;
      try {
        await this.opts.runContinuation(group.continuation, group.parentCauseId);
      } catch (err) {
        this.opts.logger.error(`Continuation for cause ${group.causeId} failed`, err);
      }
      this.persist(group);
    }

    group.resolved = true;
    group.resolvedAt = this.opts.clock.now();
    this.persist(group);
    this.groups.delete(group.causeId);

    this.opts.events?.onCompletionResolved?.({
      causeId: group.causeId,
      contactId: group.contactId,
      spawned: group.spawned.length,
    });

    const waiting = this.waiters.get(group.causeId) ?? [];
    this.waiters.delete(group.causeId);
    for (const release of waiting) release();

    if (group.parentCauseId) {
      const parent = this.groups.get(group.parentCauseId);
      if (parent) {
        parent.children = parent.children.filter(id => id !== group.causeId);
        this.persist(parent);
        await this.tryResolve(parent);
      }
    }
  }

  private persist(group: CompletionGroup): void {
    const snapshot = structuredClone(group);
    this.persisting = this.persisting
      .then(() => this.opts.store.save(snapshot))
      .catch(err => this.opts.logger.error(`Failed to persist completion group ${snapshot.causeId}`, err));
  }
}
