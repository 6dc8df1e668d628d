import type { FlowDefinition } from '../types/flow';
import type { ContactEvent, ContactSnapshot, PropertyChange } from '../types/contact';
import { evaluatePredicate, scopeFor } from './predicates';

/**
 * What happens when a trigger matches a (contact, flow) pair that already
 * has a non-terminal instance. Only dropping is supported.
 */
export type DedupPolicy = 'drop';

function byId(a: FlowDefinition, b: FlowDefinition): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Finds the flows a stimulus should start. Pure: no state, no I/O.
 * Results are ordered by flow id so fan-out is deterministic.
 */
export class TriggerMatcher {
  readonly dedup: DedupPolicy = 'drop';

  matchEvent(event: ContactEvent, snapshot: ContactSnapshot, flows: readonly FlowDefinition[]): FlowDefinition[] {
    const scope = scopeFor({ kind: 'event', event }, snapshot);
    return flows
      .filter(flow => {
        const trigger = flow.trigger;
        if (trigger.type !== 'event' || trigger.eventType !== event.type) return false;
        return trigger.where ? evaluatePredicate(trigger.where, scope) : true;
      })
      .sort(byId);
  }

  matchChange(change: PropertyChange, snapshot: ContactSnapshot, flows: readonly FlowDefinition[]): FlowDefinition[] {
    const scope = scopeFor({ kind: 'property_change', change }, snapshot);
    return flows
      .filter(flow => {
        const trigger = flow.trigger;
        if (trigger.type !== 'property' || trigger.key !== change.key) return false;
        return trigger.where ? evaluatePredicate(trigger.where, scope) : true;
      })
      .sort(byId);
  }

  /** `at` flows due at `now` */
  dueAt(now: number, flows: readonly FlowDefinition[]): FlowDefinition[] {
    return flows.filter(flow => flow.trigger.type === 'at' && flow.trigger.at <= now).sort(byId);
  }
}
