import type { BusMessage } from '../types/messages';

export type BusSubscriber = (message: BusMessage) => Promise<void>;

/**
 * Publish/subscribe fan-out connecting adapters, scheduler and engine.
 * In-process by default; the redis package provides a distributed one.
 */
export interface EventBus {
  /** Deliver a message to every subscriber. Resolves once they have handled it. */
  publish(message: BusMessage): Promise<void>;

  /** Returns an unsubscribe function */
  subscribe(subscriber: BusSubscriber): () => void;

  /** Begin consuming, for buses that pull from a broker (optional) */
  start?(): void | Promise<void>;

  /** Release connections (optional) */
  close?(): Promise<void>;
}
