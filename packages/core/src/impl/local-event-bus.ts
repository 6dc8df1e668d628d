import type { EventBus, BusSubscriber } from '../interfaces/event-bus';
import type { BusMessage } from '../types/messages';

/**
 * In-process bus. publish() resolves once every subscriber has handled
 * the message and rejects with the first subscriber error.
 */
export class LocalEventBus implements EventBus {
  private subscribers = new Set<BusSubscriber>();

  async publish(message: BusMessage): Promise<void> {
    const results = await Promise.allSettled([...this.subscribers].map(s => s(message)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) throw failed.reason;
  }

  subscribe(subscriber: BusSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => { this.subscribers.delete(subscriber); };
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }
}
