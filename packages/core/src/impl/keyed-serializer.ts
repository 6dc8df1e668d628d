import type { ContactSerializer } from '../interfaces/contact-serializer';

/**
 * In-process per-contact critical sections: a promise chain per key.
 * Not reentrant; work inside a section must never wait on the same key.
 */
export class KeyedSerializer implements ContactSerializer {
  private tails = new Map<string, Promise<void>>();

  run<T>(contactId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(contactId) ?? Promise.resolve();
    const result = prev.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(contactId, tail);
    void tail.then(() => {
      if (this.tails.get(contactId) === tail) this.tails.delete(contactId);
    });
    return result;
  }

  /** Keys with queued or running work */
  activeKeys(): number {
    return this.tails.size;
  }
}
