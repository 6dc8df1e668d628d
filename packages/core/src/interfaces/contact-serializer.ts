/**
 * Exclusive per-contact critical section.
 * Work for one contact runs strictly in order; different contacts run
 * concurrently.
 */
export interface ContactSerializer {
  run<T>(contactId: string, fn: () => Promise<T>): Promise<T>;
}
