import { KeyedSerializer, TidewaterError, createLogger, generateId, isRecord, sleep } from '@tidewater/core';
import type { ContactSerializer, Logger } from '@tidewater/core';
import type { RedisCommands } from './commands';

export interface ContactLock {
  release(): Promise<void>;
  extend(ttlMs: number): Promise<boolean>;
}

export interface RedisContactSerializerOptions {
  /** Key prefix (default: "tw:contact:") */
  prefix?: string;
  /** Lock lifetime; renewed while the section runs (default: 30s) */
  ttlMs?: number;
  /** Pause between acquisition attempts (default: 25ms) */
  retryDelayMs?: number;
  /** Give up acquiring after this long (default: 10s) */
  maxWaitMs?: number;
  logger?: Logger;
}

export class ContactLockTimeoutError extends TidewaterError {
  constructor(public readonly contactId: string, waitedMs: number) {
    super('LOCK_TIMEOUT', `Could not lock contact "${contactId}" within ${waitedMs}ms`);
    this.name = 'ContactLockTimeoutError';
  }
}

function ownerOf(stored: unknown): string | undefined {
  if (typeof stored !== 'string') return undefined;
  const parsed: unknown = JSON.parse(stored);
  return isRecord(parsed) && typeof parsed.owner === 'string' ? parsed.owner : undefined;
}

/**
 * Per-contact critical sections across processes.
 *
 * Work for a contact is chained in-process first, then runs under a
 * Redis lock so engines sharing a database never interleave on one contact.
 */
export class RedisContactSerializer implements ContactSerializer {
  private local = new KeyedSerializer();
  private prefix: string;
  private ttlMs: number;
  private retryDelayMs: number;
  private maxWaitMs: number;
  private logger: Logger;

  constructor(private redis: RedisCommands, options: RedisContactSerializerOptions = {}) {
    this.prefix = options.prefix ?? 'tw:contact:';
    this.ttlMs = options.ttlMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 25;
    this.maxWaitMs = options.maxWaitMs ?? 10_000;
    this.logger = createLogger('ContactLock', options.logger);
  }

  run<T>(contactId: string, fn: () => Promise<T>): Promise<T> {
    return this.local.run(contactId, async () => {
      const lock = await this.waitFor(contactId);
      const renew = setInterval(() => {
        lock.extend(this.ttlMs).then(
          held => { if (!held) this.logger.warn(`Lost lock for contact ${contactId}`); },
          (err: unknown) => this.logger.error(`Renewing lock for contact ${contactId} failed`, err)
        );
      }, Math.max(1, Math.floor(this.ttlMs / 2)));
      try {
        return await fn();
      } finally {
        clearInterval(renew);
        await lock.release();
      }
    });
  }

  /**
   * Try to acquire a contact lock once.
   * Returns null if another owner holds it.
   */
  async acquire(contactId: string): Promise<ContactLock | null> {
    const owner = generateId();
    const lockKey = `${this.prefix}${contactId}`;

    const result = await this.redis.set(lockKey, JSON.stringify({ owner, acquiredAt: Date.now() }), {
      NX: true,
      PX: this.ttlMs,
    });
    if (result === null) return null;

    return {
      release: async () => {
        // Only release if we still own it
        if (ownerOf(await this.redis.get(lockKey)) === owner) {
          await this.redis.del(lockKey);
        }
      },
      extend: async (ttlMs: number) => {
        if (ownerOf(await this.redis.get(lockKey)) !== owner) return false;
        await this.redis.pExpire(lockKey, ttlMs);
        return true;
      },
    };
  }

  private async waitFor(contactId: string): Promise<ContactLock> {
    const started = Date.now();
    for (;;) {
      const lock = await this.acquire(contactId);
      if (lock) return lock;
      const waited = Date.now() - started;
      if (waited >= this.maxWaitMs) throw new ContactLockTimeoutError(contactId, waited);
      await sleep(this.retryDelayMs);
    }
  }
}
