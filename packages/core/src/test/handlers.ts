/**
 * Test Actions
 *
 * Action handlers that exercise the engine's failure paths.
 */
import type { ActionHandler } from '../interfaces/action-handler';
import { Result } from '../types/result';
import { FatalActionError } from '../types/errors';

/**
 * Echo: returns its params as output.
 */
export const echoAction: ActionHandler = {
  type: 'echo',
  metadata: { type: 'echo', name: 'Echo', paramsSchema: { type: 'object' } },
  async execute({ params }) {
    return Result.success(params);
  },
};

/**
 * Fails with a retryable result until `succeedOn` attempts have been made.
 * Counts are kept per instance.
 */
export function createFlakyAction(succeedOn: number): ActionHandler & { attempts: Map<string, number> } {
  const attempts = new Map<string, number>();
  return {
    type: 'flaky',
    attempts,
    metadata: { type: 'flaky', name: 'Flaky', paramsSchema: { type: 'object' } },
    async execute({ instance }) {
      const key = instance?.id ?? 'continuation';
      const n = (attempts.get(key) ?? 0) + 1;
      attempts.set(key, n);
      return n >= succeedOn ? Result.success({ attempts: n }) : Result.retryable('UPSTREAM_DOWN', `attempt ${n} failed`);
    },
  };
}

/**
 * Returns a fatal failure.
 */
export const failAction: ActionHandler = {
  type: 'fail',
  metadata: {
    type: 'fail',
    name: 'Fail',
    paramsSchema: {
      type: 'object',
      properties: { code: { type: 'string' }, message: { type: 'string' } },
    },
  },
  async execute({ params }) {
    const code = typeof params.code === 'string' ? params.code : 'TEST_FAILURE';
    const message = typeof params.message === 'string' ? params.message : 'Intentional failure';
    return Result.fatal(code, message);
  },
};

/**
 * Throws a plain Error, which the engine retries.
 */
export const throwAction: ActionHandler = {
  type: 'throw',
  metadata: { type: 'throw', name: 'Throw', paramsSchema: { type: 'object' } },
  async execute() {
    throw new Error('Handler exploded');
  },
};

/**
 * Throws FatalActionError, which fails the instance without retries.
 */
export const throwFatalAction: ActionHandler = {
  type: 'throw_fatal',
  metadata: { type: 'throw_fatal', name: 'Throw Fatal', paramsSchema: { type: 'object' } },
  async execute() {
    throw new FatalActionError('Bad request', 'BAD_REQUEST');
  },
};

export const testActions: ActionHandler[] = [echoAction, failAction, throwAction, throwFatalAction];
