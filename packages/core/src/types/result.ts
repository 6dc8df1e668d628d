/**
 * Result returned by an ActionHandler.
 * This is the ONLY way handlers communicate with the engine.
 */
export type ActionResult =
  | {
      readonly outcome: 'success';
      /** Stored at vars[outputKey] when the step declares one */
      readonly output?: unknown;
    }
  | {
      readonly outcome: 'failure';
      readonly error: ActionError;
    };

export interface ActionError {
  readonly code: string;
  readonly message: string;
  /** Retry with backoff (true) or fail the instance (false) */
  readonly retryable: boolean;
  readonly details?: unknown;
}

/**
 * Helper functions for creating results.
 */
export const Result = {
  success(output?: unknown): ActionResult {
    return { outcome: 'success', output };
  },

  retryable(code: string, message: string, details?: unknown): ActionResult {
    return { outcome: 'failure', error: { code, message, retryable: true, details } };
  },

  fatal(code: string, message: string, details?: unknown): ActionResult {
    return { outcome: 'failure', error: { code, message, retryable: false, details } };
  },
} as const;
