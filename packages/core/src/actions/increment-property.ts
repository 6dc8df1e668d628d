import type { ActionHandler, ActionParams } from '../interfaces/action-handler';
import { Result } from '../types/result';
import { PropertyValidationError } from '../types/errors';
import { paramsReader } from '../impl/action-registry';

interface IncrementPropertyParams {
  key: string;
  by?: number;
}

const readParams = paramsReader<IncrementPropertyParams>({
  type: 'object',
  required: ['key'],
  properties: {
    key: { type: 'string', minLength: 1 },
    by: { type: 'number' },
  },
  additionalProperties: false,
});

/**
 * Add to a numeric property. A missing or null value counts as 0.
 */
export const incrementPropertyAction: ActionHandler = {
  type: 'increment_property',

  metadata: {
    type: 'increment_property',
    name: 'Increment Property',
    description: 'Add to a numeric contact property',
    category: 'contact',
    retryable: true,
    paramsSchema: {
      type: 'object',
      required: ['key'],
      properties: {
        key: { type: 'string', minLength: 1 },
        by: { type: 'number', default: 1 },
      },
      additionalProperties: false,
    },
    outputSchema: { type: 'number' },
  },

  async execute({ params, ctx }: ActionParams) {
    const { key, by = 1 } = readParams(params);
    const current = await ctx.getProperty(key);
    const base = current === undefined || current === null ? 0 : current;
    if (typeof base !== 'number') {
      return Result.fatal('NOT_A_NUMBER', `Property "${key}" holds ${typeof base}, not a number`);
    }
    const next = base + by;
    try {
      await ctx.setProperty(key, next);
    } catch (err) {
      if (err instanceof PropertyValidationError) {
        return Result.fatal(err.code, err.message, { key, reason: err.reason });
      }
      throw err;
    }
    return Result.success(next);
  },
};
