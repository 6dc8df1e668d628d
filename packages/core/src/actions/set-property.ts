import type { ActionHandler, ActionParams } from '../interfaces/action-handler';
import { Result } from '../types/result';
import { PropertyValidationError } from '../types/errors';
import { paramsReader } from '../impl/action-registry';

interface SetPropertyParams {
  key: string;
  value: unknown;
}

const readParams = paramsReader<SetPropertyParams>({
  type: 'object',
  required: ['key', 'value'],
  properties: {
    key: { type: 'string', minLength: 1 },
    value: {},
  },
  additionalProperties: false,
});

/**
 * Write one contact property through the PropertyStore.
 * A write the schema rejects fails the instance.
 */
export const setPropertyAction: ActionHandler = {
  type: 'set_property',

  metadata: {
    type: 'set_property',
    name: 'Set Property',
    description: 'Set a contact property',
    category: 'contact',
    retryable: true,
    paramsSchema: {
      type: 'object',
      required: ['key', 'value'],
      properties: {
        key: { type: 'string', minLength: 1 },
        value: { description: 'New value; must satisfy the property schema' },
      },
      additionalProperties: false,
    },
    outputSchema: {
      type: 'object',
      properties: {
        changed: { type: 'boolean' },
        changeId: { type: 'string' },
      },
    },
  },

  async execute({ params, ctx }: ActionParams) {
    const { key, value } = readParams(params);
    try {
      const change = await ctx.setProperty(key, value);
      return Result.success({ changed: change !== null, changeId: change?.id });
    } catch (err) {
      if (err instanceof PropertyValidationError) {
        return Result.fatal(err.code, err.message, { key, reason: err.reason });
      }
      throw err;
    }
  },
};
