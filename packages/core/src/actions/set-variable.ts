import type { ActionHandler, ActionParams } from '../interfaces/action-handler';
import { Result } from '../types/result';
import { paramsReader } from '../impl/action-registry';

const readParams = paramsReader<{ path: string; value: unknown }>({
  type: 'object',
  required: ['path', 'value'],
  properties: {
    path: { type: 'string', minLength: 1 },
    value: {},
  },
  additionalProperties: false,
});

export const setVariableAction: ActionHandler = {
  type: 'set_variable',

  metadata: {
    type: 'set_variable',
    name: 'Set Variable',
    description: 'Store a value in the instance variables (dot notation ok)',
    category: 'utility',
    retryable: false,
    paramsSchema: {
      type: 'object',
      required: ['path', 'value'],
      properties: {
        path: { type: 'string', minLength: 1 },
        value: {},
      },
      additionalProperties: false,
    },
  },

  async execute({ params, ctx }: ActionParams) {
    const { path, value } = readParams(params);
    ctx.setVariable(path, value);
    return Result.success(value);
  },
};
