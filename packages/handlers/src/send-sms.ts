import { Result, paramsReader, type ActionHandler, type ActionParams } from '@tidewater/core';
import { idempotencyKeyFor, type SmsProvider } from './providers';

interface SendSmsParams {
  to?: string;
  from?: string;
  body: string;
}

export interface SendSmsOptions {
  from?: string;
  /** Recipient property when the step gives no `to` (default: 'phone') */
  phoneProperty?: string;
}

/** E.164 */
const PHONE_PATTERN = '^\\+[1-9][0-9]{6,14}$';

const paramsSchema = {
  type: 'object',
  required: ['body'],
  properties: {
    to: { type: 'string', pattern: PHONE_PATTERN },
    from: { type: 'string', minLength: 1 },
    body: { type: 'string', minLength: 1, maxLength: 1600 },
  },
  additionalProperties: false,
};

const readParams = paramsReader<SendSmsParams>(paramsSchema);
const phone = new RegExp(PHONE_PATTERN);

/**
 * Send a text message through an SmsProvider. The recipient defaults to
 * the contact's `phone` property, which must be in E.164 form.
 */
export function createSendSmsAction(provider: SmsProvider, options: SendSmsOptions = {}): ActionHandler {
  const phoneProperty = options.phoneProperty ?? 'phone';

  return {
    type: 'send_sms',

    metadata: {
      type: 'send_sms',
      name: 'Send SMS',
      description: 'Send a text message to the contact',
      category: 'messaging',
      retryable: true,
      paramsSchema,
      outputSchema: {
        type: 'object',
        properties: { messageId: { type: 'string' }, to: { type: 'string' } },
      },
    },

    async execute({ params, contact, instance }: ActionParams) {
      const { to: explicit, from, body } = readParams(params);

      const fallback = contact.properties[phoneProperty];
      const to = explicit ?? (typeof fallback === 'string' ? fallback : undefined);
      if (!to) {
        return Result.fatal('NO_RECIPIENT', `Contact ${contact.contactId} has no ${phoneProperty}`);
      }
      if (!phone.test(to)) {
        return Result.fatal('INVALID_RECIPIENT', `"${to}" is not an E.164 phone number`);
      }

      const receipt = await provider.send({
        to,
        from: from ?? options.from,
        body,
        idempotencyKey: idempotencyKeyFor(instance),
      });
      return Result.success({ messageId: receipt.messageId, to });
    },
  };
}
